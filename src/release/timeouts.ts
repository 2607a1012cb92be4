const SECOND = 1000;
const MINUTE = 60 * SECOND;

export const GH_TIMEOUT_MS = 60 * SECOND;
export const GH_CLONE_TIMEOUT_MS = 15 * MINUTE;
export const GH_WATCH_TIMEOUT_MS = 4 * 60 * MINUTE;

export const GIT_TIMEOUT_MS = 30 * SECOND;
// pull and push
export const GIT_NETWORK_TIMEOUT_MS = 3 * MINUTE;

export const GH_READ_RETRY_ATTEMPTS = 3;
export const GH_READ_RETRY_DELAY_MS = SECOND;

export const PR_POLL_INTERVAL_MS = 5 * SECOND;
export const PR_MERGEABLE_MAX_WAIT_MS = 15 * MINUTE;
export const PR_MERGED_MAX_WAIT_MS = 10 * MINUTE;

export const RUN_LOOKUP_ATTEMPTS = 6;
export const RUN_LOOKUP_DELAY_MS = SECOND;
