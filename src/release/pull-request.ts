import { Result, err, ok, releaseError } from "../errors";
import { PollOutcome, PollPolicy, pollUntil } from "../platform/clock";
import { describeCommand } from "../platform/process-exec";
import { asRecord, getString, parseJson } from "../utils/structured";
import type { ReleaseContext } from "./context";
import { GH_TIMEOUT_MS, PR_MERGEABLE_MAX_WAIT_MS, PR_MERGED_MAX_WAIT_MS, PR_POLL_INTERVAL_MS } from "./timeouts";

export const DRY_RUN_PR_URL = "(dry-run)";

export type PullRequestTarget = {
  slug: string;
  label: string;
};

export type CreatePullRequest = PullRequestTarget & {
  baseBranch: string;
  branch: string;
  title: string;
  body: string;
};

export type MergeOptions = {
  deleteBranch: boolean;
  allowAutoMergeFallback: boolean;
  mergeable?: PollPolicy;
  merged?: PollPolicy;
};

export const DEFAULT_MERGEABLE_POLICY: PollPolicy = { intervalMs: PR_POLL_INTERVAL_MS, maxWaitMs: PR_MERGEABLE_MAX_WAIT_MS };
export const DEFAULT_MERGED_POLICY: PollPolicy = { intervalMs: PR_POLL_INTERVAL_MS, maxWaitMs: PR_MERGED_MAX_WAIT_MS };

export function isAutoMergeDisabled(stderr: string): boolean {
  return stderr.includes("Auto merge is not allowed for this repository") || stderr.includes("enablePullRequestAutoMerge");
}

async function viewPullRequest(
  ctx: ReleaseContext,
  target: PullRequestTarget,
  url: string,
  fields: string,
  failure: string
): Promise<Result<{ state: string | null; detail: string | null }>> {
  const result = await ctx.runner.run(["gh", "pr", "view", url, "--repo", target.slug, "--json", fields], {
    cwd: ctx.workspaceRoot,
    timeoutMs: GH_TIMEOUT_MS
  });
  if (!result.ok) {
    return err(releaseError("dist_repo_failed", failure, result.error.stderr.trim() || url));
  }
  const parsed = parseJson(result.value);
  if (!parsed.ok) {
    return err(releaseError("dist_repo_failed", `invalid JSON from gh pr view: ${parsed.error}`, url));
  }
  const data = asRecord(parsed.value);
  if (!data) {
    return err(releaseError("dist_repo_failed", "unexpected gh pr view payload", url));
  }
  const detailField = fields.split(",")[1] ?? "";
  return ok({ state: getString(data, "state"), detail: getString(data, detailField) });
}

function closedWithoutMerge(target: PullRequestTarget, url: string, state: string): Result<PollOutcome<true>> {
  return err(releaseError("dist_repo_failed", `${target.label} PR is ${state.toLowerCase()} without merge`, url));
}

export async function waitUntilMergeable(
  ctx: ReleaseContext,
  target: PullRequestTarget,
  url: string,
  policy: PollPolicy = DEFAULT_MERGEABLE_POLICY
): Promise<Result<void>> {
  const outcome = await pollUntil(ctx.clock, policy, async (): Promise<Result<PollOutcome<true>>> => {
    const view = await viewPullRequest(ctx, target, url, "state,mergeStateStatus", `failed to query ${target.label} PR merge status`);
    if (!view.ok) {
      return view;
    }
    const { state, detail } = view.value;
    if (state !== null && state !== "OPEN") {
      return closedWithoutMerge(target, url, state);
    }
    return ok(detail === "CLEAN" ? { done: true, value: true } : { done: false });
  });
  if (!outcome.ok) {
    return outcome;
  }
  if (outcome.value === null) {
    return err(releaseError("dist_repo_failed", `timed out waiting for ${target.label} PR to become mergeable`, url));
  }
  return ok(undefined);
}

export async function waitUntilMerged(
  ctx: ReleaseContext,
  target: PullRequestTarget,
  url: string,
  policy: PollPolicy = DEFAULT_MERGED_POLICY
): Promise<Result<void>> {
  const outcome = await pollUntil(ctx.clock, policy, async (): Promise<Result<PollOutcome<true>>> => {
    const view = await viewPullRequest(ctx, target, url, "state,mergedAt", `failed to query ${target.label} PR state`);
    if (!view.ok) {
      return view;
    }
    const { state, detail } = view.value;
    if (state === "MERGED" || (detail !== null && detail.trim() !== "")) {
      return ok({ done: true, value: true });
    }
    if (state !== null && state !== "OPEN") {
      return closedWithoutMerge(target, url, state);
    }
    return ok({ done: false });
  });
  if (!outcome.ok) {
    return outcome;
  }
  if (outcome.value === null) {
    return err(releaseError("dist_repo_failed", `timed out waiting for ${target.label} PR merge`, url));
  }
  return ok(undefined);
}

export async function createPullRequest(ctx: ReleaseContext, request: CreatePullRequest): Promise<Result<string>> {
  const command = [
    "gh",
    "pr",
    "create",
    "--repo",
    request.slug,
    "--base",
    request.baseBranch,
    "--head",
    request.branch,
    "--title",
    request.title,
    "--body",
    request.body
  ];
  ctx.logger.detail(`${describeCommand(command.slice(0, 3))} --repo ${request.slug} --head ${request.branch}`);
  if (ctx.dryRun) {
    return ok(DRY_RUN_PR_URL);
  }
  const result = await ctx.runner.run(command, { cwd: ctx.workspaceRoot, timeoutMs: GH_TIMEOUT_MS });
  if (!result.ok) {
    return err(releaseError("dist_repo_failed", `failed to create PR in ${request.label} repo`, result.error.stderr));
  }
  const url = result.value.trim();
  if (!url.startsWith("https://")) {
    return err(releaseError("dist_repo_failed", "unexpected gh pr create output", url));
  }
  return ok(url);
}

/**
 * Requests auto-merge; when the repository forbids it, waits for the PR to be
 * mergeable and merges directly. Either way, returns once the PR reports merged.
 */
export async function mergePullRequest(
  ctx: ReleaseContext,
  target: PullRequestTarget,
  url: string,
  options: MergeOptions
): Promise<Result<void>> {
  const deleteFlag = options.deleteBranch ? ["--delete-branch"] : [];
  const command = ["gh", "pr", "merge", url, "--repo", target.slug, "--rebase", "--auto", ...deleteFlag];
  ctx.logger.detail(describeCommand(command));
  if (ctx.dryRun) {
    return ok(undefined);
  }

  const merged = await ctx.runner.run(command, { cwd: ctx.workspaceRoot, timeoutMs: GH_TIMEOUT_MS });
  if (!merged.ok) {
    const stderr = merged.error.stderr;
    if (!options.allowAutoMergeFallback || !isAutoMergeDisabled(stderr)) {
      return err(releaseError("dist_repo_failed", `failed to merge ${target.label} PR`, stderr.trim() || url));
    }
    ctx.logger.detail("auto-merge disabled for repo; falling back to direct merge after checks");
    const mergeable = await waitUntilMergeable(ctx, target, url, options.mergeable);
    if (!mergeable.ok) {
      return mergeable;
    }
    const direct = ["gh", "pr", "merge", url, "--repo", target.slug, "--rebase", ...deleteFlag];
    const directResult = await ctx.runner.run(direct, { cwd: ctx.workspaceRoot, timeoutMs: GH_TIMEOUT_MS });
    if (!directResult.ok) {
      return err(releaseError("dist_repo_failed", `failed to merge ${target.label} PR`, directResult.error.stderr.trim() || url));
    }
  }
  return waitUntilMerged(ctx, target, url, options.merged);
}

/** Re-labels a merge failure with the PR URL so the operator can finish by hand. */
export function withPullRequestHint<T>(result: Result<T>, url: string): Result<T> {
  if (result.ok) {
    return result;
  }
  return err({ ...result.error, hint: `PR: ${url}\n${result.error.hint ?? ""}`.trim() });
}
