import { ReleaseErrorKind, Result, err, ok, releaseError } from "../errors";
import type { ProcessFailure } from "../platform/process-exec";
import { asArray, asRecord, getBoolean, getInteger, getRecord, getString, parseJson } from "../utils/structured";
import type { ReleaseContext } from "./context";
import type { DistributionRelease, RepoCommit } from "./model";
import { GH_READ_RETRY_ATTEMPTS, GH_READ_RETRY_DELAY_MS, GH_TIMEOUT_MS } from "./timeouts";

export type GhContext = Pick<ReleaseContext, "workspaceRoot" | "runner" | "clock">;

export type GhCompare = {
  status: string;
  aheadBy: number;
  behindBy: number;
};

type ReadFailure = {
  kind: ReleaseErrorKind;
  message: string;
  hint?: string;
};

const TRANSIENT_MARKERS = [
  "timed out",
  "timeout",
  "connection reset",
  "connection refused",
  "temporarily unavailable",
  "service unavailable",
  "bad gateway",
  "gateway timeout",
  "tls handshake timeout",
  "network is unreachable",
  "remote end hung up unexpectedly",
  "http 429",
  "http 500",
  "http 502",
  "http 503",
  "http 504"
];

const WRITE_PERMISSIONS = new Set(["ADMIN", "MAINTAIN", "WRITE"]);

export function isTransientFailure(failure: ProcessFailure): boolean {
  if (failure.timedOut) {
    return true;
  }
  const text = `${failure.stderr}\n${failure.stdout}`.toLowerCase();
  return TRANSIENT_MARKERS.some((marker) => text.includes(marker));
}

/**
 * Runs an idempotent gh read. Transient failures are retried with a linearly
 * growing delay; anything else fails on the first attempt.
 */
export async function runGhRead(
  ctx: GhContext,
  command: string[],
  failure: ReadFailure,
  attempts = GH_READ_RETRY_ATTEMPTS
): Promise<Result<string>> {
  const total = Math.max(1, attempts);
  for (let attempt = 0; attempt < total; attempt += 1) {
    const result = await ctx.runner.run(command, { cwd: ctx.workspaceRoot, timeoutMs: GH_TIMEOUT_MS });
    if (result.ok) {
      return result;
    }
    if (attempt < total - 1 && isTransientFailure(result.error)) {
      await ctx.clock.sleep(GH_READ_RETRY_DELAY_MS * (attempt + 1));
      continue;
    }
    return err(releaseError(failure.kind, failure.message, result.error.stderr.trim() || failure.hint));
  }
  return err(releaseError(failure.kind, failure.message, failure.hint));
}

export async function ghApiJson(ctx: GhContext, endpoint: string): Promise<Result<unknown>> {
  const result = await runGhRead(ctx, ["gh", "api", endpoint], {
    kind: "invalid_input",
    message: `gh api failed: ${endpoint}`,
    hint: endpoint
  });
  if (!result.ok) {
    return result;
  }
  const parsed = parseJson(result.value);
  if (!parsed.ok) {
    return err(releaseError("invalid_input", `gh api returned invalid JSON: ${parsed.error}`, endpoint));
  }
  return ok(parsed.value);
}

export async function ensureGhAvailable(ctx: GhContext): Promise<Result<void>> {
  const result = await ctx.runner.run(["gh", "--version"], { cwd: ctx.workspaceRoot, timeoutMs: GH_TIMEOUT_MS });
  if (!result.ok) {
    return err(releaseError("gh_missing", "gh: missing", "Install GitHub CLI: https://cli.github.com/"));
  }
  return ok(undefined);
}

export async function ensureGhAuth(ctx: GhContext): Promise<Result<void>> {
  const result = await ctx.runner.run(["gh", "auth", "status"], { cwd: ctx.workspaceRoot, timeoutMs: GH_TIMEOUT_MS });
  if (!result.ok) {
    return err(releaseError("gh_auth_required", "gh auth required", "Run: gh auth login"));
  }
  return ok(undefined);
}

export async function viewerPermission(ctx: GhContext, slug: string): Promise<Result<string>> {
  const result = await runGhRead(ctx, ["gh", "repo", "view", slug, "--json", "viewerPermission"], {
    kind: "invalid_input",
    message: `failed to query repo permission: ${slug}`,
    hint: slug
  });
  if (!result.ok) {
    return result;
  }
  const parsed = parseJson(result.value);
  if (!parsed.ok) {
    return err(releaseError("invalid_input", `invalid JSON from gh repo view: ${parsed.error}`));
  }
  const data = asRecord(parsed.value);
  const permission = data ? getString(data, "viewerPermission") : null;
  if (permission === null) {
    return err(releaseError("invalid_input", "missing viewerPermission"));
  }
  return ok(permission);
}

/** gh present, authenticated, and allowed to push to `slug`. */
export async function ensureWriteAccess(ctx: GhContext, slug: string, label: string): Promise<Result<void>> {
  const available = await ensureGhAvailable(ctx);
  if (!available.ok) {
    return available;
  }
  const auth = await ensureGhAuth(ctx);
  if (!auth.ok) {
    return auth;
  }
  const permission = await viewerPermission(ctx, slug);
  if (!permission.ok) {
    return permission;
  }
  if (!WRITE_PERMISSIONS.has(permission.value)) {
    return err(
      releaseError(
        "permission_denied",
        `insufficient permission for ${label} repo (${permission.value})`,
        `You need WRITE/MAINTAIN/ADMIN on ${slug}.`
      )
    );
  }
  return ok(undefined);
}

export async function currentUser(ctx: GhContext): Promise<Result<string>> {
  const result = await ghApiJson(ctx, "user");
  if (!result.ok) {
    return result;
  }
  const data = asRecord(result.value);
  if (!data) {
    return err(releaseError("invalid_input", "unexpected payload: user"));
  }
  const login = getString(data, "login");
  if (login === null) {
    return err(releaseError("invalid_input", "missing user.login"));
  }
  return ok(login);
}

export async function getRefHeadSha(ctx: GhContext, slug: string, ref: string): Promise<Result<string>> {
  const result = await ghApiJson(ctx, `repos/${slug}/commits/${ref}`);
  if (!result.ok) {
    return result;
  }
  const data = asRecord(result.value);
  if (!data) {
    return err(releaseError("invalid_input", `unexpected commit payload: ${slug}@${ref}`));
  }
  const sha = getString(data, "sha");
  if (sha === null || sha.length !== 40) {
    return err(releaseError("invalid_input", `invalid sha in commit payload: ${slug}@${ref}`));
  }
  return ok(sha);
}

export async function listRecentCommits(
  ctx: GhContext,
  slug: string,
  ref: string,
  limit: number
): Promise<Result<RepoCommit[]>> {
  const result = await ghApiJson(ctx, `repos/${slug}/commits?sha=${ref}&per_page=${limit}`);
  if (!result.ok) {
    return result;
  }
  const items = asArray(result.value);
  if (!items) {
    return err(releaseError("invalid_input", `unexpected commits payload: ${slug}`));
  }
  const commits: RepoCommit[] = [];
  for (const item of items) {
    const data = asRecord(item);
    const sha = data ? getString(data, "sha") : null;
    const commit = data ? getRecord(data, "commit") : null;
    const message = commit ? getString(commit, "message") : null;
    if (sha === null || !commit || message === null) {
      continue;
    }
    const committer = getRecord(commit, "committer");
    commits.push({
      sha,
      message: (message.split(/\r?\n/)[0] ?? "").trim(),
      date: committer ? getString(committer, "date") : null
    });
  }
  return ok(commits);
}

export async function listReleases(ctx: GhContext, slug: string, limit = 100): Promise<Result<DistributionRelease[]>> {
  const result = await ghApiJson(ctx, `repos/${slug}/releases?per_page=${limit}`);
  if (!result.ok) {
    return result;
  }
  const items = asArray(result.value);
  if (!items) {
    return err(releaseError("invalid_input", `unexpected releases payload: ${slug}`));
  }
  const releases: DistributionRelease[] = [];
  for (const item of items) {
    const data = asRecord(item);
    if (!data) {
      continue;
    }
    const tag = getString(data, "tag_name");
    const prerelease = getBoolean(data, "prerelease");
    if (tag === null || prerelease === null) {
      continue;
    }
    releases.push({ tag, prerelease });
  }
  return ok(releases);
}

/** Reads a file at `ref` through the contents API; no local checkout needed. */
export async function getRepoFileText(ctx: GhContext, slug: string, filePath: string, ref: string): Promise<Result<string>> {
  const endpoint = `repos/${slug}/contents/${filePath}?ref=${ref}`;
  const result = await ghApiJson(ctx, endpoint);
  if (!result.ok) {
    return result;
  }
  const data = asRecord(result.value);
  if (!data) {
    return err(releaseError("invalid_input", `unexpected contents payload: ${slug}/${filePath}`, endpoint));
  }
  const encoding = getString(data, "encoding");
  const content = getString(data, "content");
  if (encoding !== "base64" || content === null) {
    return err(releaseError("invalid_input", `unexpected contents encoding for ${slug}/${filePath}`, endpoint));
  }
  return ok(Buffer.from(content.replace(/\s+/g, ""), "base64").toString("utf-8"));
}

export async function compareCommits(ctx: GhContext, slug: string, base: string, head: string): Promise<Result<GhCompare>> {
  const result = await ghApiJson(ctx, `repos/${slug}/compare/${base}...${head}`);
  if (!result.ok) {
    return result;
  }
  const data = asRecord(result.value);
  if (!data) {
    return err(releaseError("invalid_input", `unexpected compare payload: ${slug}`));
  }
  const status = getString(data, "status");
  if (status === null) {
    return err(releaseError("invalid_input", `missing compare status: ${slug}`));
  }
  const aheadBy = getInteger(data, "ahead_by");
  const behindBy = getInteger(data, "behind_by");
  if (aheadBy === null || behindBy === null) {
    return err(releaseError("invalid_input", `invalid compare ahead/behind: ${slug}`));
  }
  return ok({ status, aheadBy, behindBy });
}
