import { repoLocalPath } from "../config/release";
import { GitStatus, isClean, isGitCheckout, readGitStatus, readHeadSha } from "../git/repository";
import { fetchGreenHeadShas } from "./ci";
import type { ReleaseContext } from "./context";
import { getRefHeadSha } from "./gh";
import type { ReleaseRepo } from "./model";

export type RepoReadiness = {
  repo: ReleaseRepo;
  ref: string;
  localPath: string;
  localExists: boolean;
  status: GitStatus | null;
  localHeadSha: string | null;
  remoteHeadSha: string | null;
  /** null when the repo has no CI gate or the query did not run. */
  headGreen: boolean | null;
  error: string | null;
};

export type ReadinessContext = Pick<ReleaseContext, "workspaceRoot" | "runner" | "clock" | "config">;

/**
 * Collects local status, remote head and CI state for one repo. Sub-query
 * failures land in `error`; the check itself never fails.
 */
export async function checkReadiness(ctx: ReadinessContext, repo: ReleaseRepo, ref: string): Promise<RepoReadiness> {
  const localPath = repoLocalPath(ctx.workspaceRoot, repo);
  const readiness: RepoReadiness = {
    repo,
    ref,
    localPath,
    localExists: isGitCheckout(localPath),
    status: null,
    localHeadSha: null,
    remoteHeadSha: null,
    headGreen: null,
    error: null
  };

  if (readiness.localExists) {
    const status = await readGitStatus(ctx.runner, localPath);
    if (!status.ok) {
      return { ...readiness, error: `git status failed: ${status.error}` };
    }
    readiness.status = status.value;
    readiness.localHeadSha = await readHeadSha(ctx.runner, localPath);
  }

  const remote = await getRefHeadSha(ctx, repo.slug, ref);
  if (!remote.ok) {
    return { ...readiness, error: remote.error.message };
  }
  readiness.remoteHeadSha = remote.value;

  if (repo.requiredCiWorkflow) {
    const green = await fetchGreenHeadShas(ctx, repo.slug, repo.requiredCiWorkflow, ref, ctx.config.greenRunsLimit);
    if (!green.ok) {
      return { ...readiness, error: green.error.message };
    }
    readiness.headGreen = green.value.has(remote.value);
  }
  return readiness;
}

export function isReady(readiness: RepoReadiness): boolean {
  return readinessIssues(readiness).length === 0;
}

/** Human-readable reasons a repo is not ready; empty when it is. */
export function readinessIssues(readiness: RepoReadiness): string[] {
  if (readiness.error !== null) {
    return [readiness.error];
  }
  if (!readiness.localExists) {
    return [`not cloned at ${readiness.localPath}`];
  }
  const status = readiness.status;
  if (!status) {
    return ["git status unavailable"];
  }
  const issues: string[] = [];
  if (!isClean(status)) {
    issues.push(`uncommitted changes (${status.entries.length})`);
  }
  if (status.upstream === null) {
    issues.push("no upstream branch");
  }
  if (status.ahead > 0) {
    issues.push(`ahead of upstream by ${status.ahead}`);
  }
  if (status.behind > 0) {
    issues.push(`behind upstream by ${status.behind}`);
  }
  if (readiness.localHeadSha === null || readiness.remoteHeadSha === null) {
    issues.push("head sha unavailable");
  } else if (readiness.localHeadSha !== readiness.remoteHeadSha) {
    issues.push(`local head differs from ${readiness.ref}`);
  }
  if (readiness.repo.requiredCiWorkflow && readiness.headGreen !== true) {
    issues.push(`CI not green at ${readiness.ref} head`);
  }
  return issues;
}

export function readinessHint(readiness: RepoReadiness): string | null {
  const status = readiness.status;
  if (!readiness.localExists || readiness.error !== null || !status) {
    return null;
  }
  if (!isClean(status) || status.ahead > 0) {
    return "Commit and push to the remote, then wait for CI.";
  }
  if (status.behind > 0) {
    return "Pull the latest changes before an auto release.";
  }
  if (readiness.repo.requiredCiWorkflow && readiness.headGreen !== true) {
    return "Wait for CI to pass at the branch head.";
  }
  return null;
}
