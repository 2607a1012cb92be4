import fs from "fs";
import path from "path";
import { Result, err, ok, releaseError } from "../errors";
import { isGitCheckout } from "../git/repository";
import { describeCommand, failureText } from "../platform/process-exec";
import type { ReleaseContext } from "./context";
import { GH_CLONE_TIMEOUT_MS, GIT_NETWORK_TIMEOUT_MS, GIT_TIMEOUT_MS } from "./timeouts";

/** A local clone the release writes into: the tracking repo or the app repo. */
export type CheckoutTarget = {
  root: string;
  slug: string;
  defaultBranch: string;
  label: string;
};

export const DRY_RUN_SHA = "0".repeat(40);

async function git(
  ctx: ReleaseContext,
  target: CheckoutTarget,
  args: string[],
  message: string,
  network = false
): Promise<Result<string>> {
  const result = await ctx.runner.run(["git", ...args], {
    cwd: target.root,
    timeoutMs: network ? GIT_NETWORK_TIMEOUT_MS : GIT_TIMEOUT_MS
  });
  if (!result.ok) {
    return err(releaseError("dist_repo_failed", message, failureText(result.error)));
  }
  return ok(result.value);
}

export async function ensureClone(ctx: ReleaseContext, target: CheckoutTarget): Promise<Result<void>> {
  if (isGitCheckout(target.root)) {
    return ok(undefined);
  }
  const command = ["gh", "repo", "clone", target.slug, target.root];
  ctx.logger.detail(describeCommand(command));
  if (ctx.dryRun) {
    return ok(undefined);
  }
  fs.mkdirSync(path.dirname(target.root), { recursive: true });
  const result = await ctx.runner.run(command, { cwd: ctx.workspaceRoot, timeoutMs: GH_CLONE_TIMEOUT_MS });
  if (!result.ok) {
    return err(releaseError("dist_repo_failed", `failed to clone ${target.label} repo`, result.error.stderr));
  }
  return ok(undefined);
}

export async function ensureClean(ctx: ReleaseContext, target: CheckoutTarget): Promise<Result<void>> {
  const status = await git(ctx, target, ["status", "--porcelain"], "failed to check git status");
  if (!status.ok) {
    return status;
  }
  if (status.value.trim()) {
    const relative = path.relative(ctx.workspaceRoot, target.root) || target.root;
    return err(
      releaseError(
        "dist_repo_dirty",
        `${target.label} repo is dirty: ${target.root}`,
        `Commit/stash changes in ${relative}/ then retry.`
      )
    );
  }
  return ok(undefined);
}

export async function checkoutDefaultAndPull(ctx: ReleaseContext, target: CheckoutTarget): Promise<Result<void>> {
  const steps: Array<{ args: string[]; network: boolean }> = [
    { args: ["checkout", target.defaultBranch], network: false },
    { args: ["pull", "--ff-only", "origin", target.defaultBranch], network: true }
  ];
  for (const step of steps) {
    ctx.logger.detail(describeCommand(["git", ...step.args]));
    if (ctx.dryRun) {
      continue;
    }
    const result = await git(ctx, target, step.args, `git failed: git ${step.args.slice(0, 2).join(" ")}`, step.network);
    if (!result.ok) {
      return result;
    }
  }
  return ok(undefined);
}

/** Clone if needed, refuse a dirty tree, then sync the default branch. */
export async function prepareCheckout(ctx: ReleaseContext, target: CheckoutTarget): Promise<Result<void>> {
  const cloned = await ensureClone(ctx, target);
  if (!cloned.ok) {
    return cloned;
  }
  if (!ctx.dryRun) {
    const clean = await ensureClean(ctx, target);
    if (!clean.ok) {
      return clean;
    }
  }
  return checkoutDefaultAndPull(ctx, target);
}

export async function createBranch(
  ctx: ReleaseContext,
  target: CheckoutTarget,
  branch: string,
  baseSha: string | null = null
): Promise<Result<void>> {
  const args = baseSha ? ["checkout", "-b", branch, baseSha] : ["checkout", "-b", branch];
  ctx.logger.detail(describeCommand(["git", ...args]));
  if (ctx.dryRun) {
    return ok(undefined);
  }
  const result = await git(ctx, target, args, `failed to create branch: ${branch}`);
  return result.ok ? ok(undefined) : result;
}

/** Stages `paths` (relative to the clone), commits, pushes and returns the new head sha. */
export async function commitAndPush(
  ctx: ReleaseContext,
  target: CheckoutTarget,
  branch: string,
  paths: string[],
  message: string
): Promise<Result<string>> {
  const addArgs = ["add", "-A", "--", ...paths];
  const commitArgs = ["commit", "-m", message];
  const pushArgs = ["push", "-u", "origin", branch];
  for (const args of [addArgs, commitArgs, pushArgs]) {
    ctx.logger.detail(describeCommand(["git", ...args]));
  }
  if (ctx.dryRun) {
    return ok(DRY_RUN_SHA);
  }

  const add = await git(ctx, target, addArgs, "git add failed");
  if (!add.ok) {
    return add;
  }
  const commit = await ctx.runner.run(["git", ...commitArgs], { cwd: target.root, timeoutMs: GIT_TIMEOUT_MS });
  if (!commit.ok) {
    const hint = commit.error.stderr.trim() || "Configure git user.name/user.email, then retry.";
    return err(releaseError("dist_repo_failed", "git commit failed", hint));
  }
  const push = await git(ctx, target, pushArgs, "git push failed", true);
  if (!push.ok) {
    return push;
  }
  const head = await git(ctx, target, ["rev-parse", "HEAD"], `failed to read ${target.label} branch head sha`);
  if (!head.ok) {
    return head;
  }
  const sha = head.value.trim();
  if (sha.length !== 40) {
    return err(releaseError("dist_repo_failed", `invalid ${target.label} branch head sha`, sha));
  }
  return ok(sha);
}
