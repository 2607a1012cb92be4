import fs from "fs";
import path from "path";
import { Result, err, ok, releaseError } from "../errors";
import { isGitCheckout } from "../git/repository";
import { failureText } from "../platform/process-exec";
import type { ReleaseContext } from "./context";
import { GIT_TIMEOUT_MS } from "./timeouts";

/**
 * Content releases rebuild against the dependent workspace; any uncommitted
 * change there would not be part of what ships.
 */
export async function ensureDependentWorkspaceClean(
  ctx: Pick<ReleaseContext, "workspaceRoot" | "config" | "runner">
): Promise<Result<void>> {
  const workspace = ctx.config.dependentWorkspace;
  if (!workspace) {
    return ok(undefined);
  }
  const dirty: string[] = [];
  for (const name of workspace.repos) {
    const root = path.join(ctx.workspaceRoot, workspace.root, name);
    if (!fs.existsSync(root) || !isGitCheckout(root)) {
      continue;
    }
    const status = await ctx.runner.run(["git", "status", "--porcelain"], { cwd: root, timeoutMs: GIT_TIMEOUT_MS });
    if (!status.ok) {
      return err(releaseError("dist_repo_failed", `failed to check git status in ${name}`, failureText(status.error)));
    }
    if (status.value.trim()) {
      dirty.push(name);
    }
  }
  if (dirty.length > 0) {
    return err(
      releaseError(
        "dist_repo_dirty",
        `${workspace.label} has uncommitted changes`,
        `Dirty: ${dirty.join(", ")}. Commit or stash them, then retry.`
      )
    );
  }
  return ok(undefined);
}
