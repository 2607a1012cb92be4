import fs from "fs";
import path from "path";
import { Result, err, errorMessage, ok, releaseError } from "../errors";
import { isGitCheckout } from "../git/repository";
import { describeCommand, failureText } from "../platform/process-exec";
import { commitAndPush, createBranch, prepareCheckout } from "./checkout";
import type { ReleaseContext } from "./context";
import { distributionTarget } from "./distribution";
import { createPullRequest, mergePullRequest, withPullRequestHint } from "./pull-request";
import { parseBeta, parseStable } from "./semver";
import { notesPathForTag, specPathForTag } from "./spec-artifact";
import { GH_TIMEOUT_MS } from "./timeouts";

export type RemovalResult = {
  /** Spec and notes files, relative to the distribution clone. */
  removed: string[];
  prUrl: string | null;
};

const MISSING_RELEASE_MARKERS = ["could not find", "not found"];

/**
 * Trims and de-duplicates `tags`, keeping their order. Stable tags need
 * `force`; anything that is not a release tag is refused.
 */
export function validateRemoveTags(tags: string[], force: boolean): Result<string[]> {
  const unique = [...new Set(tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0))];
  if (unique.length === 0) {
    return err(releaseError("invalid_input", "no tags provided", "Pass one or more --tag values."));
  }
  const malformed = unique.filter((tag) => parseStable(tag) === null && parseBeta(tag) === null);
  if (malformed.length > 0) {
    return err(releaseError("invalid_tag", `invalid release tag: ${malformed.join(", ")}`, "Expected vMAJOR.MINOR.PATCH[-beta.N]"));
  }
  const stable = unique.filter((tag) => parseStable(tag) !== null);
  if (!force && stable.length > 0) {
    return err(releaseError("invalid_input", "refusing to delete stable tags without --force", `Tags: ${stable.join(", ")}`));
  }
  return ok(unique);
}

function removalBranch(tags: string[]): string {
  const first = tags[0] ?? "unknown";
  return tags.length > 1 ? `cleanup/remove-${first}-and-more` : `cleanup/remove-${first}`;
}

/**
 * Deletes the spec and notes of every tag from the distribution repo through
 * a merged PR. Tags without artifacts on the default branch are skipped.
 */
export async function removeDistributionArtifacts(ctx: ReleaseContext, tags: string[]): Promise<Result<RemovalResult>> {
  const target = distributionTarget(ctx);
  const prepared = await prepareCheckout(ctx, target);
  if (!prepared.ok) {
    return prepared;
  }

  const candidates = tags.flatMap((tag) => [specPathForTag(ctx.config, tag), notesPathForTag(ctx.config, tag)]);
  // A dry run may not have cloned yet; every candidate is reported then.
  const removed =
    ctx.dryRun && !isGitCheckout(target.root)
      ? candidates
      : candidates.filter((relative) => fs.existsSync(path.join(target.root, relative)));
  if (removed.length === 0) {
    ctx.logger.detail("no distribution artifacts to remove");
    return ok({ removed, prUrl: null });
  }
  for (const relative of removed) {
    ctx.logger.detail(`remove ${relative}`);
  }

  const branch = removalBranch(tags);
  const created = await createBranch(ctx, target, branch);
  if (!created.ok) {
    return created;
  }
  if (!ctx.dryRun) {
    for (const relative of removed) {
      try {
        fs.rmSync(path.join(target.root, relative));
      } catch (error) {
        return err(releaseError("dist_repo_failed", `failed to remove ${relative}`, errorMessage(error)));
      }
    }
  }

  const single = tags.length === 1 ? tags[0] : undefined;
  const message = single ? `cleanup: remove ${single}` : "cleanup: remove releases";
  const commit = await commitAndPush(ctx, target, branch, removed, message);
  if (!commit.ok) {
    return commit;
  }

  const pr = await createPullRequest(ctx, {
    slug: target.slug,
    label: target.label,
    baseBranch: target.defaultBranch,
    branch,
    title: message,
    body: ["Remove artifacts for:", ...tags.map((tag) => `- ${tag}`)].join("\n")
  });
  if (!pr.ok) {
    return pr;
  }
  const merged = await mergePullRequest(ctx, target, pr.value, { deleteBranch: true, allowAutoMergeFallback: true });
  if (!merged.ok) {
    return withPullRequestHint(merged, pr.value);
  }
  return ok({ removed, prUrl: pr.value });
}

function isMissingRelease(text: string): boolean {
  const lower = text.toLowerCase();
  return MISSING_RELEASE_MARKERS.some((marker) => lower.includes(marker));
}

/** Deletes the GitHub Release and its git tag for each tag; returns the tags actually deleted. */
export async function deleteDistributionReleases(
  ctx: ReleaseContext,
  tags: string[],
  ignoreMissing: boolean
): Promise<Result<string[]>> {
  const slug = ctx.config.distribution.slug;
  const deleted: string[] = [];
  for (const tag of tags) {
    const command = ["gh", "release", "delete", tag, "--repo", slug, "--cleanup-tag", "--yes"];
    ctx.logger.detail(describeCommand(command));
    if (ctx.dryRun) {
      continue;
    }
    const result = await ctx.runner.run(command, { cwd: ctx.workspaceRoot, timeoutMs: GH_TIMEOUT_MS });
    if (!result.ok) {
      const text = failureText(result.error);
      if (ignoreMissing && isMissingRelease(text)) {
        ctx.logger.detail(`no release for ${tag}; skipped`);
        continue;
      }
      return err(releaseError("release_delete_failed", `failed to delete release: ${tag}`, text));
    }
    deleted.push(tag);
  }
  return ok(deleted);
}
