import fs from "fs";
import path from "path";
import { Result, ok } from "../errors";
import { renderPinnedBody } from "../templates/render";
import { CheckoutTarget, commitAndPush, createBranch, prepareCheckout } from "./checkout";
import type { ReleaseContext } from "./context";
import type { ReleasePlan } from "./model";
import { NotesAttachment, writeReleaseNotes } from "./notes";
import { createPullRequest, mergePullRequest, withPullRequestHint } from "./pull-request";
import { buildReleaseSpec, parsePublishedSpec, specMatchesPlan, writeReleaseSpec } from "./spec-artifact";
import { watchRun, dispatchWorkflow } from "./workflow";

export type DistributionNotes = {
  userNotes: string | null;
  notesFile: NotesAttachment | null;
};

export function distributionTarget(ctx: Pick<ReleaseContext, "workspaceRoot" | "config">): CheckoutTarget {
  const dist = ctx.config.distribution;
  return {
    root: path.join(ctx.workspaceRoot, dist.localDir),
    slug: dist.slug,
    defaultBranch: dist.defaultBranch,
    label: "distribution"
  };
}

/** True when the default branch already carries a spec (and notes) matching the plan. */
export function artifactsMatchPlan(root: string, plan: ReleasePlan): boolean {
  const specFile = path.join(root, plan.specPath);
  if (!fs.existsSync(specFile) || !fs.existsSync(path.join(root, plan.notesPath))) {
    return false;
  }
  let text: string;
  try {
    text = fs.readFileSync(specFile, "utf-8");
  } catch {
    return false;
  }
  const spec = parsePublishedSpec(text);
  return spec.ok && specMatchesPlan(spec.value, plan);
}

/**
 * Writes the spec and notes on `release/<tag>`, opens the PR and waits for it
 * to merge. Re-running after a merge is a no-op.
 */
export async function prepareDistributionPr(
  ctx: ReleaseContext,
  plan: ReleasePlan,
  notes: DistributionNotes
): Promise<Result<string>> {
  const target = distributionTarget(ctx);
  const prepared = await prepareCheckout(ctx, target);
  if (!prepared.ok) {
    return prepared;
  }

  if (artifactsMatchPlan(target.root, plan)) {
    ctx.logger.detail("distribution spec already present on default branch; skipping PR");
    return ok(`(already merged) ${plan.specPath}`);
  }

  const branch = `release/${plan.tag}`;
  const created = await createBranch(ctx, target, branch);
  if (!created.ok) {
    return created;
  }

  if (!ctx.dryRun) {
    const spec = writeReleaseSpec(target.root, plan.specPath, buildReleaseSpec(ctx.config, plan.channel, plan.tag, plan.pinned));
    if (!spec.ok) {
      return spec;
    }
    const written = writeReleaseNotes(target.root, plan.notesPath, {
      channel: plan.channel,
      tag: plan.tag,
      pinned: plan.pinned,
      userNotes: notes.userNotes,
      fileNotes: notes.notesFile?.markdown ?? null
    });
    if (!written.ok) {
      return written;
    }
  }

  const commit = await commitAndPush(ctx, target, branch, [plan.specPath, plan.notesPath], `release: add ${plan.tag} spec`);
  if (!commit.ok) {
    return commit;
  }

  const pr = await createPullRequest(ctx, {
    slug: target.slug,
    label: target.label,
    baseBranch: target.defaultBranch,
    branch,
    title: plan.title,
    body: renderPinnedBody([`channel=${plan.channel}`], plan.pinned)
  });
  if (!pr.ok) {
    return pr;
  }

  const merged = await mergePullRequest(ctx, target, pr.value, { deleteBranch: true, allowAutoMergeFallback: true });
  if (!merged.ok) {
    return withPullRequestHint(merged, pr.value);
  }
  return ok(pr.value);
}

/** Dispatches the publish workflow for a merged spec; returns the run URL. */
export async function publishDistributionRelease(ctx: ReleaseContext, plan: ReleasePlan, watch: boolean): Promise<Result<string>> {
  const dist = ctx.config.distribution;
  const run = await dispatchWorkflow(ctx, {
    slug: dist.slug,
    workflow: dist.publishWorkflow,
    ref: dist.defaultBranch,
    inputs: [
      ["channel", plan.channel],
      ["tag", plan.tag],
      ["spec_path", plan.specPath]
    ]
  });
  if (!run.ok) {
    return run;
  }
  if (watch) {
    const watched = await watchRun(ctx, dist.slug, run.value.id);
    if (!watched.ok) {
      return watched;
    }
  }
  return ok(run.value.url);
}
