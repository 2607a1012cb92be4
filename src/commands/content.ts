import { Result, ok } from "../errors";
import { ensureCiGreen } from "../release/ci";
import { prepareDistributionPr, publishDistributionRelease } from "../release/distribution";
import type { ReleasePlan } from "../release/model";
import { writePlanFile } from "../release/plan-file";
import { planRelease } from "../release/planner";
import { deleteDistributionReleases, removeDistributionArtifacts, validateRemoveTags } from "../release/removal";
import { ensureDependentWorkspaceClean } from "../release/workspace-check";
import { preflight } from "../release/wizard/common";
import {
  CommandEnv,
  ReleaseCommandOptions,
  confirmDeletion,
  confirmTag,
  loadNotes,
  parseBump,
  printPlan,
  printReplay,
  readPreflight,
  replayLines,
  resolveReleaseInputs,
  runReleaseCommand
} from "./release-common";

export type RemoveCommandOptions = {
  tag?: string[];
  force?: boolean;
  ignoreMissing?: boolean;
  yes?: boolean;
};

type PreparedContentRelease = {
  plan: ReleasePlan;
  prUrl: string;
};

/** Resolves pins and prints the plan; with `--out` the plan is saved for a later publish. */
export async function contentPlan(env: CommandEnv, options: ReleaseCommandOptions): Promise<Result<void>> {
  const bump = parseBump(options.bump);
  if (!bump.ok) {
    return bump;
  }
  const login = await readPreflight(env);
  if (!login.ok) {
    return login;
  }
  const repos = env.config.contentRepos;
  const inputs = await resolveReleaseInputs(env, "content", repos, options, "smart");
  if (!inputs.ok) {
    return inputs;
  }
  const plan = await planRelease(env, {
    channel: inputs.value.channel,
    bump: bump.value,
    tagOverride: inputs.value.tag,
    pinned: inputs.value.pinned
  });
  if (!plan.ok) {
    return plan;
  }
  printPlan(env.logger, plan.value);
  const out = options.out ?? null;
  if (out !== null) {
    const written = writePlanFile(out, { product: "content", channel: plan.value.channel, tag: plan.value.tag, pinned: plan.value.pinned });
    if (!written.ok) {
      return written;
    }
    env.logger.success(out);
  }
  printReplay(env.logger, replayLines("content", plan.value, repos, out));
  return ok(undefined);
}

async function prepareContentRelease(env: CommandEnv, options: ReleaseCommandOptions): Promise<Result<PreparedContentRelease>> {
  const bump = parseBump(options.bump);
  if (!bump.ok) {
    return bump;
  }
  const notes = loadNotes(options);
  if (!notes.ok) {
    return notes;
  }
  const login = await preflight(env, env.config.distribution.slug, "distribution");
  if (!login.ok) {
    return login;
  }
  env.logger.detail(`gh user: ${login.value}`);

  const repos = env.config.contentRepos;
  const inputs = await resolveReleaseInputs(env, "content", repos, options, "smart");
  if (!inputs.ok) {
    return inputs;
  }
  const clean = await ensureDependentWorkspaceClean(env);
  if (!clean.ok) {
    return clean;
  }
  const plan = await planRelease(env, {
    channel: inputs.value.channel,
    bump: bump.value,
    tagOverride: inputs.value.tag,
    pinned: inputs.value.pinned
  });
  if (!plan.ok) {
    return plan;
  }
  const green = await ensureCiGreen(env, plan.value.pinned, Boolean(options.allowNonGreen));
  if (!green.ok) {
    return green;
  }
  printPlan(env.logger, plan.value);
  printReplay(env.logger, replayLines("content", plan.value, repos, options.plan ?? null));

  if (!env.dryRun) {
    const confirmed = await confirmTag(plan.value.tag, options.confirmTag, env);
    if (!confirmed.ok) {
      return confirmed;
    }
  }
  const pr = await prepareDistributionPr(env, plan.value, { userNotes: options.notes ?? null, notesFile: notes.value });
  if (!pr.ok) {
    return pr;
  }
  return ok({ plan: plan.value, prUrl: pr.value });
}

/** Opens and merges the distribution PR carrying the release spec. */
export async function contentPrepare(env: CommandEnv, options: ReleaseCommandOptions): Promise<Result<void>> {
  const prepared = await prepareContentRelease(env, options);
  if (!prepared.ok) {
    return prepared;
  }
  env.logger.success(`PR: ${prepared.value.prUrl}`);
  return ok(undefined);
}

/** Prepare, then dispatch the publish workflow. Approval of the release environment stays manual. */
export async function contentPublish(env: CommandEnv, options: ReleaseCommandOptions): Promise<Result<void>> {
  const prepared = await prepareContentRelease(env, options);
  if (!prepared.ok) {
    return prepared;
  }
  env.logger.success(`PR merged: ${prepared.value.prUrl}`);
  const run = await publishDistributionRelease(env, prepared.value.plan, env.watch);
  if (!run.ok) {
    return run;
  }
  env.logger.success(`Workflow run: ${run.value}`);
  env.logger.detail("Next: approve the release environment in GitHub Actions to sign + publish.");
  return ok(undefined);
}

/** Removes the spec and notes of each tag through a PR, then deletes the GitHub Releases. */
export async function contentRemove(env: CommandEnv, options: RemoveCommandOptions): Promise<Result<void>> {
  const login = await preflight(env, env.config.distribution.slug, "distribution");
  if (!login.ok) {
    return login;
  }
  const tags = validateRemoveTags(options.tag ?? [], Boolean(options.force));
  if (!tags.ok) {
    return tags;
  }
  env.logger.info("Remove Releases");
  for (const tag of tags.value) {
    env.logger.info(`- ${tag}`);
  }
  if (!env.dryRun) {
    const confirmed = await confirmDeletion(options.yes, env);
    if (!confirmed.ok) {
      return confirmed;
    }
  }

  const artifacts = await removeDistributionArtifacts(env, tags.value);
  if (!artifacts.ok) {
    return artifacts;
  }
  if (artifacts.value.prUrl !== null) {
    env.logger.success(`PR merged: ${artifacts.value.prUrl}`);
  }
  const deleted = await deleteDistributionReleases(env, tags.value, Boolean(options.ignoreMissing));
  if (!deleted.ok) {
    return deleted;
  }
  env.logger.success("done");
  return ok(undefined);
}

export function runContentPlan(options: ReleaseCommandOptions): Promise<void> {
  return runReleaseCommand((env) => contentPlan(env, options));
}

export function runContentPrepare(options: ReleaseCommandOptions): Promise<void> {
  return runReleaseCommand((env) => contentPrepare(env, options));
}

export function runContentPublish(options: ReleaseCommandOptions): Promise<void> {
  return runReleaseCommand((env) => contentPublish(env, options));
}

export function runContentRemove(options: RemoveCommandOptions): Promise<void> {
  return runReleaseCommand((env) => contentRemove(env, options));
}
