import { Result, err, ok, releaseError } from "../errors";
import { AppPrepareResult, prepareAppPr, publishAppRelease } from "../release/app-release";
import { ensureCiGreen } from "../release/ci";
import type { AppReleasePlan } from "../release/model";
import { writePlanFile } from "../release/plan-file";
import { planAppRelease } from "../release/planner";
import { preflight } from "../release/wizard/common";
import {
  CommandEnv,
  ReleaseCommandOptions,
  confirmTag,
  loadNotes,
  parseBump,
  printAppPlan,
  printReplay,
  readPreflight,
  replayLines,
  resolveReleaseInputs,
  runReleaseCommand
} from "./release-common";

type PreparedAppRelease = AppPrepareResult & {
  plan: AppReleasePlan;
};

// The app lane has a single repo, so --auto always means strict readiness.
async function planFromOptions(env: CommandEnv, options: ReleaseCommandOptions): Promise<Result<AppReleasePlan>> {
  const bump = parseBump(options.bump);
  if (!bump.ok) {
    return bump;
  }
  const inputs = await resolveReleaseInputs(env, "app", [env.config.app.repo], options, "strict");
  if (!inputs.ok) {
    return inputs;
  }
  return planAppRelease(env, {
    channel: inputs.value.channel,
    bump: bump.value,
    tagOverride: inputs.value.tag,
    pinned: inputs.value.pinned
  });
}

export async function appPlan(env: CommandEnv, options: ReleaseCommandOptions): Promise<Result<void>> {
  const login = await readPreflight(env);
  if (!login.ok) {
    return login;
  }
  const plan = await planFromOptions(env, options);
  if (!plan.ok) {
    return plan;
  }
  printAppPlan(env.logger, plan.value);
  const out = options.out ?? null;
  if (out !== null) {
    const written = writePlanFile(out, { product: "app", channel: plan.value.channel, tag: plan.value.tag, pinned: plan.value.pinned });
    if (!written.ok) {
      return written;
    }
    env.logger.success(out);
  }
  printReplay(env.logger, replayLines("app", plan.value, [env.config.app.repo], out));
  return ok(undefined);
}

async function prepareAppRelease(env: CommandEnv, options: ReleaseCommandOptions): Promise<Result<PreparedAppRelease>> {
  const app = env.config.app;
  const login = await preflight(env, app.repo.slug, "app");
  if (!login.ok) {
    return login;
  }
  env.logger.detail(`gh user: ${login.value}`);

  const plan = await planFromOptions(env, options);
  if (!plan.ok) {
    return plan;
  }
  const green = await ensureCiGreen(env, plan.value.pinned, Boolean(options.allowNonGreen));
  if (!green.ok) {
    return green;
  }
  printAppPlan(env.logger, plan.value);
  printReplay(env.logger, replayLines("app", plan.value, [app.repo], options.plan ?? null));

  if (!env.dryRun) {
    const confirmed = await confirmTag(plan.value.tag, options.confirmTag, env);
    if (!confirmed.ok) {
      return confirmed;
    }
  }
  const [source] = plan.value.pinned;
  if (!source) {
    return err(releaseError("invalid_input", "missing selected app source sha"));
  }
  const pr = await prepareAppPr(env, plan.value, source.sha);
  if (!pr.ok) {
    return pr;
  }
  return ok({ plan: plan.value, ...pr.value });
}

/** Opens and merges the version bump PR on the app repo. */
export async function appPrepare(env: CommandEnv, options: ReleaseCommandOptions): Promise<Result<void>> {
  const prepared = await prepareAppRelease(env, options);
  if (!prepared.ok) {
    return prepared;
  }
  env.logger.success(`PR: ${prepared.value.prUrl}`);
  env.logger.detail(`source sha: ${prepared.value.sourceSha}`);
  return ok(undefined);
}

/** Version bump PR, then the candidate and release workflows on the merged commit. */
export async function appPublish(env: CommandEnv, options: ReleaseCommandOptions): Promise<Result<void>> {
  const notes = loadNotes(options);
  if (!notes.ok) {
    return notes;
  }
  const prepared = await prepareAppRelease(env, options);
  if (!prepared.ok) {
    return prepared;
  }
  env.logger.success(`PR merged: ${prepared.value.prUrl}`);
  env.logger.detail(`source sha: ${prepared.value.sourceSha}`);
  const published = await publishAppRelease(env, prepared.value.plan, prepared.value.sourceSha, notes.value, env.watch);
  if (!published.ok) {
    return published;
  }
  env.logger.success(`Candidate run: ${published.value.candidateUrl}`);
  env.logger.success(`Release run: ${published.value.releaseUrl}`);
  env.logger.detail("Next: approve the release environment in GitHub Actions to publish.");
  return ok(undefined);
}

export function runAppPlan(options: ReleaseCommandOptions): Promise<void> {
  return runReleaseCommand((env) => appPlan(env, options));
}

export function runAppPrepare(options: ReleaseCommandOptions): Promise<void> {
  return runReleaseCommand((env) => appPrepare(env, options));
}

export function runAppPublish(options: ReleaseCommandOptions): Promise<void> {
  return runReleaseCommand((env) => appPublish(env, options));
}
