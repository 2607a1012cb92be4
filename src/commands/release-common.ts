import { loadSettings } from "../config";
import { defaultReleaseConfigPath, loadReleaseConfig } from "../config/release";
import { getFlags } from "../context/flags";
import { Result, err, exitCodeFor, ok, printReleaseError, releaseError } from "../errors";
import { systemClock } from "../platform/clock";
import { createProcessRunner } from "../platform/process-exec";
import type { ReleaseContext } from "../release/context";
import { currentUser, ensureGhAuth, ensureGhAvailable } from "../release/gh";
import {
  AppReleasePlan,
  PinnedRepo,
  ReleaseBump,
  ReleaseChannel,
  ReleasePlan,
  ReleaseProduct,
  ReleaseRepo,
  isReleaseBump,
  isReleaseChannel
} from "../release/model";
import { NotesAttachment, loadNotesFile } from "../release/notes";
import { readPlanFile } from "../release/plan-file";
import {
  AutoBlocker,
  AutoSuggestion,
  applySuggestions,
  describeBlocker,
  parseAssignments,
  resolveAutoSmart,
  resolveAutoStrict,
  resolveExplicitPins
} from "../release/pins";
import { isReady, checkReadiness, readinessHint, readinessIssues } from "../release/readiness";
import { cancelled, selectGreenCommit } from "../release/wizard/common";
import { Logger, createConsoleLogger } from "../ui/logger";
import { ask, isInteractive } from "../ui/prompt";
import { Selector, createPromptSelector } from "../ui/selector";

export type ReleaseCommandOptions = {
  channel?: string;
  bump?: string;
  tag?: string;
  auto?: boolean;
  strict?: boolean;
  takeSuggested?: boolean;
  repo?: string[];
  ref?: string[];
  plan?: string;
  out?: string;
  notes?: string;
  notesFile?: string;
  allowNonGreen?: boolean;
  confirmTag?: string;
};

export type CommandEnv = ReleaseContext & {
  selector: Selector;
  interactive: boolean;
  watch: boolean;
  ask: (question: string) => Promise<string>;
};

export type ResolvedInputs = {
  channel: ReleaseChannel;
  tag: string | null;
  pinned: PinnedRepo[];
};

export type AutoPolicy = "smart" | "strict";

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function buildCommandEnv(): Result<CommandEnv> {
  const settings = loadSettings();
  const flags = getFlags();
  const config = loadReleaseConfig(settings.release.config_file || defaultReleaseConfigPath());
  if (!config.ok) {
    return config;
  }
  return ok({
    workspaceRoot: flags.workspace ?? settings.workspace.root,
    config: config.value,
    runner: createProcessRunner(),
    clock: systemClock,
    logger: createConsoleLogger(),
    dryRun: flags.dryRun,
    selector: createPromptSelector(),
    interactive: isInteractive(),
    watch: flags.watch,
    ask
  });
}

/** Builds the environment, runs `action`, and turns a failure into output plus an exit code. */
export async function runReleaseCommand(action: (env: CommandEnv) => Promise<Result<void>>): Promise<void> {
  const env = buildCommandEnv();
  const result = env.ok ? await action(env.value) : env;
  if (!result.ok) {
    printReleaseError(result.error);
    process.exitCode = exitCodeFor(result.error.kind);
  }
}

export function parseChannel(value: string | undefined): Result<ReleaseChannel | null> {
  if (value === undefined) {
    return ok(null);
  }
  const channel = value.trim().toLowerCase();
  if (!isReleaseChannel(channel)) {
    return err(releaseError("invalid_input", `invalid --channel: ${value}`, "Expected stable or beta."));
  }
  return ok(channel);
}

export function parseBump(value: string | undefined): Result<ReleaseBump> {
  const bump = (value ?? "patch").trim().toLowerCase();
  if (!isReleaseBump(bump)) {
    return err(releaseError("invalid_input", `invalid --bump: ${value ?? ""}`, "Expected major, minor or patch."));
  }
  return ok(bump);
}

export function checkOptionCombinations(options: ReleaseCommandOptions): Result<void> {
  const repos = options.repo ?? [];
  const refs = options.ref ?? [];
  if (options.plan !== undefined && (options.auto || repos.length > 0 || refs.length > 0)) {
    return err(releaseError("invalid_input", "--plan cannot be combined with --auto/--repo/--ref"));
  }
  if (options.auto && repos.length > 0) {
    return err(releaseError("invalid_input", "--auto cannot be combined with --repo overrides"));
  }
  if (options.auto && options.allowNonGreen) {
    return err(releaseError("invalid_input", "--auto is strict: remove --allow-non-green"));
  }
  if (options.strict && !options.auto) {
    return err(releaseError("invalid_input", "--strict only applies with --auto"));
  }
  if (options.takeSuggested && (!options.auto || options.strict)) {
    return err(releaseError("invalid_input", "--take-suggested only applies with smart --auto"));
  }
  return ok(undefined);
}

export function loadNotes(options: Pick<ReleaseCommandOptions, "notesFile">): Result<NotesAttachment | null> {
  if (options.notesFile === undefined) {
    return ok(null);
  }
  return loadNotesFile(options.notesFile);
}

/** gh is present and signed in; prints and returns the operator login. */
export async function readPreflight(env: CommandEnv): Promise<Result<string>> {
  const available = await ensureGhAvailable(env);
  if (!available.ok) {
    return available;
  }
  const auth = await ensureGhAuth(env);
  if (!auth.ok) {
    return auth;
  }
  const login = await currentUser(env);
  if (login.ok) {
    env.logger.detail(`gh user: ${login.value}`);
  }
  return login;
}

export async function confirmTag(
  tag: string,
  confirmation: string | undefined,
  env: Pick<CommandEnv, "interactive" | "ask">
): Promise<Result<void>> {
  if (confirmation === undefined && !env.interactive) {
    return err(releaseError("invalid_input", "missing --confirm-tag", `Pass --confirm-tag ${tag} to publish without a prompt.`));
  }
  const typed = confirmation ?? (await env.ask("Type the tag to confirm: "));
  if (typed.trim() !== tag) {
    return err(releaseError("invalid_input", "confirmation mismatch", `Expected ${tag}.`));
  }
  return ok(undefined);
}

/** Typed DELETE confirmation for destructive commands; `-y` skips it. */
export async function confirmDeletion(yes: boolean | undefined, env: Pick<CommandEnv, "interactive" | "ask">): Promise<Result<void>> {
  if (yes) {
    return ok(undefined);
  }
  if (!env.interactive) {
    return err(releaseError("invalid_input", "missing --yes", "Pass -y to remove releases without a prompt."));
  }
  const typed = await env.ask("Type DELETE to confirm: ");
  if (typed.trim() !== "DELETE") {
    return err(releaseError("invalid_input", "confirmation mismatch", "Expected DELETE."));
  }
  return ok(undefined);
}

function withRef(repo: ReleaseRepo, ref: string): ReleaseRepo {
  return ref === repo.ref ? repo : { ...repo, ref };
}

export function printBlockers(logger: Logger, blockers: AutoBlocker[]): void {
  logger.info("");
  logger.info("Auto release blocked");
  for (const blocker of blockers) {
    logger.error(`- ${describeBlocker(blocker)}`);
    const hint = blocker.kind === "not_ready" ? readinessHint(blocker.readiness) : "Pick a CI-green commit with --repo, or fix CI.";
    if (hint) {
      logger.detail(`hint: ${hint}`);
    }
  }
}

export function printSuggestions(logger: Logger, suggestions: AutoSuggestion[]): void {
  if (suggestions.length === 0) {
    return;
  }
  logger.info("");
  logger.info("Optional bumps");
  for (const suggestion of suggestions) {
    if (suggestion.kind === "bump" && suggestion.toSha !== null) {
      logger.detail(`- ${suggestion.repoId}: ${suggestion.fromSha.slice(0, 7)} -> ${suggestion.toSha.slice(0, 7)} (${suggestion.reason})`);
      if (!suggestion.applyable) {
        logger.detail("  local checkout is not clean or synced; --take-suggested will skip it");
      }
      continue;
    }
    logger.detail(`- ${suggestion.repoId}: ${suggestion.reason}`);
  }
}

/** Non-blocking readiness warnings shown before an interactive pick. */
export async function printReadinessWarnings(env: CommandEnv, repos: ReleaseRepo[], refs: Map<string, string>): Promise<void> {
  const warnings: string[] = [];
  for (const repo of repos) {
    const ref = refs.get(repo.id) ?? repo.ref;
    const readiness = await checkReadiness(env, withRef(repo, ref), ref);
    if (!isReady(readiness)) {
      warnings.push(`- ${repo.id} (${ref}): ${readinessIssues(readiness).join(", ")}`);
    }
  }
  if (warnings.length === 0) {
    return;
  }
  env.logger.info("");
  env.logger.info("Release preflight (warnings only; --auto enforces readiness)");
  for (const line of warnings) {
    env.logger.detail(line);
  }
}

/**
 * Pins every repo from `--repo`, from an auto policy, or, when interactive,
 * by letting the operator pick the commits not given on the command line.
 */
export async function resolvePins(
  env: CommandEnv,
  repos: ReleaseRepo[],
  channel: ReleaseChannel,
  options: ReleaseCommandOptions,
  policy: AutoPolicy
): Promise<Result<PinnedRepo[]>> {
  const shas = parseAssignments(options.repo ?? [], repos, "--repo");
  if (!shas.ok) {
    return shas;
  }
  const refs = parseAssignments(options.ref ?? [], repos, "--ref");
  if (!refs.ok) {
    return refs;
  }
  const blocked = releaseError("invalid_input", "auto release is blocked", "Fix the issues above, then rerun.");

  if (options.auto && (policy === "strict" || options.strict)) {
    const strict = await resolveAutoStrict(env, repos, refs.value);
    if (!strict.ok) {
      printBlockers(
        env.logger,
        strict.error.map((readiness): AutoBlocker => ({ kind: "not_ready", repo: readiness.repo, readiness }))
      );
      return err(blocked);
    }
    env.logger.success("auto pins: OK");
    return ok(strict.value);
  }

  if (options.auto) {
    const smart = await resolveAutoSmart(env, channel, repos, refs.value);
    if (!smart.ok) {
      if (smart.error.kind === "error") {
        return err(smart.error.error);
      }
      printBlockers(env.logger, smart.error.blockers);
      return err(blocked);
    }
    const resolution = smart.value;
    env.logger.success(`auto pins: OK${resolution.sourceTag ? ` (carried from ${resolution.sourceTag})` : ""}`);
    for (const [id, mode] of resolution.modes) {
      env.logger.detail(`${id}: ${mode}`);
    }
    printSuggestions(env.logger, resolution.suggestions);
    return ok(options.takeSuggested ? applySuggestions(resolution.pinned, resolution.suggestions) : resolution.pinned);
  }

  if (!env.interactive) {
    return resolveExplicitPins(repos, shas.value, refs.value);
  }

  await printReadinessWarnings(env, repos, refs.value);
  const picked = new Map(shas.value);
  for (const repo of repos) {
    if (picked.has(repo.id)) {
      continue;
    }
    const selection = withRef(repo, refs.value.get(repo.id) ?? repo.ref);
    const choice = await selectGreenCommit(
      env,
      selection,
      `Select commit: ${repo.id} (${repo.slug})`,
      null,
      0,
      !options.allowNonGreen
    );
    if (!choice.ok) {
      return choice;
    }
    if (choice.value.action !== "select") {
      return err(cancelled());
    }
    env.logger.success(`${repo.id}=${choice.value.value} (ref=${selection.ref})`);
    picked.set(repo.id, choice.value.value);
  }
  return resolveExplicitPins(repos, picked, refs.value);
}

/** Channel, tag and pins from `--plan`, or from the channel option plus pin resolution. */
export async function resolveReleaseInputs(
  env: CommandEnv,
  product: ReleaseProduct,
  repos: ReleaseRepo[],
  options: ReleaseCommandOptions,
  policy: AutoPolicy
): Promise<Result<ResolvedInputs>> {
  const combination = checkOptionCombinations(options);
  if (!combination.ok) {
    return combination;
  }
  if (options.plan !== undefined) {
    const plan = readPlanFile(options.plan, product, repos);
    return plan.ok ? ok({ channel: plan.value.channel, tag: plan.value.tag, pinned: plan.value.pinned }) : plan;
  }
  const channel = parseChannel(options.channel);
  if (!channel.ok) {
    return channel;
  }
  if (channel.value === null) {
    return err(releaseError("invalid_input", "missing --channel (or pass --plan)"));
  }
  const pinned = await resolvePins(env, repos, channel.value, options, policy);
  if (!pinned.ok) {
    return pinned;
  }
  return ok({ channel: channel.value, tag: options.tag?.trim() || null, pinned: pinned.value });
}

/** The equivalent non-interactive publish, with every pin spelled out. */
export function replayLines(
  product: ReleaseProduct,
  plan: { channel: ReleaseChannel; tag: string; pinned: PinnedRepo[] },
  configured: ReleaseRepo[],
  planFile: string | null
): string[] {
  const args = [`conductor ${product} publish`, `--channel ${plan.channel}`, `--tag ${plan.tag}`, "--no-interactive"];
  for (const pin of plan.pinned) {
    args.push(`--repo ${pin.repo.id}=${pin.sha}`);
    const base = configured.find((repo) => repo.id === pin.repo.id);
    if (base && base.ref !== pin.repo.ref) {
      args.push(`--ref ${pin.repo.id}=${pin.repo.ref}`);
    }
  }
  const lines: string[] = [];
  if (planFile !== null) {
    lines.push(`conductor ${product} publish --plan ${planFile}`);
  }
  lines.push(args.join(" "));
  return lines;
}

export function printReplay(logger: Logger, lines: string[]): void {
  logger.info("");
  logger.info("Replay:");
  for (const line of lines) {
    logger.detail(line);
  }
}

export function printPlan(logger: Logger, plan: ReleasePlan): void {
  logger.info("");
  logger.info("Release Plan");
  logger.detail(`channel: ${plan.channel}`);
  logger.detail(`tag: ${plan.tag}`);
  logger.detail("repos:");
  for (const pin of plan.pinned) {
    logger.detail(`- ${pin.repo.id}: ${pin.sha}`);
  }
  logger.detail(`spec: ${plan.specPath}`);
  logger.detail(`notes: ${plan.notesPath}`);
}

export function printAppPlan(logger: Logger, plan: AppReleasePlan): void {
  logger.info("");
  logger.info("App Release Plan");
  logger.detail(`channel: ${plan.channel}`);
  logger.detail(`tag: ${plan.tag}`);
  logger.detail(`version: ${plan.version}`);
  for (const pin of plan.pinned) {
    logger.detail(`- ${pin.repo.id}: ${pin.sha}`);
  }
}
