import { ReleaseError, Result, err, ok, releaseError } from "../errors";
import { isFullSha } from "../utils/structured";
import { isCiGreenForSha } from "./ci";
import type { ReleaseContext } from "./context";
import { compareCommits, getRepoFileText } from "./gh";
import { previousReleaseTag } from "./history";
import type { PinnedRepo, ReleaseChannel, ReleaseRepo } from "./model";
import { loadDistributionHistory } from "./planner";
import { RepoReadiness, isReady, checkReadiness, readinessIssues } from "./readiness";
import { parsePublishedSpec, specPathForTag } from "./spec-artifact";

export type PinMode = "head" | "carry";

export type AutoSuggestion = {
  kind: "bump" | "local_issue";
  repoId: string;
  fromSha: string;
  toSha: string | null;
  reason: string;
  /** A bump can be taken as-is only when the repo's head would pass a strict readiness check. */
  applyable: boolean;
};

export type AutoBlocker =
  | { kind: "not_ready"; repo: ReleaseRepo; readiness: RepoReadiness }
  | { kind: "carry_not_green"; repo: ReleaseRepo; sha: string; sourceTag: string }
  | { kind: "carry_check_failed"; repo: ReleaseRepo; sha: string; message: string };

export type SmartResolution = {
  pinned: PinnedRepo[];
  modes: Map<string, PinMode>;
  suggestions: AutoSuggestion[];
  sourceTag: string | null;
};

export type SmartFailure = { kind: "blocked"; blockers: AutoBlocker[] } | { kind: "error"; error: ReleaseError };

function withRef(repo: ReleaseRepo, ref: string): ReleaseRepo {
  return ref === repo.ref ? repo : { ...repo, ref };
}

/**
 * Parses repeated `id=value` options. Unknown ids, duplicates and malformed
 * entries are rejected.
 */
export function parseAssignments(values: string[], repos: ReleaseRepo[], label: string): Result<Map<string, string>> {
  const known = new Set(repos.map((repo) => repo.id));
  const out = new Map<string, string>();
  for (const raw of values) {
    const split = raw.indexOf("=");
    const id = split > 0 ? raw.slice(0, split).trim() : "";
    const value = split > 0 ? raw.slice(split + 1).trim() : "";
    if (!id || !value) {
      return err(releaseError("invalid_input", `invalid ${label}: ${raw}`, `Expected ${label} <id>=<value>.`));
    }
    if (!known.has(id)) {
      return err(releaseError("invalid_input", `unknown repo id in ${label}: ${id}`, `Known ids: ${[...known].join(", ")}`));
    }
    if (out.has(id)) {
      return err(releaseError("invalid_input", `duplicate ${label} for repo: ${id}`));
    }
    out.set(id, value);
  }
  return ok(out);
}

export function resolveExplicitPins(
  repos: ReleaseRepo[],
  shas: Map<string, string>,
  refOverrides: Map<string, string>
): Result<PinnedRepo[]> {
  const pinned: PinnedRepo[] = [];
  const missing: string[] = [];
  for (const repo of repos) {
    const sha = shas.get(repo.id);
    if (sha === undefined) {
      missing.push(repo.id);
      continue;
    }
    if (!isFullSha(sha)) {
      return err(releaseError("invalid_input", `invalid sha for ${repo.id}: ${sha}`, "Expected a full 40-character commit sha."));
    }
    pinned.push({ repo: withRef(repo, refOverrides.get(repo.id) ?? repo.ref), sha });
  }
  if (missing.length > 0) {
    return err(
      releaseError("invalid_input", `missing pins for: ${missing.join(", ")}`, "Pass --repo <id>=<sha> for every repo, or use --auto.")
    );
  }
  return ok(pinned);
}

/**
 * Every repo must be ready; otherwise all blocking readiness reports are returned and
 * no pins at all.
 */
export async function resolveAutoStrict(
  ctx: ReleaseContext,
  repos: ReleaseRepo[],
  refOverrides: Map<string, string>
): Promise<Result<PinnedRepo[], RepoReadiness[]>> {
  const checked: RepoReadiness[] = [];
  for (const repo of repos) {
    const ref = refOverrides.get(repo.id) ?? repo.ref;
    checked.push(await checkReadiness(ctx, withRef(repo, ref), ref));
  }
  const blockers = checked.filter((readiness) => !isReady(readiness));
  if (blockers.length > 0) {
    return err(blockers);
  }
  const pinned: PinnedRepo[] = [];
  for (const readiness of checked) {
    if (readiness.remoteHeadSha !== null) {
      pinned.push({ repo: readiness.repo, sha: readiness.remoteHeadSha });
    }
  }
  return ok(pinned);
}

async function loadPreviousPins(
  ctx: ReleaseContext,
  channel: ReleaseChannel
): Promise<Result<{ tag: string; pins: Map<string, string> } | null>> {
  const history = await loadDistributionHistory(ctx);
  if (!history.ok) {
    return history;
  }
  const tag = previousReleaseTag(channel, history.value);
  if (tag === null) {
    return ok(null);
  }
  const dist = ctx.config.distribution;
  const text = await getRepoFileText(ctx, dist.slug, specPathForTag(ctx.config, tag), dist.defaultBranch);
  if (!text.ok) {
    return text;
  }
  const spec = parsePublishedSpec(text.value);
  if (!spec.ok) {
    return err(releaseError("invalid_input", `invalid release spec for ${tag}: ${spec.error}`, specPathForTag(ctx.config, tag)));
  }
  return ok({ tag, pins: spec.value.pins });
}

async function suggestForCarried(
  ctx: ReleaseContext,
  repo: ReleaseRepo,
  carried: string
): Promise<AutoSuggestion[]> {
  const status = await checkReadiness(ctx, repo, repo.ref);
  const suggestions: AutoSuggestion[] = [];
  const head = status.remoteHeadSha;
  if (status.error === null && head !== null && head !== carried && status.headGreen !== false) {
    const compare = await compareCommits(ctx, repo.slug, carried, head);
    if (!compare.ok) {
      ctx.logger.warn(`${repo.id}: unable to compare ${carried.slice(0, 7)}...${head.slice(0, 7)}: ${compare.error.message}`);
    } else if (compare.value.aheadBy > 0) {
      suggestions.push({
        kind: "bump",
        repoId: repo.id,
        fromSha: carried,
        toSha: head,
        reason: `${compare.value.aheadBy} newer commit(s) on ${repo.ref} with green CI`,
        applyable: isReady(status)
      });
    }
  }
  if (status.localExists && status.error === null && !isReady(status)) {
    const issues = readinessIssues(status).filter((issue) => !issue.startsWith("CI not green"));
    if (issues.length > 0) {
      suggestions.push({
        kind: "local_issue",
        repoId: repo.id,
        fromSha: carried,
        toSha: null,
        reason: `local checkout: ${issues.join(", ")}; the carried pin is kept`,
        applyable: false
      });
    }
  }
  return suggestions;
}

/**
 * Head repos (configured, ref-overridden, or absent from the previous release)
 * track their branch head under strict readiness. Everything else carries the
 * pin of the most relevant previous release, re-checked for CI.
 */
export async function resolveAutoSmart(
  ctx: ReleaseContext,
  channel: ReleaseChannel,
  repos: ReleaseRepo[],
  refOverrides: Map<string, string>
): Promise<Result<SmartResolution, SmartFailure>> {
  const previous = await loadPreviousPins(ctx, channel);
  if (!previous.ok) {
    return err({ kind: "error", error: previous.error });
  }
  const source = previous.value;
  const headIds = new Set(ctx.config.headRepoIds);
  const suggestIds = new Set(ctx.config.bumpSuggestRepoIds);

  const pinned: PinnedRepo[] = [];
  const modes = new Map<string, PinMode>();
  const suggestions: AutoSuggestion[] = [];
  const blockers: AutoBlocker[] = [];

  for (const base of repos) {
    const override = refOverrides.get(base.id);
    const repo = withRef(base, override ?? base.ref);
    const carried = source?.pins.get(base.id);
    const headMode = headIds.has(base.id) || (override !== undefined && override !== base.ref) || carried === undefined;

    if (headMode || !source || carried === undefined) {
      modes.set(repo.id, "head");
      const readiness = await checkReadiness(ctx, repo, repo.ref);
      if (!isReady(readiness) || readiness.remoteHeadSha === null) {
        blockers.push({ kind: "not_ready", repo, readiness });
        continue;
      }
      pinned.push({ repo, sha: readiness.remoteHeadSha });
      continue;
    }

    modes.set(repo.id, "carry");
    if (repo.requiredCiWorkflow) {
      const green = await isCiGreenForSha(ctx, repo.slug, repo.requiredCiWorkflow, carried);
      if (!green.ok) {
        blockers.push({ kind: "carry_check_failed", repo, sha: carried, message: green.error.message });
        continue;
      }
      if (!green.value) {
        blockers.push({ kind: "carry_not_green", repo, sha: carried, sourceTag: source.tag });
        continue;
      }
    }
    pinned.push({ repo, sha: carried });
    if (suggestIds.has(repo.id)) {
      suggestions.push(...(await suggestForCarried(ctx, repo, carried)));
    }
  }

  if (blockers.length > 0) {
    return err({ kind: "blocked", blockers });
  }
  return ok({ pinned, modes, suggestions, sourceTag: source?.tag ?? null });
}

/** Takes every applyable bump suggestion; other pins are unchanged. */
export function applySuggestions(pinned: PinnedRepo[], suggestions: AutoSuggestion[]): PinnedRepo[] {
  return pinned.map((pin) => {
    const bump = suggestions.find(
      (suggestion) => suggestion.kind === "bump" && suggestion.applyable && suggestion.repoId === pin.repo.id
    );
    return bump?.toSha ? { repo: pin.repo, sha: bump.toSha } : pin;
  });
}

export function describeBlocker(blocker: AutoBlocker): string {
  switch (blocker.kind) {
    case "not_ready":
      return `${blocker.repo.id} (${blocker.repo.ref}): ${readinessIssues(blocker.readiness).join(", ")}`;
    case "carry_not_green":
      return `${blocker.repo.id}: carried ${blocker.sha} from ${blocker.sourceTag} is not CI-green`;
    case "carry_check_failed":
      return `${blocker.repo.id}: CI check for carried ${blocker.sha} failed: ${blocker.message}`;
  }
}
