import { Result, err, ok, releaseError } from "../errors";
import type { ReleaseContext } from "./context";
import { GhContext, listReleases } from "./gh";
import { ReleaseHistory, computeHistory, suggestTag, validateTag } from "./history";
import type { AppReleasePlan, PinnedRepo, ReleaseBump, ReleaseChannel, ReleasePlan } from "./model";
import { notesPathForTag, specPathForTag } from "./spec-artifact";

type HistoryContext = GhContext & Pick<ReleaseContext, "config">;

export type PlanRequest = {
  channel: ReleaseChannel;
  bump: ReleaseBump;
  tagOverride: string | null;
  pinned: PinnedRepo[];
};

export async function loadDistributionHistory(ctx: HistoryContext): Promise<Result<ReleaseHistory>> {
  const releases = await listReleases(ctx, ctx.config.distribution.slug, 100);
  return releases.ok ? ok(computeHistory(releases.value)) : releases;
}

export async function loadAppHistory(ctx: HistoryContext): Promise<Result<ReleaseHistory>> {
  const releases = await listReleases(ctx, ctx.config.app.repo.slug, 100);
  return releases.ok ? ok(computeHistory(releases.value)) : releases;
}

/** Explicit override when given, otherwise the suggested tag; validated either way. */
export function resolveTag(request: Omit<PlanRequest, "pinned">, history: ReleaseHistory): Result<string> {
  const tag = request.tagOverride?.trim() || suggestTag(request.channel, request.bump, history);
  const valid = validateTag(request.channel, tag, history);
  return valid.ok ? ok(tag) : valid;
}

export async function planRelease(ctx: HistoryContext, request: PlanRequest): Promise<Result<ReleasePlan>> {
  const history = await loadDistributionHistory(ctx);
  if (!history.ok) {
    return history;
  }
  const tag = resolveTag(request, history.value);
  if (!tag.ok) {
    return tag;
  }
  return ok({
    channel: request.channel,
    tag: tag.value,
    pinned: request.pinned,
    specPath: specPathForTag(ctx.config, tag.value),
    notesPath: notesPathForTag(ctx.config, tag.value),
    title: `release: ${tag.value} (${request.channel})`
  });
}

export function versionFromTag(tag: string): Result<string> {
  if (!tag.startsWith("v") || tag.length < 2) {
    return err(releaseError("invalid_tag", `invalid app tag: ${tag}`, "Expected vMAJOR.MINOR.PATCH[-beta.N]"));
  }
  return ok(tag.slice(1));
}

export async function planAppRelease(ctx: HistoryContext, request: PlanRequest): Promise<Result<AppReleasePlan>> {
  const history = await loadAppHistory(ctx);
  if (!history.ok) {
    return history;
  }
  const tag = resolveTag(request, history.value);
  if (!tag.ok) {
    return tag;
  }
  const version = versionFromTag(tag.value);
  if (!version.ok) {
    return version;
  }
  return ok({
    channel: request.channel,
    tag: tag.value,
    version: version.value,
    pinned: request.pinned,
    title: `release(app): ${tag.value}`
  });
}
