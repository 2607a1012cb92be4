import fs from "fs";
import path from "path";
import { Result, err, errorMessage, ok, releaseError } from "../errors";
import { writeJsonAtomic } from "../platform/persistence";
import { isFullSha, parseJson } from "../utils/structured";
import { validateJson } from "../validation/validate";
import { PinnedRepo, ReleaseChannel, ReleaseProduct, ReleaseRepo, isReleaseChannel } from "./model";

export const PLAN_SCHEMA = 2;

export type PlanFile = {
  product: ReleaseProduct;
  channel: ReleaseChannel;
  tag: string;
  pinned: PinnedRepo[];
};

type PlanDocument = {
  schema: typeof PLAN_SCHEMA;
  product: ReleaseProduct;
  channel: string;
  tag: string;
  repos: Array<{ id: string; slug?: string; sha: string; ref?: string }>;
};

export function writePlanFile(file: string, plan: PlanFile): Result<void> {
  const payload = {
    schema: PLAN_SCHEMA,
    product: plan.product,
    channel: plan.channel,
    tag: plan.tag,
    repos: plan.pinned.map((pin) => ({ id: pin.repo.id, slug: pin.repo.slug, sha: pin.sha, ref: pin.repo.ref }))
  };
  try {
    writeJsonAtomic(path.resolve(file), payload);
  } catch (error) {
    return err(releaseError("dist_repo_failed", `failed to write plan file: ${errorMessage(error)}`, file));
  }
  return ok(undefined);
}

/**
 * Reads a plan and re-binds it to the configured repos for `product`. Every
 * configured repo must be pinned; unknown ids and slug mismatches are rejected.
 */
export function readPlanFile(file: string, product: ReleaseProduct, repos: ReleaseRepo[]): Result<PlanFile> {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch (error) {
    return err(releaseError("invalid_input", `failed to read plan file: ${errorMessage(error)}`, file));
  }
  const parsed = parseJson(text);
  if (!parsed.ok) {
    return err(releaseError("invalid_input", `invalid JSON in plan file: ${parsed.error}`, file));
  }
  const checked = validateJson<PlanDocument>("release-plan.schema.json", parsed.value);
  if (!checked.valid) {
    return err(releaseError("invalid_input", "invalid plan file", checked.errors.join("\n")));
  }
  const doc = checked.value;
  if (doc.product !== product) {
    return err(releaseError("invalid_input", `plan is for ${doc.product}, not ${product}`, file));
  }
  if (!isReleaseChannel(doc.channel)) {
    return err(releaseError("invalid_input", `invalid channel in plan: ${JSON.stringify(doc.channel)}`, file));
  }
  if (!doc.tag.trim()) {
    return err(releaseError("invalid_input", "missing tag in plan", file));
  }

  const byId = new Map(repos.map((repo) => [repo.id, repo]));
  const pinned: PinnedRepo[] = [];
  const seen = new Set<string>();
  for (const entry of doc.repos) {
    if (seen.has(entry.id)) {
      continue;
    }
    seen.add(entry.id);
    const repo = byId.get(entry.id);
    if (!repo) {
      return err(releaseError("invalid_input", `unknown repo id in plan: ${entry.id}`, file));
    }
    if (entry.slug !== undefined && entry.slug !== repo.slug) {
      return err(releaseError("invalid_input", `slug mismatch for ${entry.id} in plan: ${entry.slug}`, `Configured: ${repo.slug}`));
    }
    if (!isFullSha(entry.sha)) {
      return err(releaseError("invalid_input", `invalid sha for ${entry.id} in plan`, entry.sha));
    }
    const ref = entry.ref?.trim() || repo.ref;
    pinned.push({ repo: ref === repo.ref ? repo : { ...repo, ref }, sha: entry.sha });
  }

  const missing = repos.filter((repo) => !seen.has(repo.id)).map((repo) => repo.id);
  if (missing.length > 0) {
    return err(releaseError("invalid_input", `plan missing repos: ${missing.join(", ")}`, file));
  }
  return ok({ product, channel: doc.channel, tag: doc.tag, pinned });
}
