import path from "path";
import { ArtifactAsset, InstallSet, ReleaseConfig, demoUrl } from "../config/release";
import { Result, err, errorMessage, ok, releaseError } from "../errors";
import { writeJsonAtomic } from "../platform/persistence";
import { asRecord, getArray, getString, parseJson } from "../utils/structured";
import { PinnedRepo, ReleaseChannel, ReleasePlan, isReleaseChannel, repoUrl } from "./model";

export const RELEASE_SPEC_SCHEMA = 1;

export type ReleaseSpecRepo = {
  id: string;
  url: string;
  ref: string;
  sha: string;
  required_ci_workflow_file?: string;
};

export type ReleaseSpec = {
  schema: typeof RELEASE_SPEC_SCHEMA;
  channel: ReleaseChannel;
  tag: string;
  repos: ReleaseSpecRepo[];
  assets: ArtifactAsset[];
  install_sets: InstallSet[];
  pages: { demo_url: string };
};

/** The parts of a published spec the resolver and idempotency check rely on. */
export type PublishedSpec = {
  channel: ReleaseChannel;
  tag: string;
  pins: Map<string, string>;
};

export function specPathForTag(config: ReleaseConfig, tag: string): string {
  return `${config.distribution.specDir}/${tag}.json`;
}

export function notesPathForTag(config: ReleaseConfig, tag: string): string {
  return `${config.distribution.notesDir}/${tag}.md`;
}

export function buildReleaseSpec(
  config: ReleaseConfig,
  channel: ReleaseChannel,
  tag: string,
  pinned: PinnedRepo[]
): ReleaseSpec {
  const repos = pinned.map((pin): ReleaseSpecRepo => {
    const entry: ReleaseSpecRepo = { id: pin.repo.id, url: repoUrl(pin.repo), ref: pin.repo.ref, sha: pin.sha };
    if (pin.repo.requiredCiWorkflow) {
      entry.required_ci_workflow_file = pin.repo.requiredCiWorkflow;
    }
    return entry;
  });
  return {
    schema: RELEASE_SPEC_SCHEMA,
    channel,
    tag,
    repos,
    assets: config.assets.map((asset) => ({ ...asset })),
    install_sets: config.installSets.map((set) => ({ ...set, assets: [...set.assets] })),
    pages: { demo_url: demoUrl(config, channel) }
  };
}

export function writeReleaseSpec(root: string, relativePath: string, spec: ReleaseSpec): Result<string> {
  const file = path.join(root, relativePath);
  try {
    writeJsonAtomic(file, spec);
  } catch (error) {
    return err(releaseError("dist_repo_failed", `failed to write release spec: ${errorMessage(error)}`, file));
  }
  return ok(file);
}

export function parsePublishedSpec(text: string): Result<PublishedSpec, string> {
  const parsed = parseJson(text);
  if (!parsed.ok) {
    return err(`invalid JSON: ${parsed.error}`);
  }
  const data = asRecord(parsed.value);
  if (!data) {
    return err("spec root is not an object");
  }
  const tag = getString(data, "tag");
  const channel = getString(data, "channel");
  if (tag === null || channel === null || !isReleaseChannel(channel)) {
    return err("spec is missing tag or channel");
  }
  const repos = getArray(data, "repos");
  if (!repos) {
    return err("spec is missing repos");
  }
  const pins = new Map<string, string>();
  for (const item of repos) {
    const repo = asRecord(item);
    const id = repo ? getString(repo, "id") : null;
    const sha = repo ? getString(repo, "sha") : null;
    if (id !== null && sha !== null) {
      pins.set(id, sha);
    }
  }
  return ok({ channel, tag, pins });
}

export function specMatchesPlan(spec: PublishedSpec, plan: ReleasePlan): boolean {
  if (spec.tag !== plan.tag || spec.channel !== plan.channel) {
    return false;
  }
  return plan.pinned.every((pin) => spec.pins.get(pin.repo.id) === pin.sha);
}
