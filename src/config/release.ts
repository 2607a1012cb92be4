import fs from "fs";
import path from "path";
import { Result, err, errorMessage, ok, releaseError } from "../errors";
import { bundledPath } from "../paths";
import { validateJson } from "../validation/validate";
import type { ReleaseChannel, ReleaseRepo } from "../release/model";

export type DistributionConfig = {
  slug: string;
  defaultBranch: string;
  localDir: string;
  specDir: string;
  notesDir: string;
  publishWorkflow: string;
  /** `{channel}` is replaced with the release channel. */
  demoUrlTemplate: string;
};

export type AppConfig = {
  repo: ReleaseRepo;
  localDir: string;
  versionFiles: string[];
  candidateWorkflow: string;
  releaseWorkflow: string;
};

export type DependentWorkspaceConfig = {
  label: string;
  root: string;
  repos: string[];
};

export type ArtifactAsset = {
  id: string;
  kind: string;
  os?: string;
  arch?: string;
  filename: string;
};

export type InstallSet = {
  id: string;
  os: string;
  arch: string;
  assets: string[];
};

export type ReleaseConfig = {
  distribution: DistributionConfig;
  contentRepos: ReleaseRepo[];
  headRepoIds: string[];
  bumpSuggestRepoIds: string[];
  app: AppConfig;
  dependentWorkspace: DependentWorkspaceConfig | null;
  assets: ArtifactAsset[];
  installSets: InstallSet[];
  requestIdPrefix: string;
  greenRunsLimit: number;
  commitListLimit: number;
};

export function defaultReleaseConfigPath(): string {
  return bundledPath("defaults", "release.json");
}

export function loadReleaseConfig(file = defaultReleaseConfigPath()): Result<ReleaseConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (error) {
    return err(releaseError("invalid_input", `unable to read release config: ${file}`, errorMessage(error)));
  }
  const checked = validateJson<ReleaseConfig>("release-config.schema.json", raw);
  if (!checked.valid) {
    return err(releaseError("invalid_input", `invalid release config: ${file}`, checked.errors.join("\n")));
  }
  const config = checked.value;
  const ids = new Set<string>();
  for (const repo of [...config.contentRepos, config.app.repo]) {
    if (ids.has(repo.id)) {
      return err(releaseError("invalid_input", `duplicate repo id in release config: ${repo.id}`, file));
    }
    ids.add(repo.id);
  }
  for (const id of [...config.headRepoIds, ...config.bumpSuggestRepoIds]) {
    if (!config.contentRepos.some((repo) => repo.id === id)) {
      return err(releaseError("invalid_input", `unknown content repo id in release config: ${id}`, file));
    }
  }
  return ok(config);
}

export function demoUrl(config: ReleaseConfig, channel: ReleaseChannel): string {
  return config.distribution.demoUrlTemplate.split("{channel}").join(channel);
}

export function repoLocalPath(workspaceRoot: string, repo: ReleaseRepo): string {
  const name = repo.localPath ?? repo.slug.split("/").pop() ?? repo.id;
  return path.join(workspaceRoot, name);
}
