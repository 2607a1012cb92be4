export type ReleaseChannel = "stable" | "beta";
export type ReleaseBump = "major" | "minor" | "patch";
export type ReleaseProduct = "app" | "content";

export function isReleaseChannel(value: string): value is ReleaseChannel {
  return value === "stable" || value === "beta";
}

export function isReleaseBump(value: string): value is ReleaseBump {
  return value === "major" || value === "minor" || value === "patch";
}

/** Static description of a source repository taking part in a release. */
export type ReleaseRepo = {
  id: string;
  slug: string;
  ref: string;
  requiredCiWorkflow?: string;
  /** Clone location relative to the workspace root; defaults to the slug's repo name. */
  localPath?: string;
};

export type PinnedRepo = {
  repo: ReleaseRepo;
  sha: string;
};

export type ReleasePlan = {
  channel: ReleaseChannel;
  tag: string;
  pinned: PinnedRepo[];
  specPath: string;
  notesPath: string;
  title: string;
};

export type AppReleasePlan = {
  channel: ReleaseChannel;
  tag: string;
  version: string;
  pinned: PinnedRepo[];
  title: string;
};

export type DistributionRelease = {
  tag: string;
  prerelease: boolean;
};

export type RepoCommit = {
  sha: string;
  message: string;
  date: string | null;
};

export function repoUrl(repo: ReleaseRepo): string {
  return `https://github.com/${repo.slug}`;
}

export function commitUrl(repo: ReleaseRepo, sha: string): string {
  return `${repoUrl(repo)}/commit/${sha}`;
}

export function shortSha(sha: string): string {
  return sha.slice(0, 7);
}
