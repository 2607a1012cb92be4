import type { ReleaseBump } from "./model";

export type SemVer = {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
};

export type BetaTag = {
  readonly base: SemVer;
  readonly n: number;
};

const STABLE_RE = /^v(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/;
const BETA_RE = /^v(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)-beta\.(0|[1-9]\d*)$/;

export const ZERO: SemVer = { major: 0, minor: 0, patch: 0 };

export function semver(major: number, minor: number, patch: number): SemVer {
  return { major, minor, patch };
}

export function parseStable(tag: string): SemVer | null {
  const match = STABLE_RE.exec(tag);
  if (!match) {
    return null;
  }
  return semver(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function parseBeta(tag: string): BetaTag | null {
  const match = BETA_RE.exec(tag);
  if (!match) {
    return null;
  }
  return {
    base: semver(Number(match[1]), Number(match[2]), Number(match[3])),
    n: Number(match[4])
  };
}

export function formatVersion(version: SemVer): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

export function formatStable(version: SemVer): string {
  return `v${formatVersion(version)}`;
}

export function formatBeta(base: SemVer, n: number): string {
  return `${formatStable(base)}-beta.${n}`;
}

export function compareSemVer(a: SemVer, b: SemVer): number {
  if (a.major !== b.major) {
    return a.major - b.major;
  }
  if (a.minor !== b.minor) {
    return a.minor - b.minor;
  }
  return a.patch - b.patch;
}

export function maxSemVer(a: SemVer, b: SemVer): SemVer {
  return compareSemVer(a, b) >= 0 ? a : b;
}

export function bump(version: SemVer, kind: ReleaseBump): SemVer {
  switch (kind) {
    case "major":
      return semver(version.major + 1, 0, 0);
    case "minor":
      return semver(version.major, version.minor + 1, 0);
    case "patch":
      return semver(version.major, version.minor, version.patch + 1);
  }
}

/** Key used to index per-base beta counters. */
export function versionKey(version: SemVer): string {
  return formatVersion(version);
}
