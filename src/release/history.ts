import { Result, err, ok, releaseError } from "../errors";
import type { DistributionRelease, ReleaseBump, ReleaseChannel } from "./model";
import {
  SemVer,
  ZERO,
  bump as bumpVersion,
  compareSemVer,
  formatBeta,
  formatStable,
  maxSemVer,
  parseBeta,
  parseStable,
  versionKey
} from "./semver";

export type ReleaseHistory = {
  latestStable: SemVer | null;
  latestBetaBase: SemVer | null;
  /** Highest beta number seen per base, keyed by `versionKey(base)`. */
  betaMaxByBase: ReadonlyMap<string, number>;
  existingTags: ReadonlySet<string>;
};

export function computeHistory(releases: DistributionRelease[]): ReleaseHistory {
  let latestStable: SemVer | null = null;
  let latestBetaBase: SemVer | null = null;
  const betaMax = new Map<string, number>();
  const tags = new Set<string>();

  for (const release of releases) {
    tags.add(release.tag);
    if (!release.prerelease) {
      const version = parseStable(release.tag);
      if (version) {
        latestStable = latestStable ? maxSemVer(latestStable, version) : version;
      }
      continue;
    }
    const beta = parseBeta(release.tag);
    if (!beta) {
      continue;
    }
    const key = versionKey(beta.base);
    betaMax.set(key, Math.max(betaMax.get(key) ?? beta.n, beta.n));
    latestBetaBase = latestBetaBase ? maxSemVer(latestBetaBase, beta.base) : beta.base;
  }

  return { latestStable, latestBetaBase, betaMaxByBase: betaMax, existingTags: tags };
}

export function suggestTag(channel: ReleaseChannel, bump: ReleaseBump, history: ReleaseHistory): string {
  const candidate = bumpVersion(history.latestStable ?? ZERO, bump);
  if (channel === "stable") {
    return formatStable(candidate);
  }
  // An in-flight beta line with a higher base keeps its sequence.
  const base =
    history.latestBetaBase && compareSemVer(history.latestBetaBase, candidate) > 0 ? history.latestBetaBase : candidate;
  const n = (history.betaMaxByBase.get(versionKey(base)) ?? 0) + 1;
  return formatBeta(base, Math.max(n, 1));
}

export function validateTag(channel: ReleaseChannel, tag: string, history: ReleaseHistory): Result<void> {
  if (history.existingTags.has(tag)) {
    return err(releaseError("tag_exists", `tag already exists: ${tag}`, "Pick a new version tag."));
  }

  if (channel === "stable") {
    const version = parseStable(tag);
    if (!version) {
      return err(releaseError("invalid_tag", `invalid stable tag: ${tag}`, "Expected: vMAJOR.MINOR.PATCH"));
    }
    if (history.latestStable && compareSemVer(version, history.latestStable) <= 0) {
      return err(
        releaseError(
          "invalid_tag",
          `stable tag must be > latest stable (${formatStable(history.latestStable)})`,
          "Use --bump or --tag to choose a higher version."
        )
      );
    }
    return ok(undefined);
  }

  const beta = parseBeta(tag);
  if (!beta) {
    return err(releaseError("invalid_tag", `invalid beta tag: ${tag}`, "Expected: vMAJOR.MINOR.PATCH-beta.N"));
  }
  if (beta.n < 1) {
    return err(releaseError("invalid_tag", `invalid beta number in tag: ${tag}`, "beta.N must be >= 1"));
  }
  if (history.latestStable && compareSemVer(beta.base, history.latestStable) <= 0) {
    return err(
      releaseError(
        "invalid_tag",
        `beta base version must be > latest stable (${formatStable(history.latestStable)})`,
        "Use --bump or --tag to choose a higher version."
      )
    );
  }
  if (history.latestBetaBase && compareSemVer(beta.base, history.latestBetaBase) < 0) {
    return err(
      releaseError(
        "invalid_tag",
        `beta base version must be >= latest beta base (${formatStable(history.latestBetaBase)})`,
        "Use --tag to continue the current beta base."
      )
    );
  }
  return ok(undefined);
}

/** Most recent published tag on a channel, or null when the channel has none. */
export function latestTag(channel: ReleaseChannel, history: ReleaseHistory): string | null {
  if (channel === "stable") {
    return history.latestStable ? formatStable(history.latestStable) : null;
  }
  if (!history.latestBetaBase) {
    return null;
  }
  const n = history.betaMaxByBase.get(versionKey(history.latestBetaBase));
  return n === undefined ? null : formatBeta(history.latestBetaBase, n);
}

export function previousReleaseTag(channel: ReleaseChannel, history: ReleaseHistory): string | null {
  return latestTag(channel, history) ?? latestTag(channel === "stable" ? "beta" : "stable", history);
}
