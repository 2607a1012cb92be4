import path from "path";

export type BundledDir = "schemas" | "templates" | "defaults";

/** Package root holding the bundled schemas, templates and defaults. */
export function getRepoRoot(): string {
  const override = process.env.CONDUCTOR_REPO_ROOT?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.resolve(__dirname, "..");
}

export function bundledPath(dir: BundledDir, ...segments: string[]): string {
  return path.join(getRepoRoot(), dir, ...segments);
}
