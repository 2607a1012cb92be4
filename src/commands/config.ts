import { ConductorSettings, configPath, loadSettings, updateSettingsValue } from "../config";
import { defaultReleaseConfigPath, loadReleaseConfig } from "../config/release";
import { exitCodeFor, formatError, printReleaseError } from "../errors";

function printSettings(settings: ConductorSettings): void {
  console.log(`Config file: ${configPath()}`);
  console.log(JSON.stringify(settings, null, 2));
}

export function runConfigShow(): void {
  const settings = loadSettings();
  printSettings(settings);
  const releaseFile = settings.release.config_file || defaultReleaseConfigPath();
  const release = loadReleaseConfig(releaseFile);
  if (!release.ok) {
    printReleaseError(release.error);
    process.exitCode = exitCodeFor(release.error.kind);
    return;
  }
  console.log(`Release config: ${releaseFile}`);
  console.log(`  distribution: ${release.value.distribution.slug}`);
  console.log(`  content repos: ${release.value.contentRepos.map((repo) => repo.id).join(", ")}`);
  console.log(`  app: ${release.value.app.repo.slug}`);
}

export function runConfigSet(key: string, value: string): void {
  const updated = updateSettingsValue(key, value);
  if (!updated) {
    console.log(formatError("invalid_input", "Invalid config key. Use workspace.root, release.config_file or mode.default."));
    process.exitCode = exitCodeFor("invalid_input");
    return;
  }
  console.log(`Config updated: ${configPath()}`);
  printSettings(updated);
}
