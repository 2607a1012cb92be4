import type { ReleaseConfig } from "../config/release";
import type { Clock } from "../platform/clock";
import type { CommandRunner } from "../platform/process-exec";
import type { Logger } from "../ui/logger";

/** Everything a release operation touches, passed explicitly. */
export type ReleaseContext = {
  workspaceRoot: string;
  config: ReleaseConfig;
  runner: CommandRunner;
  clock: Clock;
  logger: Logger;
  dryRun: boolean;
};
