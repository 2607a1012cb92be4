export type RuntimeFlags = {
  nonInteractive: boolean;
  dryRun: boolean;
  watch: boolean;
  workspace?: string;
};

const flags: RuntimeFlags = {
  nonInteractive: false,
  dryRun: false,
  watch: false,
  workspace: undefined
};

export function setFlags(next: Partial<RuntimeFlags>): void {
  if ("nonInteractive" in next) {
    flags.nonInteractive = Boolean(next.nonInteractive);
  }
  if ("dryRun" in next) {
    flags.dryRun = Boolean(next.dryRun);
  }
  if ("watch" in next) {
    flags.watch = Boolean(next.watch);
  }
  if ("workspace" in next) {
    flags.workspace = typeof next.workspace === "string" ? next.workspace : undefined;
  }
}

export function getFlags(): RuntimeFlags {
  return { ...flags };
}
