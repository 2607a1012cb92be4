import fs from "fs";
import os from "os";
import path from "path";

export type ConductorModeDefault = "guided" | "non-interactive";

export type ConductorSettings = {
  workspace: {
    root: string;
  };
  release: {
    config_file: string;
  };
  mode: {
    default: ConductorModeDefault;
  };
};

export function configPath(): string {
  const override = process.env.CONDUCTOR_CONFIG_PATH?.trim();
  if (override) {
    return path.resolve(override);
  }
  const root = process.env.APPDATA
    ? path.join(process.env.APPDATA, "release-conductor")
    : path.join(os.homedir(), ".config", "release-conductor");
  return path.join(root, "config.yml");
}

export function defaultSettings(): ConductorSettings {
  return {
    workspace: {
      root: process.cwd()
    },
    release: {
      config_file: ""
    },
    mode: {
      default: "guided"
    }
  };
}

function normalizeMode(value: string): ConductorModeDefault {
  return value.trim().toLowerCase() === "non-interactive" ? "non-interactive" : "guided";
}

function expandRoot(value: string): string {
  let out = value.trim();
  const home = os.homedir();
  out = out.replace(/\{\{home\}\}/gi, home);
  if (out.startsWith("~/")) {
    out = path.join(home, out.slice(2));
  }
  return path.resolve(out);
}

type SettingsInput = {
  root?: string;
  configFile?: string;
  mode?: string;
};

export function parseSimpleYaml(raw: string): SettingsInput {
  const result: SettingsInput = {};
  let section = "";
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const sectionMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*$/.exec(trimmed);
    if (sectionMatch) {
      section = sectionMatch[1];
      continue;
    }
    const valueMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.+)\s*$/.exec(trimmed);
    if (!valueMatch || !section) {
      continue;
    }
    const key = valueMatch[1];
    const value = valueMatch[2].replace(/^["']|["']$/g, "");
    if (section === "workspace" && key === "root") {
      result.root = value;
    } else if (section === "release" && key === "config_file") {
      result.configFile = value;
    } else if (section === "mode" && key === "default") {
      result.mode = value;
    }
  }
  return result;
}

function renderYaml(settings: ConductorSettings): string {
  return [
    "# release-conductor configuration",
    "# workspace.root holds the local clones; {{home}} and ~/ are expanded",
    "workspace:",
    `  root: ${settings.workspace.root}`,
    "release:",
    `  config_file: "${settings.release.config_file}"`,
    "mode:",
    `  default: ${settings.mode.default}`,
    ""
  ].join("\n");
}

export function mergeSettings(base: ConductorSettings, input: SettingsInput): ConductorSettings {
  return {
    workspace: {
      root: input.root?.trim() ? expandRoot(input.root) : base.workspace.root
    },
    release: {
      config_file: input.configFile?.trim() ? expandRoot(input.configFile) : base.release.config_file
    },
    mode: {
      default: input.mode ? normalizeMode(input.mode) : base.mode.default
    }
  };
}

export function loadSettings(): ConductorSettings {
  const defaults = defaultSettings();
  const file = configPath();
  if (!fs.existsSync(file)) {
    return defaults;
  }
  try {
    return mergeSettings(defaults, parseSimpleYaml(fs.readFileSync(file, "utf-8")));
  } catch {
    return defaults;
  }
}

export function saveSettings(settings: ConductorSettings): string {
  const file = configPath();
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, renderYaml(settings), "utf-8");
  return file;
}

export function updateSettingsValue(key: string, value: string): ConductorSettings | null {
  const current = loadSettings();
  const normalized = key.trim().toLowerCase();
  let next: ConductorSettings;
  if (normalized === "workspace.root") {
    next = mergeSettings(current, { root: value });
  } else if (normalized === "release.config_file") {
    next = mergeSettings(current, { configFile: value });
  } else if (normalized === "mode.default") {
    next = mergeSettings(current, { mode: value });
  } else {
    return null;
  }
  saveSettings(next);
  return next;
}
