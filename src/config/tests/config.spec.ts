import fs from "fs";
import os from "os";
import path from "path";
import { defaultSettings, loadSettings, mergeSettings, parseSimpleYaml, updateSettingsValue } from "..";
import { demoUrl, loadReleaseConfig, repoLocalPath } from "../release";

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "conductor-config-"));
}

describe("Settings", () => {
  let dir: string;
  const previous = process.env.CONDUCTOR_CONFIG_PATH;

  beforeEach(() => {
    dir = tempDir();
    process.env.CONDUCTOR_CONFIG_PATH = path.join(dir, "config.yml");
  });

  afterEach(() => {
    if (previous === undefined) {
      delete process.env.CONDUCTOR_CONFIG_PATH;
    } else {
      process.env.CONDUCTOR_CONFIG_PATH = previous;
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("parseSimpleYaml", () => {
    it("should read the known keys and ignore the rest", () => {
      const raw = [
        "# comment",
        "workspace:",
        "  root: /srv/work",
        "release:",
        '  config_file: "/etc/release.json"',
        "  other: ignored",
        "mode:",
        "  default: non-interactive"
      ].join("\n");

      expect(parseSimpleYaml(raw)).toEqual({ root: "/srv/work", configFile: "/etc/release.json", mode: "non-interactive" });
    });

    it("should skip values outside a section", () => {
      expect(parseSimpleYaml("root: /nowhere\n")).toEqual({});
    });
  });

  describe("mergeSettings", () => {
    it("should expand ~/ and fall back to guided for unknown modes", () => {
      const merged = mergeSettings(defaultSettings(), { root: "~/work", mode: "chaotic" });

      expect(merged.workspace.root).toBe(path.join(os.homedir(), "work"));
      expect(merged.mode.default).toBe("guided");
    });

    it("should keep base values for blank input", () => {
      const base = { workspace: { root: "/base" }, release: { config_file: "/r.json" }, mode: { default: "non-interactive" as const } };

      expect(mergeSettings(base, { root: "  ", configFile: "" })).toEqual(base);
    });
  });

  describe("updateSettingsValue", () => {
    it("should persist a known key and reload it", () => {
      const updated = updateSettingsValue("Mode.Default", "non-interactive");

      expect(updated?.mode.default).toBe("non-interactive");
      expect(loadSettings().mode.default).toBe("non-interactive");
    });

    it("should return null for an unknown key without writing", () => {
      expect(updateSettingsValue("color.theme", "dark")).toBeNull();
      expect(fs.existsSync(path.join(dir, "config.yml"))).toBe(false);
    });
  });
});

describe("Release config", () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function variant(edit: (config: Record<string, unknown>) => Record<string, unknown>): string {
    const loaded = loadReleaseConfig();
    if (!loaded.ok) {
      throw new Error(loaded.error.message);
    }
    const file = path.join(dir, "release.json");
    fs.writeFileSync(file, JSON.stringify(edit({ ...loaded.value })), "utf-8");
    return file;
  }

  it("should load the bundled defaults", () => {
    const result = loadReleaseConfig();

    expect(result.ok && result.value.contentRepos.map((repo) => repo.id)).toEqual(["loader", "bridge", "core", "plugin-host"]);
    expect(result.ok && result.value.app.versionFiles).toEqual(["package.json", "desktop/app.conf.json"]);
  });

  it("should reject a duplicate repo id", () => {
    const file = variant((config) => ({
      ...config,
      app: { repo: { id: "core", slug: "example-org/manager", ref: "main" }, localDir: "manager", versionFiles: ["package.json"], candidateWorkflow: "c.yml", releaseWorkflow: "r.yml" }
    }));

    const result = loadReleaseConfig(file);

    expect(!result.ok && result.error.message).toBe("duplicate repo id in release config: core");
  });

  it("should reject a head repo that is not a content repo", () => {
    const file = variant((config) => ({ ...config, headRepoIds: ["core", "app"] }));

    const result = loadReleaseConfig(file);

    expect(!result.ok && result.error.message).toBe("unknown content repo id in release config: app");
  });

  it("should report a missing file", () => {
    const file = path.join(dir, "missing.json");

    const result = loadReleaseConfig(file);

    expect(!result.ok && result.error.message).toBe(`unable to read release config: ${file}`);
  });

  it("should fill the demo URL and place clones under the workspace", () => {
    const loaded = loadReleaseConfig();
    if (!loaded.ok) {
      throw new Error(loaded.error.message);
    }

    expect(demoUrl(loaded.value, "beta")).toBe("https://example-org.github.io/distribution/demos/beta/");
    expect(repoLocalPath("/work", { id: "x", slug: "acme/widgets", ref: "main" })).toBe(path.join("/work", "widgets"));
    expect(repoLocalPath("/work", { id: "x", slug: "acme/widgets", ref: "main", localPath: "nested/w" })).toBe(path.join("/work", "nested/w"));
  });
});
