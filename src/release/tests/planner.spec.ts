import { planAppRelease, planRelease, versionFromTag } from "../planner";
import { buildReleaseSpec, parsePublishedSpec, specMatchesPlan } from "../spec-artifact";
import { ScriptedRunner, createScriptedRunner, json, sha, testConfig, testContext, testRepo } from "./fakes";

const pinned = [
  { repo: testRepo("core"), sha: sha("a") },
  { repo: testRepo("loader"), sha: sha("b") }
];

describe("Release planning", () => {
  let runner: ScriptedRunner;

  beforeEach(() => {
    jest.clearAllMocks();
    runner = createScriptedRunner();
  });

  describe("planRelease", () => {
    it("should suggest the next beta after the published history", async () => {
      // Arrange: Stable v1.0.0 and a first beta of 1.1.0 are out
      runner.on(
        ["gh", "api", "repos/acme/dist/releases?per_page=100"],
        json([
          { tag_name: "v1.1.0-beta.1", prerelease: true },
          { tag_name: "v1.0.0", prerelease: false }
        ])
      );

      // Act: Plan a minor beta
      const result = await planRelease(testContext("/work", runner), { channel: "beta", bump: "minor", tagOverride: null, pinned });

      // Assert: Paths and title follow the tag
      expect(result).toEqual({
        ok: true,
        value: {
          channel: "beta",
          tag: "v1.1.0-beta.2",
          pinned,
          specPath: "specs/v1.1.0-beta.2.json",
          notesPath: "notes/v1.1.0-beta.2.md",
          title: "release: v1.1.0-beta.2 (beta)"
        }
      });
    });

    it("should validate an explicit tag", async () => {
      runner.on(["gh", "api", "repos/acme/dist/releases?per_page=100"], json([{ tag_name: "v1.0.0", prerelease: false }]));

      const result = await planRelease(testContext("/work", runner), { channel: "stable", bump: "patch", tagOverride: "v1.0.0", pinned });

      expect(!result.ok && result.error.kind).toBe("tag_exists");
    });
  });

  describe("planAppRelease", () => {
    it("should derive the version from the app repo history", async () => {
      runner.on(["gh", "api", "repos/acme/app/releases?per_page=100"], "[]");

      const result = await planAppRelease(testContext("/work", runner), {
        channel: "stable",
        bump: "minor",
        tagOverride: null,
        pinned: [{ repo: testRepo("app"), sha: sha("a") }]
      });

      expect(result.ok && [result.value.tag, result.value.version, result.value.title]).toEqual(["v0.1.0", "0.1.0", "release(app): v0.1.0"]);
    });

    it("should reject a tag without the v prefix", () => {
      const result = versionFromTag("1.0.0");

      expect(!result.ok && result.error.message).toBe("invalid app tag: 1.0.0");
    });
  });

  describe("release spec", () => {
    it("should omit the CI workflow for repos without one", () => {
      const spec = buildReleaseSpec(testConfig(), "beta", "v1.1.0-beta.1", [{ repo: testRepo("docs", { requiredCiWorkflow: undefined }), sha: sha("c") }]);

      expect(spec.repos).toEqual([{ id: "docs", url: "https://github.com/acme/docs", ref: "main", sha: sha("c") }]);
      expect(spec.pages).toEqual({ demo_url: "https://acme.test/beta/" });
    });

    it("should match a published spec only when every pin agrees", () => {
      const published = parsePublishedSpec(json(buildReleaseSpec(testConfig(), "stable", "v1.0.0", pinned)));
      const plan = { channel: "stable" as const, tag: "v1.0.0", pinned, specPath: "", notesPath: "", title: "" };

      expect(published.ok && specMatchesPlan(published.value, plan)).toBe(true);
      expect(published.ok && specMatchesPlan(published.value, { ...plan, tag: "v1.0.1" })).toBe(false);
    });

    it("should reject a spec without a channel", () => {
      expect(parsePublishedSpec(json({ tag: "v1.0.0", repos: [] }))).toEqual({ ok: false, error: "spec is missing tag or channel" });
    });
  });
});
