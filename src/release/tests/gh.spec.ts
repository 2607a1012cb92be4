import {
  compareCommits,
  currentUser,
  ensureWriteAccess,
  getRepoFileText,
  listRecentCommits,
  listReleases,
  runGhRead
} from "../gh";
import { FakeClock, ScriptedRunner, createFakeClock, createScriptedRunner, json, sha, testContext } from "./fakes";

describe("GitHub CLI access", () => {
  let runner: ScriptedRunner;
  let clock: FakeClock;

  beforeEach(() => {
    jest.clearAllMocks();
    runner = createScriptedRunner();
    clock = createFakeClock();
  });

  describe("runGhRead", () => {
    it("should retry transient failures with a growing delay", async () => {
      // Arrange: Two gateway errors, then success
      runner.on(["gh", "api", "user"], { stderr: "HTTP 502: Bad Gateway" }, { stderr: "HTTP 502: Bad Gateway" }, "{}");
      const ctx = testContext("/work", runner, { clock });

      // Act: Run the read
      const result = await runGhRead(ctx, ["gh", "api", "user"], { kind: "invalid_input", message: "read failed" });

      // Assert: Third attempt wins after 1s and 2s waits
      expect(result).toEqual({ ok: true, value: "{}" });
      expect(runner.run).toHaveBeenCalledTimes(3);
      expect(clock.sleep.mock.calls).toEqual([[1000], [2000]]);
    });

    it("should fail at once on a non-transient error", async () => {
      runner.on(["gh", "api", "user"], { stderr: "HTTP 404: Not Found\n" });
      const ctx = testContext("/work", runner, { clock });

      const result = await runGhRead(ctx, ["gh", "api", "user"], { kind: "invalid_input", message: "read failed" });

      expect(result).toEqual({ ok: false, error: { kind: "invalid_input", message: "read failed", hint: "HTTP 404: Not Found" } });
      expect(runner.run).toHaveBeenCalledTimes(1);
      expect(clock.sleep).not.toHaveBeenCalled();
    });

    it("should give up after the last attempt", async () => {
      runner.on(["gh", "api", "user"], { stderr: "connection reset by peer" });
      const ctx = testContext("/work", runner, { clock });

      const result = await runGhRead(ctx, ["gh", "api", "user"], { kind: "invalid_input", message: "read failed" });

      expect(result.ok).toBe(false);
      expect(runner.run).toHaveBeenCalledTimes(3);
    });
  });

  describe("ensureWriteAccess", () => {
    beforeEach(() => {
      runner.on(["gh", "--version"], "gh version 2.50.0").on(["gh", "auth", "status"], "");
    });

    it("should accept WRITE permission", async () => {
      runner.on(["gh", "repo", "view"], json({ viewerPermission: "WRITE" }));

      const result = await ensureWriteAccess(testContext("/work", runner), "acme/dist", "distribution");

      expect(result).toEqual({ ok: true, value: undefined });
      expect(runner.run).toHaveBeenCalledWith(["gh", "repo", "view", "acme/dist", "--json", "viewerPermission"], expect.anything());
    });

    it("should reject READ permission", async () => {
      runner.on(["gh", "repo", "view"], json({ viewerPermission: "READ" }));

      const result = await ensureWriteAccess(testContext("/work", runner), "acme/dist", "distribution");

      expect(result).toEqual({
        ok: false,
        error: {
          kind: "permission_denied",
          message: "insufficient permission for distribution repo (READ)",
          hint: "You need WRITE/MAINTAIN/ADMIN on acme/dist."
        }
      });
    });

    it("should report a missing gh before anything else", async () => {
      const missing = createScriptedRunner().on(["gh", "--version"], { stderr: "spawn gh ENOENT" });

      const result = await ensureWriteAccess(testContext("/work", missing), "acme/dist", "distribution");

      expect(!result.ok && result.error.kind).toBe("gh_missing");
      expect(missing.run).toHaveBeenCalledTimes(1);
    });

    it("should require authentication", async () => {
      const anonymous = createScriptedRunner()
        .on(["gh", "--version"], "gh version 2.50.0")
        .on(["gh", "auth", "status"], { stderr: "You are not logged into any GitHub hosts." });

      const result = await ensureWriteAccess(testContext("/work", anonymous), "acme/dist", "distribution");

      expect(!result.ok && result.error).toEqual({ kind: "gh_auth_required", message: "gh auth required", hint: "Run: gh auth login" });
    });
  });

  describe("API readers", () => {
    it("should read the login of the current user", async () => {
      runner.on(["gh", "api", "user"], json({ login: "octo" }));

      expect(await currentUser(testContext("/work", runner))).toEqual({ ok: true, value: "octo" });
    });

    it("should name the endpoint when the API call fails", async () => {
      runner.on(["gh", "api", "user"], { stderr: "HTTP 401: Bad credentials" });

      const result = await currentUser(testContext("/work", runner));

      expect(!result.ok && result.error).toEqual({ kind: "invalid_input", message: "gh api failed: user", hint: "HTTP 401: Bad credentials" });
    });

    it("should skip releases without a boolean prerelease flag", async () => {
      runner.on(
        ["gh", "api", "repos/acme/dist/releases?per_page=100"],
        json([
          { tag_name: "v1.0.0", prerelease: false },
          { tag_name: "v1.1.0-beta.1", prerelease: true },
          { tag_name: "v0.9.0" }
        ])
      );

      const result = await listReleases(testContext("/work", runner), "acme/dist");

      expect(result).toEqual({
        ok: true,
        value: [
          { tag: "v1.0.0", prerelease: false },
          { tag: "v1.1.0-beta.1", prerelease: true }
        ]
      });
    });

    it("should keep only the first line of each commit message", async () => {
      runner.on(
        ["gh", "api", "repos/acme/core/commits?sha=main&per_page=2"],
        json([
          { sha: sha("a"), commit: { message: "fix: loader\n\nlong body", committer: { date: "2026-01-02T00:00:00Z" } } },
          { sha: sha("b"), commit: { message: "chore: deps" } }
        ])
      );

      const result = await listRecentCommits(testContext("/work", runner), "acme/core", "main", 2);

      expect(result).toEqual({
        ok: true,
        value: [
          { sha: sha("a"), message: "fix: loader", date: "2026-01-02T00:00:00Z" },
          { sha: sha("b"), message: "chore: deps", date: null }
        ]
      });
    });

    it("should decode base64 file contents", async () => {
      const content = Buffer.from('{"tag":"v1.0.0"}', "utf-8").toString("base64");
      runner.on(["gh", "api", "repos/acme/dist/contents/specs/v1.0.0.json?ref=main"], json({ encoding: "base64", content: `${content}\n` }));

      const result = await getRepoFileText(testContext("/work", runner), "acme/dist", "specs/v1.0.0.json", "main");

      expect(result).toEqual({ ok: true, value: '{"tag":"v1.0.0"}' });
    });

    it("should read ahead and behind counts from a comparison", async () => {
      runner.on(["gh", "api", `repos/acme/core/compare/${sha("a")}...${sha("b")}`], json({ status: "ahead", ahead_by: 3, behind_by: 0 }));

      const result = await compareCommits(testContext("/work", runner), "acme/core", sha("a"), sha("b"));

      expect(result).toEqual({ ok: true, value: { status: "ahead", aheadBy: 3, behindBy: 0 } });
    });
  });
});
