import fs from "fs";
import path from "path";
import { MAX_NOTES_B64_LENGTH, applyAppVersion, currentAppVersion, notesInputs, prepareAppPr, publishAppRelease } from "../app-release";
import type { ReleaseContext } from "../context";
import type { AppReleasePlan } from "../model";
import {
  ScriptedRunner,
  createScriptedRunner,
  fakeCheckout,
  json,
  lastRequestId,
  makeTempDir,
  removeTempDir,
  sha,
  testConfig,
  testContext,
  testRepo,
  writeFile
} from "./fakes";

const PR_URL = "https://github.com/acme/app/pull/12";

const plan: AppReleasePlan = {
  channel: "stable",
  tag: "v1.1.0",
  version: "1.1.0",
  pinned: [{ repo: testRepo("app"), sha: sha("a") }],
  title: "release(app): v1.1.0 (stable)"
};

/** Lists no run before the dispatch, then one run titled with the dispatched request id. */
function dispatchRun(runner: ScriptedRunner, id: number): [string, () => string] {
  const listed = () =>
    json([
      {
        databaseId: id,
        url: `https://github.com/acme/app/actions/runs/${id}`,
        event: "workflow_dispatch",
        headBranch: "main",
        displayTitle: `release ${lastRequestId(runner)}`
      }
    ]);
  return ["[]", listed];
}

describe("App release", () => {
  let workspace: string;
  let appRoot: string;
  let runner: ScriptedRunner;
  let ctx: ReleaseContext;

  beforeEach(() => {
    jest.clearAllMocks();
    workspace = makeTempDir();
    appRoot = fakeCheckout(workspace, "app");
    runner = createScriptedRunner();
    ctx = testContext(workspace, runner);
  });

  afterEach(() => {
    removeTempDir(workspace);
  });

  describe("version files", () => {
    it("should read the shared version", () => {
      writeFile(appRoot, "package.json", json({ name: "app", version: "1.0.0" }));
      writeFile(appRoot, "web/package.json", json({ version: "1.0.0" }));

      expect(currentAppVersion(appRoot, ["package.json", "web/package.json"])).toEqual({ ok: true, value: "1.0.0" });
    });

    it("should refuse files that disagree", () => {
      writeFile(appRoot, "package.json", json({ version: "1.0.0" }));
      writeFile(appRoot, "web/package.json", json({ version: "0.9.0" }));

      const result = currentAppVersion(appRoot, ["package.json", "web/package.json"]);

      expect(!result.ok && result.error).toEqual({
        kind: "invalid_input",
        message: "app version files disagree on the current version",
        hint: "package.json: 1.0.0\nweb/package.json: 0.9.0"
      });
    });

    it("should refuse a file without a version field", () => {
      writeFile(appRoot, "package.json", json({ name: "app" }));

      const result = currentAppVersion(appRoot, ["package.json"]);

      expect(!result.ok && result.error.message).toBe(`version file has no "version" field: ${path.join(appRoot, "package.json")}`);
    });

    it("should rewrite only the files that differ", () => {
      writeFile(appRoot, "package.json", json({ name: "app", version: "1.0.0" }));
      writeFile(appRoot, "web/package.json", json({ version: "1.1.0" }));

      const result = applyAppVersion(appRoot, ["package.json", "web/package.json"], "1.1.0");

      expect(result).toEqual({ ok: true, value: ["package.json"] });
      expect(fs.readFileSync(path.join(appRoot, "package.json"), "utf-8")).toBe('{\n  "name": "app",\n  "version": "1.1.0"\n}\n');
    });
  });

  describe("prepareAppPr", () => {
    it("should bump the version on a branch cut from the pinned sha", async () => {
      // Arrange: App at 1.0.0; every git and gh call succeeds
      writeFile(appRoot, "package.json", json({ name: "app", version: "1.0.0" }));
      runner
        .on(["git"], "")
        .on(["git", "rev-parse", "HEAD"], `${sha("f")}\n`)
        .on(["gh", "pr", "create"], `${PR_URL}\n`)
        .on(["gh", "pr", "merge"], "")
        .on(["gh", "pr", "view"], json({ state: "MERGED", mergedAt: "2026-10-19T10:00:00Z" }));

      // Act: Prepare from sha a
      const result = await prepareAppPr(ctx, plan, sha("a"));

      // Assert: Merged commit is the new source sha; branch is kept
      expect(result).toEqual({ ok: true, value: { prUrl: PR_URL, sourceSha: sha("f") } });
      expect(runner.commands()).toEqual([
        "git status --porcelain",
        "git checkout main",
        "git pull --ff-only origin main",
        `git checkout -b release/v1.1.0-aaaaaaaa ${sha("a")}`,
        "git add -A -- package.json",
        "git commit -m release(app): bump version to 1.1.0",
        "git push -u origin release/v1.1.0-aaaaaaaa",
        "git rev-parse HEAD",
        `gh pr create --repo acme/app --base main --head release/v1.1.0-aaaaaaaa --title release(app): v1.1.0 (stable) --body tag=v1.1.0\nversion=1.1.0\n\nPinned SHAs:\n- app: ${sha("a")}`,
        `gh pr merge ${PR_URL} --repo acme/app --rebase --auto`,
        `gh pr view ${PR_URL} --repo acme/app --json state,mergedAt`
      ]);
    });

    it("should skip the PR when the version is already on the default branch", async () => {
      writeFile(appRoot, "package.json", json({ version: "1.1.0" }));
      runner.on(["git"], "");

      const result = await prepareAppPr(ctx, plan, sha("a"));

      expect(result).toEqual({ ok: true, value: { prUrl: "(already merged) v1.1.0", sourceSha: sha("a") } });
      expect(runner.run).toHaveBeenCalledTimes(3);
    });

    it("should report an already-merged version in dry run", async () => {
      writeFile(appRoot, "package.json", json({ version: "1.1.0" }));

      const result = await prepareAppPr({ ...ctx, dryRun: true }, plan, sha("a"));

      expect(result).toEqual({ ok: true, value: { prUrl: "(already merged) v1.1.0", sourceSha: sha("a") } });
      expect(runner.run).not.toHaveBeenCalled();
    });

    it("should echo the PR in dry run when the version files cannot be read", async () => {
      const result = await prepareAppPr({ ...ctx, dryRun: true }, plan, sha("a"));

      expect(result).toEqual({ ok: true, value: { prUrl: "(dry-run)", sourceSha: sha("a") } });
      expect(runner.run).not.toHaveBeenCalled();
    });
  });

  describe("notesInputs", () => {
    it("should encode notes for the workflow", () => {
      const result = notesInputs({ sourcePath: " /notes/v1.1.0.md ", markdown: "hello", sha256: "x" });

      expect(result).toEqual({
        ok: true,
        value: [
          ["notes_b64", "aGVsbG8="],
          ["notes_source", "/notes/v1.1.0.md"]
        ]
      });
      expect(notesInputs(null)).toEqual({ ok: true, value: [] });
    });

    it("should refuse notes that exceed the dispatch input limit", () => {
      const markdown = "a".repeat((MAX_NOTES_B64_LENGTH / 4) * 3 + 3);

      const result = notesInputs({ sourcePath: "/n.md", markdown, sha256: "x" });

      expect(!result.ok && result.error.message).toBe("notes markdown is too large for workflow dispatch input");
    });
  });

  describe("publishAppRelease", () => {
    it("should run the candidate workflow before the release workflow", async () => {
      // Arrange: Both dispatches accepted; each workflow lists one run
      runner
        .on(["gh", "workflow", "run"], "")
        .on(["gh", "run", "list", "--repo", "acme/app", "--workflow", "candidate.yml"], ...dispatchRun(runner, 1))
        .on(["gh", "run", "list", "--repo", "acme/app", "--workflow", "release.yml"], ...dispatchRun(runner, 2));

      // Act: Publish without watching
      const result = await publishAppRelease(ctx, plan, sha("f"), { sourcePath: "/n.md", markdown: "hi", sha256: "x" }, false);

      // Assert: Both run URLs; inputs in order
      expect(result).toEqual({
        ok: true,
        value: { candidateUrl: "https://github.com/acme/app/actions/runs/1", releaseUrl: "https://github.com/acme/app/actions/runs/2" }
      });
      const commands = runner.commands();
      expect(commands[1]).toMatch(new RegExp(`^gh workflow run candidate\\.yml --repo acme/app --ref main -f source_sha=${sha("f")} -f request_id=rc-`));
      expect(commands[4]).toMatch(
        new RegExp(`^gh workflow run release\\.yml --repo acme/app --ref main -f tag=v1\\.1\\.0 -f source_sha=${sha("f")} -f notes_b64=aGk= -f notes_source=/n\\.md -f request_id=rc-`)
      );
    });

    it("should not dispatch the release when the candidate fails", async () => {
      runner
        .on(["gh", "workflow", "run"], "")
        .on(["gh", "run", "list"], ...dispatchRun(runner, 1))
        .on(["gh", "run", "watch"], { stderr: "run 1 failed" });

      const result = await publishAppRelease({ ...ctx, config: testConfig() }, plan, sha("f"), null, true);

      expect(!result.ok && result.error.message).toBe("workflow run failed");
      expect(runner.commands().filter((command) => command.startsWith("gh workflow run"))).toHaveLength(1);
    });
  });
});
