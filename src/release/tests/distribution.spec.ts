import fs from "fs";
import path from "path";
import type { ReleaseContext } from "../context";
import { artifactsMatchPlan, prepareDistributionPr, publishDistributionRelease } from "../distribution";
import type { ReleasePlan } from "../model";
import {
  CI_WORKFLOW,
  ScriptedRunner,
  createScriptedRunner,
  fakeCheckout,
  json,
  lastRequestId,
  makeTempDir,
  removeTempDir,
  sha,
  testContext,
  testRepo
} from "./fakes";

const PR_URL = "https://github.com/acme/dist/pull/9";

const plan: ReleasePlan = {
  channel: "stable",
  tag: "v1.0.0",
  pinned: [
    { repo: testRepo("core"), sha: sha("a") },
    { repo: testRepo("loader"), sha: sha("b") }
  ],
  specPath: "specs/v1.0.0.json",
  notesPath: "notes/v1.0.0.md",
  title: "release: v1.0.0 (stable)"
};

function scriptHappyPath(runner: ScriptedRunner): void {
  runner
    .on(["git", "status", "--porcelain"], "")
    .on(["git", "checkout"], "")
    .on(["git", "pull"], "")
    .on(["git", "add"], "")
    .on(["git", "commit"], "")
    .on(["git", "push"], "")
    .on(["git", "rev-parse", "HEAD"], `${sha("f")}\n`)
    .on(["gh", "pr", "create"], `${PR_URL}\n`)
    .on(["gh", "pr", "merge"], "")
    .on(["gh", "pr", "view"], json({ state: "MERGED", mergedAt: "2026-10-19T10:00:00Z" }));
}

describe("Distribution release", () => {
  let workspace: string;
  let distRoot: string;
  let runner: ScriptedRunner;
  let ctx: ReleaseContext;

  beforeEach(() => {
    jest.clearAllMocks();
    workspace = makeTempDir();
    distRoot = fakeCheckout(workspace, "dist");
    runner = createScriptedRunner();
    ctx = testContext(workspace, runner);
  });

  afterEach(() => {
    removeTempDir(workspace);
  });

  describe("prepareDistributionPr", () => {
    it("should write the spec and notes, then open and merge the PR", async () => {
      // Arrange: Every git and gh call succeeds
      scriptHappyPath(runner);

      // Act: Prepare
      const result = await prepareDistributionPr(ctx, plan, { userNotes: "First cut", notesFile: null });

      // Assert: PR URL, command sequence and artifacts
      expect(result).toEqual({ ok: true, value: PR_URL });
      expect(runner.commands()).toEqual([
        "git status --porcelain",
        "git checkout main",
        "git pull --ff-only origin main",
        "git checkout -b release/v1.0.0",
        "git add -A -- specs/v1.0.0.json notes/v1.0.0.md",
        "git commit -m release: add v1.0.0 spec",
        "git push -u origin release/v1.0.0",
        "git rev-parse HEAD",
        `gh pr create --repo acme/dist --base main --head release/v1.0.0 --title release: v1.0.0 (stable) --body channel=stable\n\nPinned SHAs:\n- core: ${sha("a")}\n- loader: ${sha("b")}`,
        `gh pr merge ${PR_URL} --repo acme/dist --rebase --auto --delete-branch`,
        `gh pr view ${PR_URL} --repo acme/dist --json state,mergedAt`
      ]);

      const spec: unknown = JSON.parse(fs.readFileSync(path.join(distRoot, "specs/v1.0.0.json"), "utf-8"));
      expect(spec).toEqual({
        schema: 1,
        channel: "stable",
        tag: "v1.0.0",
        repos: [
          { id: "core", url: "https://github.com/acme/core", ref: "main", sha: sha("a"), required_ci_workflow_file: CI_WORKFLOW },
          { id: "loader", url: "https://github.com/acme/loader", ref: "main", sha: sha("b"), required_ci_workflow_file: CI_WORKFLOW }
        ],
        assets: [{ id: "bundle-linux", kind: "bundle", os: "linux", arch: "x86_64", filename: "bundle-linux.zip" }],
        install_sets: [{ id: "default", os: "linux", arch: "x86_64", assets: ["bundle-linux"] }],
        pages: { demo_url: "https://acme.test/stable/" }
      });
      expect(fs.readFileSync(path.join(distRoot, "notes/v1.0.0.md"), "utf-8")).toBe(
        [
          "# v1.0.0",
          "",
          "Channel: stable",
          "",
          "## Pinned Repos",
          `- core: ${sha("a")} (https://github.com/acme/core/commit/${sha("a")})`,
          `- loader: ${sha("b")} (https://github.com/acme/loader/commit/${sha("b")})`,
          "",
          "## Notes",
          "First cut",
          ""
        ].join("\n")
      );
    });

    it("should skip the branch and PR on a second run", async () => {
      // Arrange: A first successful run leaves the artifacts on disk
      scriptHappyPath(runner);
      await prepareDistributionPr(ctx, plan, { userNotes: null, notesFile: null });
      runner.run.mockClear();

      // Act: Run again
      const result = await prepareDistributionPr(ctx, plan, { userNotes: null, notesFile: null });

      // Assert: Only the sync commands ran
      expect(result).toEqual({ ok: true, value: "(already merged) specs/v1.0.0.json" });
      expect(runner.commands()).toEqual(["git status --porcelain", "git checkout main", "git pull --ff-only origin main"]);
    });

    it("should report an already-merged plan in dry run without git or gh calls", async () => {
      // Arrange: A real run leaves the artifacts on disk
      scriptHappyPath(runner);
      await prepareDistributionPr(ctx, plan, { userNotes: null, notesFile: null });
      runner.run.mockClear();

      // Act: Dry run of the same plan
      const result = await prepareDistributionPr({ ...ctx, dryRun: true }, plan, { userNotes: null, notesFile: null });

      // Assert: Skipped before any branch, commit or PR
      expect(result).toEqual({ ok: true, value: "(already merged) specs/v1.0.0.json" });
      expect(runner.run).not.toHaveBeenCalled();
    });

    it("should refuse a dirty checkout", async () => {
      runner.on(["git", "status", "--porcelain"], " M specs/v0.9.0.json\n");

      const result = await prepareDistributionPr(ctx, plan, { userNotes: null, notesFile: null });

      expect(result).toEqual({
        ok: false,
        error: { kind: "dist_repo_dirty", message: `distribution repo is dirty: ${distRoot}`, hint: "Commit/stash changes in dist/ then retry." }
      });
    });

    it("should touch nothing in dry run", async () => {
      const result = await prepareDistributionPr({ ...ctx, dryRun: true }, plan, { userNotes: null, notesFile: null });

      expect(result).toEqual({ ok: true, value: "(dry-run)" });
      expect(runner.run).not.toHaveBeenCalled();
      expect(fs.existsSync(path.join(distRoot, "specs"))).toBe(false);
    });
  });

  describe("artifactsMatchPlan", () => {
    it("should not match when a pin differs", async () => {
      scriptHappyPath(runner);
      await prepareDistributionPr(ctx, plan, { userNotes: null, notesFile: null });

      const moved: ReleasePlan = { ...plan, pinned: [plan.pinned[0], { repo: testRepo("loader"), sha: sha("c") }] };

      expect(artifactsMatchPlan(distRoot, plan)).toBe(true);
      expect(artifactsMatchPlan(distRoot, moved)).toBe(false);
    });

    it("should not match when the notes file is missing", async () => {
      scriptHappyPath(runner);
      await prepareDistributionPr(ctx, plan, { userNotes: null, notesFile: null });
      fs.rmSync(path.join(distRoot, plan.notesPath));

      expect(artifactsMatchPlan(distRoot, plan)).toBe(false);
    });
  });

  describe("publishDistributionRelease", () => {
    it("should dispatch the publish workflow and watch the run", async () => {
      // Arrange: Dispatch accepted; the titled run listed after it
      runner
        .on(["gh", "workflow", "run"], "")
        .on(["gh", "run", "list"], "[]", () =>
          json([
            {
              databaseId: 42,
              url: "https://github.com/acme/dist/actions/runs/42",
              event: "workflow_dispatch",
              headBranch: "main",
              displayTitle: `publish ${lastRequestId(runner)}`
            }
          ])
        )
        .on(["gh", "run", "watch"], "");

      // Act: Publish with watch
      const result = await publishDistributionRelease(ctx, plan, true);

      // Assert: Run URL and dispatch inputs
      expect(result).toEqual({ ok: true, value: "https://github.com/acme/dist/actions/runs/42" });
      const dispatch: string[] = runner.run.mock.calls[1]?.[0] ?? [];
      expect(dispatch.slice(0, 14)).toEqual([
        "gh",
        "workflow",
        "run",
        "publish.yml",
        "--repo",
        "acme/dist",
        "--ref",
        "main",
        "-f",
        "channel=stable",
        "-f",
        "tag=v1.0.0",
        "-f",
        "spec_path=specs/v1.0.0.json"
      ]);
      expect(runner.commands()[3]).toBe("gh run watch --repo acme/dist 42 --exit-status");
    });
  });
});
