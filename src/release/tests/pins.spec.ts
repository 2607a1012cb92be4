import path from "path";
import type { ReleaseContext } from "../context";
import {
  AutoBlocker,
  AutoSuggestion,
  applySuggestions,
  describeBlocker,
  parseAssignments,
  resolveAutoSmart,
  resolveAutoStrict,
  resolveExplicitPins
} from "../pins";
import { RepoReadiness, readinessHint, readinessIssues } from "../readiness";
import {
  ScriptedRunner,
  createScriptedRunner,
  fakeCheckout,
  json,
  makeTempDir,
  removeTempDir,
  sha,
  testConfig,
  testContext,
  testRepo
} from "./fakes";

const CLEAN = "## main...origin/main\n";
const repos = testConfig().contentRepos;

type RepoScript = {
  local?: { status: string; head: string };
  remote: string;
  green: string[];
};

function runsEndpoint(id: string): string {
  return `repos/acme/${id}/actions/workflows/.github%2Fworkflows%2Fci.yml/runs?branch=main&event=push&status=success&per_page=30`;
}

function scriptRepo(runner: ScriptedRunner, workspace: string, id: string, script: RepoScript): void {
  if (script.local) {
    const dir = fakeCheckout(workspace, id);
    runner.onIn(dir, ["git", "status"], script.local.status).onIn(dir, ["git", "rev-parse", "HEAD"], script.local.head);
  }
  runner
    .on(["gh", "api", `repos/acme/${id}/commits/main`], json({ sha: script.remote }))
    .on(["gh", "api", runsEndpoint(id)], json({ workflow_runs: script.green.map((head) => ({ head_sha: head })) }));
}

function scriptPreviousRelease(runner: ScriptedRunner, pins: Record<string, string>): void {
  const spec = {
    schema: 1,
    channel: "stable",
    tag: "v1.0.0",
    repos: Object.entries(pins).map(([id, pinned]) => ({ id, sha: pinned }))
  };
  runner
    .on(["gh", "api", "repos/acme/dist/releases?per_page=100"], json([{ tag_name: "v1.0.0", prerelease: false }]))
    .on(
      ["gh", "api", "repos/acme/dist/contents/specs/v1.0.0.json?ref=main"],
      json({ encoding: "base64", content: Buffer.from(json(spec), "utf-8").toString("base64") })
    );
}

function ciAt(runner: ScriptedRunner, id: string, commit: string, green: boolean): void {
  runner.on(
    ["gh", "run", "list", "--repo", `acme/${id}`, "--workflow", ".github/workflows/ci.yml", "--commit", commit],
    green ? json([{ databaseId: 1 }]) : "[]"
  );
}

describe("Pin resolution", () => {
  let workspace: string;
  let runner: ScriptedRunner;
  let ctx: ReleaseContext;

  beforeEach(() => {
    jest.clearAllMocks();
    workspace = makeTempDir();
    runner = createScriptedRunner();
    ctx = testContext(workspace, runner);
  });

  afterEach(() => {
    removeTempDir(workspace);
  });

  describe("parseAssignments", () => {
    it("should trim ids and values", () => {
      const result = parseAssignments(["core=abc", " loader = def "], repos, "--repo");

      expect(result.ok && [...result.value]).toEqual([
        ["core", "abc"],
        ["loader", "def"]
      ]);
    });

    it("should reject malformed, unknown and duplicate entries", () => {
      const malformed = parseAssignments(["core"], repos, "--repo");
      const unknown = parseAssignments(["nope=x"], repos, "--repo");
      const duplicate = parseAssignments(["core=a", "core=b"], repos, "--ref");

      expect(!malformed.ok && malformed.error.message).toBe("invalid --repo: core");
      expect(!unknown.ok && unknown.error.message).toBe("unknown repo id in --repo: nope");
      expect(!duplicate.ok && duplicate.error.message).toBe("duplicate --ref for repo: core");
    });
  });

  describe("resolveExplicitPins", () => {
    it("should list every missing repo", () => {
      const result = resolveExplicitPins(repos, new Map([["core", sha("a")]]), new Map());

      expect(!result.ok && result.error.message).toBe("missing pins for: loader");
    });

    it("should reject a short sha", () => {
      const result = resolveExplicitPins(repos, new Map([["core", "abc"]]), new Map());

      expect(!result.ok && result.error.message).toBe("invalid sha for core: abc");
    });

    it("should carry a ref override onto the pinned repo", () => {
      const shas = new Map([
        ["core", sha("a")],
        ["loader", sha("b")]
      ]);

      const result = resolveExplicitPins(repos, shas, new Map([["loader", "next"]]));

      expect(result.ok && result.value.map((pin) => [pin.repo.id, pin.repo.ref, pin.sha])).toEqual([
        ["core", "main", sha("a")],
        ["loader", "next", sha("b")]
      ]);
    });
  });

  describe("readinessIssues", () => {
    it("should list every problem of a diverged checkout", () => {
      // Arrange: A checkout with no upstream, diverged, off-head and red
      const readiness: RepoReadiness = {
        repo: testRepo("core"),
        ref: "main",
        localPath: "/work/core",
        localExists: true,
        status: { branch: "main", upstream: null, ahead: 1, behind: 2, entries: [] },
        localHeadSha: sha("a"),
        remoteHeadSha: sha("b"),
        headGreen: false,
        error: null
      };

      // Act / Assert: Issues in a fixed order
      expect(readinessIssues(readiness)).toEqual([
        "no upstream branch",
        "ahead of upstream by 1",
        "behind upstream by 2",
        "local head differs from main",
        "CI not green at main head"
      ]);
      expect(readinessHint(readiness)).toBe("Commit and push to the remote, then wait for CI.");
    });
  });

  describe("resolveAutoStrict", () => {
    it("should pin every branch head when all repos are ready", async () => {
      scriptRepo(runner, workspace, "core", { local: { status: CLEAN, head: sha("a") }, remote: sha("a"), green: [sha("a")] });
      scriptRepo(runner, workspace, "loader", { local: { status: CLEAN, head: sha("b") }, remote: sha("b"), green: [sha("b")] });

      const result = await resolveAutoStrict(ctx, repos, new Map());

      expect(result.ok && result.value.map((pin) => [pin.repo.id, pin.sha])).toEqual([
        ["core", sha("a")],
        ["loader", sha("b")]
      ]);
    });

    it("should return exactly the one dirty repo as a blocker", async () => {
      // Arrange: core has an uncommitted change
      scriptRepo(runner, workspace, "core", {
        local: { status: `${CLEAN} M src/index.ts\n`, head: sha("a") },
        remote: sha("a"),
        green: [sha("a")]
      });
      scriptRepo(runner, workspace, "loader", { local: { status: CLEAN, head: sha("b") }, remote: sha("b"), green: [sha("b")] });

      // Act: Resolve strictly
      const result = await resolveAutoStrict(ctx, repos, new Map());

      // Assert: One blocker, no pins
      expect(result.ok).toBe(false);
      const blockers: RepoReadiness[] = result.ok ? [] : result.error;
      expect(blockers.map((readiness) => readiness.repo.id)).toEqual(["core"]);
      expect(blockers.map(readinessIssues)).toEqual([["uncommitted changes (1)"]]);
    });

    it("should block a repo that is not cloned", async () => {
      scriptRepo(runner, workspace, "core", { local: { status: CLEAN, head: sha("a") }, remote: sha("a"), green: [sha("a")] });
      scriptRepo(runner, workspace, "loader", { remote: sha("b"), green: [sha("b")] });

      const result = await resolveAutoStrict(ctx, repos, new Map());

      const blockers: RepoReadiness[] = result.ok ? [] : result.error;
      const [blocker] = blockers;
      expect(blocker && readinessIssues(blocker)).toEqual([`not cloned at ${path.join(workspace, "loader")}`]);
    });
  });

  describe("resolveAutoSmart", () => {
    it("should block a carried pin whose CI is not green", async () => {
      // Arrange: Previous stable pinned loader at b, which is red
      scriptPreviousRelease(runner, { core: sha("a"), loader: sha("b") });
      scriptRepo(runner, workspace, "core", { local: { status: CLEAN, head: sha("c") }, remote: sha("c"), green: [sha("c")] });
      ciAt(runner, "loader", sha("b"), false);

      // Act: Resolve in smart mode
      const result = await resolveAutoSmart(ctx, "stable", repos, new Map());

      // Assert: One carry blocker naming repo and sha
      expect(result.ok).toBe(false);
      const failure = result.ok ? null : result.error;
      expect(failure?.kind).toBe("blocked");
      const blockers: AutoBlocker[] = failure?.kind === "blocked" ? failure.blockers : [];
      expect(blockers.map(describeBlocker)).toEqual([`loader: carried ${sha("b")} from v1.0.0 is not CI-green`]);
    });

    it("should pin head repos at head, carry the rest and suggest bumps", async () => {
      // Arrange: core tracks head; loader carries b and has two newer green commits
      scriptPreviousRelease(runner, { core: sha("a"), loader: sha("b") });
      scriptRepo(runner, workspace, "core", { local: { status: CLEAN, head: sha("c") }, remote: sha("c"), green: [sha("c")] });
      scriptRepo(runner, workspace, "loader", { local: { status: CLEAN, head: sha("d") }, remote: sha("d"), green: [sha("d")] });
      ciAt(runner, "loader", sha("b"), true);
      runner.on(["gh", "api", `repos/acme/loader/compare/${sha("b")}...${sha("d")}`], json({ status: "ahead", ahead_by: 2, behind_by: 0 }));

      // Act: Resolve in smart mode
      const result = await resolveAutoSmart(ctx, "stable", repos, new Map());

      // Assert: Modes, pins and the applyable suggestion
      expect(result.ok).toBe(true);
      if (!result.ok) {
        return;
      }
      expect([...result.value.modes]).toEqual([
        ["core", "head"],
        ["loader", "carry"]
      ]);
      expect(result.value.sourceTag).toBe("v1.0.0");
      expect(result.value.pinned.map((pin) => pin.sha)).toEqual([sha("c"), sha("b")]);
      expect(result.value.suggestions).toEqual([
        {
          kind: "bump",
          repoId: "loader",
          fromSha: sha("b"),
          toSha: sha("d"),
          reason: "2 newer commit(s) on main with green CI",
          applyable: true
        }
      ]);
      expect(applySuggestions(result.value.pinned, result.value.suggestions).map((pin) => pin.sha)).toEqual([sha("c"), sha("d")]);
    });

    it("should not apply a bump when the local checkout is missing", async () => {
      scriptPreviousRelease(runner, { core: sha("a"), loader: sha("b") });
      scriptRepo(runner, workspace, "core", { local: { status: CLEAN, head: sha("c") }, remote: sha("c"), green: [sha("c")] });
      scriptRepo(runner, workspace, "loader", { remote: sha("d"), green: [sha("d")] });
      ciAt(runner, "loader", sha("b"), true);
      runner.on(["gh", "api", `repos/acme/loader/compare/${sha("b")}...${sha("d")}`], json({ status: "ahead", ahead_by: 1, behind_by: 0 }));

      const result = await resolveAutoSmart(ctx, "stable", repos, new Map());

      const suggestions: AutoSuggestion[] = result.ok ? result.value.suggestions : [];
      expect(suggestions.map((suggestion) => suggestion.applyable)).toEqual([false]);
      expect(applySuggestions(result.ok ? result.value.pinned : [], suggestions).map((pin) => pin.sha)).toEqual([sha("c"), sha("b")]);
    });

    it("should track every head when nothing was released before", async () => {
      runner.on(["gh", "api", "repos/acme/dist/releases?per_page=100"], "[]");
      scriptRepo(runner, workspace, "core", { local: { status: CLEAN, head: sha("c") }, remote: sha("c"), green: [sha("c")] });
      scriptRepo(runner, workspace, "loader", { remote: sha("d"), green: [sha("d")] });

      const result = await resolveAutoSmart(ctx, "beta", repos, new Map());

      const blockers: AutoBlocker[] = !result.ok && result.error.kind === "blocked" ? result.error.blockers : [];
      expect(blockers.map(describeBlocker)).toEqual([`loader (main): not cloned at ${path.join(workspace, "loader")}`]);
    });
  });
});
