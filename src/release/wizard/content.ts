import { Result, err, ok, releaseError } from "../../errors";
import type { SelectorOption } from "../../ui/selector";
import { ensureCiGreen } from "../ci";
import { prepareDistributionPr, publishDistributionRelease } from "../distribution";
import type { PinnedRepo, ReleaseRepo } from "../model";
import type { NotesAttachment } from "../notes";
import { planRelease } from "../planner";
import { ContentSession, ContentStep, clearSession, loadContentSession, newContentSession, saveSession } from "../session";
import { FINISH, StepHandler, StepOutcome, advance, runStateMachine } from "../state-machine";
import { ensureDependentWorkspaceClean } from "../workspace-check";
import {
  WizardContext,
  bootstrapSession,
  cancelled,
  discardOnCancel,
  notesStatus,
  notesStep,
  preflight,
  selectBump,
  selectChannel,
  selectGreenCommit
} from "./common";

type Outcome = Result<StepOutcome<ContentSession>>;
type SummaryChoice = "channel" | "bump" | "tag" | "notes" | "start" | `repo:${number}`;

function to(state: ContentSession): Outcome {
  return ok(advance(state));
}

function shaMap(session: ContentSession): Map<string, string> {
  return new Map(session.repoShas.map((entry) => [entry.id, entry.sha]));
}

/** Records a pick, keeping entries in configured repo order. */
export function setRepoSha(repos: ReleaseRepo[], session: ContentSession, repoId: string, sha: string): ContentSession {
  const byId = shaMap(session);
  byId.set(repoId, sha);
  const repoShas: Array<{ id: string; sha: string }> = [];
  for (const repo of repos) {
    const picked = byId.get(repo.id);
    if (picked !== undefined) {
      repoShas.push({ id: repo.id, sha: picked });
    }
  }
  return { ...session, repoShas, tag: null };
}

export function pinnedFor(repos: ReleaseRepo[], session: ContentSession): Result<PinnedRepo[]> {
  const byId = shaMap(session);
  const missing = repos.filter((repo) => !byId.has(repo.id)).map((repo) => repo.id);
  if (missing.length > 0) {
    return err(releaseError("invalid_input", `missing selected source sha for: ${missing.join(", ")}`));
  }
  return ok(repos.map((repo) => ({ repo, sha: byId.get(repo.id) ?? "" })));
}

async function stepChannel(ctx: WizardContext, s: ContentSession): Promise<Outcome> {
  const choice = await selectChannel(ctx.selector, "Content Release Channel", "Choose content release channel", s.idxChannel);
  if (choice.action === "cancel") {
    return err(cancelled());
  }
  if (choice.action === "back") {
    return ok(FINISH);
  }
  return to({
    ...s,
    channel: choice.value,
    tag: null,
    idxChannel: choice.index,
    step: s.returnToSummary ? "summary" : "bump",
    returnToSummary: false
  });
}

async function stepBump(ctx: WizardContext, s: ContentSession): Promise<Outcome> {
  const choice = await selectBump(ctx.selector, "Content Version Bump", "Choose semantic version bump", s.idxBump);
  if (choice.action === "cancel") {
    return err(cancelled());
  }
  if (choice.action === "back") {
    return to({ ...s, step: "channel" });
  }
  return to({
    ...s,
    bump: choice.value,
    tag: null,
    idxBump: choice.index,
    repoCursor: 0,
    step: s.returnToSummary ? "summary" : "repo",
    returnToSummary: false
  });
}

async function stepRepo(ctx: WizardContext, s: ContentSession): Promise<Outcome> {
  const repos = ctx.config.contentRepos;
  const cursor = s.repoCursor >= 0 && s.repoCursor < repos.length ? s.repoCursor : 0;
  const repo = repos[cursor];
  if (!repo) {
    return err(releaseError("invalid_input", "no content repos configured"));
  }
  const current: ContentSession = { ...s, repoCursor: cursor };
  const picked = await selectGreenCommit(ctx, repo, `Source Commit (${repo.id})`, shaMap(current).get(repo.id) ?? null, current.idxRepo);
  if (!picked.ok) {
    return picked;
  }
  const choice = picked.value;
  if (choice.action === "cancel") {
    return err(cancelled());
  }
  if (choice.action === "back") {
    if (current.returnToSummary) {
      return to({ ...current, step: "summary", returnToSummary: false });
    }
    if (cursor === 0) {
      return to({ ...current, step: "bump" });
    }
    return to({ ...current, repoCursor: cursor - 1 });
  }

  const next: ContentSession = { ...setRepoSha(repos, current, repo.id, choice.value), idxRepo: choice.index };
  if (next.returnToSummary) {
    return to({ ...next, step: "summary", returnToSummary: false });
  }
  if (cursor + 1 < repos.length) {
    return to({ ...next, repoCursor: cursor + 1 });
  }
  return to({ ...next, step: "tag" });
}

async function stepTag(ctx: WizardContext, s: ContentSession): Promise<Outcome> {
  if (s.channel === null || s.bump === null) {
    return err(releaseError("invalid_input", "missing channel/bump selection"));
  }
  const pinned = pinnedFor(ctx.config.contentRepos, s);
  if (!pinned.ok) {
    return pinned;
  }
  const planned = await planRelease(ctx, { channel: s.channel, bump: s.bump, tagOverride: null, pinned: pinned.value });
  if (!planned.ok) {
    return planned;
  }
  const { tag, specPath } = planned.value;
  const choice = await ctx.selector.selectOne({
    title: "Content Release Tag",
    subtitle: "Tag is generated from channel + bump",
    options: [{ value: "accept", label: `Use ${tag}`, detail: specPath }],
    initialIndex: 0,
    allowBack: true
  });
  if (choice.action === "cancel") {
    return err(cancelled());
  }
  if (choice.action === "back") {
    return to({ ...s, step: "repo", repoCursor: Math.max(0, ctx.config.contentRepos.length - 1) });
  }
  return to({ ...s, tag, step: "summary", returnToSummary: false });
}

async function stepSummary(ctx: WizardContext, s: ContentSession): Promise<Outcome> {
  const repos = ctx.config.contentRepos;
  const byId = shaMap(s);
  const options: SelectorOption<SummaryChoice>[] = [
    { value: "channel", label: `Channel: ${s.channel ?? "unset"}`, detail: "Edit channel" },
    { value: "bump", label: `Bump: ${s.bump ?? "unset"}`, detail: "Edit semantic bump" }
  ];
  repos.forEach((repo, index) => {
    options.push({ value: `repo:${index}`, label: `${repo.id}: ${(byId.get(repo.id) ?? "unset").slice(0, 12)}`, detail: repo.slug });
  });
  options.push(
    { value: "tag", label: `Tag: ${s.tag ?? "unset"}`, detail: "Computed release tag" },
    { value: "notes", label: `Notes file: ${s.notesPath ?? "none"}`, detail: "Optional release notes" },
    { value: "start", label: "Start release", detail: "Continue to final confirmation" }
  );

  const choice = await ctx.selector.selectOne({
    title: "Content Release Summary",
    subtitle: "Select an item to edit, or start release",
    options,
    initialIndex: s.idxSummary,
    allowBack: true
  });
  if (choice.action === "cancel") {
    return err(cancelled());
  }
  if (choice.action === "back") {
    return to({ ...s, step: "tag" });
  }
  const idxSummary = choice.index;
  switch (choice.value) {
    case "channel":
    case "bump":
    case "tag":
    case "notes":
      return to({ ...s, step: choice.value, idxSummary, returnToSummary: true });
    case "start":
      return s.tag === null
        ? to({ ...s, step: "tag", idxSummary, returnToSummary: true })
        : to({ ...s, step: "confirm", idxSummary, returnToSummary: false });
    default: {
      const index = Number.parseInt(choice.value.slice("repo:".length), 10);
      const repoCursor = Math.max(0, Math.min(Number.isNaN(index) ? 0 : index, repos.length - 1));
      return to({ ...s, step: "repo", repoCursor, idxSummary, returnToSummary: true });
    }
  }
}

async function stepNotes(ctx: WizardContext, s: ContentSession): Promise<Outcome> {
  const next = await notesStep(ctx.selector, s, "Publish content release with generated notes only");
  return next.ok ? to(next.value) : next;
}

async function stepConfirm(ctx: WizardContext, s: ContentSession): Promise<Outcome> {
  const approved = await ctx.selector.confirm(`Publish content ${s.tag ?? "unset"}? (y/N) `);
  if (!approved) {
    return to({ ...s, step: "summary" });
  }
  const pinned = pinnedFor(ctx.config.contentRepos, s);
  if (!pinned.ok) {
    return pinned;
  }
  const green = await ensureCiGreen(ctx, pinned.value, false);
  if (!green.ok) {
    return green;
  }
  const clean = await ensureDependentWorkspaceClean(ctx);
  if (!clean.ok) {
    return clean;
  }
  if (s.channel === null || s.bump === null || s.tag === null) {
    return err(releaseError("invalid_input", "incomplete content release session; missing channel/bump/tag"));
  }
  const plan = await planRelease(ctx, { channel: s.channel, bump: s.bump, tagOverride: s.tag, pinned: pinned.value });
  if (!plan.ok) {
    return plan;
  }

  ctx.logger.detail(notesStatus(s));
  const pr = await prepareDistributionPr(ctx, plan.value, { userNotes: s.notesMarkdown, notesFile: null });
  if (!pr.ok) {
    return pr;
  }
  ctx.logger.success(`PR merged: ${pr.value}`);

  const run = await publishDistributionRelease(ctx, plan.value, ctx.watch);
  if (!run.ok) {
    return run;
  }
  ctx.logger.success(`Workflow run: ${run.value}`);
  ctx.logger.detail("Next: approve the release environment in GitHub Actions to sign + publish.");

  const cleared = clearSession(ctx.workspaceRoot, "content");
  return cleared.ok ? ok(FINISH) : cleared;
}

export function contentHandlers(ctx: WizardContext): Record<ContentStep, StepHandler<ContentSession>> {
  return {
    product: async (s) => to({ ...s, step: "channel" }),
    channel: (s) => stepChannel(ctx, s),
    bump: (s) => stepBump(ctx, s),
    repo: (s) => stepRepo(ctx, s),
    tag: (s) => stepTag(ctx, s),
    summary: (s) => stepSummary(ctx, s),
    notes: (s) => stepNotes(ctx, s),
    confirm: (s) => stepConfirm(ctx, s)
  };
}

export async function runGuidedContentRelease(ctx: WizardContext, notes: NotesAttachment | null): Promise<Result<void>> {
  const login = await preflight(ctx, ctx.config.distribution.slug, "distribution");
  if (!login.ok) {
    return login;
  }
  const boot = await bootstrapSession(
    ctx.selector,
    loadContentSession(ctx.workspaceRoot),
    () => newContentSession(login.value),
    notes,
    "Resume Content Release Session"
  );
  if (!boot.ok) {
    return discardOnCancel(ctx.workspaceRoot, "content", boot);
  }
  const saved = saveSession(ctx.workspaceRoot, boot.value);
  if (!saved.ok) {
    return saved;
  }
  const finished = await runStateMachine(
    saved.value,
    (s) => s.step,
    contentHandlers(ctx),
    async (s) => saveSession(ctx.workspaceRoot, s)
  );
  return discardOnCancel(ctx.workspaceRoot, "content", finished);
}
