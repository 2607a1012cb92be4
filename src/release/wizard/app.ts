import { Result, err, ok, releaseError } from "../../errors";
import type { SelectorOption } from "../../ui/selector";
import { prepareAppPr, publishAppRelease } from "../app-release";
import { ensureCiGreen } from "../ci";
import type { PinnedRepo, ReleaseRepo } from "../model";
import type { NotesAttachment } from "../notes";
import { planAppRelease } from "../planner";
import { AppSession, AppStep, clearSession, loadAppSession, newAppSession, saveSession, sessionNotes } from "../session";
import { FINISH, StepHandler, StepOutcome, advance, runStateMachine } from "../state-machine";
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

type Outcome = Result<StepOutcome<AppSession>>;
type SummaryChoice = "channel" | "bump" | "sha" | "tag" | "notes" | "start";

function to(state: AppSession): Outcome {
  return ok(advance(state));
}

function appRepo(ctx: WizardContext, ref: string): ReleaseRepo {
  const base = ctx.config.app.repo;
  return ref === base.ref ? base : { ...base, ref };
}

function pinnedFor(ctx: WizardContext, session: AppSession): Result<PinnedRepo[]> {
  if (session.repoSha === null) {
    return err(releaseError("invalid_input", "missing selected app source sha"));
  }
  return ok([{ repo: appRepo(ctx, session.repoRef), sha: session.repoSha }]);
}

async function stepChannel(ctx: WizardContext, s: AppSession): Promise<Outcome> {
  const choice = await selectChannel(ctx.selector, "Release Channel", "Choose app release channel", s.idxChannel);
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
    version: null,
    idxChannel: choice.index,
    step: s.returnToSummary ? "summary" : "bump",
    returnToSummary: false
  });
}

async function stepBump(ctx: WizardContext, s: AppSession): Promise<Outcome> {
  const choice = await selectBump(ctx.selector, "Version Bump", "Choose semantic version bump", s.idxBump);
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
    version: null,
    idxBump: choice.index,
    step: s.returnToSummary ? "summary" : "sha",
    returnToSummary: false
  });
}

async function stepSha(ctx: WizardContext, s: AppSession): Promise<Outcome> {
  const picked = await selectGreenCommit(ctx, appRepo(ctx, s.repoRef), "Source Commit", s.repoSha, s.idxSha);
  if (!picked.ok) {
    return picked;
  }
  const choice = picked.value;
  if (choice.action === "cancel") {
    return err(cancelled());
  }
  if (choice.action === "back") {
    return to({ ...s, step: "bump" });
  }
  return to({
    ...s,
    repoSha: choice.value,
    tag: null,
    version: null,
    idxSha: choice.index,
    step: s.returnToSummary ? "summary" : "tag",
    returnToSummary: false
  });
}

async function stepTag(ctx: WizardContext, s: AppSession): Promise<Outcome> {
  if (s.channel === null || s.bump === null) {
    return err(releaseError("invalid_input", "missing channel/bump selection"));
  }
  const pinned = pinnedFor(ctx, s);
  if (!pinned.ok) {
    return pinned;
  }
  const planned = await planAppRelease(ctx, { channel: s.channel, bump: s.bump, tagOverride: null, pinned: pinned.value });
  if (!planned.ok) {
    return planned;
  }
  const { tag, version } = planned.value;
  const choice = await ctx.selector.selectOne({
    title: "Release Tag",
    subtitle: "Tag is generated from channel + bump",
    options: [{ value: "accept", label: `Use ${tag}`, detail: `version ${version}` }],
    initialIndex: 0,
    allowBack: true
  });
  if (choice.action === "cancel") {
    return err(cancelled());
  }
  if (choice.action === "back") {
    return to({ ...s, step: "sha" });
  }
  return to({ ...s, tag, version, step: "summary", returnToSummary: false });
}

async function stepSummary(ctx: WizardContext, s: AppSession): Promise<Outcome> {
  const options: SelectorOption<SummaryChoice>[] = [
    { value: "channel", label: `Channel: ${s.channel ?? "unset"}`, detail: "Edit channel" },
    { value: "bump", label: `Bump: ${s.bump ?? "unset"}`, detail: "Edit semantic bump" },
    { value: "sha", label: `Source SHA: ${(s.repoSha ?? "unset").slice(0, 12)}`, detail: "Edit selected source commit" },
    { value: "tag", label: `Tag: ${s.tag ?? "unset"}`, detail: `Version: ${s.version ?? "unset"}` },
    { value: "notes", label: `Notes file: ${s.notesPath ?? "none"}`, detail: "Optional attached notes" },
    { value: "start", label: "Start release", detail: "Continue to final confirmation" }
  ];
  const choice = await ctx.selector.selectOne({
    title: "App Release Summary",
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
  if (choice.value === "start") {
    const ready = s.tag !== null;
    return to({ ...s, idxSummary: choice.index, step: ready ? "confirm" : "tag", returnToSummary: !ready });
  }
  const step: AppStep = choice.value;
  return to({ ...s, idxSummary: choice.index, step, returnToSummary: true });
}

async function stepNotes(ctx: WizardContext, s: AppSession): Promise<Outcome> {
  const next = await notesStep(ctx.selector, s, "Publish release with automatic notes only");
  return next.ok ? to(next.value) : next;
}

async function stepConfirm(ctx: WizardContext, s: AppSession): Promise<Outcome> {
  const approved = await ctx.selector.confirm(`Publish ${s.tag ?? "unset"} from ${(s.repoSha ?? "unset").slice(0, 12)}? (y/N) `);
  if (!approved) {
    return to({ ...s, step: "summary" });
  }
  const pinned = pinnedFor(ctx, s);
  if (!pinned.ok) {
    return pinned;
  }
  const green = await ensureCiGreen(ctx, pinned.value, false);
  if (!green.ok) {
    return green;
  }
  if (s.channel === null || s.bump === null || s.tag === null || s.repoSha === null) {
    return err(releaseError("invalid_input", "incomplete release session; missing tag/version/source sha"));
  }
  const plan = await planAppRelease(ctx, { channel: s.channel, bump: s.bump, tagOverride: s.tag, pinned: pinned.value });
  if (!plan.ok) {
    return plan;
  }

  const prepared = await prepareAppPr(ctx, plan.value, s.repoSha);
  if (!prepared.ok) {
    return prepared;
  }
  ctx.logger.success(`PR merged: ${prepared.value.prUrl}`);
  ctx.logger.detail(`source sha: ${prepared.value.sourceSha}`);
  ctx.logger.detail(notesStatus(s));

  const published = await publishAppRelease(ctx, plan.value, prepared.value.sourceSha, sessionNotes(s), ctx.watch);
  if (!published.ok) {
    return published;
  }
  ctx.logger.success(`Candidate run: ${published.value.candidateUrl}`);
  ctx.logger.success(`Release run: ${published.value.releaseUrl}`);
  ctx.logger.detail("Next: approve the release environment in GitHub Actions to publish.");

  const cleared = clearSession(ctx.workspaceRoot, "app");
  return cleared.ok ? ok(FINISH) : cleared;
}

export function appHandlers(ctx: WizardContext): Record<AppStep, StepHandler<AppSession>> {
  return {
    product: async (s) => to({ ...s, step: "channel" }),
    channel: (s) => stepChannel(ctx, s),
    bump: (s) => stepBump(ctx, s),
    sha: (s) => stepSha(ctx, s),
    tag: (s) => stepTag(ctx, s),
    summary: (s) => stepSummary(ctx, s),
    notes: (s) => stepNotes(ctx, s),
    confirm: (s) => stepConfirm(ctx, s)
  };
}

export async function runGuidedAppRelease(ctx: WizardContext, notes: NotesAttachment | null): Promise<Result<void>> {
  const app = ctx.config.app;
  const login = await preflight(ctx, app.repo.slug, "app");
  if (!login.ok) {
    return login;
  }
  const boot = await bootstrapSession(
    ctx.selector,
    loadAppSession(ctx.workspaceRoot),
    () => newAppSession(login.value, app.repo.ref),
    notes,
    "Resume App Release Session"
  );
  if (!boot.ok) {
    return discardOnCancel(ctx.workspaceRoot, "app", boot);
  }
  const saved = saveSession(ctx.workspaceRoot, boot.value);
  if (!saved.ok) {
    return saved;
  }
  const finished = await runStateMachine(
    saved.value,
    (s) => s.step,
    appHandlers(ctx),
    async (s) => saveSession(ctx.workspaceRoot, s)
  );
  return discardOnCancel(ctx.workspaceRoot, "app", finished);
}
