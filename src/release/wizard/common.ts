import { ReleaseError, Result, err, ok, releaseError } from "../../errors";
import type { Selector, SelectorOption, SelectorResult } from "../../ui/selector";
import { fetchGreenHeadShas } from "../ci";
import type { ReleaseContext } from "../context";
import { currentUser, ensureWriteAccess, listRecentCommits } from "../gh";
import { ReleaseBump, ReleaseChannel, ReleaseProduct, ReleaseRepo, shortSha } from "../model";
import { NotesAttachment, describeNotes } from "../notes";
import { WizardSession, clearSession, sessionNotes, withNotes } from "../session";

export type WizardContext = ReleaseContext & {
  selector: Selector;
  watch: boolean;
};

export type ResumeChoice = "resume" | "new";
type NotesAction = "keep" | "clear";

const CANCELLED_MESSAGE = "release cancelled";

export function cancelled(): ReleaseError {
  return releaseError("invalid_input", CANCELLED_MESSAGE);
}

export function isCancelled(error: ReleaseError): boolean {
  return error.kind === "invalid_input" && error.message === CANCELLED_MESSAGE;
}

/** An explicit cancel discards the saved session; any other failure keeps it for a resume. */
export function discardOnCancel(workspaceRoot: string, product: ReleaseProduct, result: Result<void>): Result<void> {
  if (result.ok || !isCancelled(result.error)) {
    return result;
  }
  const cleared = clearSession(workspaceRoot, product);
  return cleared.ok ? result : cleared;
}

/** Checks gh, auth and write access to `slug`; returns the operator login. */
export async function preflight(ctx: ReleaseContext, slug: string, label: string): Promise<Result<string>> {
  const access = await ensureWriteAccess(ctx, slug, label);
  if (!access.ok) {
    return access;
  }
  return currentUser(ctx);
}

export function selectChannel(
  selector: Selector,
  title: string,
  subtitle: string,
  initialIndex: number
): Promise<SelectorResult<ReleaseChannel>> {
  const options: SelectorOption<ReleaseChannel>[] = [
    { value: "stable", label: "stable", detail: "Production release" },
    { value: "beta", label: "beta", detail: "Pre-release channel" }
  ];
  return selector.selectOne({ title, subtitle, options, initialIndex, allowBack: true });
}

export function selectBump(
  selector: Selector,
  title: string,
  subtitle: string,
  initialIndex: number
): Promise<SelectorResult<ReleaseBump>> {
  const options: SelectorOption<ReleaseBump>[] = [
    { value: "patch", label: "patch", detail: "Bug fixes and minor updates" },
    { value: "minor", label: "minor", detail: "Feature release" },
    { value: "major", label: "major", detail: "Breaking release" }
  ];
  return selector.selectOne({ title, subtitle, options, initialIndex, allowBack: true });
}

export function selectResumeOrNew(selector: Selector, title: string, subtitle: string): Promise<SelectorResult<ResumeChoice>> {
  const options: SelectorOption<ResumeChoice>[] = [
    { value: "resume", label: "Resume", detail: "Continue previous selections" },
    { value: "new", label: "Start new", detail: "Discard previous selections" }
  ];
  return selector.selectOne({ title, subtitle, options, initialIndex: 0, allowBack: false });
}

/**
 * Lists recent commits on `ref`, keeping only CI-green ones when the repo has
 * a required workflow (unless `requireGreen` is off), and lets the operator pick one.
 */
export async function selectGreenCommit(
  ctx: ReleaseContext & { selector: Selector },
  repo: ReleaseRepo,
  title: string,
  currentSha: string | null,
  initialIndex: number,
  requireGreen = true
): Promise<Result<SelectorResult<string>>> {
  const commits = await listRecentCommits(ctx, repo.slug, repo.ref, ctx.config.commitListLimit);
  if (!commits.ok) {
    return commits;
  }
  let green: Set<string> | null = null;
  if (requireGreen && repo.requiredCiWorkflow) {
    const runs = await fetchGreenHeadShas(ctx, repo.slug, repo.requiredCiWorkflow, repo.ref, ctx.config.greenRunsLimit);
    if (!runs.ok) {
      return runs;
    }
    green = runs.value;
  }

  const options: SelectorOption<string>[] = [];
  for (const commit of commits.value) {
    if (green && !green.has(commit.sha)) {
      continue;
    }
    options.push({ value: commit.sha, label: `${shortSha(commit.sha)}  ${commit.message}`, detail: commit.date ?? "" });
  }
  if (options.length === 0) {
    return err(
      releaseError("ci_not_green", `no green commits available for ${repo.slug}@${repo.ref}`, "Wait for CI green or investigate failed runs.")
    );
  }

  const current = currentSha === null ? -1 : options.findIndex((option) => option.value === currentSha);
  const index = current >= 0 ? current : Math.max(0, Math.min(initialIndex, options.length - 1));
  const choice = await ctx.selector.selectOne({
    title,
    subtitle: green ? `Pick CI-green commit for ${repo.slug}` : `Pick commit for ${repo.slug}`,
    options,
    initialIndex: index,
    allowBack: true
  });
  return ok(choice);
}

/** Keep or drop the attached notes, then return to the summary. */
export async function notesStep<S extends WizardSession>(selector: Selector, session: S, clearDetail: string): Promise<Result<S>> {
  const hasNotes = session.notesMarkdown !== null;
  const options: SelectorOption<NotesAction>[] = [
    {
      value: "keep",
      label: hasNotes ? "Keep notes" : "No notes configured",
      detail: session.notesPath ?? "Provide --notes-file to set notes"
    }
  ];
  if (hasNotes) {
    options.push({ value: "clear", label: "Remove notes", detail: clearDetail });
  }
  const choice = await selector.selectOne({
    title: "Release Notes",
    subtitle: "External notes are optional",
    options,
    initialIndex: 0,
    allowBack: true
  });
  if (choice.action === "cancel") {
    return err(cancelled());
  }
  const next: S = { ...session, step: "summary", returnToSummary: false };
  if (choice.action === "select" && choice.value === "clear") {
    return ok({ ...next, notesPath: null, notesMarkdown: null, notesSha256: null });
  }
  return ok(next);
}

/**
 * Offers to resume an unfinished session, otherwise starts `fresh()`. Notes
 * given on the command line replace whatever the session carried.
 */
export async function bootstrapSession<S extends WizardSession>(
  selector: Selector,
  loaded: Result<S | null>,
  fresh: () => S,
  notes: NotesAttachment | null,
  title: string
): Promise<Result<S>> {
  if (!loaded.ok) {
    return loaded;
  }
  let session = fresh();
  if (loaded.value) {
    const choice = await selectResumeOrNew(selector, title, `An unfinished ${loaded.value.product} release session exists`);
    if (choice.action !== "select") {
      return err(cancelled());
    }
    if (choice.value === "resume") {
      session = loaded.value;
    }
  }
  return ok(notes ? withNotes(session, notes) : session);
}

export function notesStatus(session: WizardSession): string {
  const notes: NotesAttachment | null = sessionNotes(session);
  return describeNotes(notes);
}
