import crypto from "crypto";
import path from "path";
import { Result, err, errorMessage, ok, releaseError } from "../errors";
import { readJsonFile, removeFile, writeJsonAtomic } from "../platform/persistence";
import { asRecord } from "../utils/structured";
import { validateJson } from "../validation/validate";
import type { ReleaseBump, ReleaseChannel, ReleaseProduct } from "./model";
import type { NotesAttachment } from "./notes";

export const SESSION_SCHEMA = 1;

export type AppStep = "product" | "channel" | "bump" | "sha" | "tag" | "summary" | "notes" | "confirm";
export type ContentStep = "product" | "channel" | "bump" | "repo" | "tag" | "summary" | "notes" | "confirm";

type SessionCommon = {
  schema: typeof SESSION_SCHEMA;
  releaseId: string;
  createdAt: string;
  createdBy: string;
  channel: ReleaseChannel | null;
  bump: ReleaseBump | null;
  /** Derived from channel, bump and pins; cleared whenever one of them changes. */
  tag: string | null;
  notesPath: string | null;
  notesMarkdown: string | null;
  notesSha256: string | null;
  idxChannel: number;
  idxBump: number;
  idxSummary: number;
  returnToSummary: boolean;
};

export type AppSession = SessionCommon & {
  product: "app";
  step: AppStep;
  version: string | null;
  repoRef: string;
  repoSha: string | null;
  idxSha: number;
};

export type ContentSession = SessionCommon & {
  product: "content";
  step: ContentStep;
  repoCursor: number;
  repoShas: Array<{ id: string; sha: string }>;
  idxRepo: number;
};

export type WizardSession = AppSession | ContentSession;

export function sessionPath(workspaceRoot: string, product: ReleaseProduct): string {
  return path.join(workspaceRoot, ".conductor", "release", "sessions", `${product}-release.json`);
}

function common(product: ReleaseProduct, createdBy: string, now: Date): SessionCommon {
  return {
    schema: SESSION_SCHEMA,
    releaseId: `${product}-${crypto.randomBytes(6).toString("hex")}`,
    createdAt: now.toISOString(),
    createdBy,
    channel: null,
    bump: null,
    tag: null,
    notesPath: null,
    notesMarkdown: null,
    notesSha256: null,
    idxChannel: 0,
    idxBump: 0,
    idxSummary: 0,
    returnToSummary: false
  };
}

export function newAppSession(createdBy: string, repoRef: string, now = new Date()): AppSession {
  return { ...common("app", createdBy, now), product: "app", step: "product", version: null, repoRef, repoSha: null, idxSha: 0 };
}

export function newContentSession(createdBy: string, now = new Date()): ContentSession {
  return { ...common("content", createdBy, now), product: "content", step: "product", repoCursor: 0, repoShas: [], idxRepo: 0 };
}

export function withNotes<S extends WizardSession>(session: S, notes: NotesAttachment | null): S {
  return {
    ...session,
    notesPath: notes?.sourcePath ?? null,
    notesMarkdown: notes?.markdown ?? null,
    notesSha256: notes?.sha256 ?? null
  };
}

export function sessionNotes(session: WizardSession): NotesAttachment | null {
  if (session.notesMarkdown === null) {
    return null;
  }
  return {
    sourcePath: session.notesPath ?? "(unknown source)",
    markdown: session.notesMarkdown,
    sha256: session.notesSha256 ?? ""
  };
}

function loadSession(workspaceRoot: string, product: ReleaseProduct): Result<WizardSession | null> {
  const file = sessionPath(workspaceRoot, product);
  const read = readJsonFile(file);
  if (!read.found) {
    return ok(null);
  }
  if ("error" in read) {
    return err(releaseError("invalid_input", `failed to load release session: ${read.error}`, file));
  }
  const schema = asRecord(read.value)?.["schema"];
  if (schema !== SESSION_SCHEMA) {
    return err(releaseError("invalid_input", `unsupported release session schema: ${String(schema)}`, file));
  }
  const checked = validateJson<WizardSession>("wizard-session.schema.json", read.value);
  if (!checked.valid) {
    return err(releaseError("invalid_input", "invalid release session", `${file}\n${checked.errors.join("\n")}`));
  }
  if (checked.value.product !== product) {
    return err(releaseError("invalid_input", `release session is for ${checked.value.product}, not ${product}`, file));
  }
  return ok(checked.value);
}

export function loadAppSession(workspaceRoot: string): Result<AppSession | null> {
  const loaded = loadSession(workspaceRoot, "app");
  if (!loaded.ok) {
    return loaded;
  }
  return ok(loaded.value?.product === "app" ? loaded.value : null);
}

export function loadContentSession(workspaceRoot: string): Result<ContentSession | null> {
  const loaded = loadSession(workspaceRoot, "content");
  if (!loaded.ok) {
    return loaded;
  }
  return ok(loaded.value?.product === "content" ? loaded.value : null);
}

export function saveSession<S extends WizardSession>(workspaceRoot: string, session: S): Result<S> {
  const file = sessionPath(workspaceRoot, session.product);
  try {
    writeJsonAtomic(file, session);
  } catch (error) {
    return err(releaseError("dist_repo_failed", `failed to write release session: ${errorMessage(error)}`, file));
  }
  return ok(session);
}

export function clearSession(workspaceRoot: string, product: ReleaseProduct): Result<void> {
  const file = sessionPath(workspaceRoot, product);
  try {
    removeFile(file);
  } catch (error) {
    return err(releaseError("dist_repo_failed", `failed to delete release session: ${errorMessage(error)}`, file));
  }
  return ok(undefined);
}
