import crypto from "crypto";
import fs from "fs";
import path from "path";
import { Result, err, errorMessage, ok, releaseError } from "../errors";
import { writeTextAtomic } from "../platform/persistence";
import { PinnedRepo, ReleaseChannel, commitUrl } from "./model";

/** Release notes loaded once from an operator-supplied markdown file. */
export type NotesAttachment = {
  sourcePath: string;
  markdown: string;
  sha256: string;
};

export type NotesInput = {
  channel: ReleaseChannel;
  tag: string;
  pinned: PinnedRepo[];
  userNotes?: string | null;
  fileNotes?: string | null;
};

export function loadNotesFile(file: string): Result<NotesAttachment> {
  const sourcePath = path.resolve(file);
  if (path.extname(sourcePath).toLowerCase() !== ".md") {
    return err(releaseError("invalid_input", `notes file must be markdown (.md): ${sourcePath}`));
  }
  let markdown: string;
  try {
    markdown = fs.readFileSync(sourcePath, "utf-8");
  } catch (error) {
    return err(releaseError("invalid_input", `failed to read --notes-file: ${errorMessage(error)}`, sourcePath));
  }
  if (!markdown.trim()) {
    return err(releaseError("invalid_input", `notes file is empty: ${sourcePath}`));
  }
  const sha256 = crypto.createHash("sha256").update(markdown, "utf-8").digest("hex");
  return ok({ sourcePath, markdown, sha256 });
}

export function renderReleaseNotes(input: NotesInput): string {
  const lines = [`# ${input.tag}`, "", `Channel: ${input.channel}`, "", "## Pinned Repos"];
  for (const pin of input.pinned) {
    lines.push(`- ${pin.repo.id}: ${pin.sha} (${commitUrl(pin.repo, pin.sha)})`);
  }
  if (input.userNotes?.trim()) {
    lines.push("", "## Notes", input.userNotes.trimEnd());
  }
  if (input.fileNotes?.trim()) {
    lines.push("", "## Additional", input.fileNotes.trimEnd());
  }
  return `${lines.join("\n").trimEnd()}\n`;
}

export function writeReleaseNotes(root: string, relativePath: string, input: NotesInput): Result<string> {
  const file = path.join(root, relativePath);
  try {
    writeTextAtomic(file, renderReleaseNotes(input));
  } catch (error) {
    return err(releaseError("dist_repo_failed", `failed to write release notes: ${errorMessage(error)}`, file));
  }
  return ok(file);
}

export function describeNotes(notes: NotesAttachment | null): string {
  if (!notes) {
    return "notes: automatic notes only";
  }
  return `notes: attached from ${notes.sourcePath} (${notes.markdown.length} bytes, sha256=${notes.sha256.slice(0, 12)})`;
}
