import fs from "fs";
import path from "path";
import { Result, err, ok } from "../errors";
import { CommandRunner, failureText } from "../platform/process-exec";
import { GIT_TIMEOUT_MS } from "../release/timeouts";

export type StatusEntry = {
  xy: string;
  path: string;
};

export type GitStatus = {
  branch: string;
  upstream: string | null;
  ahead: number;
  behind: number;
  entries: StatusEntry[];
};

export function isClean(status: GitStatus): boolean {
  return status.entries.length === 0;
}

export function isGitCheckout(root: string): boolean {
  return fs.existsSync(path.join(root, ".git"));
}

function parseBranchLine(line: string): { branch: string; upstream: string | null } {
  let text = line.trim();
  if (text.startsWith("##")) {
    text = text.slice(2).trimStart();
  }
  text = (text.split(" [")[0] ?? "").trim();
  const split = text.indexOf("...");
  if (split >= 0) {
    return { branch: text.slice(0, split).trim(), upstream: text.slice(split + 3).trim() || null };
  }
  return { branch: text, upstream: null };
}

function parseAheadBehind(line: string): { ahead: number; behind: number } {
  const inside = /\[([^\]]+)\]/.exec(line)?.[1];
  if (!inside) {
    return { ahead: 0, behind: 0 };
  }
  const ahead = /ahead\s+(\d+)/.exec(inside)?.[1];
  const behind = /behind\s+(\d+)/.exec(inside)?.[1];
  return { ahead: ahead ? Number(ahead) : 0, behind: behind ? Number(behind) : 0 };
}

function parseEntry(line: string): StatusEntry | null {
  if (line.length < 4) {
    return null;
  }
  const xy = line.slice(0, 2);
  const rest = line.slice(3);
  const arrow = rest.indexOf(" -> ");
  return { xy, path: arrow >= 0 ? rest.slice(arrow + 4) : rest };
}

/** Parses `git status --porcelain=v1 -b`. */
export function parseGitStatus(output: string): GitStatus {
  const lines = output.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const [first, ...rest] = lines;
  if (!first) {
    return { branch: "", upstream: null, ahead: 0, behind: 0, entries: [] };
  }
  const entries: StatusEntry[] = [];
  for (const line of first.startsWith("##") ? rest : lines) {
    const entry = parseEntry(line);
    if (entry) {
      entries.push(entry);
    }
  }
  if (!first.startsWith("##")) {
    return { branch: "", upstream: null, ahead: 0, behind: 0, entries };
  }
  return { ...parseBranchLine(first), ...parseAheadBehind(first), entries };
}

export async function readGitStatus(runner: CommandRunner, root: string): Promise<Result<GitStatus, string>> {
  const result = await runner.run(["git", "status", "--porcelain=v1", "-b"], { cwd: root, timeoutMs: GIT_TIMEOUT_MS });
  if (!result.ok) {
    return err(failureText(result.error) || "git status failed");
  }
  return ok(parseGitStatus(result.value));
}

export async function readHeadSha(runner: CommandRunner, root: string): Promise<string | null> {
  const result = await runner.run(["git", "rev-parse", "HEAD"], { cwd: root, timeoutMs: GIT_TIMEOUT_MS });
  if (!result.ok) {
    return null;
  }
  const sha = result.value.trim();
  return sha.length === 40 ? sha : null;
}
