import { SpawnSyncOptionsWithStringEncoding, SpawnSyncReturns, spawnSync } from "child_process";
import { Result, err, ok } from "../errors";

type RunSyncArgs = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  shell?: boolean;
  timeout?: number;
  encoding?: BufferEncoding;
};

export type CommandOptions = {
  cwd: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
};

export type ProcessFailure = {
  command: string[];
  status: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

/**
 * Narrow seam every component uses to reach git and gh. Resolves to stdout on a
 * zero exit status and to a ProcessFailure otherwise; it never rejects.
 */
export interface CommandRunner {
  run(command: string[], options: CommandOptions): Promise<Result<string, ProcessFailure>>;
}

function shouldUseWindowsShell(command: string): boolean {
  if (process.platform !== "win32") {
    return false;
  }
  const normalized = command.toLowerCase();
  return normalized.endsWith(".cmd") || normalized.endsWith(".bat");
}

export function runCommandSync(command: string, args: string[], options: RunSyncArgs = {}): SpawnSyncReturns<string> {
  const shell = typeof options.shell === "boolean" ? options.shell : shouldUseWindowsShell(command);
  const spawnOptions: SpawnSyncOptionsWithStringEncoding = {
    cwd: options.cwd,
    env: options.env,
    shell,
    timeout: options.timeout,
    encoding: options.encoding ?? "utf-8",
    windowsHide: process.platform === "win32",
    maxBuffer: 32 * 1024 * 1024
  };
  return spawnSync(command, args, spawnOptions);
}

export function describeCommand(command: string[]): string {
  return command.map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part)).join(" ");
}

export function failureText(failure: ProcessFailure): string {
  return failure.stderr.trim() || failure.stdout.trim();
}

function toFailure(command: string[], result: SpawnSyncReturns<string>, timeoutMs?: number): ProcessFailure {
  const stdout = result.stdout ?? "";
  const stderr = result.stderr ?? "";
  const code = result.error && "code" in result.error ? String(result.error.code) : "";
  if (code === "ETIMEDOUT") {
    const seconds = timeoutMs ? Math.round(timeoutMs / 1000) : 0;
    return { command, status: result.status, stdout, stderr: `command timed out after ${seconds}s`, timedOut: true };
  }
  if (result.error) {
    return { command, status: result.status, stdout, stderr: stderr || result.error.message, timedOut: false };
  }
  return { command, status: result.status, stdout, stderr, timedOut: false };
}

export function createProcessRunner(): CommandRunner {
  return {
    async run(command, options) {
      const [bin, ...args] = command;
      if (!bin) {
        return err({ command, status: null, stdout: "", stderr: "empty command", timedOut: false });
      }
      const result = runCommandSync(bin, args, {
        cwd: options.cwd,
        env: options.env,
        timeout: options.timeoutMs
      });
      if (result.error || result.status !== 0) {
        return err(toFailure(command, result, options.timeoutMs));
      }
      return ok(result.stdout ?? "");
    }
  };
}
