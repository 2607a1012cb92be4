import crypto from "crypto";
import { Result, err, ok, releaseError } from "../errors";
import { describeCommand } from "../platform/process-exec";
import { asArray, asRecord, getInteger, getString, parseJson } from "../utils/structured";
import type { ReleaseContext } from "./context";
import { GH_TIMEOUT_MS, GH_WATCH_TIMEOUT_MS, RUN_LOOKUP_ATTEMPTS, RUN_LOOKUP_DELAY_MS } from "./timeouts";

export type WorkflowRun = {
  id: number;
  url: string;
  requestId: string;
};

export type WorkflowDispatch = {
  slug: string;
  workflow: string;
  ref: string;
  inputs: Array<[string, string]>;
};

type RunCandidate = { id: number; url: string; title: string };

export function newRequestId(prefix: string): string {
  return `${prefix}-${crypto.randomBytes(6).toString("hex")}`;
}

export type RunLookup = {
  /** Run ids listed before the dispatch; never adopted. */
  knownIds: ReadonlySet<number>;
  /** Lets the newest unknown dispatch run stand in when no title matches. */
  allowFallback: boolean;
};

function listDispatchRuns(payload: string, ref: string): Result<RunCandidate[]> {
  const parsed = parseJson(payload);
  if (!parsed.ok) {
    return err(releaseError("workflow_failed", `invalid JSON from gh run list: ${parsed.error}`));
  }
  const items = asArray(parsed.value);
  if (!items) {
    return err(releaseError("workflow_failed", "unexpected gh run list payload"));
  }
  const candidates: RunCandidate[] = [];
  for (const item of items) {
    const run = asRecord(item);
    if (!run || getString(run, "event") !== "workflow_dispatch" || getString(run, "headBranch") !== ref) {
      continue;
    }
    const id = getInteger(run, "databaseId");
    const url = getString(run, "url");
    if (id === null || url === null) {
      continue;
    }
    candidates.push({ id, url, title: getString(run, "displayTitle") ?? "" });
  }
  return ok(candidates);
}

/**
 * Picks the run whose title carries the request id. With `allowFallback`, the
 * newest dispatch run on `ref` that was not listed before the dispatch stands
 * in for it.
 */
export function findDispatchedRun(
  payload: string,
  ref: string,
  requestId: string,
  lookup: RunLookup = { knownIds: new Set(), allowFallback: false }
): Result<WorkflowRun | null> {
  const listed = listDispatchRuns(payload, ref);
  if (!listed.ok) {
    return listed;
  }
  const fresh = listed.value.filter((candidate) => !lookup.knownIds.has(candidate.id));
  const match =
    fresh.find((candidate) => candidate.title.includes(requestId)) ?? (lookup.allowFallback ? fresh[0] : undefined);
  return ok(match ? { id: match.id, url: match.url, requestId } : null);
}

function runListCommand(request: WorkflowDispatch): string[] {
  return [
    "gh",
    "run",
    "list",
    "--repo",
    request.slug,
    "--workflow",
    request.workflow,
    "--limit",
    "20",
    "--json",
    "databaseId,url,event,headBranch,displayTitle"
  ];
}

async function snapshotRunIds(ctx: ReleaseContext, request: WorkflowDispatch): Promise<Result<Set<number>>> {
  const listed = await ctx.runner.run(runListCommand(request), { cwd: ctx.workspaceRoot, timeoutMs: GH_TIMEOUT_MS });
  if (!listed.ok) {
    return err(releaseError("workflow_failed", "failed to query workflow runs", listed.error.stderr));
  }
  const runs = listDispatchRuns(listed.value, request.ref);
  if (!runs.ok) {
    return runs;
  }
  return ok(new Set(runs.value.map((run) => run.id)));
}

async function resolveDispatchedRun(
  ctx: ReleaseContext,
  request: WorkflowDispatch,
  requestId: string,
  knownIds: ReadonlySet<number>
): Promise<Result<WorkflowRun>> {
  const command = runListCommand(request);
  for (let attempt = 0; attempt < RUN_LOOKUP_ATTEMPTS; attempt += 1) {
    const listed = await ctx.runner.run(command, { cwd: ctx.workspaceRoot, timeoutMs: GH_TIMEOUT_MS });
    if (!listed.ok) {
      return err(releaseError("workflow_failed", "failed to query workflow runs", listed.error.stderr));
    }
    const lastAttempt = attempt === RUN_LOOKUP_ATTEMPTS - 1;
    const found = findDispatchedRun(listed.value, request.ref, requestId, { knownIds, allowFallback: lastAttempt });
    if (!found.ok) {
      return found;
    }
    if (found.value) {
      return ok(found.value);
    }
    if (!lastAttempt) {
      await ctx.clock.sleep(RUN_LOOKUP_DELAY_MS);
    }
  }
  return err(
    releaseError(
      "workflow_failed",
      "could not identify the dispatched workflow run",
      `No workflow_dispatch run of ${request.workflow} on ${request.ref} exposed request_id=${requestId}; check Actions in ${request.slug}.`
    )
  );
}

export async function dispatchWorkflow(ctx: ReleaseContext, request: WorkflowDispatch): Promise<Result<WorkflowRun>> {
  const requestId = newRequestId(ctx.config.requestIdPrefix);
  const command = ["gh", "workflow", "run", request.workflow, "--repo", request.slug, "--ref", request.ref];
  for (const [key, value] of request.inputs) {
    command.push("-f", `${key}=${value}`);
  }
  command.push("-f", `request_id=${requestId}`);

  ctx.logger.detail(`${describeCommand(command.slice(0, 4))} --repo ${request.slug} --ref ${request.ref}`);
  ctx.logger.detail(`dispatch request_id: ${requestId}`);
  if (ctx.dryRun) {
    return ok({ id: 0, url: "(dry-run)", requestId });
  }

  const knownIds = await snapshotRunIds(ctx, request);
  if (!knownIds.ok) {
    return knownIds;
  }
  const dispatched = await ctx.runner.run(command, { cwd: ctx.workspaceRoot, timeoutMs: GH_TIMEOUT_MS });
  if (!dispatched.ok) {
    return err(releaseError("workflow_failed", "failed to dispatch workflow", dispatched.error.stderr));
  }
  return resolveDispatchedRun(ctx, request, requestId, knownIds.value);
}

export async function watchRun(ctx: ReleaseContext, slug: string, runId: number): Promise<Result<void>> {
  if (runId <= 0) {
    return ok(undefined);
  }
  const command = ["gh", "run", "watch", "--repo", slug, String(runId), "--exit-status"];
  ctx.logger.detail(describeCommand(command));
  if (ctx.dryRun) {
    return ok(undefined);
  }
  const watched = await ctx.runner.run(command, { cwd: ctx.workspaceRoot, timeoutMs: GH_WATCH_TIMEOUT_MS });
  if (!watched.ok) {
    return err(releaseError("workflow_failed", "workflow run failed", watched.error.stderr));
  }
  return ok(undefined);
}
