import { Result, err, ok, releaseError } from "../errors";
import { asArray, asRecord, getArray, getString, parseJson } from "../utils/structured";
import { GhContext, ghApiJson, runGhRead } from "./gh";
import type { PinnedRepo } from "./model";

export async function fetchGreenHeadShas(
  ctx: GhContext,
  slug: string,
  workflowFile: string,
  branch: string,
  limit: number
): Promise<Result<Set<string>>> {
  // Workflow paths contain slashes; the API wants them encoded.
  const workflow = encodeURIComponent(workflowFile);
  const endpoint =
    `repos/${slug}/actions/workflows/${workflow}/runs` +
    `?branch=${encodeURIComponent(branch)}&event=push&status=success&per_page=${limit}`;
  const result = await ghApiJson(ctx, endpoint);
  if (!result.ok) {
    return result;
  }
  const data = asRecord(result.value);
  if (!data) {
    return err(releaseError("invalid_input", `unexpected workflow runs payload: ${slug}`));
  }
  const runs = getArray(data, "workflow_runs");
  if (!runs) {
    return err(releaseError("invalid_input", `missing workflow_runs: ${slug}`));
  }
  const shas = new Set<string>();
  for (const item of runs) {
    const run = asRecord(item);
    const sha = run ? getString(run, "head_sha") : null;
    if (sha !== null && sha.length === 40) {
      shas.add(sha);
    }
  }
  return ok(shas);
}

export async function isCiGreenForSha(
  ctx: GhContext,
  slug: string,
  workflowFile: string,
  sha: string
): Promise<Result<boolean>> {
  const command = [
    "gh",
    "run",
    "list",
    "--repo",
    slug,
    "--workflow",
    workflowFile,
    "--commit",
    sha,
    "--status",
    "success",
    "--limit",
    "1",
    "--json",
    "databaseId"
  ];
  const result = await runGhRead(ctx, command, {
    kind: "invalid_input",
    message: `failed to query CI status for ${slug}@${sha}`
  });
  if (!result.ok) {
    return result;
  }
  const parsed = parseJson(result.value);
  if (!parsed.ok) {
    return err(releaseError("invalid_input", `invalid JSON from gh run list: ${parsed.error}`, slug));
  }
  const runs = asArray(parsed.value);
  if (!runs) {
    return err(releaseError("invalid_input", "unexpected gh run list payload", slug));
  }
  return ok(runs.length > 0);
}

/**
 * Every pin whose repo declares a CI workflow must have a successful run at
 * exactly that commit. All offending pins are reported together.
 */
export async function ensureCiGreen(ctx: GhContext, pinned: PinnedRepo[], allowNonGreen: boolean): Promise<Result<void>> {
  const red: PinnedRepo[] = [];
  for (const pin of pinned) {
    const workflow = pin.repo.requiredCiWorkflow;
    if (!workflow) {
      continue;
    }
    const green = await isCiGreenForSha(ctx, pin.repo.slug, workflow, pin.sha);
    if (!green.ok) {
      return green;
    }
    if (!green.value) {
      red.push(pin);
    }
  }
  if (red.length === 0 || allowNonGreen) {
    return ok(undefined);
  }
  const remedy = "Pick a SHA with successful CI, or pass --allow-non-green.";
  const [first] = red;
  if (red.length === 1 && first) {
    return err(releaseError("ci_not_green", `CI not green for ${first.repo.slug}@${first.sha}`, remedy));
  }
  const lines = red.map((pin) => `${pin.repo.slug}@${pin.sha}`);
  return err(releaseError("ci_not_green", `CI not green for ${red.length} pinned repos`, [...lines, remedy].join("\n")));
}
