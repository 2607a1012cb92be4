import fs from "fs";
import path from "path";
import { Result, err, errorMessage, ok, releaseError } from "../errors";
import { writeJsonAtomic } from "../platform/persistence";
import { asRecord, getString, parseJson } from "../utils/structured";
import { renderPinnedBody } from "../templates/render";
import { CheckoutTarget, commitAndPush, createBranch, prepareCheckout } from "./checkout";
import type { ReleaseContext } from "./context";
import type { AppReleasePlan } from "./model";
import type { NotesAttachment } from "./notes";
import { createPullRequest, mergePullRequest, withPullRequestHint } from "./pull-request";
import { dispatchWorkflow, watchRun } from "./workflow";

export const MAX_NOTES_B64_LENGTH = 60000;
const MAX_NOTES_SOURCE_LENGTH = 1024;

export type AppPrepareResult = {
  prUrl: string;
  sourceSha: string;
};

export type AppPublishResult = {
  candidateUrl: string;
  releaseUrl: string;
};

export function appTarget(ctx: Pick<ReleaseContext, "workspaceRoot" | "config">): CheckoutTarget {
  const app = ctx.config.app;
  return {
    root: path.join(ctx.workspaceRoot, app.localDir),
    slug: app.repo.slug,
    defaultBranch: app.repo.ref,
    label: "app"
  };
}

function readVersionFile(file: string): Result<{ data: Record<string, unknown>; version: string }> {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch (error) {
    return err(releaseError("invalid_input", `unable to read version file: ${file}`, errorMessage(error)));
  }
  const parsed = parseJson(text);
  const data = parsed.ok ? asRecord(parsed.value) : null;
  const version = data ? getString(data, "version") : null;
  if (!data || version === null) {
    return err(releaseError("invalid_input", `version file has no "version" field: ${file}`));
  }
  return ok({ data, version });
}

/** The version shared by every configured version file. */
export function currentAppVersion(root: string, versionFiles: string[]): Result<string> {
  const seen = new Map<string, string>();
  for (const relative of versionFiles) {
    const read = readVersionFile(path.join(root, relative));
    if (!read.ok) {
      return read;
    }
    seen.set(relative, read.value.version);
  }
  const distinct = new Set(seen.values());
  const [version] = [...distinct];
  if (distinct.size !== 1 || version === undefined) {
    const listing = [...seen].map(([file, value]) => `${file}: ${value}`).join("\n");
    return err(releaseError("invalid_input", "app version files disagree on the current version", listing));
  }
  return ok(version);
}

/** Rewrites the `version` field wherever it differs; returns the files touched. */
export function applyAppVersion(root: string, versionFiles: string[], version: string): Result<string[]> {
  const changed: string[] = [];
  for (const relative of versionFiles) {
    const file = path.join(root, relative);
    const read = readVersionFile(file);
    if (!read.ok) {
      return read;
    }
    if (read.value.version === version) {
      continue;
    }
    try {
      writeJsonAtomic(file, { ...read.value.data, version });
    } catch (error) {
      return err(releaseError("dist_repo_failed", `failed to write version file: ${errorMessage(error)}`, file));
    }
    changed.push(relative);
  }
  return ok(changed);
}

/**
 * Bumps the app version on a branch cut from the pinned sha and merges it.
 * `sourceSha` is the merged commit the workflows build from.
 */
export async function prepareAppPr(ctx: ReleaseContext, plan: AppReleasePlan, baseSha: string): Promise<Result<AppPrepareResult>> {
  const target = appTarget(ctx);
  const versionFiles = ctx.config.app.versionFiles;
  const prepared = await prepareCheckout(ctx, target);
  if (!prepared.ok) {
    return prepared;
  }

  // A dry run may have no checkout to read.
  const current = currentAppVersion(target.root, versionFiles);
  if (!current.ok && !ctx.dryRun) {
    return current;
  }
  if (current.ok && current.value === plan.version) {
    ctx.logger.detail("app version already present on default branch; skipping PR");
    return ok({ prUrl: `(already merged) ${plan.tag}`, sourceSha: baseSha });
  }

  const branch = `release/${plan.tag}-${baseSha.slice(0, 8)}`;
  const created = await createBranch(ctx, target, branch, baseSha);
  if (!created.ok) {
    return created;
  }

  let changed = versionFiles;
  if (!ctx.dryRun) {
    const applied = applyAppVersion(target.root, versionFiles, plan.version);
    if (!applied.ok) {
      return applied;
    }
    if (applied.value.length === 0) {
      return err(releaseError("dist_repo_failed", "version update produced no file changes", `Target version: ${plan.version}`));
    }
    changed = applied.value;
  }

  const commit = await commitAndPush(ctx, target, branch, changed, `release(app): bump version to ${plan.version}`);
  if (!commit.ok) {
    return commit;
  }
  const sourceSha = ctx.dryRun ? baseSha : commit.value;

  const pr = await createPullRequest(ctx, {
    slug: target.slug,
    label: target.label,
    baseBranch: target.defaultBranch,
    branch,
    title: plan.title,
    body: renderPinnedBody([`tag=${plan.tag}`, `version=${plan.version}`], plan.pinned)
  });
  if (!pr.ok) {
    return pr;
  }
  const merged = await mergePullRequest(ctx, target, pr.value, { deleteBranch: false, allowAutoMergeFallback: true });
  if (!merged.ok) {
    return withPullRequestHint(merged, pr.value);
  }
  return ok({ prUrl: pr.value, sourceSha });
}

export function notesInputs(notes: NotesAttachment | null): Result<Array<[string, string]>> {
  if (!notes) {
    return ok([]);
  }
  const encoded = Buffer.from(notes.markdown, "utf-8").toString("base64");
  if (encoded.length > MAX_NOTES_B64_LENGTH) {
    return err(
      releaseError(
        "invalid_input",
        "notes markdown is too large for workflow dispatch input",
        "Use a shorter --notes-file (recommended < 45KB)."
      )
    );
  }
  let source = notes.sourcePath.trim();
  if (source.length > MAX_NOTES_SOURCE_LENGTH) {
    source = `${source.slice(0, MAX_NOTES_SOURCE_LENGTH - 3)}...`;
  }
  return ok([
    ["notes_b64", encoded],
    ["notes_source", source]
  ]);
}

/** Runs the candidate workflow, then the release workflow, on `sourceSha`. */
export async function publishAppRelease(
  ctx: ReleaseContext,
  plan: AppReleasePlan,
  sourceSha: string,
  notes: NotesAttachment | null,
  watch: boolean
): Promise<Result<AppPublishResult>> {
  const app = ctx.config.app;
  const extra = notesInputs(notes);
  if (!extra.ok) {
    return extra;
  }
  ctx.logger.detail(
    notes ? `release notes: external markdown attached from ${notes.sourcePath}` : "release notes: automatic notes only"
  );

  const candidate = await dispatchWorkflow(ctx, {
    slug: app.repo.slug,
    workflow: app.candidateWorkflow,
    ref: app.repo.ref,
    inputs: [["source_sha", sourceSha]]
  });
  if (!candidate.ok) {
    return candidate;
  }
  if (watch) {
    const watched = await watchRun(ctx, app.repo.slug, candidate.value.id);
    if (!watched.ok) {
      return watched;
    }
  }

  const release = await dispatchWorkflow(ctx, {
    slug: app.repo.slug,
    workflow: app.releaseWorkflow,
    ref: app.repo.ref,
    inputs: [["tag", plan.tag], ["source_sha", sourceSha], ...extra.value]
  });
  if (!release.ok) {
    return release;
  }
  if (watch) {
    const watched = await watchRun(ctx, app.repo.slug, release.value.id);
    if (!watched.ok) {
      return watched;
    }
  }
  return ok({ candidateUrl: candidate.value.url, releaseUrl: release.value.url });
}
