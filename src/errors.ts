export type ReleaseErrorKind =
  | "invalid_input"
  | "invalid_tag"
  | "tag_exists"
  | "ci_not_green"
  | "permission_denied"
  | "dist_repo_dirty"
  | "dist_repo_failed"
  | "workflow_failed"
  | "release_delete_failed"
  | "gh_missing"
  | "gh_auth_required";

export type ReleaseError = {
  kind: ReleaseErrorKind;
  message: string;
  hint?: string;
};

export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E = ReleaseError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function releaseError(kind: ReleaseErrorKind, message: string, hint?: string | null): ReleaseError {
  const clean = hint?.trim();
  return clean ? { kind, message, hint: clean } : { kind, message };
}

export const ExitCode = {
  OK: 0,
  USER_ERROR: 1,
  ENV_ERROR: 2,
  NETWORK_ERROR: 4,
  IO_ERROR: 5
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(kind: ReleaseErrorKind): ExitCodeValue {
  switch (kind) {
    case "gh_missing":
    case "gh_auth_required":
    case "permission_denied":
      return ExitCode.ENV_ERROR;
    case "workflow_failed":
    case "release_delete_failed":
      return ExitCode.NETWORK_ERROR;
    case "dist_repo_dirty":
    case "dist_repo_failed":
      return ExitCode.IO_ERROR;
    default:
      return ExitCode.USER_ERROR;
  }
}

export function formatError(code: string, message: string): string {
  return `[${code}] ${message}`;
}

export function formatReleaseError(error: ReleaseError): string {
  const lines = [formatError(error.kind, error.message)];
  if (error.hint) {
    for (const line of error.hint.split(/\r?\n/)) {
      lines.push(`  hint: ${line}`);
    }
  }
  return lines.join("\n");
}

export function printReleaseError(error: ReleaseError): void {
  console.error(formatReleaseError(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
