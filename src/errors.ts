/**
 * Error codes raised by the repository client. Callers branch on `code`
 * rather than on message text.
 */
export type RepoClientErrorCode =
  | "empty_reference"
  | "invalid_reference"
  | "invalid_argument"
  | "gh_unavailable"
  | "gh_unauthenticated"
  | "command_not_found"
  | "command_timeout"
  | "command_failed"
  | "http_error";

export class RepoClientError extends Error {
  readonly code: RepoClientErrorCode;
  readonly details?: unknown;

  constructor(
    code: RepoClientErrorCode,
    message: string,
    options: { details?: unknown; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "RepoClientError";
    this.code = code;
    this.details = options.details;
  }
}

export function isRepoClientError(
  error: unknown,
  code?: RepoClientErrorCode,
): error is RepoClientError {
  if (!(error instanceof RepoClientError)) return false;
  return code === undefined || error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
