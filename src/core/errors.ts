/**
 * Error taxonomy for archive runs.
 *
 * Fatal kinds abort the run before anything is committed. MalformedRecord is
 * scoped to one playlist and ends up in the run summary instead.
 */

export type ArchiveErrorKind =
  | "AuthError"
  | "RateLimited"
  | "MalformedRecord"
  | "ArchiveBusy"
  | "CommitFailed"
  | "ConfigError";

export abstract class ArchiveError extends Error {
  abstract readonly kind: ArchiveErrorKind;
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AuthError extends ArchiveError {
  readonly kind = "AuthError";
  readonly fatal = true;
}

export class RateLimited extends ArchiveError {
  readonly kind = "RateLimited";
  readonly fatal = true;

  constructor(
    message: string,
    public readonly retryAfterSeconds: number | null = null
  ) {
    super(message);
  }
}

export class MalformedRecord extends ArchiveError {
  readonly kind = "MalformedRecord";
  readonly fatal = false;

  constructor(
    message: string,
    public readonly playlistId: string | null = null
  ) {
    super(message);
  }
}

export class ArchiveBusy extends ArchiveError {
  readonly kind = "ArchiveBusy";
  readonly fatal = true;

  constructor(
    public readonly lockPath: string,
    public readonly holderPid: number | null
  ) {
    super(
      holderPid === null
        ? `Archive is locked by another run (${lockPath})`
        : `Archive is locked by another run (pid ${holderPid}, ${lockPath})`
    );
  }
}

export class CommitFailed extends ArchiveError {
  readonly kind = "CommitFailed";
  readonly fatal = true;
}

export class ConfigError extends ArchiveError {
  readonly kind = "ConfigError";
  readonly fatal = true;
}

export function isArchiveError(err: unknown): err is ArchiveError {
  return err instanceof ArchiveError;
}

/** Errors that must stop the whole run, wherever they surface. */
export function isRunAborting(err: unknown): boolean {
  return isArchiveError(err) && err.fatal;
}

const EXIT_CODES: Record<ArchiveErrorKind, number> = {
  ConfigError: 1,
  MalformedRecord: 1,
  AuthError: 2,
  RateLimited: 3,
  ArchiveBusy: 4,
  CommitFailed: 5,
};

export function exitCodeFor(err: unknown): number {
  return isArchiveError(err) ? EXIT_CODES[err.kind] : 1;
}

export function describeError(err: unknown): string {
  if (isArchiveError(err)) {
    let text = `${err.kind}: ${err.message}`;
    if (err instanceof RateLimited && err.retryAfterSeconds !== null) {
      text += ` (retry after ${err.retryAfterSeconds}s)`;
    }
    if (err.cause instanceof Error) {
      text += ` (cause: ${err.cause.message})`;
    }
    return text;
  }
  return err instanceof Error ? err.message : String(err);
}
