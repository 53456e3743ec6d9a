/**
 * Failure categories raised inside the guard.
 *
 * None of these is fatal to the host: every caller maps a GuardError to an
 * allow (or, for STORE_UNWRITABLE, to a deny without a retry path).
 */
export type GuardErrorCode =
  | "INPUT_PARSE"
  | "UNSUPPORTED_KIND"
  | "FILE_UNREADABLE"
  | "STORE_UNWRITABLE"
  | "INVALID_INPUT";

export class GuardError extends Error {
  constructor(
    public readonly code: GuardErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "GuardError";
  }
}

export function isGuardError(err: unknown, code?: GuardErrorCode): err is GuardError {
  return err instanceof GuardError && (code === undefined || err.code === code);
}

export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
