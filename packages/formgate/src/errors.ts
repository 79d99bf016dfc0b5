// --------------------------------------------------------------------------
// Error types
// --------------------------------------------------------------------------

export type FormGateErrorCode =
  | 'profile_load_failed'
  | 'persistence_io'
  | 'surface_disconnected'
  | 'resolution_parse';

export class FormGateError extends Error {
  constructor(
    message: string,
    public readonly code: FormGateErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FormGateError';
  }
}

/** The profile document exists but cannot be read or does not validate. */
export class ProfileLoadError extends FormGateError {
  constructor(
    public readonly filePath: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Cannot load profile document ${filePath}: ${reason}`, 'profile_load_failed', { cause });
    this.name = 'ProfileLoadError';
  }
}

/**
 * A persist call failed. The target file is left as it was before the call;
 * the in-memory merge is kept so the caller can retry.
 */
export class PersistenceIOError extends FormGateError {
  constructor(
    public readonly filePath: string,
    public readonly step: 'backup' | 'write' | 'rename',
    cause?: unknown,
  ) {
    super(`Persisting ${filePath} failed during ${step}: ${describeCause(cause)}`, 'persistence_io', { cause });
    this.name = 'PersistenceIOError';
  }
}

/** The form surface cannot report page state at all. Ends the session. */
export class SurfaceDisconnectedError extends FormGateError {
  constructor(cause?: unknown) {
    super(`Form surface unreachable: ${describeCause(cause)}`, 'surface_disconnected', { cause });
    this.name = 'SurfaceDisconnectedError';
  }
}

/** Malformed batch AI reply. Logged only; the reply counts as "no answers". */
export class ResolutionParseError extends FormGateError {
  constructor(
    public readonly rawReply: string,
    reason: string,
  ) {
    super(`Unparseable batch AI reply: ${reason}`, 'resolution_parse');
    this.name = 'ResolutionParseError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}
