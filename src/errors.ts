export type ParseErrorCode =
  | 'file_not_found'
  | 'not_found'
  | 'empty_file'
  | 'invalid_json'
  | 'missing_field'
  | 'invalid_field'
  | 'io_error';

export type ValidationErrorCode = 'mixed_session_ids';

export type SessionErrorCode = 'busy' | 'invalid_argument';

export type ExecutionErrorCode =
  | 'agent_not_found'
  | 'spawn_failed'
  | 'agent_failed'
  | 'timeout'
  | 'invalid_response';

export type WorkspaceErrorCode = 'not_found' | 'not_a_directory';

/**
 * Base class for every error this package throws on purpose.
 */
export class TurnlogError<C extends string = string> extends Error {
  readonly code: C;

  constructor(code: C, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TurnlogError';
    this.code = code;
  }
}

/**
 * A transcript could not be read or does not follow the record schema.
 * Always fatal to the single parse that raised it.
 */
export class ParseError extends TurnlogError<ParseErrorCode> {
  readonly filePath: string | null;
  readonly lineNumber: number | null;

  constructor(
    code: ParseErrorCode,
    message: string,
    details: { filePath?: string; lineNumber?: number; cause?: unknown } = {},
  ) {
    super(code, message, { cause: details.cause });
    this.name = 'ParseError';
    this.filePath = details.filePath ?? null;
    this.lineNumber = details.lineNumber ?? null;
  }
}

/**
 * Structurally valid input that is semantically inconsistent.
 */
export class ValidationError extends TurnlogError<ValidationErrorCode> {
  readonly filePath: string | null;
  readonly lineNumber: number | null;

  constructor(
    code: ValidationErrorCode,
    message: string,
    details: { filePath?: string; lineNumber?: number } = {},
  ) {
    super(code, message);
    this.name = 'ValidationError';
    this.filePath = details.filePath ?? null;
    this.lineNumber = details.lineNumber ?? null;
  }
}

/** Misuse of a session or conversation object. */
export class SessionError extends TurnlogError<SessionErrorCode> {
  constructor(code: SessionErrorCode, message: string) {
    super(code, message);
    this.name = 'SessionError';
  }
}

/**
 * The external agent invocation failed. The turn that triggered it is
 * discarded.
 */
export class ExecutionError extends TurnlogError<ExecutionErrorCode> {
  readonly stderr: string | null;

  constructor(
    code: ExecutionErrorCode,
    message: string,
    details: { stderr?: string; cause?: unknown } = {},
  ) {
    super(code, message, { cause: details.cause });
    this.name = 'ExecutionError';
    this.stderr = details.stderr ?? null;
  }
}

export class WorkspaceError extends TurnlogError<WorkspaceErrorCode> {
  constructor(code: WorkspaceErrorCode, message: string) {
    super(code, message);
    this.name = 'WorkspaceError';
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
