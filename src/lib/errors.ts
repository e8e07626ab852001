import { SessionErrorCode, type SessionFailure, type SessionPhase } from './types';

const SUGGESTIONS: Record<SessionErrorCode, string> = {
  [SessionErrorCode.CONNECTION_ERROR]: 'Check network access and the HORIZONS_HOST / HORIZONS_PORT settings',
  [SessionErrorCode.TIMEOUT]: 'The server did not answer as expected; raise HORIZONS_STEP_TIMEOUT_MS or rerun with --verbose',
  [SessionErrorCode.AMBIGUOUS_MATCH]: 'Pick one of the listed records and query it by its ID',
  [SessionErrorCode.NOT_FOUND]: 'Consult JPL HORIZONS for valid designators',
  [SessionErrorCode.CANCELLED]: 'The session was cancelled before it finished',
};

/**
 * Error form of a SessionFailure, for code paths that throw.
 */
export class SessionError extends Error {
  readonly code: SessionErrorCode;
  readonly phase?: SessionPhase;
  readonly diagnostic?: string;

  constructor(
    code: SessionErrorCode,
    message: string,
    details: { phase?: SessionPhase; diagnostic?: string; cause?: unknown } = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'SessionError';
    this.code = code;
    this.phase = details.phase;
    this.diagnostic = details.diagnostic;
  }

  toFailure(): SessionFailure {
    return createFailure(this.code, this.message, {
      phase: this.phase,
      diagnostic: this.diagnostic,
    });
  }
}

export function createFailure(
  code: SessionErrorCode,
  message: string,
  details: { phase?: SessionPhase; diagnostic?: string } = {}
): SessionFailure {
  const failure: SessionFailure = {
    code,
    message,
    suggestion: SUGGESTIONS[code],
    recoverable: false,
  };
  if (details.phase !== undefined) failure.phase = details.phase;
  if (details.diagnostic !== undefined) failure.diagnostic = details.diagnostic;
  return failure;
}

export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}
