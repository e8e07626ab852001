/**
 * Shared types for observer-table sessions.
 */

/**
 * Designator passed verbatim to HORIZONS. Designation lookups are
 * space/case-sensitive, name lookups are not; nothing here normalizes it.
 */
export type Target = string;

export interface ObserverTableRequest {
  readonly target: Target;
  /** Start time in any format HORIZONS accepts, e.g. "2018-01-01 10:00" */
  readonly startTime: string;
  /** Output interval, default "7d" */
  readonly stepSize: string;
  /** Table quantity code, default "21" (one-way light time) */
  readonly quantityCode: string;
}

export const DEFAULT_STEP_SIZE = '7d';
export const DEFAULT_QUANTITY_CODE = '21';

export function createRequest(
  target: Target,
  startTime: string,
  options: { stepSize?: string; quantityCode?: string } = {}
): ObserverTableRequest {
  return Object.freeze({
    target,
    startTime,
    stepSize: options.stepSize ?? DEFAULT_STEP_SIZE,
    quantityCode: options.quantityCode ?? DEFAULT_QUANTITY_CODE,
  });
}

export enum SessionPhase {
  CONNECTING = 'Connecting',
  AWAITING_MAIN_PROMPT = 'AwaitingMainPrompt',
  SUBMITTING_TARGET = 'SubmittingTarget',
  RESOLVING_AMBIGUITY = 'ResolvingAmbiguity',
  SELECTING_EPHEMERIS_TYPE = 'SelectingEphemerisType',
  SETTING_CENTER = 'SettingCenter',
  SETTING_START = 'SettingStart',
  SETTING_STOP = 'SettingStop',
  SETTING_STEP = 'SettingStep',
  CONFIRMING_DEFAULTS = 'ConfirmingDefaults',
  SETTING_QUANTITIES = 'SettingQuantities',
  AWAITING_TABLE = 'AwaitingTable',
  DONE = 'Done',
  FAILED = 'Failed',
}

/**
 * One candidate pattern of a wait. A string is matched literally.
 */
export interface Expectation {
  name: string;
  pattern: string | RegExp;
}

export interface MatchResult {
  matched: boolean;
  /** Index of the winning expectation, -1 when nothing matched */
  index: number;
  /** Name of the winning expectation */
  name?: string;
  /** Capture groups of the winning pattern, in order ('' for groups that did not participate) */
  captured: string[];
  /** Full matched text */
  text?: string;
  timedOut: boolean;
  /** The channel ended while waiting */
  closed?: boolean;
}

export enum SessionErrorCode {
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  TIMEOUT = 'TIMEOUT',
  AMBIGUOUS_MATCH = 'AMBIGUOUS_MATCH',
  NOT_FOUND = 'NOT_FOUND',
  CANCELLED = 'CANCELLED',
}

export interface SessionFailure {
  code: SessionErrorCode;
  message: string;
  /** Phase that was active when the session failed */
  phase?: SessionPhase;
  /** Raw server text worth showing the caller (candidate list for ambiguous matches) */
  diagnostic?: string;
  suggestion?: string;
  recoverable: false;
}

export type ObserverTableResult =
  | {
      ok: true;
      /** Text between the table markers, or the synthesized line */
      text: string;
      /** True for the disallowed-date placeholder instead of a real table */
      synthesized: boolean;
    }
  | {
      ok: false;
      error: SessionFailure;
    };
