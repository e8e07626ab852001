/**
 * HORIZONS dialogue
 *
 * Prompt patterns of the HORIZONS telnet interface and the phase table
 * the session interprets. Each phase lists its expectations in priority
 * order; the first one found in the buffer decides the transition.
 */

import {
  SessionErrorCode,
  SessionPhase,
  type Expectation,
  type ObserverTableRequest,
} from '../lib/types';
import { HORIZONS_MARKERS, markerExpectation, type MarkerPair } from './table-extractor';

// ============================================================================
// Prompt Patterns
// ============================================================================

export const PROMPTS = {
  // Horizons>
  main: /Horizons>/,
  // Continue [ <cr>=yes, n=no, ? ] :
  continue: /Continue\s*\[[^\]]*\]\s*:/,
  // Select ... [E]phemeris, [F]tp, [M]ail, [R]edisplay, ?, <cr>:
  select: /\[E\]phemeris/,
  // Multiple major-bodies match string "APOPHIS*"
  //   ID#      Name                               Designation  IAU/aliases/other
  //   -------  ---------------------------------- -----------  -------------------
  //   <rows>
  // Number of matches =  2. Use ID# to make unique selection.
  multipleMajorBodies:
    /Multiple major-bodies match string[^\n]*\n[\s\S]*?-{3,}[- ]*\n([\s\S]*?)\n\s*Number of matches/,
  // Matching small-bodies:
  //   Record #  Epoch-yr  >MATCH DESIG<  Primary Desig  Name
  //   --------  --------  -------------  -------------  -------------------------
  //   <rows>
  // (2 matches. To SELECT, enter record # (integer), followed by semi-colon.)
  multipleSmallBodies:
    /Matching small-bodies[^\n]*\n[\s\S]*?-{3,}[- ]*\n([\s\S]*?)\n\s*\(\d+ matches\./,
  noMatches: /No matches found/,
  // Observe, Elements, Vectors  [o,e,v,?] :
  ephemerisType: /Observe, Elements, Vectors\s*\[[^\]]*\]\s*:/,
  // Coordinate center [ <id>,coord,geo  ] :
  center: /Coordinate center\s*\[[^\]]*\]\s*:/,
  disallowed: /disallowed/i,
  // Starting UT  [>=   1599-Dec-11 23:59] :
  start: /Starting\s+UT\s*\[[^\]]*\]\s*:/,
  // Ending   UT  [<=   2500-Dec-31 23:58] :
  stop: /Ending\s+UT\s*\[[^\]]*\]\s*:/,
  // Output interval [ex: 10m, 1h, 1d, ? ] :
  interval: /Output interval\s*\[[^\]]*\]\s*:/,
  // Accept default output [ cr=(y), n, ?] :
  acceptDefault: /Accept default output\s*\[[^\]]*\]\s*:/,
  // Select table quantities [ <#,#..>, ?] :
  quantities: /Select table quantities\s*\[[^\]]*\]\s*:/,
} as const;

/** Sent to the main prompt first, turning paging off */
export const PAGE_COMMAND = 'PAGE';
/** Sent after the table has been captured */
export const FINAL_ACKNOWLEDGEMENT = 'q';

/**
 * Line returned when the server refuses the requested date. Its third
 * whitespace field is the placeholder light-time value.
 */
export function synthesizeDisallowedLine(request: ObserverTableRequest): string {
  return `${request.startTime} 0`;
}

// ============================================================================
// Phase Table
// ============================================================================

export type PhaseAction =
  /** Send the input, then wait in the next phase */
  | { kind: 'send'; input: (request: ObserverTableRequest) => string; next: SessionPhase }
  /** End the session; group 1 of the match becomes the diagnostic when present */
  | { kind: 'fail'; code: SessionErrorCode.AMBIGUOUS_MATCH | SessionErrorCode.NOT_FOUND }
  /** End successfully with a synthesized line instead of a table */
  | { kind: 'synthesize' }
  /** End successfully with the marker-delimited payload */
  | { kind: 'extract' };

export interface Transition extends Expectation {
  action: PhaseAction;
}

export interface PhaseDefinition {
  phase: SessionPhase;
  transitions: readonly Transition[];
}

export type ActivePhase = Exclude<SessionPhase, SessionPhase.DONE | SessionPhase.FAILED>;

export type PhaseTable = Readonly<Record<ActivePhase, PhaseDefinition>>;

const send = (
  input: string | ((request: ObserverTableRequest) => string),
  next: SessionPhase
): PhaseAction => ({
  kind: 'send',
  input: typeof input === 'string' ? () => input : input,
  next,
});

/**
 * Outcomes of a submitted target. Reached directly after the target and
 * again after answering "Continue?", so both paths behave identically.
 */
export const TARGET_RESOLUTION: readonly Transition[] = [
  { name: 'select', pattern: PROMPTS.select, action: send('E', SessionPhase.SELECTING_EPHEMERIS_TYPE) },
  {
    name: 'multiple-major-bodies',
    pattern: PROMPTS.multipleMajorBodies,
    action: { kind: 'fail', code: SessionErrorCode.AMBIGUOUS_MATCH },
  },
  {
    name: 'multiple-small-bodies',
    pattern: PROMPTS.multipleSmallBodies,
    action: { kind: 'fail', code: SessionErrorCode.AMBIGUOUS_MATCH },
  },
  {
    name: 'no-matches',
    pattern: PROMPTS.noMatches,
    action: { kind: 'fail', code: SessionErrorCode.NOT_FOUND },
  },
];

const DISALLOWED: Transition = {
  name: 'disallowed',
  pattern: PROMPTS.disallowed,
  action: { kind: 'synthesize' },
};

export function buildPhaseTable(markers: MarkerPair = HORIZONS_MARKERS): PhaseTable {
  return {
    [SessionPhase.CONNECTING]: {
      phase: SessionPhase.CONNECTING,
      transitions: [
        { name: 'main', pattern: PROMPTS.main, action: send(PAGE_COMMAND, SessionPhase.AWAITING_MAIN_PROMPT) },
      ],
    },
    [SessionPhase.AWAITING_MAIN_PROMPT]: {
      phase: SessionPhase.AWAITING_MAIN_PROMPT,
      transitions: [
        {
          name: 'main',
          pattern: PROMPTS.main,
          action: send((r) => r.target, SessionPhase.SUBMITTING_TARGET),
        },
      ],
    },
    [SessionPhase.SUBMITTING_TARGET]: {
      phase: SessionPhase.SUBMITTING_TARGET,
      transitions: [
        { name: 'continue', pattern: PROMPTS.continue, action: send('yes', SessionPhase.RESOLVING_AMBIGUITY) },
        ...TARGET_RESOLUTION,
      ],
    },
    [SessionPhase.RESOLVING_AMBIGUITY]: {
      phase: SessionPhase.RESOLVING_AMBIGUITY,
      transitions: TARGET_RESOLUTION,
    },
    [SessionPhase.SELECTING_EPHEMERIS_TYPE]: {
      phase: SessionPhase.SELECTING_EPHEMERIS_TYPE,
      transitions: [
        { name: 'ephemeris-type', pattern: PROMPTS.ephemerisType, action: send('O', SessionPhase.SETTING_CENTER) },
      ],
    },
    [SessionPhase.SETTING_CENTER]: {
      phase: SessionPhase.SETTING_CENTER,
      transitions: [
        { name: 'center', pattern: PROMPTS.center, action: send('', SessionPhase.SETTING_START) },
      ],
    },
    [SessionPhase.SETTING_START]: {
      phase: SessionPhase.SETTING_START,
      transitions: [
        DISALLOWED,
        { name: 'start', pattern: PROMPTS.start, action: send((r) => r.startTime, SessionPhase.SETTING_STOP) },
      ],
    },
    [SessionPhase.SETTING_STOP]: {
      phase: SessionPhase.SETTING_STOP,
      transitions: [
        DISALLOWED,
        { name: 'stop', pattern: PROMPTS.stop, action: send('', SessionPhase.SETTING_STEP) },
      ],
    },
    [SessionPhase.SETTING_STEP]: {
      phase: SessionPhase.SETTING_STEP,
      transitions: [
        {
          name: 'interval',
          pattern: PROMPTS.interval,
          action: send((r) => r.stepSize, SessionPhase.CONFIRMING_DEFAULTS),
        },
      ],
    },
    [SessionPhase.CONFIRMING_DEFAULTS]: {
      phase: SessionPhase.CONFIRMING_DEFAULTS,
      transitions: [
        { name: 'accept-default', pattern: PROMPTS.acceptDefault, action: send('Y', SessionPhase.SETTING_QUANTITIES) },
      ],
    },
    [SessionPhase.SETTING_QUANTITIES]: {
      phase: SessionPhase.SETTING_QUANTITIES,
      transitions: [
        {
          name: 'quantities',
          pattern: PROMPTS.quantities,
          action: send((r) => r.quantityCode, SessionPhase.AWAITING_TABLE),
        },
      ],
    },
    [SessionPhase.AWAITING_TABLE]: {
      phase: SessionPhase.AWAITING_TABLE,
      transitions: [{ ...markerExpectation(markers), action: { kind: 'extract' } }],
    },
  };
}

export function isActivePhase(phase: SessionPhase): phase is ActivePhase {
  return phase !== SessionPhase.DONE && phase !== SessionPhase.FAILED;
}
