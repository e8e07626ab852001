/**
 * Observer Table Sessions
 *
 * Scripts the HORIZONS telnet dialogue: sends the scripted answers, waits
 * for the expected prompts, branches on ambiguous / unknown targets, and
 * captures the ephemeris between the $$SOE / $$EOE markers.
 *
 * Example:
 *   const result = await fetchObserverTable(
 *     createRequest('2015 HM10;', '2018-01-01 10:00'),
 *     { host: 'horizons.jpl.nasa.gov', port: 6775, stepTimeoutMs: 15000 }
 *   );
 */

export { ObserverSession, fetchObserverTable, type SessionConfig } from './session';

export { PromptMatcher, compilePattern, escapeRegExp, type PromptMatcherOptions } from './prompt-matcher';

export {
  HORIZONS_MARKERS,
  extractBetween,
  markerExpectation,
  trimMarkerLines,
  type MarkerPair,
} from './table-extractor';

export {
  FINAL_ACKNOWLEDGEMENT,
  PAGE_COMMAND,
  PROMPTS,
  TARGET_RESOLUTION,
  buildPhaseTable,
  synthesizeDisallowedLine,
  type PhaseAction,
  type PhaseDefinition,
  type PhaseTable,
  type Transition,
} from './horizons-prompts';

export {
  createRequest,
  SessionErrorCode,
  SessionPhase,
  type Expectation,
  type MatchResult,
  type ObserverTableRequest,
  type ObserverTableResult,
  type SessionFailure,
  type Target,
} from '../lib/types';

export { SessionError } from '../lib/errors';
