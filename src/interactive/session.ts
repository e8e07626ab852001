/**
 * Observer Session
 *
 * Drives one HORIZONS dialogue from connect to table. The phase table in
 * horizons-prompts.ts says what to wait for and what to answer; this
 * module interprets it, one send-then-wait step per phase, and owns the
 * channel for the whole session.
 *
 * Every failure is terminal: there are no retries, and the channel is
 * closed on every exit path.
 */

import { createFailure, isSessionError } from '../lib/errors';
import { generateSessionId, sessionLogger, type Logger } from '../lib/logger';
import {
  SessionErrorCode,
  SessionPhase,
  type MatchResult,
  type ObserverTableRequest,
  type ObserverTableResult,
  type SessionFailure,
} from '../lib/types';
import { openTelnetChannel, type Channel, type ChannelFactory } from '../transport';
import {
  FINAL_ACKNOWLEDGEMENT,
  buildPhaseTable,
  isActivePhase,
  synthesizeDisallowedLine,
  type PhaseDefinition,
  type PhaseTable,
} from './horizons-prompts';
import { PromptMatcher } from './prompt-matcher';
import { HORIZONS_MARKERS, extractBetween, trimMarkerLines, type MarkerPair } from './table-extractor';

/**
 * Settings for one session. Nothing is read from ambient state.
 */
export interface SessionConfig {
  host: string;
  port: number;
  /** Window for each wait, applied independently at every phase */
  stepTimeoutMs: number;
  connectTimeoutMs?: number;
  /** Log every send and every received chunk at info instead of debug */
  verbose?: boolean;
  /** Receives the raw server text as it arrives */
  onChunk?: (chunk: string) => void;
  /** Aborting closes the channel and ends the session as CANCELLED */
  signal?: AbortSignal;
  /** Defaults to the telnet transport */
  openChannel?: ChannelFactory;
  markers?: MarkerPair;
  logger?: Logger;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

/**
 * Observer Session
 *
 * Holds no state between run() calls beyond the phase of the current run.
 */
export class ObserverSession {
  private readonly request: ObserverTableRequest;
  private readonly config: SessionConfig;
  private readonly table: PhaseTable;
  private readonly markers: MarkerPair;
  private readonly log: Logger;
  private phase: SessionPhase = SessionPhase.CONNECTING;

  constructor(request: ObserverTableRequest, config: SessionConfig) {
    this.request = request;
    this.config = config;
    this.markers = config.markers ?? HORIZONS_MARKERS;
    this.table = buildPhaseTable(this.markers);
    this.log = (config.logger ?? sessionLogger).child({
      sessionId: generateSessionId(),
      target: request.target,
    });
  }

  /** Phase of the current (or last) run */
  get currentPhase(): SessionPhase {
    return this.phase;
  }

  async run(): Promise<ObserverTableResult> {
    this.phase = SessionPhase.CONNECTING;
    const { signal } = this.config;

    if (signal?.aborted) {
      return this.fail(SessionErrorCode.CANCELLED, 'Cancelled before connecting');
    }

    const open = this.config.openChannel ?? openTelnetChannel;
    let channel: Channel;
    try {
      channel = await open(this.config.host, this.config.port, {
        connectTimeoutMs: this.config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
        signal,
      });
    } catch (error) {
      return this.failFromError(error);
    }

    const matcher = new PromptMatcher(channel, {
      onChunk: (chunk) => {
        this.trace({ phase: this.phase, chunk }, 'received');
        this.config.onChunk?.(chunk);
      },
    });

    const onAbort = (): void => {
      this.log.info({ phase: this.phase }, 'cancel requested');
      channel.close().catch((error: unknown) => {
        this.log.warn({ err: error }, 'failed to close channel on cancel');
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await this.drive(channel, matcher);
    } catch (error) {
      return this.failFromError(error);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      matcher.dispose();
      await channel.close();
      this.log.debug({ phase: this.phase }, 'channel closed');
    }
  }

  /**
   * One unit of work: send the input (if any), then wait for the phase's
   * expectations.
   */
  async step(
    channel: Channel,
    matcher: PromptMatcher,
    definition: PhaseDefinition,
    input: string | undefined
  ): Promise<MatchResult> {
    if (input !== undefined) {
      this.trace({ phase: definition.phase, input }, 'send');
      await channel.sendLine(input);
    }
    return matcher.awaitAny(definition.transitions, this.config.stepTimeoutMs);
  }

  private async drive(channel: Channel, matcher: PromptMatcher): Promise<ObserverTableResult> {
    let input: string | undefined;

    while (isActivePhase(this.phase)) {
      const definition = this.table[this.phase];
      const result = await this.step(channel, matcher, definition, input);
      input = undefined;

      if (this.config.signal?.aborted) {
        return this.fail(SessionErrorCode.CANCELLED, `Cancelled in phase ${this.phase}`);
      }

      if (!result.matched) {
        const reason = result.closed
          ? 'connection closed'
          : `no expected prompt within ${this.config.stepTimeoutMs}ms`;
        return this.fail(SessionErrorCode.TIMEOUT, `Timed out in phase ${this.phase}: ${reason}`, {
          diagnostic: matcher.getRecentBuffer(),
        });
      }

      const transition = definition.transitions[result.index];
      this.log.debug({ phase: this.phase, matched: transition.name }, 'matched');

      const { action } = transition;
      switch (action.kind) {
        case 'send':
          input = action.input(this.request);
          this.phase = action.next;
          break;

        case 'fail':
          return action.code === SessionErrorCode.AMBIGUOUS_MATCH
            ? this.fail(action.code, `Multiple matches for '${this.request.target}'`, {
                diagnostic: result.captured[0] ?? '',
              })
            : this.fail(action.code, `No matches found for '${this.request.target}'`);

        case 'synthesize':
          this.log.warn(
            { phase: this.phase, startTime: this.request.startTime },
            'date disallowed by server, returning placeholder line'
          );
          this.phase = SessionPhase.DONE;
          return { ok: true, text: synthesizeDisallowedLine(this.request), synthesized: true };

        case 'extract': {
          const payload = extractBetween(result.text ?? '', this.markers) ?? '';
          await this.acknowledge(channel);
          this.phase = SessionPhase.DONE;
          return { ok: true, text: trimMarkerLines(payload), synthesized: false };
        }
      }
    }

    return this.fail(SessionErrorCode.TIMEOUT, `Session ended in phase ${this.phase}`);
  }

  private async acknowledge(channel: Channel): Promise<void> {
    try {
      this.trace({ phase: this.phase, input: FINAL_ACKNOWLEDGEMENT }, 'send');
      await channel.sendLine(FINAL_ACKNOWLEDGEMENT);
    } catch (error) {
      // The table is already captured
      this.log.warn({ err: error }, 'final acknowledgement not delivered');
    }
  }

  private trace(fields: Record<string, unknown>, message: string): void {
    if (this.config.verbose) {
      this.log.info(fields, message);
    } else {
      this.log.debug(fields, message);
    }
  }

  private fail(
    code: SessionErrorCode,
    message: string,
    details: { diagnostic?: string } = {}
  ): ObserverTableResult {
    const failure: SessionFailure = createFailure(code, message, {
      phase: this.phase,
      diagnostic: details.diagnostic,
    });
    this.log.warn({ code, phase: this.phase }, message);
    this.phase = SessionPhase.FAILED;
    return { ok: false, error: failure };
  }

  private failFromError(error: unknown): ObserverTableResult {
    if (this.config.signal?.aborted) {
      return this.fail(SessionErrorCode.CANCELLED, `Cancelled in phase ${this.phase}`);
    }
    if (isSessionError(error)) {
      return this.fail(error.code, error.message, { diagnostic: error.diagnostic });
    }
    throw error;
  }
}

/**
 * Run one session for the request
 */
export function fetchObserverTable(
  request: ObserverTableRequest,
  config: SessionConfig
): Promise<ObserverTableResult> {
  return new ObserverSession(request, config).run();
}
