/**
 * Prompt Matcher
 *
 * Buffers channel output and waits for one of several expected prompts.
 *
 * Features:
 * - Expectations tested in declaration order against the whole buffer
 * - Literal (string) or capturing (RegExp) patterns
 * - Text up to the end of a match is consumed; anything after it stays
 *   buffered for the next wait
 * - A wait ends on first match, on timeout, or when the channel closes
 */

import type { Channel } from '../transport';
import type { Expectation, MatchResult } from '../lib/types';

/**
 * Options for PromptMatcher
 */
export interface PromptMatcherOptions {
  /** Called with every chunk received, before matching */
  onChunk?: (chunk: string) => void;
}

interface PendingWait {
  check: () => void;
  close: () => void;
}

/**
 * Escape a literal for use inside a RegExp
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile an expectation pattern. Global and sticky flags are dropped so
 * exec() never depends on lastIndex.
 */
export function compilePattern(pattern: string | RegExp): RegExp {
  if (typeof pattern === 'string') {
    return new RegExp(escapeRegExp(pattern));
  }
  if (pattern.global || pattern.sticky) {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }
  return pattern;
}

function noMatch(closed: boolean): MatchResult {
  return { matched: false, index: -1, captured: [], timedOut: true, closed };
}

/**
 * Prompt Matcher
 *
 * One matcher per session; at most one wait may be pending at a time.
 */
export class PromptMatcher {
  private buffer = '';
  private pending: PendingWait | null = null;
  private closed = false;
  private readonly onChunk?: (chunk: string) => void;
  private readonly subscriptions: Array<() => void>;

  constructor(channel: Channel, options: PromptMatcherOptions = {}) {
    this.onChunk = options.onChunk;
    this.closed = !channel.isOpen;
    this.subscriptions = [
      channel.onData((chunk) => this.addOutput(chunk)),
      channel.onClose(() => this.handleClose()),
    ];
  }

  /**
   * Add output to the buffer and re-test a pending wait
   */
  addOutput(chunk: string): void {
    this.buffer += chunk;
    this.onChunk?.(chunk);
    this.pending?.check();
  }

  /**
   * Wait until one of the expectations matches the buffer, or time out.
   *
   * The first expectation (in the given order) that matches anywhere in
   * the buffer wins, even when a later one matches earlier text.
   */
  awaitAny(expectations: readonly Expectation[], timeoutMs: number): Promise<MatchResult> {
    if (this.pending) {
      return Promise.reject(new Error('PromptMatcher: a wait is already pending'));
    }

    const compiled = expectations.map((e) => compilePattern(e.pattern));

    const immediate = this.tryMatch(expectations, compiled);
    if (immediate) return Promise.resolve(immediate);
    if (this.closed) return Promise.resolve(noMatch(true));

    return new Promise((resolve) => {
      const finish = (result: MatchResult): void => {
        clearTimeout(timer);
        this.pending = null;
        resolve(result);
      };

      const timer = setTimeout(() => finish(noMatch(false)), timeoutMs);

      this.pending = {
        check: () => {
          const result = this.tryMatch(expectations, compiled);
          if (result) finish(result);
        },
        close: () => finish(noMatch(true)),
      };
    });
  }

  private tryMatch(expectations: readonly Expectation[], compiled: RegExp[]): MatchResult | null {
    for (let i = 0; i < compiled.length; i++) {
      const match = compiled[i].exec(this.buffer);
      if (!match) continue;

      this.buffer = this.buffer.slice(match.index + match[0].length);

      return {
        matched: true,
        index: i,
        name: expectations[i].name,
        captured: match.slice(1).map((group) => group ?? ''),
        text: match[0],
        timedOut: false,
      };
    }
    return null;
  }

  private handleClose(): void {
    this.closed = true;
    this.pending?.close();
  }

  /**
   * Get the current buffer contents
   */
  getBuffer(): string {
    return this.buffer;
  }

  /**
   * Get recent buffer (last N characters)
   */
  getRecentBuffer(chars: number = 500): string {
    return this.buffer.slice(-chars);
  }

  /**
   * Detach from the channel. A pending wait resolves as closed.
   */
  dispose(): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.handleClose();
  }
}
