/**
 * Replay transport
 *
 * Plays back a recorded server transcript: the first entry is the banner
 * sent on connect, and each line the client sends releases the next
 * entry. Once the transcript runs out the channel stays silent, which the
 * session sees as a timeout.
 *
 * Transcripts captured off the wire keep their CR LF line endings; they
 * are delivered as LF, the way the telnet decoder delivers live text.
 */

import { readFileSync } from 'fs';
import { BaseChannel, type Channel, type ChannelFactory } from './channel';

export type ReplayScript = readonly string[];

function toNvtText(entry: string): string {
  return entry.replace(/\r\n/g, '\n');
}

export class ReplayChannel extends BaseChannel {
  private readonly script: string[];
  private readonly sentLines: string[] = [];
  private timers = new Set<NodeJS.Timeout>();
  private closeCount = 0;

  constructor(script: ReplayScript) {
    super();
    this.script = script.map(toNvtText);
    const banner = this.script.shift();
    if (banner !== undefined) {
      this.deliver(banner);
    }
  }

  /** Lines sent by the client, without terminators */
  get sent(): readonly string[] {
    return this.sentLines;
  }

  /** Number of close() calls (idempotence is observable) */
  get closeCalls(): number {
    return this.closeCount;
  }

  /** Transcript entries not yet played */
  get remaining(): number {
    return this.script.length;
  }

  async send(text: string): Promise<void> {
    if (!this.isOpen) {
      throw new Error('ReplayChannel: send after close');
    }
    this.sentLines.push(text.replace(/\r?\n$/, ''));

    const reply = this.script.shift();
    if (reply === undefined) return;

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.deliver(reply);
    }, 0);
    this.timers.add(timer);
  }

  async close(): Promise<void> {
    this.closeCount++;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.markClosed();
  }
}

/**
 * Validate parsed JSON as a replay script
 */
export function parseReplayScript(value: unknown): ReplayScript {
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
    throw new Error('Replay transcript must be a JSON array of strings');
  }
  return value;
}

export function loadReplayScript(path: string): ReplayScript {
  return parseReplayScript(JSON.parse(readFileSync(path, 'utf-8')));
}

/**
 * Channel factory that ignores host and port and replays the script
 */
export function createReplayFactory(script: ReplayScript): ChannelFactory {
  return async (): Promise<Channel> => new ReplayChannel(script);
}
