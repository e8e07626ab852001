/**
 * Mention handling
 *
 * Turns the outcome of an observer-table query for a mention into either
 * an event to track (the reply is due once light has made the round trip)
 * or an immediate reply text.
 */

import type { ObserverTableResult } from '../lib/types';
import { SessionErrorCode } from '../lib/types';
import type { EventForm } from './events';

/** Reply length limit of the delivery channel */
export const MAX_REPLY_LENGTH = 280;

export const NOT_FOUND_REPLY = `Sorry, I don't recognize that location.

Consult JPL HORIZONS for valid options: https://ssd.jpl.nasa.gov/?horizons
`;

export interface Mention {
  id: bigint;
  text: string;
  createdAt: Date;
}

export type MentionOutcome =
  | { kind: 'record'; event: EventForm; roundTripSeconds: number }
  | { kind: 'reply'; text: string };

/**
 * Strip a leading handle from a mention, leaving the target designator
 */
export function mentionBody(text: string, handle: string): string {
  const trimmed = text.trim();
  if (handle && trimmed.startsWith(handle)) {
    return trimmed.slice(handle.length).trim();
  }
  return trimmed;
}

/**
 * One-way light time, in minutes, from the first row of a quantity-21
 * table (third whitespace-separated field).
 */
export function parseLightTimeMinutes(table: string): number {
  const line = table.trim().split('\n')[0];
  if (!line) {
    throw new Error('Observer table is missing the distance line');
  }

  const field = line.trim().split(/\s+/)[2];
  if (field === undefined) {
    throw new Error(`Missing distance field: '${line}'`);
  }

  const minutes = Number(field);
  if (!Number.isFinite(minutes)) {
    throw new Error(`Invalid distance field '${field}' in '${line}'`);
  }
  return minutes;
}

/**
 * Deadline at which a signal sent at `sentAt` would have come back
 */
export function computeDeadline(
  sentAt: Date,
  lightMinutes: number
): { deadline: Date; roundTripSeconds: number } {
  const roundTripSeconds = lightMinutes * 60 * 2;
  const deadline = new Date(sentAt.getTime() + Math.trunc(roundTripSeconds * 1000));
  return { deadline, roundTripSeconds };
}

const CANDIDATE_LINE = / *(-?\d+) *(.*?)(\(| {2}|$)/;

/**
 * "Pick a number:" reply listing `<id>: <name>` per candidate row, keeping
 * only rows that fit within the reply limit.
 */
export function formatCandidatesReply(candidates: string): string {
  let message = 'Pick a number:\n';

  for (const row of candidates.trim().split('\n')) {
    const match = CANDIDATE_LINE.exec(row);
    if (!match) {
      throw new Error(`No match found in '${row}'`);
    }
    const line = `${match[1]}: ${match[2].trim()}\n`;
    if (message.length + line.length <= MAX_REPLY_LENGTH) {
      message += line;
    }
  }

  return message;
}

/**
 * Decide what to do with a mention given its query result. Failures other
 * than ambiguous / not-found are raised.
 */
export function buildEvent(mention: Mention, body: string, result: ObserverTableResult): MentionOutcome {
  if (result.ok) {
    const minutes = parseLightTimeMinutes(result.text);
    const { deadline, roundTripSeconds } = computeDeadline(mention.createdAt, minutes);
    return {
      kind: 'record',
      event: {
        tweetId: mention.id,
        celestialBody: body,
        replied: false,
        deadline: deadline.toISOString(),
      },
      roundTripSeconds,
    };
  }

  switch (result.error.code) {
    case SessionErrorCode.NOT_FOUND:
      return { kind: 'reply', text: NOT_FOUND_REPLY };
    case SessionErrorCode.AMBIGUOUS_MATCH:
      return { kind: 'reply', text: formatCandidatesReply(result.error.diagnostic ?? '') };
    default:
      throw new Error(`${result.error.code}: ${result.error.message}`);
  }
}
