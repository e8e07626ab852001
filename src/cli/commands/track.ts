/**
 * CLI Track Command
 *
 * Query the light time to a mentioned body and either start tracking the
 * mention (reply due after the round trip) or print the immediate reply.
 * Mentions at or below the highest tracked tweet id are skipped.
 */

import pc from 'picocolors';
import { getConfig } from '../../lib/config';
import { EventStore, buildEvent, mentionBody, type MentionOutcome } from '../../memory';
import { EXIT_FAILURE, EXIT_SUCCESS, runQuery, type QueryCommandOptions } from './query';

export interface TrackCommandOptions extends QueryCommandOptions {
  tweetId: string;
  /** Mention time, ISO-8601; defaults to now */
  at?: string;
  /** Leading handle to strip from the mention text */
  handle?: string;
}

/**
 * HORIZONS start time for a mention: "YYYY-MM-DD HH:MM:SS" in UTC
 */
export function formatStartTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

function withStore<T>(use: (store: EventStore) => T): T {
  const store = new EventStore(getConfig().databasePath);
  try {
    return use(store);
  } finally {
    store.close();
  }
}

function parseMentionTime(at: string | undefined): Date | null {
  if (at === undefined) return new Date();
  const date = new Date(at);
  return Number.isNaN(date.getTime()) ? null : date;
}

function parseTweetId(value: string): bigint | null {
  return /^\d+$/.test(value) ? BigInt(value) : null;
}

export async function trackCommand(
  text: string,
  options: TrackCommandOptions,
  signal?: AbortSignal
): Promise<number> {
  const createdAt = parseMentionTime(options.at);
  if (!createdAt) {
    console.error(pc.red(`Error: invalid mention time '${options.at}'`));
    return EXIT_FAILURE;
  }

  const tweetId = parseTweetId(options.tweetId);
  if (tweetId === null) {
    console.error(pc.red(`Error: invalid tweet id '${options.tweetId}'`));
    return EXIT_FAILURE;
  }

  const latest = withStore((store) => store.getMaxTweetId());
  if (latest !== null && tweetId <= latest) {
    console.log(`Mention ${tweetId} already processed (latest tracked ${latest})`);
    return EXIT_SUCCESS;
  }

  const body = mentionBody(text, options.handle ?? '');
  if (!body) {
    console.error(pc.red('Error: mention has no target'));
    return EXIT_FAILURE;
  }

  const result = await runQuery(formatStartTime(createdAt), body, options, signal);

  let outcome: MentionOutcome;
  try {
    outcome = buildEvent({ id: tweetId, text, createdAt }, body, result);
  } catch (error) {
    console.error(pc.red(`Error processing mention: ${error instanceof Error ? error.message : String(error)}`));
    return EXIT_FAILURE;
  }

  if (outcome.kind === 'reply') {
    process.stdout.write(outcome.text);
    return EXIT_SUCCESS;
  }

  const { event, roundTripSeconds } = outcome;
  const id = withStore((store) => store.insert(event));
  console.log(`Tracking event ${id}: ${body} (round trip ${roundTripSeconds.toFixed(1)}s, due ${event.deadline})`);
  return EXIT_SUCCESS;
}
