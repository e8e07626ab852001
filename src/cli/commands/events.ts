/**
 * CLI Event Commands
 *
 * Inspect tracked events and record replies.
 */

import pc from 'picocolors';
import { getConfig } from '../../lib/config';
import { EventStore, type TrackedEvent } from '../../memory';
import { EXIT_FAILURE, EXIT_SUCCESS } from './query';

function formatEvent(event: TrackedEvent): string {
  const status = event.replied ? pc.green('replied') : pc.yellow('pending');
  return `${event.id}. ${event.celestialBody} [${status}] tweet ${event.tweetId} due ${event.deadline}`;
}

/**
 * List unreplied events whose deadline has passed
 */
export function dueCommand(options: { all?: boolean; now?: Date } = {}): number {
  const store = new EventStore(getConfig().databasePath);
  try {
    const events = options.all ? store.list() : store.listDue(options.now);

    if (events.length === 0) {
      console.log(options.all ? 'No tracked events.' : 'No events due.');
      return EXIT_SUCCESS;
    }

    console.log(options.all ? '\nTracked Events:' : '\nDue Events:');
    console.log('─'.repeat(60));
    for (const event of events) {
      console.log(formatEvent(event));
    }
    return EXIT_SUCCESS;
  } finally {
    store.close();
  }
}

/**
 * Mark an event as replied
 */
export function repliedCommand(id: string): number {
  const numericId = Number(id);
  if (!Number.isInteger(numericId) || numericId <= 0) {
    console.error(pc.red(`Error: invalid event id '${id}'`));
    return EXIT_FAILURE;
  }

  const store = new EventStore(getConfig().databasePath);
  try {
    const event = store.get(numericId);
    if (!event) {
      console.error(pc.red(`Event not found: ${id}`));
      return EXIT_FAILURE;
    }
    if (event.replied) {
      console.log(`Event ${numericId} was already replied`);
      return EXIT_SUCCESS;
    }
    store.markReplied(numericId);
    console.log(`Marked event ${numericId} as replied`);
    return EXIT_SUCCESS;
  } finally {
    store.close();
  }
}
