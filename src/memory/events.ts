/**
 * Tracked events store
 *
 * One row per mention whose reply is waiting on a light-time deadline.
 * Uses better-sqlite3 for synchronous SQLite operations.
 *
 * Timestamps are ISO-8601 UTC strings, so they order lexicographically.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import path from 'path';
import { storeLogger } from '../lib/logger';

export interface TrackedEvent {
  id: number;
  tweetId: bigint;
  celestialBody: string;
  replied: boolean;
  deadline: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Fields supplied when an event starts being tracked
 */
export interface EventForm {
  tweetId: bigint;
  celestialBody: string;
  deadline: string;
  replied?: boolean;
}

interface EventRow {
  id: bigint;
  tweet_id: bigint;
  celestial_body: string;
  replied: bigint;
  deadline: string;
  created_at: string;
  updated_at: string;
}

function toEvent(row: EventRow): TrackedEvent {
  return {
    id: Number(row.id),
    tweetId: row.tweet_id,
    celestialBody: row.celestial_body,
    replied: row.replied !== 0n,
    deadline: row.deadline,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class EventStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY NOT NULL,
        tweet_id UNSIGNED BIG INT NOT NULL,
        celestial_body TEXT NOT NULL,
        replied BOOLEAN NOT NULL DEFAULT 0,
        deadline TIMESTAMP NOT NULL,
        created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_events_pending
      ON events(replied, deadline)
    `);
  }

  /**
   * Start tracking an event, returning its id
   */
  insert(form: EventForm, now: Date = new Date()): number {
    const timestamp = now.toISOString();
    const info = this.db
      .prepare<[bigint, string, number, string, string, string]>(`
        INSERT INTO events (tweet_id, celestial_body, replied, deadline, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(form.tweetId, form.celestialBody, form.replied ? 1 : 0, form.deadline, timestamp, timestamp);

    const id = Number(info.lastInsertRowid);
    storeLogger.debug({ id, tweetId: form.tweetId.toString() }, 'event tracked');
    return id;
  }

  get(id: number): TrackedEvent | null {
    const row = this.db
      .prepare<[number], EventRow>('SELECT * FROM events WHERE id = ?')
      .safeIntegers(true)
      .get(id);
    return row ? toEvent(row) : null;
  }

  list(): TrackedEvent[] {
    return this.db
      .prepare<[], EventRow>('SELECT * FROM events ORDER BY id')
      .safeIntegers(true)
      .all()
      .map(toEvent);
  }

  /**
   * Highest mention id seen so far, for resuming the mention feed
   */
  getMaxTweetId(): bigint | null {
    const row = this.db
      .prepare<[], { max_id: bigint | null }>('SELECT MAX(tweet_id) AS max_id FROM events')
      .safeIntegers(true)
      .get();
    return row?.max_id ?? null;
  }

  /**
   * Unreplied events whose deadline is at or before `now`, earliest first
   */
  listDue(now: Date = new Date()): TrackedEvent[] {
    return this.db
      .prepare<[string], EventRow>(`
        SELECT * FROM events
        WHERE replied = 0 AND deadline <= ?
        ORDER BY deadline, id
      `)
      .safeIntegers(true)
      .all(now.toISOString())
      .map(toEvent);
  }

  /**
   * Record that the reply went out. Returns false for an unknown id.
   */
  markReplied(id: number, now: Date = new Date()): boolean {
    const info = this.db
      .prepare<[string, number]>('UPDATE events SET replied = 1, updated_at = ? WHERE id = ?')
      .run(now.toISOString(), id);
    return info.changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
