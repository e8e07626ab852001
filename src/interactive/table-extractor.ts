/**
 * Table Extractor
 *
 * Captures the payload between two literal markers in the stream.
 */

import type { Expectation } from '../lib/types';
import { escapeRegExp } from './prompt-matcher';

export interface MarkerPair {
  start: string;
  end: string;
}

/** Start/end of ephemeris markers in HORIZONS output */
export const HORIZONS_MARKERS: MarkerPair = { start: '$$SOE', end: '$$EOE' };

/**
 * Text strictly between the first start marker and the first end marker
 * after it, or null if either is missing.
 */
export function extractBetween(text: string, markers: MarkerPair): string | null {
  const start = text.indexOf(markers.start);
  if (start < 0) return null;

  const from = start + markers.start.length;
  const end = text.indexOf(markers.end, from);
  if (end < 0) return null;

  return text.slice(from, end);
}

/**
 * Drop the line break that ends the start-marker line and the one that
 * precedes the end marker, leaving just the table rows.
 */
export function trimMarkerLines(payload: string): string {
  return payload.replace(/^\r?\n/, '').replace(/\r?\n$/, '');
}

/**
 * Expectation matching a complete marker pair; group 1 is the payload.
 */
export function markerExpectation(markers: MarkerPair, name: string = 'table'): Expectation {
  return {
    name,
    pattern: new RegExp(`${escapeRegExp(markers.start)}([\\s\\S]*?)${escapeRegExp(markers.end)}`),
  };
}
