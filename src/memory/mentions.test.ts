import { describe, test, expect } from 'vitest';
import { SessionErrorCode, type ObserverTableResult } from '../lib/types';
import { createFailure } from '../lib/errors';
import { SMALL_BODY_CANDIDATES } from '../interactive/__fixtures__/horizons-transcripts';
import {
  MAX_REPLY_LENGTH,
  NOT_FOUND_REPLY,
  buildEvent,
  computeDeadline,
  formatCandidatesReply,
  mentionBody,
  parseLightTimeMinutes,
} from './mentions';

const MENTION = {
  id: 955178235183341568n,
  text: '@stargazer Mars',
  createdAt: new Date('2018-01-01T10:00:00.000Z'),
};

describe('mentionBody', () => {
  test('strips the handle and surrounding whitespace', () => {
    expect(mentionBody('  @stargazer  2015 HM10; ', '@stargazer')).toBe('2015 HM10;');
  });

  test('leaves text without the handle alone', () => {
    expect(mentionBody('Mars', '@stargazer')).toBe('Mars');
  });
});

describe('parseLightTimeMinutes', () => {
  test('reads the third field of the first row', () => {
    expect(parseLightTimeMinutes(' 2018-Jan-01 10:00      1.5\n 2018-Jan-08 10:00      1.6')).toBe(1.5);
  });

  test('reads the synthesized placeholder line', () => {
    expect(parseLightTimeMinutes('1800-01-01 10:00 0')).toBe(0);
  });

  test('rejects rows without a third field', () => {
    expect(() => parseLightTimeMinutes('2018-Jan-01 10:00')).toThrow("Missing distance field: '2018-Jan-01 10:00'");
  });

  test('rejects non-numeric fields', () => {
    expect(() => parseLightTimeMinutes('2018-Jan-01 10:00 n.a.')).toThrow(
      "Invalid distance field 'n.a.' in '2018-Jan-01 10:00 n.a.'"
    );
  });

  test('rejects an empty table', () => {
    expect(() => parseLightTimeMinutes('  ')).toThrow('Observer table is missing the distance line');
  });
});

describe('computeDeadline', () => {
  test('adds the round trip to the send time', () => {
    const { deadline, roundTripSeconds } = computeDeadline(new Date('2018-01-01T10:00:00.000Z'), 1.5);
    expect(roundTripSeconds).toBe(180);
    expect(deadline.toISOString()).toBe('2018-01-01T10:03:00.000Z');
  });
});

describe('formatCandidatesReply', () => {
  test('lists id and name per candidate', () => {
    const candidates = '  99942  Apophis (alt)\n  20099942  Apophis (other)';
    expect(formatCandidatesReply(candidates)).toBe('Pick a number:\n99942: Apophis\n20099942: Apophis\n');
  });

  test('cuts names at a double space', () => {
    expect(formatCandidatesReply('  -61  Juno  Spacecraft')).toBe('Pick a number:\n-61: Juno\n');
  });

  test('keeps within the reply limit', () => {
    const rows = Array.from({ length: 40 }, (_, i) => `  ${1000 + i}  Candidate ${i}`).join('\n');
    const reply = formatCandidatesReply(rows);

    expect(reply.length).toBeLessThanOrEqual(MAX_REPLY_LENGTH);
    expect(reply.startsWith('Pick a number:\n1000: Candidate 0\n')).toBe(true);
  });

  test('fails on rows without an id', () => {
    expect(() => formatCandidatesReply('no id here')).toThrow("No match found in 'no id here'");
  });
});

describe('buildEvent', () => {
  test('records an event due after the round trip', () => {
    const result: ObserverTableResult = { ok: true, text: ' 2018-Jan-01 10:00   2.0', synthesized: false };

    expect(buildEvent(MENTION, 'Mars', result)).toEqual({
      kind: 'record',
      event: {
        tweetId: 955178235183341568n,
        celestialBody: 'Mars',
        replied: false,
        deadline: '2018-01-01T10:04:00.000Z',
      },
      roundTripSeconds: 240,
    });
  });

  test('replies with help for unknown targets', () => {
    const result: ObserverTableResult = {
      ok: false,
      error: createFailure(SessionErrorCode.NOT_FOUND, 'No matches found'),
    };
    expect(buildEvent(MENTION, 'Marz', result)).toEqual({ kind: 'reply', text: NOT_FOUND_REPLY });
  });

  test('replies with the candidates for ambiguous targets', () => {
    const result: ObserverTableResult = {
      ok: false,
      error: createFailure(SessionErrorCode.AMBIGUOUS_MATCH, 'Multiple matches', {
        diagnostic: '  499  Mars\n  4  Mars Barycenter',
      }),
    };
    expect(buildEvent(MENTION, 'Mars', result)).toEqual({
      kind: 'reply',
      text: 'Pick a number:\n499: Mars\n4: Mars Barycenter\n',
    });
  });

  test('replies with the rows of a small-body listing', () => {
    const result: ObserverTableResult = {
      ok: false,
      error: createFailure(SessionErrorCode.AMBIGUOUS_MATCH, 'Multiple matches', {
        diagnostic: SMALL_BODY_CANDIDATES,
      }),
    };
    expect(buildEvent(MENTION, '2004 MN4', result)).toEqual({
      kind: 'reply',
      text: 'Pick a number:\n54509: 2000 PH5\n99942: 2004 MN4\n',
    });
  });

  test('raises other failures', () => {
    const result: ObserverTableResult = {
      ok: false,
      error: createFailure(SessionErrorCode.TIMEOUT, 'Timed out in phase SettingCenter'),
    };
    expect(() => buildEvent(MENTION, 'Mars', result)).toThrow('TIMEOUT: Timed out in phase SettingCenter');
  });
});
