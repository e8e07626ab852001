import { describe, test, expect } from 'vitest';
import { ReplayChannel, parseReplayScript } from './replay';

async function nextData(channel: ReplayChannel): Promise<string> {
  let unsubscribe = (): void => {};
  const chunk = await new Promise<string>((resolve) => {
    unsubscribe = channel.onData(resolve);
  });
  unsubscribe();
  return chunk;
}

describe('ReplayChannel', () => {
  test('releases one reply per line sent', async () => {
    const channel = new ReplayChannel(['banner', 'first reply', 'second reply']);
    expect(await nextData(channel)).toBe('banner');

    const first = nextData(channel);
    await channel.sendLine('PAGE');
    expect(await first).toBe('first reply');

    expect(channel.sent).toEqual(['PAGE']);
    expect(channel.remaining).toBe(1);
  });

  test('delivers CR LF line endings as LF', async () => {
    const channel = new ReplayChannel(['banner\r\n', ' Paging turned off.\r\nHorizons> ']);
    expect(await nextData(channel)).toBe('banner\n');

    const reply = nextData(channel);
    await channel.sendLine('PAGE');
    expect(await reply).toBe(' Paging turned off.\nHorizons> ');
  });

  test('stays silent once the transcript runs out', async () => {
    const channel = new ReplayChannel(['banner']);
    await channel.sendLine('PAGE');
    expect(channel.remaining).toBe(0);
    expect(channel.sent).toEqual(['PAGE']);
  });

  test('close is idempotent and blocks further sends', async () => {
    const channel = new ReplayChannel(['banner']);
    let closes = 0;
    channel.onClose(() => closes++);

    await channel.close();
    await channel.close();

    expect(channel.isOpen).toBe(false);
    expect(channel.closeCalls).toBe(2);
    expect(closes).toBe(1);
    await expect(channel.sendLine('late')).rejects.toThrow('ReplayChannel: send after close');
  });
});

describe('parseReplayScript', () => {
  test('accepts an array of strings', () => {
    expect(parseReplayScript(['a', 'b'])).toEqual(['a', 'b']);
  });

  test('rejects anything else', () => {
    expect(() => parseReplayScript({ replies: [] })).toThrow(
      'Replay transcript must be a JSON array of strings'
    );
    expect(() => parseReplayScript(['a', 1])).toThrow('Replay transcript must be a JSON array of strings');
  });
});
