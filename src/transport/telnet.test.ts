import { describe, test, expect, afterEach, vi } from 'vitest';
import { SessionErrorCode } from '../lib/types';
import type { Channel } from './channel';
import {
  DO,
  DONT,
  IAC,
  SB,
  SE,
  TelnetDecoder,
  WILL,
  WONT,
  describeConnectError,
  openTelnetChannel,
} from './telnet';
import { startScriptedServer, unusedPort, type ScriptedServer } from './__fixtures__/telnet-server';

const ECHO = 1;
const SUPPRESS_GO_AHEAD = 3;
const TERMINAL_TYPE = 24;

function bytes(...parts: Array<string | number[]>): Buffer {
  return Buffer.concat(parts.map((p) => (typeof p === 'string' ? Buffer.from(p, 'latin1') : Buffer.from(p))));
}

describe('TelnetDecoder', () => {
  test('passes plain text through', () => {
    const decoded = new TelnetDecoder().push(bytes('Horizons> '));
    expect(decoded.data.toString()).toBe('Horizons> ');
    expect(decoded.replies.length).toBe(0);
  });

  test('decodes NVT line endings', () => {
    const decoded = new TelnetDecoder().push(bytes('a\r\nb\r', [0], 'c'));
    expect(decoded.data.toString()).toBe('a\nb\rc');
  });

  test('refuses DO with WONT and WILL with DONT', () => {
    const decoded = new TelnetDecoder().push(
      bytes([IAC, DO, TERMINAL_TYPE], 'x', [IAC, WILL, SUPPRESS_GO_AHEAD], 'y')
    );
    expect(decoded.data.toString()).toBe('xy');
    expect([...decoded.replies]).toEqual([IAC, WONT, TERMINAL_TYPE, IAC, DONT, SUPPRESS_GO_AHEAD]);
  });

  test('does not answer WONT or DONT', () => {
    const decoded = new TelnetDecoder().push(bytes([IAC, WONT, ECHO, IAC, DONT, ECHO]));
    expect(decoded.replies.length).toBe(0);
    expect(decoded.data.length).toBe(0);
  });

  test('keeps state across chunks', () => {
    const decoder = new TelnetDecoder();

    const first = decoder.push(bytes('line', [IAC]));
    const second = decoder.push(bytes([DO, ECHO], '\r\n'));

    expect(first.data.toString()).toBe('line');
    expect(second.data.toString()).toBe('\n');
    expect([...second.replies]).toEqual([IAC, WONT, ECHO]);
  });

  test('carries a CR split from its LF', () => {
    const decoder = new TelnetDecoder();
    expect(decoder.push(bytes('a\r')).data.toString()).toBe('a');
    expect(decoder.push(bytes('\nb')).data.toString()).toBe('\nb');
  });

  test('drops subnegotiation', () => {
    const decoded = new TelnetDecoder().push(bytes([IAC, SB, TERMINAL_TYPE, 1, IAC, SE], 'ok'));
    expect(decoded.data.toString()).toBe('ok');
  });

  test('unescapes a doubled IAC', () => {
    const decoded = new TelnetDecoder().push(bytes([IAC, IAC]));
    expect([...decoded.data]).toEqual([IAC]);
  });
});

async function nextData(channel: Channel): Promise<string> {
  let unsubscribe = (): void => {};
  const chunk = await new Promise<string>((resolve) => {
    unsubscribe = channel.onData(resolve);
  });
  unsubscribe();
  return chunk;
}

function errnoError(code: string, message: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

describe('describeConnectError', () => {
  test('names unresolvable hosts', () => {
    expect(describeConnectError(errnoError('ENOTFOUND', 'getaddrinfo ENOTFOUND'), 'horizons.invalid', 6775)).toBe(
      'Cannot resolve host horizons.invalid'
    );
    expect(describeConnectError(errnoError('EAI_AGAIN', 'getaddrinfo EAI_AGAIN'), 'horizons.invalid', 6775)).toBe(
      'Cannot resolve host horizons.invalid'
    );
  });

  test('falls back to the socket message', () => {
    expect(describeConnectError(errnoError('EHOSTUNREACH', 'no route'), 'horizons.test', 6775)).toBe(
      'Cannot connect to horizons.test:6775: no route'
    );
  });
});

describe('openTelnetChannel', () => {
  let server: ScriptedServer | undefined;

  afterEach(async () => {
    vi.useRealTimers();
    await server?.close();
    server = undefined;
  });

  test('refuses option negotiation and terminates lines with CR LF', async () => {
    server = await startScriptedServer(['Horizons> ', 'ok'], {
      preamble: Buffer.from([IAC, DO, 24]),
    });
    const channel = await openTelnetChannel('127.0.0.1', server.port, { connectTimeoutMs: 1000 });

    try {
      expect(await nextData(channel)).toBe('Horizons> ');
      await channel.sendLine('PAGE');
      await server.waitForLines(1);

      expect([...server.raw()]).toEqual([IAC, WONT, 24, ...Buffer.from('PAGE\r\n')]);
    } finally {
      await channel.close();
    }
  });

  test('decodes CR LF from the server to LF', async () => {
    server = await startScriptedServer(['Horizons> ', ' Paging turned off.\nHorizons> ']);
    const channel = await openTelnetChannel('127.0.0.1', server.port, { connectTimeoutMs: 1000 });

    try {
      expect(await nextData(channel)).toBe('Horizons> ');
      const reply = nextData(channel);
      await channel.sendLine('PAGE');
      expect(await reply).toBe(' Paging turned off.\nHorizons> ');
    } finally {
      await channel.close();
    }
  });

  test('reports the channel closed when the peer hangs up', async () => {
    server = await startScriptedServer(['Horizons> ']);
    const channel = await openTelnetChannel('127.0.0.1', server.port, { connectTimeoutMs: 1000 });
    const closed = new Promise<void>((resolve) => {
      channel.onClose(resolve);
    });

    await channel.sendLine('PAGE');
    await closed;

    expect(channel.isOpen).toBe(false);
    await expect(channel.sendLine('late')).rejects.toMatchObject({
      code: SessionErrorCode.CONNECTION_ERROR,
      message: 'Connection closed by remote host',
    });
  });

  test('maps a refused connection to CONNECTION_ERROR', async () => {
    const port = await unusedPort();

    await expect(openTelnetChannel('127.0.0.1', port, { connectTimeoutMs: 1000 })).rejects.toMatchObject({
      code: SessionErrorCode.CONNECTION_ERROR,
      message: `Connection refused by 127.0.0.1:${port}`,
    });
  });

  test('maps the connect timeout to CONNECTION_ERROR', async () => {
    server = await startScriptedServer([]);
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });

    const pending = openTelnetChannel('127.0.0.1', server.port, { connectTimeoutMs: 50 });
    vi.advanceTimersByTime(50);

    await expect(pending).rejects.toMatchObject({
      code: SessionErrorCode.CONNECTION_ERROR,
      message: `Timed out connecting to 127.0.0.1:${server.port} after 50ms`,
    });
  });

  test('cancels while connecting', async () => {
    server = await startScriptedServer([]);
    const controller = new AbortController();

    const pending = openTelnetChannel('127.0.0.1', server.port, {
      connectTimeoutMs: 1000,
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toMatchObject({
      code: SessionErrorCode.CANCELLED,
      message: 'Cancelled while connecting',
    });
  });

  test('does not connect with an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      openTelnetChannel('127.0.0.1', 6775, { connectTimeoutMs: 1000, signal: controller.signal })
    ).rejects.toMatchObject({
      code: SessionErrorCode.CANCELLED,
      message: 'Cancelled before connecting',
    });
  });
});
