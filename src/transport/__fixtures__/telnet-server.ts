/**
 * Loopback telnet peer for transport and session tests. Writes the first
 * script entry on connect and the next one for every CR LF line it
 * receives; ends the connection once the script runs out. Text is sent
 * with CR LF line endings, as the real service sends it.
 */

import { EventEmitter } from 'events';
import { createServer, type Socket } from 'net';

export interface ScriptedServer {
  port: number;
  /** Lines received, without their CR LF */
  readonly received: string[];
  /** Every byte received, in order */
  raw(): Buffer;
  /** Resolves once `count` lines have been received */
  waitForLines(count: number): Promise<void>;
  close(): Promise<void>;
}

export interface ScriptedServerOptions {
  /** Bytes written ahead of the first entry, e.g. option negotiation */
  preamble?: Buffer;
}

function toWire(text: string): Buffer {
  return Buffer.from(text.replace(/\n/g, '\r\n'), 'latin1');
}

export async function startScriptedServer(
  script: readonly string[],
  options: ScriptedServerOptions = {}
): Promise<ScriptedServer> {
  const received: string[] = [];
  const chunks: Buffer[] = [];
  const sockets = new Set<Socket>();
  const lines = new EventEmitter();

  const server = createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    // Resets from a client that closes mid-write are expected here
    socket.on('error', () => socket.destroy());

    const replies = [...script];
    let pending = '';

    if (options.preamble) socket.write(options.preamble);
    const banner = replies.shift();
    if (banner !== undefined) socket.write(toWire(banner));

    socket.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
      pending += chunk.toString('latin1');

      let end = pending.indexOf('\r\n');
      while (end >= 0) {
        received.push(pending.slice(0, end));
        pending = pending.slice(end + 2);
        lines.emit('line');

        const reply = replies.shift();
        if (reply === undefined) {
          socket.end();
          return;
        }
        socket.write(toWire(reply));
        end = pending.indexOf('\r\n');
      }
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Scripted server is not listening on a TCP port');
  }

  return {
    port: address.port,
    received,
    raw: () => Buffer.concat(chunks),
    waitForLines: (count) =>
      new Promise<void>((resolve) => {
        const check = (): void => {
          if (received.length >= count) {
            lines.off('line', check);
            resolve();
          }
        };
        lines.on('line', check);
        check();
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const socket of sockets) socket.destroy();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

/**
 * A loopback port with nothing listening on it
 */
export async function unusedPort(): Promise<number> {
  const server = await startScriptedServer([]);
  await server.close();
  return server.port;
}
