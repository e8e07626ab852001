/**
 * Telnet transport
 *
 * Opens a TCP connection to the HORIZONS telnet port and exposes it as a
 * text Channel. Option negotiation is refused (DO -> WONT, WILL -> DONT),
 * command and subnegotiation bytes are dropped, and NVT line endings are
 * decoded (CR LF -> LF, CR NUL -> CR).
 */

import { createConnection, type Socket } from 'net';
import { StringDecoder } from 'string_decoder';
import { SessionError } from '../lib/errors';
import { transportLogger } from '../lib/logger';
import { SessionErrorCode } from '../lib/types';
import { BaseChannel, type Channel, type OpenChannelOptions } from './channel';

export const IAC = 255;
export const DONT = 254;
export const DO = 253;
export const WONT = 252;
export const WILL = 251;
export const SB = 250;
export const SE = 240;

const CR = 13;
const LF = 10;
const NUL = 0;

type DecoderState = 'data' | 'cr' | 'iac' | 'option' | 'sb' | 'sb-iac';

export interface DecodedChunk {
  /** Application bytes */
  data: Buffer;
  /** Negotiation replies to write back to the server */
  replies: Buffer;
}

/**
 * Incremental telnet stream decoder. State carries across chunks, so an
 * IAC sequence or CR LF split between two reads decodes the same.
 */
export class TelnetDecoder {
  private state: DecoderState = 'data';
  private command = 0;

  push(chunk: Uint8Array): DecodedChunk {
    const data: number[] = [];
    const replies: number[] = [];

    for (const byte of chunk) {
      this.consume(byte, data, replies);
    }

    return { data: Buffer.from(data), replies: Buffer.from(replies) };
  }

  private consume(byte: number, data: number[], replies: number[]): void {
    switch (this.state) {
      case 'cr':
        this.state = 'data';
        if (byte === LF) {
          data.push(LF);
          return;
        }
        data.push(CR);
        if (byte === NUL) return;
        this.consume(byte, data, replies);
        return;

      case 'iac':
        if (byte === IAC) {
          data.push(IAC);
          this.state = 'data';
        } else if (byte === WILL || byte === WONT || byte === DO || byte === DONT) {
          this.command = byte;
          this.state = 'option';
        } else if (byte === SB) {
          this.state = 'sb';
        } else {
          // NOP, GA, AYT and friends carry no payload
          this.state = 'data';
        }
        return;

      case 'option':
        if (this.command === DO) replies.push(IAC, WONT, byte);
        if (this.command === WILL) replies.push(IAC, DONT, byte);
        this.state = 'data';
        return;

      case 'sb':
        if (byte === IAC) this.state = 'sb-iac';
        return;

      case 'sb-iac':
        this.state = byte === SE ? 'data' : 'sb';
        return;

      case 'data':
        if (byte === IAC) {
          this.state = 'iac';
        } else if (byte === CR) {
          this.state = 'cr';
        } else {
          data.push(byte);
        }
        return;
    }
  }
}

/**
 * Channel over a connected telnet socket
 */
export class TelnetChannel extends BaseChannel {
  private readonly socket: Socket;
  private readonly decoder = new TelnetDecoder();
  private readonly text = new StringDecoder('utf8');

  constructor(socket: Socket) {
    super();
    this.socket = socket;

    socket.on('data', (chunk: Buffer) => {
      const { data, replies } = this.decoder.push(chunk);
      if (replies.length > 0 && !socket.destroyed) {
        socket.write(replies);
      }
      this.deliver(this.text.write(data));
    });

    socket.on('error', (error: Error) => {
      transportLogger.warn({ err: error }, 'telnet socket error');
    });

    socket.on('close', () => {
      this.deliver(this.text.end());
      this.markClosed();
    });
  }

  protected lineTerminator(): string {
    return '\r\n';
  }

  async send(text: string): Promise<void> {
    if (!this.isOpen || this.socket.destroyed) {
      throw new SessionError(SessionErrorCode.CONNECTION_ERROR, 'Connection closed by remote host');
    }

    // UTF-8 never produces 0xFF, so outgoing text needs no IAC escaping
    const payload = Buffer.from(text, 'utf8');

    await new Promise<void>((resolve, reject) => {
      this.socket.write(payload, (error) => {
        if (error) {
          reject(
            new SessionError(SessionErrorCode.CONNECTION_ERROR, `Write failed: ${error.message}`, {
              cause: error,
            })
          );
          return;
        }
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    if (!this.socket.destroyed) {
      this.socket.destroy();
    }
    this.markClosed();
  }
}

/**
 * One-line reason for a failed connect
 */
export function describeConnectError(error: NodeJS.ErrnoException, host: string, port: number): string {
  switch (error.code) {
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return `Cannot resolve host ${host}`;
    case 'ECONNREFUSED':
      return `Connection refused by ${host}:${port}`;
    default:
      return `Cannot connect to ${host}:${port}: ${error.message}`;
  }
}

/**
 * Open a telnet channel, failing with CONNECTION_ERROR when the host
 * cannot be resolved or reached within the connect timeout.
 */
export function openTelnetChannel(
  host: string,
  port: number,
  options: OpenChannelOptions
): Promise<Channel> {
  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new SessionError(SessionErrorCode.CANCELLED, 'Cancelled before connecting'));
      return;
    }

    const socket = createConnection({ host, port });

    const cleanup = (): void => {
      clearTimeout(timer);
      socket.off('error', onError);
      socket.off('connect', onConnect);
      options.signal?.removeEventListener('abort', onAbort);
    };

    const fail = (error: SessionError): void => {
      cleanup();
      socket.destroy();
      reject(error);
    };

    const onError = (error: NodeJS.ErrnoException): void => {
      fail(
        new SessionError(SessionErrorCode.CONNECTION_ERROR, describeConnectError(error, host, port), {
          cause: error,
        })
      );
    };

    const onAbort = (): void => {
      fail(new SessionError(SessionErrorCode.CANCELLED, 'Cancelled while connecting'));
    };

    const onConnect = (): void => {
      cleanup();
      transportLogger.debug({ host, port }, 'connected');
      resolve(new TelnetChannel(socket));
    };

    const timer = setTimeout(() => {
      fail(
        new SessionError(
          SessionErrorCode.CONNECTION_ERROR,
          `Timed out connecting to ${host}:${port} after ${options.connectTimeoutMs}ms`
        )
      );
    }, options.connectTimeoutMs);

    socket.once('error', onError);
    socket.once('connect', onConnect);
    options.signal?.addEventListener('abort', onAbort, { once: true });
  });
}
