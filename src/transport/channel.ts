/**
 * Text channel contract shared by the telnet transport and the replay
 * transport used for recorded transcripts.
 */

import { EventEmitter } from 'events';

export interface Channel {
  /** False once either side has closed the channel */
  readonly isOpen: boolean;
  /** Write raw text */
  send(text: string): Promise<void>;
  /** Write text followed by the line terminator of the transport */
  sendLine(line: string): Promise<void>;
  /** Subscribe to decoded text. Text received before the first subscriber is replayed to it. */
  onData(listener: (chunk: string) => void): () => void;
  /** Subscribe to end of stream. Fires once; fires on the next tick if already closed. */
  onClose(listener: () => void): () => void;
  /** Idempotent */
  close(): Promise<void>;
}

export interface OpenChannelOptions {
  connectTimeoutMs: number;
  signal?: AbortSignal;
}

export type ChannelFactory = (
  host: string,
  port: number,
  options: OpenChannelOptions
) => Promise<Channel>;

/**
 * Base class with the listener plumbing; subclasses call deliver() and
 * markClosed().
 */
export abstract class BaseChannel extends EventEmitter implements Channel {
  private backlog: string[] = [];
  private _isOpen = true;

  abstract send(text: string): Promise<void>;
  abstract close(): Promise<void>;

  get isOpen(): boolean {
    return this._isOpen;
  }

  async sendLine(line: string): Promise<void> {
    await this.send(line + this.lineTerminator());
  }

  protected lineTerminator(): string {
    return '\n';
  }

  onData(listener: (chunk: string) => void): () => void {
    this.on('data', listener);
    if (this.backlog.length > 0) {
      const pending = this.backlog.join('');
      this.backlog = [];
      listener(pending);
    }
    return () => {
      this.off('data', listener);
    };
  }

  onClose(listener: () => void): () => void {
    if (!this._isOpen) {
      const handle = setImmediate(listener);
      return () => clearImmediate(handle);
    }
    this.once('close', listener);
    return () => {
      this.off('close', listener);
    };
  }

  protected deliver(chunk: string): void {
    if (chunk.length === 0) return;
    if (this.listenerCount('data') === 0) {
      this.backlog.push(chunk);
      return;
    }
    this.emit('data', chunk);
  }

  protected markClosed(): void {
    if (!this._isOpen) return;
    this._isOpen = false;
    this.emit('close');
  }
}
