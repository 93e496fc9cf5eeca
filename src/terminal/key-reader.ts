/**
 * Key source backed by a raw-mode input stream.
 *
 * Chunks are decoded as they arrive and queued; `next()` hands out one
 * key per call and waits when the queue is empty. An escape sequence split
 * across reads is joined with the next chunk, or decoded on its own once
 * no more input arrives within `ESCAPE_TIMEOUT_MS`.
 */

import type { EventEmitter } from 'node:events';
import { decodeKeys, decodeKeyStream, type KeyEvent } from '../picker/keymap.ts';
import type { KeySource } from '../picker/session.ts';

/** How long a lone ESC waits for the rest of its sequence. */
export const ESCAPE_TIMEOUT_MS = 50;

interface Waiter {
  resolve: (key: KeyEvent) => void;
  reject: (err: Error) => void;
}

export class InputClosedError extends Error {
  constructor() {
    super('Input stream closed before a selection was made');
    this.name = 'InputClosedError';
  }
}

export class StdinKeyReader implements KeySource {
  private readonly queue: KeyEvent[] = [];
  private waiter: Waiter | null = null;
  private closed = false;
  private pending = '';
  private escapeTimer: ReturnType<typeof setTimeout> | null = null;

  private readonly onData = (chunk: unknown) => {
    const text = typeof chunk === 'string' ? chunk : Buffer.isBuffer(chunk) ? chunk.toString('utf8') : '';
    this.cancelEscapeTimer();
    const { keys, pending } = decodeKeyStream(this.pending + text);
    this.queue.push(...keys);
    this.pending = pending;
    if (pending) {
      this.escapeTimer = setTimeout(this.releasePending, ESCAPE_TIMEOUT_MS);
    }
    this.flush();
  };

  private readonly releasePending = () => {
    this.escapeTimer = null;
    this.queue.push(...decodeKeys(this.pending));
    this.pending = '';
    this.flush();
  };

  private readonly onEnd = () => {
    this.cancelEscapeTimer();
    this.queue.push(...decodeKeys(this.pending));
    this.pending = '';
    this.closed = true;
    this.flush();
  };

  constructor(private readonly input: EventEmitter) {
    input.on('data', this.onData);
    input.on('end', this.onEnd);
  }

  next(): Promise<KeyEvent> {
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
      this.flush();
    });
  }

  /** Stop listening. A pending `next()` rejects. */
  close(): void {
    this.input.off('data', this.onData);
    this.input.off('end', this.onEnd);
    this.onEnd();
  }

  private cancelEscapeTimer(): void {
    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer);
      this.escapeTimer = null;
    }
  }

  private flush(): void {
    const waiter = this.waiter;
    if (!waiter) return;

    const key = this.queue.shift();
    if (key) {
      this.waiter = null;
      waiter.resolve(key);
    } else if (this.closed) {
      this.waiter = null;
      waiter.reject(new InputClosedError());
    }
  }
}
