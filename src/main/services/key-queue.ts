import { ErrorCode, MonitorError } from '../../shared/types/errors';
import type { KeyEvent } from '../../shared/types/monitor';

/** Bounded wait for the next key press. */
export interface KeySource {
  /** Resolves with the next event, or null once `timeoutMs` passes without one. */
  next(timeoutMs: number): Promise<KeyEvent | null>;
}

interface Waiter {
  resolve: (event: KeyEvent | null) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Buffers key events pushed by the terminal driver until the
 * event loop asks for them. At most one reader waits at a time.
 */
export class KeyQueue implements KeySource {
  private readonly pending: KeyEvent[] = [];
  private waiter: Waiter | null = null;
  private failure: MonitorError | null = null;
  private closed = false;

  push(event: KeyEvent): void {
    if (this.closed) return;
    const waiter = this.takeWaiter();
    if (waiter) {
      waiter.resolve(event);
    } else {
      this.pending.push(event);
    }
  }

  /** Input broke: the waiting read (or the next one) rejects. */
  fail(error: unknown): void {
    this.failure = MonitorError.from(error, ErrorCode.INPUT_ERROR);
    this.takeWaiter()?.reject(this.failure);
  }

  /** Wake any waiting read with null and drop further input. */
  close(): void {
    this.closed = true;
    this.pending.length = 0;
    this.takeWaiter()?.resolve(null);
  }

  next(timeoutMs: number): Promise<KeyEvent | null> {
    if (this.failure) return Promise.reject(this.failure);

    const queued = this.pending.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closed || timeoutMs <= 0) return Promise.resolve(null);

    if (this.waiter) {
      return Promise.reject(new MonitorError('KeyQueue already has a pending reader', ErrorCode.INVALID_STATE));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = { resolve, reject, timer };
    });
  }

  private takeWaiter(): Waiter | null {
    const waiter = this.waiter;
    if (waiter) {
      clearTimeout(waiter.timer);
      this.waiter = null;
    }
    return waiter;
  }
}
