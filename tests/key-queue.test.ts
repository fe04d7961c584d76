/**
 * Tests for KeyQueue — the bounded wait between the terminal driver and the loop.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { KeyQueue } from '../src/main/services/key-queue';
import { ErrorCode } from '../src/shared/types/errors';
import { char, keys } from './helpers/fixtures';

describe('KeyQueue', () => {
  let queue: KeyQueue;

  beforeEach(() => {
    vi.useFakeTimers();
    queue = new KeyQueue();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns keys pushed before the read, in order', async () => {
    queue.push(char('a'));
    queue.push(keys.down);
    await expect(queue.next(1000)).resolves.toEqual(char('a'));
    await expect(queue.next(1000)).resolves.toEqual(keys.down);
  });

  it('wakes a waiting read when a key arrives', async () => {
    const pending = queue.next(1000);
    vi.advanceTimersByTime(300);
    queue.push(keys.enter);
    await expect(pending).resolves.toEqual(keys.enter);
  });

  it('resolves null once the timeout passes', async () => {
    const pending = queue.next(500);
    vi.advanceTimersByTime(500);
    await expect(pending).resolves.toBeNull();
  });

  it('returns null immediately for a zero timeout', async () => {
    await expect(queue.next(0)).resolves.toBeNull();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('still delivers a queued key for a zero timeout', async () => {
    queue.push(char('q'));
    await expect(queue.next(0)).resolves.toEqual(char('q'));
  });

  it('clears its timer when a key arrives', async () => {
    const pending = queue.next(1000);
    expect(vi.getTimerCount()).toBe(1);
    queue.push(char('x'));
    await pending;
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects a second concurrent reader', async () => {
    const first = queue.next(1000);
    await expect(queue.next(1000)).rejects.toMatchObject({ code: ErrorCode.INVALID_STATE });
    queue.push(char('a'));
    await expect(first).resolves.toEqual(char('a'));
  });

  it('close() wakes the reader with null and drops later input', async () => {
    const pending = queue.next(1000);
    queue.close();
    await expect(pending).resolves.toBeNull();

    queue.push(char('a'));
    await expect(queue.next(1000)).resolves.toBeNull();
  });

  it('fail() rejects the waiting read and every later one', async () => {
    const pending = queue.next(1000);
    queue.fail(new Error('stdin closed'));
    await expect(pending).rejects.toMatchObject({ code: ErrorCode.INPUT_ERROR, message: 'stdin closed' });
    await expect(queue.next(1000)).rejects.toMatchObject({ code: ErrorCode.INPUT_ERROR });
  });
});
