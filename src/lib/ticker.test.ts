import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EventQueue } from './eventQueue';
import { startTicker } from './ticker';
import type { AppEvent } from '../types';

describe('startTicker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('pushes one tick per interval until stopped', () => {
    const queue = new EventQueue<AppEvent>();
    const stop = startTicker(queue);

    vi.advanceTimersByTime(999);
    expect(queue.size).toBe(0);

    vi.advanceTimersByTime(1);
    expect(queue.size).toBe(1);

    vi.advanceTimersByTime(2000);
    expect(queue.size).toBe(3);

    stop();
    vi.advanceTimersByTime(5000);
    expect(queue.size).toBe(3);
  });

  it('interleaves ticks with other events in arrival order', async () => {
    const queue = new EventQueue<AppEvent>();
    const stop = startTicker(queue, 100);

    queue.push({ type: 'key', key: { code: { kind: 'char', char: 'a' }, ctrl: false } });
    vi.advanceTimersByTime(100);
    stop();

    expect(await queue.next()).toEqual({
      type: 'key',
      key: { code: { kind: 'char', char: 'a' }, ctrl: false },
    });
    expect(await queue.next()).toEqual({ type: 'tick' });
  });
});
