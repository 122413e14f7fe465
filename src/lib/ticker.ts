import type { AppEvent } from '../types';
import type { EventQueue } from './eventQueue';

export const TICK_INTERVAL_MS = 1000;

export function startTicker(queue: EventQueue<AppEvent>, intervalMs = TICK_INTERVAL_MS): () => void {
  const timer = setInterval(() => {
    queue.push({ type: 'tick' });
  }, intervalMs);

  return () => clearInterval(timer);
}
