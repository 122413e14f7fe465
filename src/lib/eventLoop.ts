import type { AppEvent } from '../types';
import type { EventQueue } from './eventQueue';

export interface EventLoopApp {
  handleEvent(event: AppEvent): void;
  render(): void;
  isExitRequested(): boolean;
  shutdown(): void;
}

/**
 * Consumes one event at a time and renders exactly once per event. The final
 * flush runs however the loop ends; a flush failure rejects the returned
 * promise.
 */
export async function runEventLoop(app: EventLoopApp, events: EventQueue<AppEvent>): Promise<void> {
  try {
    app.render();

    while (!app.isExitRequested()) {
      const event = await events.next();
      if (event === null) break;

      app.handleEvent(event);
      app.render();
    }
  } finally {
    app.shutdown();
  }
}
