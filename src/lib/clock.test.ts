import { describe, expect, it } from 'vitest';
import { Clock } from './clock';

describe('Clock', () => {
  it('counts one second per tick while running', () => {
    const clock = new Clock(() => true);
    expect(clock.tick()).toBe(true);
    clock.tick();
    clock.tick();
    expect(clock.elapsedSecs).toBe(3);
    expect(clock.remaining(15)).toBe(12);
  });

  it('drops ticks while the session is not running', () => {
    let running = false;
    const clock = new Clock(() => running);
    expect(clock.tick()).toBe(false);
    running = true;
    clock.tick();
    running = false;
    clock.tick();
    expect(clock.elapsedSecs).toBe(1);
  });

  it('never reports negative remaining time', () => {
    const clock = new Clock(() => true);
    for (let i = 0; i < 20; i++) clock.tick();
    expect(clock.remaining(15)).toBe(0);
  });

  it('starts over after reset', () => {
    const clock = new Clock(() => true);
    clock.tick();
    clock.reset();
    expect(clock.elapsedSecs).toBe(0);
    expect(clock.remaining(30)).toBe(30);
  });
});
