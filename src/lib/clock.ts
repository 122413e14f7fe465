/**
 * Whole-second elapsed counter driven by an external one-second tick.
 * Ticks only count while `isRunning()` holds; there is no drift correction.
 */
export class Clock {
  private elapsed = 0;

  constructor(private readonly isRunning: () => boolean) {}

  tick(): boolean {
    if (!this.isRunning()) return false;
    this.elapsed += 1;
    return true;
  }

  get elapsedSecs(): number {
    return this.elapsed;
  }

  remaining(totalDurationSecs: number): number {
    return Math.max(0, totalDurationSecs - this.elapsed);
  }

  reset(): void {
    this.elapsed = 0;
  }
}
