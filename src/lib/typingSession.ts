import type {
  Activity,
  CharClassification,
  SessionState,
  Stat,
  TypingDuration,
} from '../types';

export type TextSource = (duration: TypingDuration) => string;

export interface TypingSessionOptions {
  generateText: TextSource;
  now?: () => number;
}

export interface CharacterView {
  char: string;
  classification: CharClassification;
}

export interface SessionSnapshot {
  state: SessionState;
  duration: TypingDuration;
  characters: CharacterView[];
  cursor: number;
  errorCount: number;
  correctCount: number;
}

export interface SessionResult {
  stat: Stat;
  activity: Activity;
}

const CHARS_PER_WORD = 5;

export function computeAverageWpm(correctCount: number, elapsedSecs: number): number {
  const minutes = Math.max(1, elapsedSecs) / 60;
  return correctCount / CHARS_PER_WORD / minutes;
}

export function computeAccuracy(correctCount: number, errorCount: number): number {
  const classified = correctCount + errorCount;
  return classified > 0 ? correctCount / classified : 0;
}

/**
 * One typing attempt over a generated text.
 *
 * Each position is classified once, when the cursor passes it, and the
 * result is cached. Rendering reads the cache and never re-scores, so the
 * error count only moves on input. Backspace drops the cached value of the
 * removed position (and its error, if it was one).
 */
export class TypingSession {
  private readonly generate: TextSource;
  private readonly now: () => number;

  private generatedText: string[] = [];
  private input: string[] = [];
  private cursor = 0;
  private classifications = new Map<number, 'correct' | 'incorrect'>();
  private errorCount = 0;
  private state: SessionState = 'idle';
  private duration: TypingDuration;
  private elapsedSecs = 0;
  private startedAt: number | null = null;
  private finalized = false;

  constructor(duration: TypingDuration, options: TypingSessionOptions) {
    this.generate = options.generateText;
    this.now = options.now ?? Date.now;
    this.duration = duration;
    this.start(duration);
  }

  start(duration: TypingDuration): void {
    this.duration = duration;
    this.generatedText = Array.from(this.generate(duration));
    this.input = [];
    this.cursor = 0;
    this.classifications = new Map();
    this.errorCount = 0;
    this.state = 'idle';
    this.elapsedSecs = 0;
    this.startedAt = null;
    this.finalized = false;
  }

  reset(): void {
    this.start(this.duration);
  }

  /** Idle -> Running without a keystroke. */
  begin(): void {
    if (this.state !== 'idle') return;
    this.state = 'running';
    this.startedAt = this.now();
  }

  pushChar(char: string): void {
    if (this.isTerminal()) return;
    if (this.cursor >= this.generatedText.length) return;

    this.begin();
    this.input.push(char);
    this.cursor += 1;
    this.classify(this.cursor - 1);

    if (this.cursor === this.generatedText.length) {
      this.state = 'completed';
    }
  }

  popChar(): void {
    if (this.isTerminal()) return;
    if (this.cursor === 0) return;

    this.input.pop();
    this.cursor -= 1;
    if (this.classifications.get(this.cursor) === 'incorrect') {
      this.errorCount -= 1;
    }
    this.classifications.delete(this.cursor);
  }

  tick(elapsedSecs: number, totalDurationSecs: number): void {
    if (this.state !== 'running') return;
    this.elapsedSecs = elapsedSecs;
    if (totalDurationSecs - elapsedSecs <= 0) {
      this.state = 'timed-out';
    }
  }

  classify(index: number): CharClassification {
    if (index < 0 || index >= this.cursor) return 'pending';

    const cached = this.classifications.get(index);
    if (cached) return cached;

    const classification = this.input[index] === this.generatedText[index] ? 'correct' : 'incorrect';
    this.classifications.set(index, classification);
    if (classification === 'incorrect') {
      this.errorCount += 1;
    }
    return classification;
  }

  canFinalize(): boolean {
    return this.isTerminal() && !this.finalized;
  }

  finalize(): SessionResult {
    if (this.finalized) {
      throw new Error('Session has already been finalized');
    }
    const outcome: SessionState = this.state;
    if (outcome !== 'completed' && outcome !== 'timed-out') {
      throw new Error(`Cannot finalize a session in state "${outcome}"`);
    }
    this.finalized = true;

    const correctCount = this.getCorrectCount();
    const finishedAt = this.now();
    const stat: Stat = Object.freeze({
      duration: this.duration,
      averageWpm: computeAverageWpm(correctCount, this.elapsedSecs),
      errorCount: this.errorCount,
      elapsedSecs: this.elapsedSecs,
      accuracy: computeAccuracy(correctCount, this.errorCount),
      outcome,
      finishedAt,
    });
    const activity: Activity = Object.freeze({
      duration: this.duration,
      outcome,
      startedAt: this.startedAt ?? finishedAt,
      finishedAt,
    });
    return { stat, activity };
  }

  isTerminal(): boolean {
    return this.state === 'completed' || this.state === 'timed-out';
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  getState(): SessionState {
    return this.state;
  }

  getDuration(): TypingDuration {
    return this.duration;
  }

  getCursor(): number {
    return this.cursor;
  }

  getErrorCount(): number {
    return this.errorCount;
  }

  getCorrectCount(): number {
    let count = 0;
    for (const classification of this.classifications.values()) {
      if (classification === 'correct') count += 1;
    }
    return count;
  }

  getGeneratedText(): string {
    return this.generatedText.join('');
  }

  getInput(): string {
    return this.input.join('');
  }

  getSnapshot(): SessionSnapshot {
    return {
      state: this.state,
      duration: this.duration,
      characters: this.generatedText.map((char, index) => ({
        char,
        classification: this.classify(index),
      })),
      cursor: this.cursor,
      errorCount: this.errorCount,
      correctCount: this.getCorrectCount(),
    };
  }
}
