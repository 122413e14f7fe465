// Typing duration: selectable target length of one session
export type TypingDuration = 'fifteen-sec' | 'thirty-sec' | 'minute' | 'three-minutes';

export const TYPING_DURATIONS: readonly TypingDuration[] = [
  'fifteen-sec',
  'thirty-sec',
  'minute',
  'three-minutes',
];

export type SessionState = 'idle' | 'running' | 'completed' | 'timed-out';
export type SessionOutcome = 'completed' | 'timed-out';

export type CharClassification = 'pending' | 'correct' | 'incorrect';

export type LayoutName = 'classic' | 'ocean' | 'ember' | 'forest';
export type LanguageName = 'english' | 'spanish' | 'german';

export const LAYOUT_NAMES: readonly LayoutName[] = ['classic', 'ocean', 'ember', 'forest'];
export const LANGUAGE_NAMES: readonly LanguageName[] = ['english', 'spanish', 'german'];

export interface AppConfig {
  typingDuration: TypingDuration;
  transparentBackground: boolean;
  layout: LayoutName;
  language: LanguageName;
}

/**
 * Finalized result of one session. Created once by `TypingSession.finalize`
 * and frozen; the stats history is append-only.
 */
export interface Stat {
  readonly duration: TypingDuration;
  readonly averageWpm: number;
  readonly errorCount: number;
  readonly elapsedSecs: number;
  readonly accuracy: number;
  readonly outcome: SessionOutcome;
  readonly finishedAt: number;
}

// Timestamped marker of one finished session
export interface Activity {
  readonly duration: TypingDuration;
  readonly outcome: SessionOutcome;
  readonly startedAt: number;
  readonly finishedAt: number;
}

export type StorageEntry =
  | { key: 'stats'; value: Stat[] }
  | { key: 'activities'; value: Activity[] };

export type StorageKey = StorageEntry['key'];

export type StorageData = {
  [K in StorageKey]: Extract<StorageEntry, { key: K }>['value'];
};

export interface StatsRepository {
  insert(stat: Stat, activity?: Activity): boolean;
  getReversed(): Stat[];
  getActivities(): readonly Activity[];
  flush(): void;
}

export type ScreenId = 'typing' | 'stats';

export type NamedKey = 'backspace' | 'enter' | 'escape' | 'tab' | 'left' | 'right' | 'up' | 'down';

export type KeyCode = { kind: 'char'; char: string } | { kind: NamedKey };

export interface KeyInput {
  code: KeyCode;
  ctrl: boolean;
}

export type AppEvent = { type: 'key'; key: KeyInput } | { type: 'tick' };
