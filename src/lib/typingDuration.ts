import type { TypingDuration } from '../types';
import { TYPING_DURATIONS } from '../types';

const DURATION_SECONDS: Record<TypingDuration, number> = {
  'fifteen-sec': 15,
  'thirty-sec': 30,
  minute: 60,
  'three-minutes': 180,
};

const DURATION_LABELS: Record<TypingDuration, string> = {
  'fifteen-sec': '15s',
  'thirty-sec': '30s',
  minute: '1m',
  'three-minutes': '3m',
};

export const DEFAULT_TYPING_DURATION: TypingDuration = 'minute';

export function durationSeconds(duration: TypingDuration): number {
  return DURATION_SECONDS[duration];
}

export function durationLabel(duration: TypingDuration): string {
  return DURATION_LABELS[duration];
}

export function nextTypingDuration(duration: TypingDuration): TypingDuration {
  const index = TYPING_DURATIONS.indexOf(duration);
  return TYPING_DURATIONS[(index + 1) % TYPING_DURATIONS.length];
}

export function isTypingDuration(value: unknown): value is TypingDuration {
  return typeof value === 'string' && TYPING_DURATIONS.some((duration) => duration === value);
}
