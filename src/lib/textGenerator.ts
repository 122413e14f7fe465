import type { TypingDuration } from '../types';
import { durationSeconds } from './typingDuration';

export type RandomSource = () => number;

const WORDS_PER_SECOND = 2;

export function wordCountForDuration(duration: TypingDuration): number {
  return durationSeconds(duration) * WORDS_PER_SECOND;
}

export function generateText(
  words: readonly string[],
  count: number,
  random: RandomSource = Math.random
): string {
  if (words.length === 0) {
    throw new Error('Cannot generate text from an empty word list');
  }

  const picked: string[] = [];
  for (let i = 0; i < count; i++) {
    const index = Math.min(words.length - 1, Math.floor(random() * words.length));
    picked.push(words[index]);
  }
  return picked.join(' ');
}
