import { describe, expect, it } from 'vitest';
import { toTextRuns } from './textRuns';
import type { CharacterView } from './typingSession';
import type { CharClassification } from '../types';

function chars(text: string, classes: CharClassification[]): CharacterView[] {
  return Array.from(text, (char, i) => ({ char, classification: classes[i] }));
}

describe('toTextRuns', () => {
  it('groups characters with the same classification', () => {
    const characters = chars('hello', ['correct', 'correct', 'incorrect', 'pending', 'pending']);
    expect(toTextRuns(characters, 3)).toEqual([
      { kind: 'correct', text: 'he' },
      { kind: 'incorrect', text: 'l' },
      { kind: 'cursor', text: 'l' },
      { kind: 'pending', text: 'o' },
    ]);
  });

  it('has no cursor run once the text is fully typed', () => {
    const characters = chars('ab', ['correct', 'correct']);
    expect(toTextRuns(characters, 2)).toEqual([{ kind: 'correct', text: 'ab' }]);
  });

  it('returns no runs for empty text', () => {
    expect(toTextRuns([], 0)).toEqual([]);
  });
});
