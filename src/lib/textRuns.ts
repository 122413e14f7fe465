import type { CharacterView } from './typingSession';

export type TextRunKind = 'correct' | 'incorrect' | 'pending' | 'cursor';

export interface TextRun {
  kind: TextRunKind;
  text: string;
}

/**
 * Groups consecutive characters with the same styling so a line renders as a
 * handful of spans instead of one per character.
 */
export function toTextRuns(characters: readonly CharacterView[], cursor: number): TextRun[] {
  const runs: TextRun[] = [];

  characters.forEach((character, index) => {
    const kind: TextRunKind = index === cursor ? 'cursor' : character.classification;
    const last = runs[runs.length - 1];
    if (last && last.kind === kind && kind !== 'cursor') {
      last.text += character.char;
    } else {
      runs.push({ kind, text: character.char });
    }
  });

  return runs;
}
