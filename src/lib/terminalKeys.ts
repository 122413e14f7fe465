import type { Key } from 'ink';
import type { KeyInput, NamedKey } from '../types';

export type TerminalKey = Pick<
  Key,
  | 'upArrow'
  | 'downArrow'
  | 'leftArrow'
  | 'rightArrow'
  | 'return'
  | 'escape'
  | 'ctrl'
  | 'tab'
  | 'backspace'
  | 'delete'
>;

function namedKey(key: TerminalKey): NamedKey | null {
  if (key.escape) return 'escape';
  if (key.leftArrow) return 'left';
  if (key.rightArrow) return 'right';
  if (key.upArrow) return 'up';
  if (key.downArrow) return 'down';
  // The backspace key sends DEL, which ink reports as delete.
  if (key.delete) return 'backspace';
  if (key.return) return 'enter';
  if (key.tab) return 'tab';
  return null;
}

/**
 * Converts one ink input callback into key inputs. Pasted text arrives as a
 * single callback and becomes one char input per character.
 */
export function toKeyInputs(input: string, key: TerminalKey): KeyInput[] {
  // BS (0x08) is what terminals send for ctrl+h; ink reports it as backspace.
  if (key.backspace) {
    return [{ code: { kind: 'char', char: 'h' }, ctrl: true }];
  }

  const named = namedKey(key);
  if (named) {
    return [{ code: { kind: named }, ctrl: key.ctrl }];
  }
  if (input.length === 0) return [];

  if (key.ctrl) {
    return [{ code: { kind: 'char', char: input.charAt(0) }, ctrl: true }];
  }
  return Array.from(input, (char): KeyInput => ({ code: { kind: 'char', char }, ctrl: false }));
}
