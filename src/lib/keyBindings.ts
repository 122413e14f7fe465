import type { KeyInput } from '../types';

export type GlobalCommand =
  | 'reset'
  | 'show-stats'
  | 'show-typing'
  | 'exit'
  | 'cycle-duration'
  | 'toggle-background'
  | 'cycle-layout'
  | 'cycle-language';

export type NavigationAction = 'none' | 'exit' | 'navigate-left' | 'navigate-right';

const CTRL_COMMANDS: Record<string, GlobalCommand> = {
  r: 'reset',
  l: 'show-stats',
  h: 'show-typing',
  c: 'exit',
  d: 'cycle-duration',
  t: 'toggle-background',
  s: 'cycle-layout',
  p: 'cycle-language',
};

export interface KeyHint {
  keys: string;
  label: string;
}

export const GLOBAL_KEY_HINTS: readonly KeyHint[] = [
  { keys: '^R', label: 'Reset' },
  { keys: '^D', label: 'Duration' },
  { keys: '^P', label: 'Language' },
  { keys: '^S', label: 'Layout' },
  { keys: '^T', label: 'Background' },
  { keys: '^C', label: 'Exit' },
];

// Every ctrl combination is reserved, including the unbound ones.
export function isReservedCombination(key: KeyInput): boolean {
  return key.ctrl;
}

export function resolveGlobalCommand(key: KeyInput): GlobalCommand | null {
  if (!key.ctrl || key.code.kind !== 'char') return null;
  return CTRL_COMMANDS[key.code.char.toLowerCase()] ?? null;
}

export function planNavigation(key: KeyInput): NavigationAction {
  if (key.ctrl) return 'none';
  switch (key.code.kind) {
    case 'escape':
      return 'exit';
    case 'left':
      return 'navigate-left';
    case 'right':
      return 'navigate-right';
    default:
      return 'none';
  }
}
