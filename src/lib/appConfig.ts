import { createStore, type StoreApi } from 'zustand/vanilla';
import type { AppConfig, LanguageName, LayoutName } from '../types';
import { LANGUAGE_NAMES, LAYOUT_NAMES } from '../types';
import { DEFAULT_TYPING_DURATION, isTypingDuration, nextTypingDuration } from './typingDuration';

export const DEFAULT_CONFIG: AppConfig = {
  typingDuration: DEFAULT_TYPING_DURATION,
  transparentBackground: false,
  layout: 'classic',
  language: 'english',
};

export interface ConfigState {
  config: AppConfig;
  cycleTypingDuration: () => AppConfig;
  toggleTransparentBackground: () => AppConfig;
  cycleLayout: () => AppConfig;
  cycleLanguage: () => AppConfig;
}

export type ConfigStore = StoreApi<ConfigState>;

function nextInCycle<T>(values: readonly T[], current: T): T {
  const index = values.indexOf(current);
  return values[(index + 1) % values.length];
}

export function isLayoutName(value: unknown): value is LayoutName {
  return typeof value === 'string' && LAYOUT_NAMES.some((name) => name === value);
}

export function isLanguageName(value: unknown): value is LanguageName {
  return typeof value === 'string' && LANGUAGE_NAMES.some((name) => name === value);
}

/**
 * Merges a stored settings object over the defaults, field by field.
 * Unknown or invalid values fall back to their default.
 */
export function normalizeConfig(raw: unknown): AppConfig {
  if (typeof raw !== 'object' || raw === null) return { ...DEFAULT_CONFIG };
  const stored: Record<string, unknown> = { ...raw };

  return {
    typingDuration: isTypingDuration(stored.typingDuration)
      ? stored.typingDuration
      : DEFAULT_CONFIG.typingDuration,
    transparentBackground: typeof stored.transparentBackground === 'boolean'
      ? stored.transparentBackground
      : DEFAULT_CONFIG.transparentBackground,
    layout: isLayoutName(stored.layout) ? stored.layout : DEFAULT_CONFIG.layout,
    language: isLanguageName(stored.language) ? stored.language : DEFAULT_CONFIG.language,
  };
}

// The store is the only writer; `config` is replaced, never mutated.
export function createConfigStore(initial: AppConfig = DEFAULT_CONFIG): ConfigStore {
  return createStore<ConfigState>()((set, get) => {
    const update = (patch: Partial<AppConfig>): AppConfig => {
      const config = Object.freeze({ ...get().config, ...patch });
      set({ config });
      return config;
    };

    return {
      config: Object.freeze({ ...initial }),
      cycleTypingDuration: () =>
        update({ typingDuration: nextTypingDuration(get().config.typingDuration) }),
      toggleTransparentBackground: () =>
        update({ transparentBackground: !get().config.transparentBackground }),
      cycleLayout: () => update({ layout: nextInCycle(LAYOUT_NAMES, get().config.layout) }),
      cycleLanguage: () => update({ language: nextInCycle(LANGUAGE_NAMES, get().config.language) }),
    };
  });
}
