import type {
  AppConfig,
  AppEvent,
  KeyInput,
  LanguageName,
  ScreenId,
  Stat,
  StatsRepository,
  TypingDuration,
} from '../types';
import type { ConfigStore } from './appConfig';
import { Clock } from './clock';
import {
  isReservedCombination,
  planNavigation,
  resolveGlobalCommand,
  type GlobalCommand,
} from './keyBindings';
import { ScreenRouter, type ScreenFlagMap } from './screenRouter';
import { StatsScreen, TypingScreen } from './screens';
import { summarizeStats, type StatsSummary } from './statsSummary';
import { durationSeconds } from './typingDuration';
import { TypingSession, type SessionSnapshot } from './typingSession';

export const SAVE_FAILED_NOTICE = 'Could not save this result. It will be saved again on exit.';

export interface TypingAppOptions {
  config: ConfigStore;
  stats: StatsRepository;
  generateText: (duration: TypingDuration, language: LanguageName) => string;
  now?: () => number;
}

export interface StatsView {
  entries: Stat[];
  summary: StatsSummary;
  scrollOffset: number;
}

export interface AppSnapshot {
  activeScreen: ScreenId;
  screens: ScreenFlagMap;
  config: AppConfig;
  session: SessionSnapshot;
  elapsedSecs: number;
  remainingSecs: number;
  popupVisible: boolean;
  lastResult: Stat | null;
  stats: StatsView;
  notice: string | null;
  exitRequested: boolean;
}

type Listener = () => void;

/**
 * Owns the session, clock and screens for the lifetime of the process and
 * applies one event at a time. Configuration is read as snapshots from the
 * config store and changed only through its actions.
 */
export class TypingApp {
  private readonly config: ConfigStore;
  private readonly stats: StatsRepository;
  private readonly session: TypingSession;
  private readonly clock: Clock;
  private readonly typingScreen: TypingScreen;
  private readonly statsScreen: StatsScreen;
  private readonly router: ScreenRouter;
  private readonly listeners = new Set<Listener>();

  private snapshot: AppSnapshot;
  private lastResult: Stat | null = null;
  private notice: string | null = null;
  private exitRequested = false;

  constructor(options: TypingAppOptions) {
    this.config = options.config;
    this.stats = options.stats;

    this.session = new TypingSession(this.currentConfig().typingDuration, {
      generateText: (duration) => options.generateText(duration, this.currentConfig().language),
      now: options.now,
    });
    this.clock = new Clock(() => this.session.isRunning());
    this.typingScreen = new TypingScreen(() => this.session);
    this.statsScreen = new StatsScreen(() => this.stats.getReversed().length);
    this.router = new ScreenRouter({ typing: this.typingScreen, stats: this.statsScreen });
    this.snapshot = this.buildSnapshot();
  }

  handleEvent(event: AppEvent): void {
    switch (event.type) {
      case 'tick':
        this.handleTick();
        break;
      case 'key':
        this.handleKey(event.key);
        break;
    }
    this.finishSessionIfOver();
  }

  render(): void {
    this.router.refresh();
    this.snapshot = this.buildSnapshot();
    for (const listener of this.listeners) {
      listener();
    }
  }

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): AppSnapshot => this.snapshot;

  isExitRequested(): boolean {
    return this.exitRequested;
  }

  /** Final flush; a failure here means unsaved results and is rethrown. */
  shutdown(): void {
    this.stats.flush();
  }

  runCommand(command: GlobalCommand): void {
    switch (command) {
      case 'reset':
        this.reset();
        break;
      case 'show-stats':
        this.router.switchTo('stats');
        break;
      case 'show-typing':
        this.router.switchTo('typing');
        break;
      case 'exit':
        this.exitRequested = true;
        break;
      case 'cycle-duration':
        this.config.getState().cycleTypingDuration();
        this.reset();
        break;
      case 'toggle-background':
        this.config.getState().toggleTransparentBackground();
        break;
      case 'cycle-layout':
        this.config.getState().cycleLayout();
        break;
      case 'cycle-language':
        this.config.getState().cycleLanguage();
        this.reset();
        break;
    }
  }

  private currentConfig(): AppConfig {
    return this.config.getState().config;
  }

  private handleTick(): void {
    if (!this.clock.tick()) return;
    this.session.tick(this.clock.elapsedSecs, durationSeconds(this.session.getDuration()));
  }

  private handleKey(key: KeyInput): void {
    if (isReservedCombination(key)) {
      const command = resolveGlobalCommand(key);
      if (command) this.runCommand(command);
      return;
    }

    if (this.router.dispatch(key)) return;

    switch (planNavigation(key)) {
      case 'exit':
        this.exitRequested = true;
        break;
      case 'navigate-left':
        this.router.switchTo('typing');
        break;
      case 'navigate-right':
        this.router.switchTo('stats');
        break;
      case 'none':
        break;
    }
  }

  private reset(): void {
    this.clock.reset();
    this.session.start(this.currentConfig().typingDuration);
    this.typingScreen.reset();
    this.lastResult = null;
    this.notice = null;
  }

  private finishSessionIfOver(): void {
    if (!this.session.canFinalize()) return;

    const { stat, activity } = this.session.finalize();
    this.lastResult = stat;
    if (!this.stats.insert(stat, activity)) {
      this.notice = SAVE_FAILED_NOTICE;
    }
  }

  private buildSnapshot(): AppSnapshot {
    const entries = this.stats.getReversed();
    const activeScreen = this.router.getActiveScreenId();
    const duration = durationSeconds(this.session.getDuration());

    return {
      activeScreen,
      screens: this.router.getFlags(),
      config: this.currentConfig(),
      session: this.session.getSnapshot(),
      elapsedSecs: this.clock.elapsedSecs,
      remainingSecs: this.clock.remaining(duration),
      popupVisible: activeScreen === 'typing' && this.typingScreen.isPopupVisible(),
      lastResult: this.lastResult,
      stats: {
        entries,
        summary: summarizeStats(entries),
        scrollOffset: this.statsScreen.getScrollOffset(),
      },
      notice: this.notice,
      exitRequested: this.exitRequested,
    };
  }
}
