import { describe, expect, it } from 'vitest';
import { createConfigStore, DEFAULT_CONFIG } from './appConfig';
import { toKeyInputs } from './terminalKeys';
import { SAVE_FAILED_NOTICE, TypingApp } from './typingApp';
import { MemoryStatsRepository } from '../test/memoryStatsRepository';
import type { AppConfig, AppEvent, LanguageName, NamedKey, TypingDuration } from '../types';

const TEXTS: Record<LanguageName, string> = {
  english: 'ab',
  spanish: 'hola',
  german: 'ja',
};

function setup(config: Partial<AppConfig> = {}) {
  const store = createConfigStore({ ...DEFAULT_CONFIG, ...config });
  const stats = new MemoryStatsRepository();
  const requests: Array<{ duration: TypingDuration; language: LanguageName }> = [];
  const app = new TypingApp({
    config: store,
    stats,
    generateText: (duration, language) => {
      requests.push({ duration, language });
      return TEXTS[language];
    },
    now: () => 42,
  });

  const send = (...events: AppEvent[]) => {
    for (const event of events) {
      app.handleEvent(event);
      app.render();
    }
  };

  return { app, store, stats, requests, send };
}

function char(value: string): AppEvent {
  return { type: 'key', key: { code: { kind: 'char', char: value }, ctrl: false } };
}

function ctrl(value: string): AppEvent {
  return { type: 'key', key: { code: { kind: 'char', char: value }, ctrl: true } };
}

function named(kind: NamedKey): AppEvent {
  return { type: 'key', key: { code: { kind }, ctrl: false } };
}

const tick: AppEvent = { type: 'tick' };

describe('TypingApp', () => {
  it('generates the first text from the configured duration and language', () => {
    const { app, requests } = setup({ typingDuration: 'thirty-sec' });
    expect(requests).toEqual([{ duration: 'thirty-sec', language: 'english' }]);
    expect(app.getSnapshot().session.characters.map((c) => c.char).join('')).toBe('ab');
    expect(app.getSnapshot().remainingSecs).toBe(30);
  });

  it('ignores ticks until the first keystroke', () => {
    const { app, send } = setup();
    send(tick, tick);
    expect(app.getSnapshot().elapsedSecs).toBe(0);

    send(char('a'), tick);
    expect(app.getSnapshot().elapsedSecs).toBe(1);
    expect(app.getSnapshot().remainingSecs).toBe(59);
  });

  it('stores one stat when the text is completed', () => {
    const { app, stats, send } = setup();
    send(char('a'), tick, char('b'));

    expect(stats.stats).toHaveLength(1);
    expect(stats.stats[0]).toMatchObject({
      duration: 'minute',
      errorCount: 0,
      elapsedSecs: 1,
      accuracy: 1,
      outcome: 'completed',
    });
    expect(stats.activities).toEqual([
      { duration: 'minute', outcome: 'completed', startedAt: 42, finishedAt: 42 },
    ]);

    const snapshot = app.getSnapshot();
    expect(snapshot.popupVisible).toBe(true);
    expect(snapshot.lastResult).toBe(stats.stats[0]);
    expect(snapshot.screens.typing).toEqual({ visible: true, active: false });

    send(tick, char('x'), tick);
    expect(stats.stats).toHaveLength(1);
    expect(stats.flushCount).toBe(1);
  });

  it('times out and stores the partial result', () => {
    const { app, stats, send } = setup({ typingDuration: 'fifteen-sec' });
    send(char('x'));
    for (let i = 0; i < 15; i++) send(tick);

    expect(app.getSnapshot().session.state).toBe('timed-out');
    expect(app.getSnapshot().remainingSecs).toBe(0);
    expect(stats.stats).toHaveLength(1);
    expect(stats.stats[0]).toMatchObject({
      duration: 'fifteen-sec',
      outcome: 'timed-out',
      errorCount: 1,
      elapsedSecs: 15,
      averageWpm: 0,
      accuracy: 0,
    });

    send(tick);
    expect(app.getSnapshot().elapsedSecs).toBe(15);
  });

  it('keeps the session usable when saving fails', () => {
    const { app, stats, send } = setup();
    stats.failWrites = true;
    send(char('a'), char('b'));

    expect(app.getSnapshot().notice).toBe(SAVE_FAILED_NOTICE);
    expect(stats.stats).toHaveLength(1);

    stats.failWrites = false;
    send(ctrl('r'));
    expect(app.getSnapshot().notice).toBeNull();
    send(char('a'));
    expect(app.getSnapshot().session.cursor).toBe(1);
  });

  it('resets the session and the clock', () => {
    const { app, send, requests } = setup();
    send(char('x'), tick, ctrl('r'));

    const snapshot = app.getSnapshot();
    expect(snapshot.session.state).toBe('idle');
    expect(snapshot.session.cursor).toBe(0);
    expect(snapshot.session.errorCount).toBe(0);
    expect(snapshot.elapsedSecs).toBe(0);
    expect(requests).toHaveLength(2);
  });

  it('cycles the duration and restarts with it', () => {
    const { app, store, send, requests } = setup();
    send(char('a'), ctrl('d'));

    expect(store.getState().config.typingDuration).toBe('three-minutes');
    expect(app.getSnapshot().config.typingDuration).toBe('three-minutes');
    expect(app.getSnapshot().session.duration).toBe('three-minutes');
    expect(app.getSnapshot().session.cursor).toBe(0);
    expect(requests[1]).toEqual({ duration: 'three-minutes', language: 'english' });
  });

  it('cycles the language and regenerates the text', () => {
    const { app, store, send } = setup();
    send(ctrl('p'));

    expect(store.getState().config.language).toBe('spanish');
    expect(app.getSnapshot().session.characters.map((c) => c.char).join('')).toBe('hola');
  });

  it('toggles the background and layout without resetting', () => {
    const { app, send } = setup();
    send(char('a'), ctrl('t'), ctrl('s'));

    expect(app.getSnapshot().config.transparentBackground).toBe(true);
    expect(app.getSnapshot().config.layout).toBe('ocean');
    expect(app.getSnapshot().session.cursor).toBe(1);
  });

  it('switches screens with ctrl combinations and arrows', () => {
    const { app, send } = setup();
    send(ctrl('l'));
    expect(app.getSnapshot().activeScreen).toBe('stats');
    send(ctrl('h'));
    expect(app.getSnapshot().activeScreen).toBe('typing');
    send(named('right'));
    expect(app.getSnapshot().activeScreen).toBe('stats');
    send(named('left'));
    expect(app.getSnapshot().activeScreen).toBe('typing');
  });

  it('switches back to typing on the byte a terminal sends for ctrl+h', () => {
    const { app, send } = setup();
    send(char('a'), ctrl('l'));
    expect(app.getSnapshot().activeScreen).toBe('stats');

    const [key] = toKeyInputs('\b', {
      upArrow: false,
      downArrow: false,
      leftArrow: false,
      rightArrow: false,
      return: false,
      escape: false,
      ctrl: false,
      tab: false,
      backspace: true,
      delete: false,
    });
    send({ type: 'key', key });

    expect(app.getSnapshot().activeScreen).toBe('typing');
    expect(app.getSnapshot().session.cursor).toBe(1);
  });

  it('never passes ctrl combinations to the screen', () => {
    const { app, send } = setup();
    send(ctrl('z'), ctrl('a'));
    expect(app.getSnapshot().session.cursor).toBe(0);
    expect(app.getSnapshot().session.state).toBe('idle');
  });

  it('lets the typing screen consume characters before navigation', () => {
    const { app, send } = setup({ language: 'german' });
    send(char('j'));
    expect(app.getSnapshot().activeScreen).toBe('typing');
    expect(app.getSnapshot().session.cursor).toBe(1);
  });

  it('lets the stats screen consume arrow keys', () => {
    const { app, send } = setup();
    send(char('a'), char('b'), ctrl('r'), char('a'), char('b'));
    send(named('right'), named('down'));

    const snapshot = app.getSnapshot();
    expect(snapshot.activeScreen).toBe('stats');
    expect(snapshot.stats.entries).toHaveLength(2);
    expect(snapshot.stats.scrollOffset).toBe(1);
    expect(snapshot.stats.summary.sessionCount).toBe(2);
  });

  it('hides the result popup when leaving the typing screen', () => {
    const { app, send } = setup();
    send(char('a'), char('b'));
    expect(app.getSnapshot().popupVisible).toBe(true);

    send(ctrl('l'), ctrl('h'));
    expect(app.getSnapshot().popupVisible).toBe(false);
    expect(app.getSnapshot().screens.typing).toEqual({ visible: true, active: true });
  });

  it('requests exit on escape and on ctrl+c', () => {
    const first = setup();
    first.send(named('escape'));
    expect(first.app.isExitRequested()).toBe(true);

    const second = setup();
    second.send(ctrl('c'));
    expect(second.app.isExitRequested()).toBe(true);
    expect(second.app.getSnapshot().exitRequested).toBe(true);
  });

  it('flushes on shutdown and surfaces a failure', () => {
    const { app, stats } = setup();
    app.shutdown();
    expect(stats.flushCount).toBe(1);

    stats.failWrites = true;
    expect(() => app.shutdown()).toThrow('disk full');
  });

  it('notifies subscribers once per render', () => {
    const { app, send } = setup();
    let renders = 0;
    const unsubscribe = app.subscribe(() => {
      renders += 1;
    });

    send(char('a'), tick);
    unsubscribe();
    send(char('b'));

    expect(renders).toBe(2);
  });
});
