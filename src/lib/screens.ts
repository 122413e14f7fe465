import type { KeyInput } from '../types';
import type { Screen } from './screenRouter';
import type { TypingSession } from './typingSession';

export class TypingScreen implements Screen {
  readonly id = 'typing';
  private popupDismissed = false;

  constructor(private readonly getSession: () => TypingSession) {}

  handleEvents(key: KeyInput): boolean {
    const { code } = key;
    if (code.kind === 'char') {
      this.getSession().pushChar(code.char);
      return true;
    }
    if (code.kind === 'backspace') {
      this.getSession().popChar();
      return true;
    }
    return false;
  }

  isPopupVisible(): boolean {
    return this.getSession().isTerminal() && !this.popupDismissed;
  }

  hide(): void {
    this.popupDismissed = true;
  }

  reset(): void {
    this.popupDismissed = false;
  }
}

export class StatsScreen implements Screen {
  readonly id = 'stats';
  private scrollOffset = 0;

  constructor(private readonly getEntryCount: () => number) {}

  handleEvents(key: KeyInput): boolean {
    switch (key.code.kind) {
      case 'up':
        this.scrollOffset = Math.max(0, this.scrollOffset - 1);
        return true;
      case 'down':
        this.scrollOffset = Math.min(Math.max(0, this.getEntryCount() - 1), this.scrollOffset + 1);
        return true;
      default:
        return false;
    }
  }

  isPopupVisible(): boolean {
    return false;
  }

  hide(): void {
    this.scrollOffset = 0;
  }

  getScrollOffset(): number {
    return this.scrollOffset;
  }
}
