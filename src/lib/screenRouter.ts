import type { KeyInput, ScreenId } from '../types';

export interface Screen {
  readonly id: ScreenId;
  handleEvents(key: KeyInput): boolean;
  isPopupVisible(): boolean;
  hide(): void;
}

export interface ScreenFlags {
  visible: boolean;
  active: boolean;
}

export type ScreenFlagMap = Record<ScreenId, ScreenFlags>;

/**
 * Selects one of two mutually exclusive screens. Visibility and activity are
 * tracked separately: `refresh()` runs once per render pass and marks the
 * visible screen inactive for as long as its popup is open.
 */
export class ScreenRouter {
  private active: ScreenId;
  private flags: ScreenFlagMap;

  constructor(
    private readonly screens: Record<ScreenId, Screen>,
    initial: ScreenId = 'typing'
  ) {
    this.active = initial;
    this.flags = {
      typing: { visible: initial === 'typing', active: initial === 'typing' },
      stats: { visible: initial === 'stats', active: initial === 'stats' },
    };
  }

  getActiveScreenId(): ScreenId {
    return this.active;
  }

  getFlags(): ScreenFlagMap {
    return {
      typing: { ...this.flags.typing },
      stats: { ...this.flags.stats },
    };
  }

  switchTo(target: ScreenId): void {
    if (target !== this.active) {
      this.screens[this.active].hide();
      this.flags[this.active] = { visible: false, active: false };
    }
    this.active = target;
    this.flags[target] = { visible: true, active: true };
    this.refresh();
  }

  refresh(): void {
    const flags = this.flags[this.active];
    flags.active = !this.screens[this.active].isPopupVisible();
  }

  // Offers the key to the visible screen; an inactive screen never consumes.
  dispatch(key: KeyInput): boolean {
    if (!this.flags[this.active].active) return false;
    return this.screens[this.active].handleEvents(key);
  }
}
