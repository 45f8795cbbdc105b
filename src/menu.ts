/**
 * @file menu.ts
 * @description MainMenu: the mode picker shown before play starts.
 *
 * Pure state.  renderer.ts draws it; main.ts routes keys to it while it is
 * visible and acts on the selection callback.
 */

import { createLogger } from './logger.js';

const log = createLogger('menu');

export const MENU_SINGLE_PLAYER = 0;
export const MENU_TWO_PLAYER    = 1;

export const MENU_OPTIONS: readonly string[] = Object.freeze(['Single Player (vs AI)', 'Two Player']);

/**
 * @class MainMenu
 * @description Up/Down move the highlight (wrapping at both ends); Return
 *              picks the highlighted option, hides the menu and fires
 *              `onSelection`.
 */
export class MainMenu
{
  private selected = 0;
  private visible  = true;

  /** Called with the chosen option index when the player confirms. */
  onSelection: ((option: number) => void) | null = null;

  get options(): readonly string[]
  {
    return MENU_OPTIONS;
  }

  get selectedIndex(): number
  {
    return this.selected;
  }

  get isVisible(): boolean
  {
    return this.visible;
  }

  /**
   * @method handleKey
   * @description Returns true only when the key confirmed a selection.
   */
  handleKey(key: string): boolean
  {
    if (!this.visible || !key) return false;

    const count = MENU_OPTIONS.length;

    switch (key.toLowerCase())
    {
      case 'up':
        this.selected = (this.selected - 1 + count) % count;
        return false;

      case 'down':
        this.selected = (this.selected + 1) % count;
        return false;

      case 'return':
      case 'enter':
        this.hide();
        log.info({ option: this.selected, label: MENU_OPTIONS[this.selected] }, 'menu selection');
        this.onSelection?.(this.selected);
        return true;

      default:
        return false;
    }
  }

  show(): void
  {
    this.visible = true;
  }

  hide(): void
  {
    this.visible = false;
  }
}
