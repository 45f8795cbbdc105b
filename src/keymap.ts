/**
 * @file keymap.ts
 * @description Key bindings: lower-case key names to GameActions.
 *
 * Key names follow Node's readline keypress names ('w', 'up', 'space').
 * Letters are matched case-insensitively so Shift or Caps Lock make no
 * difference.  Anything not listed resolves to null and is ignored.
 *
 *   W / S       left paddle up / down
 *   Up / Down   right paddle up / down
 *   Space       pause / resume
 *   R           reset
 *   A           toggle AI opponent
 *   D           cycle AI difficulty
 */

import type { GameAction } from './types.js';

/**
 * @constant KEY_BINDINGS
 * @description The full binding table.
 */
export const KEY_BINDINGS: Readonly<Record<string, GameAction>> = Object.freeze(
{
  w:     { type: 'paddle_up',   side: 'LEFT'  },
  s:     { type: 'paddle_down', side: 'LEFT'  },
  up:    { type: 'paddle_up',   side: 'RIGHT' },
  down:  { type: 'paddle_down', side: 'RIGHT' },
  space: { type: 'toggle_pause'     },
  r:     { type: 'reset'            },
  a:     { type: 'toggle_ai'        },
  d:     { type: 'cycle_difficulty' },
});

/**
 * @function resolveKey
 * @description Action bound to `key`, or null for empty and unbound keys.
 */
export function resolveKey(key: string): GameAction | null
{
  if (!key) return null;

  const name = key.toLowerCase();
  return Object.hasOwn(KEY_BINDINGS, name) ? KEY_BINDINGS[name] ?? null : null;
}
