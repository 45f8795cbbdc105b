/**
 * @file keymap.test.ts
 * @description Tests for key-name → GameAction resolution.
 */

import { describe, test, expect } from 'vitest';
import { resolveKey } from '../src/keymap.js';

describe('resolveKey', () =>
{
  test('w / s drive the left paddle', () =>
  {
    expect(resolveKey('w')).toEqual({ type: 'paddle_up', side: 'LEFT' });
    expect(resolveKey('s')).toEqual({ type: 'paddle_down', side: 'LEFT' });
  });

  test('arrow keys drive the right paddle', () =>
  {
    expect(resolveKey('up')).toEqual({ type: 'paddle_up', side: 'RIGHT' });
    expect(resolveKey('down')).toEqual({ type: 'paddle_down', side: 'RIGHT' });
  });

  test('control keys', () =>
  {
    expect(resolveKey('space')).toEqual({ type: 'toggle_pause' });
    expect(resolveKey('r')).toEqual({ type: 'reset' });
    expect(resolveKey('a')).toEqual({ type: 'toggle_ai' });
    expect(resolveKey('d')).toEqual({ type: 'cycle_difficulty' });
  });

  test('letters are case-insensitive', () =>
  {
    expect(resolveKey('R')).toEqual({ type: 'reset' });
    expect(resolveKey('Up')).toEqual({ type: 'paddle_up', side: 'RIGHT' });
  });

  test('unbound and empty keys resolve to null', () =>
  {
    expect(resolveKey('x')).toBeNull();
    expect(resolveKey('')).toBeNull();
    expect(resolveKey('constructor')).toBeNull();
  });
});
