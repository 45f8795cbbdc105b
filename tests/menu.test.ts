/**
 * @file menu.test.ts
 * @description Tests for the MainMenu mode picker.
 */

import { describe, test, expect, vi } from 'vitest';
import { MainMenu, MENU_SINGLE_PLAYER, MENU_TWO_PLAYER } from '../src/menu.js';

describe('MainMenu', () =>
{
  test('starts visible with the first option selected', () =>
  {
    const menu = new MainMenu();
    expect(menu.isVisible).toBe(true);
    expect(menu.selectedIndex).toBe(MENU_SINGLE_PLAYER);
    expect(menu.options).toEqual(['Single Player (vs AI)', 'Two Player']);
  });

  test('down moves the selection and wraps', () =>
  {
    const menu = new MainMenu();
    expect(menu.handleKey('down')).toBe(false);
    expect(menu.selectedIndex).toBe(MENU_TWO_PLAYER);
    menu.handleKey('down');
    expect(menu.selectedIndex).toBe(MENU_SINGLE_PLAYER);
  });

  test('up from the first option wraps to the last', () =>
  {
    const menu = new MainMenu();
    expect(menu.handleKey('up')).toBe(false);
    expect(menu.selectedIndex).toBe(MENU_TWO_PLAYER);
  });

  test('return selects, hides and calls back with the index', () =>
  {
    const menu = new MainMenu();
    const onSelection = vi.fn();
    menu.onSelection = onSelection;

    menu.handleKey('down');
    expect(menu.handleKey('return')).toBe(true);

    expect(menu.isVisible).toBe(false);
    expect(onSelection).toHaveBeenCalledTimes(1);
    expect(onSelection).toHaveBeenCalledWith(MENU_TWO_PLAYER);
  });

  test('selection works without a callback', () =>
  {
    const menu = new MainMenu();
    expect(menu.handleKey('return')).toBe(true);
    expect(menu.isVisible).toBe(false);
  });

  test('empty and unknown keys do nothing', () =>
  {
    const menu = new MainMenu();
    expect(menu.handleKey('')).toBe(false);
    expect(menu.handleKey('x')).toBe(false);
    expect(menu.selectedIndex).toBe(MENU_SINGLE_PLAYER);
    expect(menu.isVisible).toBe(true);
  });

  test('keys are ignored while hidden', () =>
  {
    const menu = new MainMenu();
    const onSelection = vi.fn();
    menu.onSelection = onSelection;
    menu.hide();

    expect(menu.handleKey('down')).toBe(false);
    expect(menu.handleKey('return')).toBe(false);
    expect(menu.selectedIndex).toBe(MENU_SINGLE_PLAYER);
    expect(onSelection).not.toHaveBeenCalled();
  });

  test('show makes it visible again', () =>
  {
    const menu = new MainMenu();
    menu.handleKey('return');
    menu.show();
    expect(menu.isVisible).toBe(true);
  });
});
