#!/usr/bin/env node
/**
 * @file main.ts
 * @description Entry point for Rally Pong in a terminal.
 *
 * Responsibilities:
 *   1. Load the JSON config file (created with defaults when missing).
 *   2. Put stdin into raw mode and turn keypresses into InputEvents.
 *   3. Drive Game.tick() every `tickIntervalMs` and redraw at a fixed rate.
 *   4. Put the terminal back the way it was on exit.
 */

import { emitKeypressEvents } from 'node:readline';
import type { Key } from 'node:readline';

import { Game } from './game.js';
import { MainMenu, MENU_SINGLE_PLAYER } from './menu.js';
import { loadConfig } from './config.js';
import type { GameConfig } from './config.js';
import { renderFrame, renderMenu } from './renderer.js';
import type { RenderOptions } from './renderer.js';
import { FRAME_INTERVAL_MS } from './constants.js';
import { createLogger } from './logger.js';

const log = createLogger('main');

const DEFAULT_CONFIG_PATH = 'rally-pong.config.json';

const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const CLEAR       = '\x1b[2J';
const HOME        = '\x1b[H';

/**
 * @function renderOptionsFor
 * @description Grid size that fits the current terminal, within sane limits.
 */
function renderOptionsFor(config: GameConfig): RenderOptions
{
  const columns = process.stdout.columns ?? 80;
  const lines   = process.stdout.rows    ?? 24;

  return {
    cols:       Math.max(20, Math.min(80, columns - 2)),
    rows:       Math.max(10, Math.min(30, lines - 6)),
    halfHeight: config.paddle.yLength / 2,
  };
}

function restoreTerminal(): void
{
  if (process.stdin.isTTY) process.stdin.setRawMode(false);
  process.stdin.pause();
  process.stdout.write(SHOW_CURSOR + CLEAR + HOME);
}

/**
 * @function main
 * @description Bootstraps the game and returns once the loops are running.
 */
function main(): void
{
  /* ── Step 1: Config ──────────────────────────────────────────────────── */
  const configPath = process.env.RALLY_PONG_CONFIG ?? DEFAULT_CONFIG_PATH;
  const config     = loadConfig(configPath);

  /* ── Step 2: Game and menu ───────────────────────────────────────────── */
  const game = new Game({ config });
  const menu = new MainMenu();

  menu.onSelection = (option) =>
  {
    game.setAiEnabled(option === MENU_SINGLE_PLAYER);
  };

  /* ── Step 3: Loops ───────────────────────────────────────────────────── */
  const draw = (): void =>
  {
    const options = renderOptionsFor(config);
    const frame   = menu.isVisible ? renderMenu(menu, options) : renderFrame(game.snapshot(), options);
    process.stdout.write(HOME + CLEAR + frame + '\n');
  };

  const tickTimer = setInterval(() =>
  {
    if (!menu.isVisible) game.handle({ type: 'tick' });
  }, config.game.tickIntervalMs);

  const drawTimer = setInterval(draw, FRAME_INTERVAL_MS);

  const quit = (code: number): void =>
  {
    clearInterval(tickTimer);
    clearInterval(drawTimer);
    restoreTerminal();
    log.info({ code, scores: game.snapshot().scores }, 'exiting');
    process.exit(code);
  };

  /* ── Step 4: Keyboard ────────────────────────────────────────────────── */
  emitKeypressEvents(process.stdin);
  if (process.stdin.isTTY) process.stdin.setRawMode(true);
  process.stdin.resume();

  process.stdin.on('keypress', (_str: string | undefined, key: Key | undefined) =>
  {
    const name = key?.name ?? '';

    if ((key?.ctrl && name === 'c') || name === 'q')
    {
      quit(0);
      return;
    }

    if (menu.isVisible)
    {
      menu.handleKey(name);
      return;
    }

    game.handle({ type: 'key', key: name });
  });

  process.stdout.write(HIDE_CURSOR + CLEAR);
  draw();
  log.info({ configPath }, 'rally pong started');
}

process.on('uncaughtException', (err) =>
{
  restoreTerminal();
  log.error({ err }, 'fatal error');
  process.exit(1);
});

try
{
  main();
}
catch (err)
{
  restoreTerminal();
  log.error({ err }, 'fatal error');
  process.exit(1);
}
