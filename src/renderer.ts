/**
 * @file renderer.ts
 * @description Text renderer: turns a GameSnapshot (or the main menu) into a
 *              block of terminal lines.
 *
 * PURE OUTPUT
 * -----------
 * Nothing here mutates game state or touches the terminal.  Each function
 * returns a string; main.ts decides when and where to write it.
 *
 * COORDINATE MAPPING
 * ------------------
 * The arena [-1, +1] x [-1, +1] is mapped onto a grid of `cols` x `rows`
 * cells inside a border.  Arena Y points up, rows count down, so Y = +1 is
 * the first row.
 *
 * LAYOUT (top to bottom)
 * ----------------------
 *   1. Score line
 *   2. Top border
 *   3. Court rows (centre line, paddles, ball, overlay banner)
 *   4. Bottom border
 *   5. Status line (mode, difficulty, key help)
 *   6. Rally line
 */

import type { GameSnapshot, Vec2 } from './types.js';
import type { MainMenu } from './menu.js';
import { PADDLE_LENGTH } from './constants.js';

/**
 * @interface RenderOptions
 * @description Grid size in character cells, and the paddle half-height in
 *              arena units (the snapshot carries only paddle centres).
 */
export interface RenderOptions
{
  cols:       number;
  rows:       number;
  halfHeight: number;
}

export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = Object.freeze(
{
  cols:       60,
  rows:       20,
  halfHeight: PADDLE_LENGTH / 2,
});

const BALL_CHAR   = 'O';
const PADDLE_CHAR = '#';
const NET_CHAR    = ':';

export const KEY_HELP = '[A]I [D]ifficulty [R]eset [SPACE]Pause [Q]uit';

/* ═══════════════════════════════════════════════════════════════════════════
   MAPPING HELPERS
   ═══════════════════════════════════════════════════════════════════════════ */

/** Column for arena X, clamped to the grid. */
export function toColumn(x: number, cols: number): number
{
  const col = Math.round(((x + 1) / 2) * (cols - 1));
  return Math.max(0, Math.min(cols - 1, col));
}

/** Row for arena Y (Y up, rows down), clamped to the grid. */
export function toRow(y: number, rows: number): number
{
  const row = Math.round(((1 - y) / 2) * (rows - 1));
  return Math.max(0, Math.min(rows - 1, row));
}

function centre(text: string, width: number): string
{
  if (text.length >= width) return text;
  const left = Math.floor((width - text.length) / 2);
  return ' '.repeat(left) + text + ' '.repeat(width - text.length - left);
}

/** Overwrites `grid[row]` with `text` centred on it. */
function overlay(grid: string[][], row: number, text: string): void
{
  const line  = grid[row];
  const start = Math.max(0, Math.floor((line.length - text.length) / 2));

  for (let i = 0; i < text.length && start + i < line.length; i++)
  {
    line[start + i] = text[i];
  }
}

function drawPaddle(grid: string[][], paddle: Vec2, opts: RenderOptions): void
{
  const col    = toColumn(paddle.x, opts.cols);
  const top    = toRow(paddle.y + opts.halfHeight, opts.rows);
  const bottom = toRow(paddle.y - opts.halfHeight, opts.rows);

  for (let row = top; row <= bottom; row++)
  {
    grid[row][col] = PADDLE_CHAR;
  }
}

/* ═══════════════════════════════════════════════════════════════════════════
   TEXT LINES
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function modeLabel
 * @description 'AI MEDIUM' with the AI on, '2 PLAYER' otherwise.
 */
export function modeLabel(snapshot: GameSnapshot): string
{
  return snapshot.aiEnabled ? `AI ${snapshot.difficulty}` : '2 PLAYER';
}

/**
 * @function statusLine
 * @description e.g. `MODE: AI MEDIUM | [A]I [D]ifficulty [R]eset [SPACE]Pause [Q]uit`
 */
export function statusLine(snapshot: GameSnapshot): string
{
  return `MODE: ${modeLabel(snapshot)} | ${KEY_HELP}`;
}

/**
 * @function scoreLine
 * @description e.g. `P1  3 : 5  AI`.  The right player is labelled AI while
 *              AI mode is on.
 */
export function scoreLine(snapshot: GameSnapshot): string
{
  const right = snapshot.aiEnabled ? 'AI' : 'P2';
  return `P1  ${snapshot.scores[0]} : ${snapshot.scores[1]}  ${right}`;
}

/**
 * @function rallyLine
 * @description e.g. `RALLY 4  BEST 9  SPEED 0.014`
 */
export function rallyLine(snapshot: GameSnapshot): string
{
  return `RALLY ${snapshot.rallyCount}  BEST ${snapshot.longestRally}  SPEED ${snapshot.ballSpeed.toFixed(3)}`;
}

/**
 * @function bannerText
 * @description Winner banner once the match is over, 'PAUSED' while paused,
 *              otherwise null.
 */
export function bannerText(snapshot: GameSnapshot): string | null
{
  if (snapshot.gameOver && snapshot.winner !== null)
  {
    if (snapshot.winner === 2 && snapshot.aiEnabled) return 'AI WINS!';
    return `PLAYER ${snapshot.winner} WINS!`;
  }
  if (snapshot.paused) return 'PAUSED';
  return null;
}

/* ═══════════════════════════════════════════════════════════════════════════
   FRAMES
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function renderFrame
 * @description Full game frame as newline-joined lines.
 */
export function renderFrame(snapshot: GameSnapshot, options: RenderOptions = DEFAULT_RENDER_OPTIONS): string
{
  const { cols, rows } = options;
  const grid: string[][] = [];

  for (let row = 0; row < rows; row++)
  {
    const line = new Array<string>(cols).fill(' ');
    if (row % 2 === 0) line[Math.floor(cols / 2)] = NET_CHAR;
    grid.push(line);
  }

  drawPaddle(grid, snapshot.leftPaddle,  options);
  drawPaddle(grid, snapshot.rightPaddle, options);
  grid[toRow(snapshot.ball.y, rows)][toColumn(snapshot.ball.x, cols)] = BALL_CHAR;

  const banner = bannerText(snapshot);
  if (banner) overlay(grid, Math.floor(rows / 2), ` ${banner} `);

  const border = '+' + '-'.repeat(cols) + '+';

  return [
    centre(scoreLine(snapshot), cols + 2),
    border,
    ...grid.map((line) => '|' + line.join('') + '|'),
    border,
    statusLine(snapshot),
    rallyLine(snapshot),
  ].join('\n');
}

/**
 * @function renderMenu
 * @description Main menu as newline-joined lines, each centred in the frame
 *              width.  The highlighted option is wrapped in `> <`.
 */
export function renderMenu(menu: MainMenu, options: RenderOptions = DEFAULT_RENDER_OPTIONS): string
{
  const width = options.cols + 2;
  const lines = ['RALLY PONG', ''];

  menu.options.forEach((label, i) =>
  {
    lines.push(i === menu.selectedIndex ? `> ${label} <` : `  ${label}  `);
  });

  lines.push('', 'UP/DOWN to choose, ENTER to start, Q to quit');

  return lines.map((line) => centre(line, width)).join('\n');
}
