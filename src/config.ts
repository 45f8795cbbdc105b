/**
 * @file config.ts
 * @description Game configuration: schema, defaults, validation and the JSON
 *              config file.
 *
 * The schema is the single source of the config shape; `GameConfig` is
 * inferred from it and DEFAULT_CONFIG is simply the schema applied to `{}`.
 *
 * Bad input never throws.  Each field carries its own fallback:
 *   - missing value → default, silently;
 *   - wrong type or out-of-range value → default, with a warning naming the
 *     offending path and value.
 * A whole section that is not an object falls back the same way.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';

import
{
  BALL_RADIUS, BALL_MAX_SPEED,
  PADDLE_THICKNESS, PADDLE_LENGTH, PADDLE_MOVE_SPEED,
  SPEED_INCREASE_INTERVAL, SPEED_MULTIPLIER, SUB_STEPS,
  WIN_SCORE, TICK_INTERVAL_MS,
  DIFFICULTY_CYCLE,
} from './constants.js';
import { createLogger } from './logger.js';

const log = createLogger('config');

/* ═══════════════════════════════════════════════════════════════════════════
   FIELD HELPERS
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function recover
 * @description Builds a zod `.catch()` handler that logs the rejected value
 *              and substitutes `fallback`.
 */
function recover<T>(path: string, fallback: T)
{
  return (ctx: { input: unknown }): T =>
  {
    log.warn({ path, value: ctx.input, fallback }, 'invalid config value, using default');
    return fallback;
  };
}

const positiveNumber = (path: string, fallback: number) =>
  z.number().positive().default(fallback).catch(recover(path, fallback));

const positiveInt = (path: string, fallback: number) =>
  z.number().int().positive().default(fallback).catch(recover(path, fallback));

/* Sub-steps accept any integer here: BallController owns the "≤ 0 means one
   whole-tick step" rule so it also holds for controllers built by hand.     */
const integer = (path: string, fallback: number) =>
  z.number().int().default(fallback).catch(recover(path, fallback));

const flag = (path: string, fallback: boolean) =>
  z.boolean().default(fallback).catch(recover(path, fallback));

/* Difficulty names are case-insensitive in the file ("medium" works). */
const difficulty = (path: string, fallback: (typeof DIFFICULTY_CYCLE)[number]) =>
  z.string()
    .transform((s) => s.toUpperCase())
    .pipe(z.enum(DIFFICULTY_CYCLE))
    .default(fallback)
    .catch(recover(path, fallback));

/* ═══════════════════════════════════════════════════════════════════════════
   SECTIONS
   ═══════════════════════════════════════════════════════════════════════════ */

const WindowSchema = z.object(
{
  width:  positiveInt('window.width',  800),
  height: positiveInt('window.height', 600),
});

const BallSchema = z.object(
{
  radius:   positiveNumber('ball.radius',   BALL_RADIUS),
  maxSpeed: positiveNumber('ball.maxSpeed', BALL_MAX_SPEED),
});

const PaddleSchema = z.object(
{
  xLength:   positiveNumber('paddle.xLength',   PADDLE_THICKNESS),
  yLength:   positiveNumber('paddle.yLength',   PADDLE_LENGTH),
  moveSpeed: positiveNumber('paddle.moveSpeed', PADDLE_MOVE_SPEED),
});

const MatchSchema = z.object(
{
  speedIncreaseInterval: positiveInt('game.speedIncreaseInterval', SPEED_INCREASE_INTERVAL),
  speedMultiplier:       positiveNumber('game.speedMultiplier',    SPEED_MULTIPLIER),
  winScore:              positiveInt('game.winScore',              WIN_SCORE),
  subSteps:              integer('game.subSteps',                  SUB_STEPS),
  aiEnabled:             flag('game.aiEnabled',                    false),
  defaultDifficulty:     difficulty('game.defaultDifficulty',      'MEDIUM'),
  tickIntervalMs:        positiveInt('game.tickIntervalMs',        TICK_INTERVAL_MS),
});

/**
 * @constant GameConfigSchema
 * @description Full config file schema.  Unknown keys are dropped.
 */
export const GameConfigSchema = z.object(
{
  window: WindowSchema.default({}).catch(recover('window', WindowSchema.parse({}))),
  ball:   BallSchema.default({}).catch(recover('ball', BallSchema.parse({}))),
  paddle: PaddleSchema.default({}).catch(recover('paddle', PaddleSchema.parse({}))),
  game:   MatchSchema.default({}).catch(recover('game', MatchSchema.parse({}))),
});

/** Validated configuration consumed by the core (never mutated by it). */
export type GameConfig = z.infer<typeof GameConfigSchema>;

/** Every setting at its default value. */
export const DEFAULT_CONFIG: Readonly<GameConfig> = Object.freeze(GameConfigSchema.parse({}));

/* ═══════════════════════════════════════════════════════════════════════════
   RESOLUTION AND FILE I/O
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function resolveConfig
 * @description Validates arbitrary input (usually parsed JSON) into a complete
 *              GameConfig.  Never throws.
 */
export function resolveConfig(raw: unknown): GameConfig
{
  if (raw === undefined || raw === null)
  {
    return GameConfigSchema.parse({});
  }

  const result = GameConfigSchema.safeParse(raw);

  if (!result.success)
  {
    /* Only reachable when the root itself is not an object. */
    log.warn({ issues: result.error.issues }, 'config is not an object, using defaults');
    return GameConfigSchema.parse({});
  }

  return result.data;
}

/**
 * @function createDefaultConfig
 * @description Writes DEFAULT_CONFIG to `path` as pretty-printed JSON.
 */
export function createDefaultConfig(path: string): void
{
  writeFileSync(path, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n', 'utf8');
  log.info({ path }, 'default config file created');
}

/**
 * @function loadConfig
 * @description Reads and validates the JSON config file at `path`.
 *
 *   - File missing: a default file is written and the defaults are returned.
 *   - File unreadable or not JSON: the defaults are returned and the failure
 *     is logged at error level.
 */
export function loadConfig(path: string): GameConfig
{
  if (!existsSync(path))
  {
    log.warn({ path }, 'config file not found, creating default');

    try
    {
      createDefaultConfig(path);
    }
    catch (err)
    {
      log.error({ err, path }, 'could not write default config file');
    }

    return GameConfigSchema.parse({});
  }

  let raw: unknown;

  try
  {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  }
  catch (err)
  {
    log.error({ err, path }, 'could not read config file, using defaults');
    return GameConfigSchema.parse({});
  }

  log.info({ path }, 'config file loaded');
  return resolveConfig(raw);
}
