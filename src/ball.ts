/**
 * @file ball.ts
 * @description BallController: ball direction, sub-stepped movement,
 *              paddle/wall/goal collisions, speed-ups and rally tracking.
 *
 * ORDER OF OPERATIONS PER TICK
 * ----------------------------
 *   1. elapsedTicks += 1; every `speedIncreaseInterval` ticks the direction
 *      is scaled by `speedMultiplier` (once per tick, never per sub-step).
 *   2. For each sub-step:
 *        a. move by direction / steps
 *        b. paddle bounce (left, else right)
 *        c. top/bottom wall bounce
 *        d. left/right goal
 *        e. commit the position to the entity
 *
 * SUB-STEP COUNT
 * --------------
 * The configured count is a floor.  When one tick's horizontal travel
 * split into that many pieces would exceed the paddle band width, more
 * sub-steps are taken so the leading edge cannot jump over the band.  This
 * also applies when an invalid configured count has fallen back to a single
 * whole-tick step: a fast ball still gets ceil(|dx| / band width) steps.
 *
 * GOALS
 * -----
 * The ScoreManager announces points (onScore, then onGameOver).  A goal
 * after the match is over only reflects the ball; no rally is recorded.
 */

import type { GameHooks, MovableEntity, PaddleSide, Vec2 } from './types.js';
import type { PaddleController } from './paddle.js';
import type { ScoreManager } from './score.js';
import
{
  BALL_RADIUS, BALL_MAX_SPEED, BALL_SERVE_COMPONENT,
  SUB_STEPS, SPEED_INCREASE_INTERVAL, SPEED_MULTIPLIER,
  PADDLE_BAND_WIDTH,
} from './constants.js';
import
{
  magnitude, isInPaddleBand, pushOutOfPaddle, bounceDirection,
  resolveWallBounce, resolveGoal,
} from './physics.js';
import { createLogger } from './logger.js';

const log = createLogger('ball');

/**
 * @interface BallOptions
 * @description Tuning values for one BallController.  All optional.
 */
export interface BallOptions
{
  radius?:                number;
  maxSpeed?:              number;
  subSteps?:              number;
  speedIncreaseInterval?: number;
  speedMultiplier?:       number;
  /** onPaddleHit and onWallHit.  Points are announced by the ScoreManager. */
  hooks?:                 Partial<GameHooks>;
}

/**
 * @class BallController
 * @description Sole owner of the ball's position and direction.
 */
export class BallController
{
  private readonly ball:    MovableEntity;
  private readonly paddles: PaddleController;
  private readonly score:   ScoreManager;
  private readonly hooks:   Partial<GameHooks>;

  readonly radius:                number;
  readonly maxSpeed:              number;
  readonly subSteps:              number;
  readonly speedIncreaseInterval: number;
  readonly speedMultiplier:       number;

  private dir: Vec2 = { x: BALL_SERVE_COMPONENT, y: BALL_SERVE_COMPONENT };
  private ticks   = 0;
  private rally   = 0;
  private longest = 0;

  constructor(ball: MovableEntity, paddles: PaddleController, score: ScoreManager, options: BallOptions = {})
  {
    this.ball    = ball;
    this.paddles = paddles;
    this.score   = score;
    this.hooks   = options.hooks ?? {};

    this.radius                = options.radius                ?? BALL_RADIUS;
    this.maxSpeed              = options.maxSpeed              ?? BALL_MAX_SPEED;
    this.speedIncreaseInterval = options.speedIncreaseInterval ?? SPEED_INCREASE_INTERVAL;
    this.speedMultiplier       = options.speedMultiplier       ?? SPEED_MULTIPLIER;

    const steps = options.subSteps ?? SUB_STEPS;
    if (!Number.isInteger(steps) || steps <= 0)
    {
      log.warn({ subSteps: steps }, 'invalid sub-step count, using one whole-tick step');
      this.subSteps = 1;
    }
    else
    {
      this.subSteps = steps;
    }
  }

  /* ── Queries ─────────────────────────────────────────────────────────── */

  get direction(): Vec2
  {
    return { x: this.dir.x, y: this.dir.y };
  }

  get position(): Vec2
  {
    const { x, y } = this.ball.getPosition();
    return { x, y };
  }

  /** Current speed (direction magnitude) in units per tick. */
  get speed(): number
  {
    return magnitude(this.dir);
  }

  /** Paddle hits since the last point. */
  get rallyCount(): number
  {
    return this.rally;
  }

  /** Longest rally since the last reset. */
  get longestRally(): number
  {
    return this.longest;
  }

  get elapsedTicks(): number
  {
    return this.ticks;
  }

  /* ── Control ─────────────────────────────────────────────────────────── */

  /**
   * @method reset
   * @description Centres the ball and serves it: horizontal sign chosen at
   *              random, vertical component random within ±|dx| so the
   *              serve angle is at most 45°.  Clears the tick and rally
   *              counters.
   */
  reset(): void
  {
    this.ball.setPosition(0, 0);

    const dx = (Math.random() < 0.5 ? -1 : 1) * BALL_SERVE_COMPONENT;
    const dy = (Math.random() * 2 - 1) * BALL_SERVE_COMPONENT;
    this.dir = { x: dx, y: dy };

    this.ticks   = 0;
    this.rally   = 0;
    this.longest = 0;

    log.info({ direction: this.dir }, 'ball reset');
  }

  /**
   * @method serve
   * @description Replaces the direction outright.  Position is untouched.
   */
  serve(direction: Readonly<Vec2>): void
  {
    this.dir = { x: direction.x, y: direction.y };
    log.debug({ direction: this.dir }, 'ball served');
  }

  /**
   * @method increaseSpeed
   * @description Scales the direction by the speed multiplier.
   */
  increaseSpeed(): void
  {
    this.dir = { x: this.dir.x * this.speedMultiplier, y: this.dir.y * this.speedMultiplier };
    log.debug({ direction: this.dir, speed: this.speed }, 'ball speed increased');
  }

  /**
   * @method tick
   * @description Advances the ball by one tick.
   */
  tick(): void
  {
    this.ticks += 1;
    if (this.ticks % this.speedIncreaseInterval === 0)
    {
      this.increaseSpeed();
    }

    const steps = this.stepsFor(this.dir);

    for (let i = 0; i < steps; i++)
    {
      const { x, y } = this.ball.getPosition();
      const next: Vec2 = { x: x + this.dir.x / steps, y: y + this.dir.y / steps };

      this.checkPaddles(next);
      this.checkWalls(next);

      this.ball.setPosition(next.x, next.y);
      log.trace({ step: i, x: next.x, y: next.y }, 'sub-step');
    }
  }

  /* ── Internals ───────────────────────────────────────────────────────── */

  private stepsFor(direction: Readonly<Vec2>): number
  {
    const needed = Math.ceil(Math.abs(direction.x) / PADDLE_BAND_WIDTH);
    return Math.max(this.subSteps, needed);
  }

  /** Left paddle first, otherwise right.  Mutates `next` on a hit. */
  private checkPaddles(next: Vec2): void
  {
    for (const side of ['LEFT', 'RIGHT'] as const)
    {
      if (this.bounceOff(side, next)) return;
    }
  }

  private bounceOff(side: PaddleSide, next: Vec2): boolean
  {
    const paddleY    = this.paddles.position(side).y;
    const halfHeight = this.paddles.halfHeight;

    const hit = isInPaddleBand(side,
    {
      ball: next,
      radius: this.radius,
      direction: this.dir,
      paddleY,
      halfHeight,
    });
    if (!hit) return false;

    next.x   = pushOutOfPaddle(side, next.x, this.radius);
    this.dir = bounceDirection(side, this.dir, next.y, paddleY, halfHeight, this.maxSpeed);
    this.rally += 1;

    log.debug({ side, rally: this.rally, direction: this.dir }, 'paddle hit');
    this.hooks.onPaddleHit?.(side);
    return true;
  }

  /** Top/bottom bounce, then left/right goal.  Mutates `next`. */
  private checkWalls(next: Vec2): void
  {
    const wall = resolveWallBounce(next.y, this.dir.y, this.radius);
    if (wall)
    {
      next.y   = wall.y;
      this.dir = { x: this.dir.x, y: wall.dy };
      log.debug({ wall: wall.wall }, 'wall hit');
      this.hooks.onWallHit?.(wall.wall);
    }

    const goal = resolveGoal(next.x, this.dir.x, this.radius);
    if (goal)
    {
      next.x   = goal.x;
      this.dir = { x: goal.dx, y: this.dir.y };

      if (this.score.isGameOver)
      {
        log.debug({ scorer: goal.scorer }, 'goal after match end, no point');
        return;
      }

      this.longest = Math.max(this.longest, this.rally);
      log.info({ scorer: goal.scorer, rally: this.rally, longest: this.longest }, 'goal');
      this.rally = 0;

      this.score.scorePoint(goal.scorer);
    }
  }
}
