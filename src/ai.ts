/**
 * @file ai.ts
 * @description AIController: drives one paddle (the right one by default)
 *              without human input.
 *
 * ALGORITHM OVERVIEW
 * ------------------
 *   1. THROTTLE  A frame counter advances on every update(); the AI only
 *                acts on updates where counter % reactionDelay === 0.
 *
 *   2. PREDICT   If the ball is heading toward the AI paddle, extrapolate
 *                where it will cross the paddle's X line and fold that Y
 *                back into the arena to account for wall bounces.
 *
 *   3. ERR       Add a uniform random offset of up to ±predictionError.
 *
 *   4. TRACK     With probability `accuracy`, move one step (at most
 *                `speed`) toward the target.  Otherwise this reaction is a
 *                missed read and the paddle stays put.
 *
 *   5. RECENTRE  If the ball is heading away, drift toward Y = 0 at half
 *                speed instead.
 *
 * Every move goes through PaddleController.move(), so the AI is clamped by
 * exactly the same rule as a human player.
 *
 * THREE DIFFICULTY TIERS
 * ----------------------
 *   EASY    reacts every 15 ticks, moves 0.03, reads 70%, error ±0.15
 *   MEDIUM  reacts every 8 ticks,  moves 0.05, reads 85%, error ±0.08
 *   HARD    reacts every 3 ticks,  moves 0.08, reads 95%, error ±0.03
 */

import type { AIProfile, Difficulty, MovableEntity, PaddleSide, Vec2 } from './types.js';
import type { PaddleController } from './paddle.js';
import
{
  AI_EASY_REACTION_DELAY, AI_EASY_SPEED, AI_EASY_ACCURACY, AI_EASY_PREDICTION_ERROR,
  AI_REACTION_DELAY, AI_SPEED, AI_ACCURACY, AI_PREDICTION_ERROR,
  AI_HARD_REACTION_DELAY, AI_HARD_SPEED, AI_HARD_ACCURACY, AI_HARD_PREDICTION_ERROR,
  AI_CENTER_DRIFT_FACTOR,
} from './constants.js';
import { predictInterceptY } from './physics.js';
import { createLogger } from './logger.js';

const log = createLogger('ai');

/* ─── Difficulty table ───────────────────────────────────────────────────── */

/**
 * @constant AI_PROFILES
 * @description One frozen tuning record per difficulty.
 */
export const AI_PROFILES: Readonly<Record<Difficulty, AIProfile>> = Object.freeze(
{
  EASY: Object.freeze(
  {
    reactionDelay:   AI_EASY_REACTION_DELAY,
    speed:           AI_EASY_SPEED,
    accuracy:        AI_EASY_ACCURACY,
    predictionError: AI_EASY_PREDICTION_ERROR,
  }),
  MEDIUM: Object.freeze(
  {
    reactionDelay:   AI_REACTION_DELAY,
    speed:           AI_SPEED,
    accuracy:        AI_ACCURACY,
    predictionError: AI_PREDICTION_ERROR,
  }),
  HARD: Object.freeze(
  {
    reactionDelay:   AI_HARD_REACTION_DELAY,
    speed:           AI_HARD_SPEED,
    accuracy:        AI_HARD_ACCURACY,
    predictionError: AI_HARD_PREDICTION_ERROR,
  }),
});

/**
 * @function stepToward
 * @description Signed move from `from` toward `to`, no longer than `maxStep`.
 *              Lands exactly on `to` when it is within reach.
 */
function stepToward(from: number, to: number, maxStep: number): number
{
  const diff = to - from;
  if (Math.abs(diff) <= maxStep) return diff;
  return diff > 0 ? maxStep : -maxStep;
}

/**
 * @class AIController
 * @description Computer opponent for one paddle.
 */
export class AIController
{
  private readonly paddles: PaddleController;
  private readonly ball:    MovableEntity;
  private readonly side:    PaddleSide;

  private level:    Difficulty;
  private settings: AIProfile;

  /** Updates seen since the last reset or difficulty change. */
  private frameCounter = 0;

  /** Last predicted Y, including the random error. */
  private target = 0;

  /** The random error applied to the last prediction. */
  private predictionOffset = 0;

  /**
   * @param paddles     Shared paddle controller (the AI only calls move()).
   * @param ball        Ball handle, read only.
   * @param difficulty  Starting difficulty.
   * @param side        Which paddle the AI drives.
   */
  constructor(
    paddles: PaddleController,
    ball: MovableEntity,
    difficulty: Difficulty = 'MEDIUM',
    side: PaddleSide = 'RIGHT',
  )
  {
    this.paddles  = paddles;
    this.ball     = ball;
    this.side     = side;
    this.level    = difficulty;
    this.settings = AI_PROFILES[difficulty];

    log.info({ difficulty, side }, 'AI controller initialised');
  }

  /* ── Queries ─────────────────────────────────────────────────────────── */

  get difficulty(): Difficulty
  {
    return this.level;
  }

  get profile(): AIProfile
  {
    return this.settings;
  }

  get targetY(): number
  {
    return this.target;
  }

  get paddleSide(): PaddleSide
  {
    return this.side;
  }

  /* ── Control ─────────────────────────────────────────────────────────── */

  /**
   * @method update
   * @description Called once per tick with the ball's resolved direction.
   */
  update(ballDirection: Readonly<Vec2>): void
  {
    this.frameCounter += 1;
    if (this.frameCounter % this.settings.reactionDelay !== 0) return;

    const paddleY = this.paddles.position(this.side).y;

    if (this.isIncoming(ballDirection))
    {
      this.predictTarget(ballDirection);

      if (Math.random() < this.settings.accuracy)
      {
        this.paddles.move(this.side, stepToward(paddleY, this.target, this.settings.speed));
      }
      else
      {
        log.trace({ targetY: this.target }, 'missed read');
      }
    }
    else
    {
      const drift = this.settings.speed * AI_CENTER_DRIFT_FACTOR;
      this.paddles.move(this.side, stepToward(paddleY, 0, drift));
    }
  }

  /**
   * @method setDifficulty
   * @description Swaps the active profile and discards in-flight prediction
   *              state.  The next update() already uses the new profile.
   */
  setDifficulty(difficulty: Difficulty): void
  {
    this.level    = difficulty;
    this.settings = AI_PROFILES[difficulty];
    this.reset();

    log.info({ difficulty }, 'AI difficulty changed');
  }

  /**
   * @method reset
   * @description Clears the frame counter and prediction.  Difficulty is kept.
   */
  reset(): void
  {
    this.frameCounter     = 0;
    this.target           = 0;
    this.predictionOffset = 0;
  }

  /* ── Internals ───────────────────────────────────────────────────────── */

  private isIncoming(direction: Readonly<Vec2>): boolean
  {
    return this.side === 'RIGHT' ? direction.x > 0 : direction.x < 0;
  }

  private predictTarget(direction: Readonly<Vec2>): void
  {
    const paddleX   = this.paddles.position(this.side).x;
    const predicted = predictInterceptY(this.ball.getPosition(), direction, paddleX);

    this.predictionOffset = (Math.random() - 0.5) * 2 * this.settings.predictionError;
    this.target           = predicted + this.predictionOffset;

    log.trace({ predicted, offset: this.predictionOffset, targetY: this.target }, 'AI prediction');
  }
}
