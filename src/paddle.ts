/**
 * @file paddle.ts
 * @description PaddleController: the one place paddle positions are written.
 *
 * Paddles are moved by two independent actors, the human keyboard and the
 * AIController.  Both go through move(), which clamps.
 */

import type { MovableEntity, PaddleSide, Vec2 } from './types.js';
import { ARENA_TOP, ARENA_BOTTOM, PADDLE_LENGTH } from './constants.js';
import { createLogger } from './logger.js';

const log = createLogger('paddle');

/**
 * @class PaddleController
 * @description Owns both paddle handles.  X never changes after construction;
 *              Y is moved in discrete steps and clamped to the arena.
 */
export class PaddleController
{
  private readonly paddles: Record<PaddleSide, MovableEntity>;

  /** Half of the configured paddle length. */
  readonly halfHeight: number;

  /**
   * @param left          Handle for the left (player 1) paddle.
   * @param right         Handle for the right (player 2) paddle.
   * @param paddleLength  Full paddle length along Y.  Non-positive values fall
   *                      back to PADDLE_LENGTH.
   */
  constructor(left: MovableEntity, right: MovableEntity, paddleLength: number = PADDLE_LENGTH)
  {
    this.paddles = { LEFT: left, RIGHT: right };

    if (!(paddleLength > 0))
    {
      log.warn({ paddleLength, fallback: PADDLE_LENGTH }, 'invalid paddle length, using default');
      paddleLength = PADDLE_LENGTH;
    }

    this.halfHeight = paddleLength / 2;
  }

  /**
   * @method move
   * @description Shifts a paddle by `deltaY` then clamps it inside the arena.
   */
  move(side: PaddleSide, deltaY: number): void
  {
    const paddle = this.paddles[side];
    const { x, y } = paddle.getPosition();
    const next = this.clamp(y + deltaY);

    paddle.setPosition(x, next);
    log.trace({ side, y: next }, 'paddle moved');
  }

  /**
   * @method clamp
   * @description Limits a paddle-centre Y to
   *              [ARENA_BOTTOM + halfHeight, ARENA_TOP - halfHeight].
   */
  clamp(y: number): number
  {
    const minY = ARENA_BOTTOM + this.halfHeight;
    const maxY = ARENA_TOP    - this.halfHeight;
    return Math.max(minY, Math.min(maxY, y));
  }

  /**
   * @method position
   * @description Read-only copy of a paddle's centre.
   */
  position(side: PaddleSide): Vec2
  {
    const { x, y } = this.paddles[side].getPosition();
    return { x, y };
  }

  /**
   * @method resetPositions
   * @description Centres both paddles vertically, keeping their X lines.
   */
  resetPositions(): void
  {
    for (const side of ['LEFT', 'RIGHT'] as const)
    {
      const paddle = this.paddles[side];
      paddle.setPosition(paddle.getPosition().x, 0);
    }
    log.debug('paddle positions reset to centre');
  }
}
