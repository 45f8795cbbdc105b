/**
 * @file helpers.ts
 * @description Shared factory functions for Rally Pong unit tests.
 *
 * Every test starts from real controllers wired to PointEntity handles at
 * the live game's starting positions.  Overrides let each test move only
 * what it cares about.
 *
 * Import pattern:
 *   import { makePaddles, makeBallRig, makeSnapshot } from './helpers.js';
 */

import type { GameSnapshot, Vec2 } from '../src/types.js';
import { PADDLE_X, PADDLE_LENGTH, WIN_SCORE } from '../src/constants.js';
import { PointEntity } from '../src/entity.js';
import { PaddleController } from '../src/paddle.js';
import { ScoreManager } from '../src/score.js';
import { BallController } from '../src/ball.js';
import type { BallOptions } from '../src/ball.js';

/* ═══════════════════════════════════════════════════════════════════════════
   PADDLES
   ═══════════════════════════════════════════════════════════════════════════ */

export interface PaddleRig
{
  left:    PointEntity;
  right:   PointEntity;
  paddles: PaddleController;
}

/**
 * @function makePaddles
 * @description Both paddles on their X lines at the given centre Ys.
 */
export function makePaddles(leftY = 0, rightY = 0, paddleLength = PADDLE_LENGTH): PaddleRig
{
  const left  = new PointEntity(-PADDLE_X, leftY);
  const right = new PointEntity( PADDLE_X, rightY);
  return { left, right, paddles: new PaddleController(left, right, paddleLength) };
}

/* ═══════════════════════════════════════════════════════════════════════════
   BALL
   ═══════════════════════════════════════════════════════════════════════════ */

export interface BallRig extends PaddleRig
{
  entity: PointEntity;
  score:  ScoreManager;
  ball:   BallController;
}

export interface BallRigOptions extends BallOptions
{
  position?:  Vec2;
  direction?: Vec2;
  leftY?:     number;
  rightY?:    number;
  winScore?:  number;
}

/**
 * @function makeBallRig
 * @description A BallController with its paddles and score manager.  The
 *              ball starts at `position` (default centre) and, when given,
 *              is served along `direction`.
 */
export function makeBallRig(options: BallRigOptions = {}): BallRig
{
  const { position = { x: 0, y: 0 }, direction, leftY = 0, rightY = 0, winScore = WIN_SCORE, ...ballOptions } = options;

  const rig    = makePaddles(leftY, rightY);
  const entity = new PointEntity(position.x, position.y);
  const score  = new ScoreManager(winScore, ballOptions.hooks ?? {});
  const ball   = new BallController(entity, rig.paddles, score, ballOptions);

  if (direction) ball.serve(direction);

  return { ...rig, entity, score, ball };
}

/* ═══════════════════════════════════════════════════════════════════════════
   SNAPSHOTS
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function makeSnapshot
 * @description A mid-match snapshot with everything centred.
 */
export function makeSnapshot(overrides: Partial<GameSnapshot> = {}): GameSnapshot
{
  return {
    ball:         { x: 0, y: 0 },
    leftPaddle:   { x: -PADDLE_X, y: 0 },
    rightPaddle:  { x:  PADDLE_X, y: 0 },
    scores:       [0, 0],
    gameOver:     false,
    winner:       null,
    paused:       false,
    aiEnabled:    false,
    difficulty:   'MEDIUM',
    rallyCount:   0,
    longestRally: 0,
    ballSpeed:    0,
    ...overrides,
  };
}
