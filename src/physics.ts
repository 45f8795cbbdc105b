/**
 * @file physics.ts
 * @description Pure geometry for Rally Pong: paddle-band tests, angle bounce,
 *              wall and goal resolution, and the AI's intercept prediction.
 *
 * Nothing here owns state.  BallController and AIController call these with
 * plain numbers and apply the results to the entities they hold.
 *
 * COORDINATE SYSTEM
 * -----------------
 *   The arena is [-1, +1] x [-1, +1], Y increases UPWARD.
 *   The left paddle sits on x = -PADDLE_X, the right one on x = +PADDLE_X.
 *   Directions are in arena units per tick.
 */

import type { PaddleSide, PlayerId, Vec2, Wall } from './types.js';
import
{
  ARENA_TOP, ARENA_BOTTOM, ARENA_LEFT, ARENA_RIGHT,
  PADDLE_X, PADDLE_FACE_X,
  BALL_MAX_BOUNCE_ANGLE_DEG,
} from './constants.js';

/* ═══════════════════════════════════════════════════════════════════════════
   VECTORS
   ═══════════════════════════════════════════════════════════════════════════ */

/** Euclidean length of a direction, i.e. the ball's speed per tick. */
export function magnitude(v: Readonly<Vec2>): number
{
  return Math.hypot(v.x, v.y);
}

/* ═══════════════════════════════════════════════════════════════════════════
   PADDLE COLLISION
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface PaddleContact
 * @description Everything the paddle test needs about one candidate hit.
 */
export interface PaddleContact
{
  /** Ball centre after the current sub-step. */
  ball:       Readonly<Vec2>;
  radius:     number;
  direction:  Readonly<Vec2>;
  /** Centre Y of the paddle on `side`. */
  paddleY:    number;
  halfHeight: number;
}

/**
 * @function isInPaddleBand
 * @description True when the ball should bounce off the paddle on `side`:
 *
 *   - its leading edge lies in the band between the paddle line and the
 *     paddle face (inclusive at both ends),
 *   - its centre Y lies within the paddle's half-height,
 *   - it is travelling toward that paddle.
 *
 * The direction check stops a receding ball that grazes the band from
 * bouncing a second time.
 */
export function isInPaddleBand(side: PaddleSide, c: PaddleContact): boolean
{
  const withinY = Math.abs(c.ball.y - c.paddleY) <= c.halfHeight;
  if (!withinY) return false;

  if (side === 'LEFT')
  {
    const edge = c.ball.x - c.radius;
    return edge >= -PADDLE_X && edge <= -PADDLE_FACE_X && c.direction.x < 0;
  }

  const edge = c.ball.x + c.radius;
  return edge >= PADDLE_FACE_X && edge <= PADDLE_X && c.direction.x > 0;
}

/**
 * @function pushOutOfPaddle
 * @description X the ball is moved back to after a paddle hit: twice the
 *              penetration past the paddle face, away from the paddle.
 */
export function pushOutOfPaddle(side: PaddleSide, x: number, radius: number): number
{
  if (side === 'LEFT')
  {
    const overlap = -PADDLE_FACE_X - (x - radius);
    return x + 2 * overlap;
  }

  const overlap = (x + radius) - PADDLE_FACE_X;
  return x - 2 * overlap;
}

/**
 * @function bounceDirection
 * @description Outgoing direction after a hit on the paddle on `side`.
 *
 * The hit offset from the paddle centre, normalised by the half-height and
 * clamped to [-1, 1], picks an angle up to BALL_MAX_BOUNCE_ANGLE_DEG off the
 * horizontal.  Speed is carried over from `incoming` but never above
 * `maxSpeed`.  Horizontal sign always points away from the paddle.
 *
 *   offset  0  → flat return
 *   offset ±1  → ±60°
 */
export function bounceDirection(
  side: PaddleSide,
  incoming: Readonly<Vec2>,
  hitY: number,
  paddleY: number,
  halfHeight: number,
  maxSpeed: number,
): Vec2
{
  const offset   = Math.max(-1, Math.min(1, (hitY - paddleY) / halfHeight));
  const angleRad = (offset * BALL_MAX_BOUNCE_ANGLE_DEG * Math.PI) / 180;
  const speed    = Math.min(magnitude(incoming), maxSpeed);
  const awayX    = side === 'LEFT' ? 1 : -1;

  return {
    x: awayX * speed * Math.cos(angleRad),
    y: speed * Math.sin(angleRad),
  };
}

/* ═══════════════════════════════════════════════════════════════════════════
   WALLS AND GOALS
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface WallBounce
 * @description Result of a top/bottom wall check: clamped Y, flipped dy, and
 *              which wall was struck.
 */
export interface WallBounce
{
  y:    number;
  dy:   number;
  wall: Wall;
}

/**
 * @function resolveWallBounce
 * @description Clamps a ball whose edge crossed the top or bottom wall back
 *              inside and flips its vertical direction.  Null when no wall
 *              was crossed.
 */
export function resolveWallBounce(y: number, dy: number, radius: number): WallBounce | null
{
  if (y - radius < ARENA_BOTTOM)
  {
    return { y: ARENA_BOTTOM + radius, dy: -dy, wall: 'BOTTOM' };
  }
  if (y + radius > ARENA_TOP)
  {
    return { y: ARENA_TOP - radius, dy: -dy, wall: 'TOP' };
  }
  return null;
}

/**
 * @interface Goal
 * @description Result of a left/right wall check: clamped X, flipped dx, and
 *              the player who is awarded the point.
 */
export interface Goal
{
  x:      number;
  dx:     number;
  scorer: PlayerId;
}

/**
 * @function resolveGoal
 * @description A ball past the left wall is a point for player 2, past the
 *              right wall a point for player 1.  Null when neither wall was
 *              crossed.
 */
export function resolveGoal(x: number, dx: number, radius: number): Goal | null
{
  if (x - radius < ARENA_LEFT)
  {
    return { x: ARENA_LEFT + radius, dx: -dx, scorer: 2 };
  }
  if (x + radius > ARENA_RIGHT)
  {
    return { x: ARENA_RIGHT - radius, dx: -dx, scorer: 1 };
  }
  return null;
}

/* ═══════════════════════════════════════════════════════════════════════════
   AI PREDICTION
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function timeToReach
 * @description Ticks until the ball reaches `targetX` at its current
 *              horizontal speed.  Zero when dx is zero.
 */
export function timeToReach(ballX: number, targetX: number, dx: number): number
{
  if (dx === 0) return 0;
  return (targetX - ballX) / dx;
}

/**
 * @function foldIntoRange
 * @description Reflects `y` about the arena's top and bottom until it lies in
 *              [ARENA_BOTTOM, ARENA_TOP], mirroring the wall bounces the ball
 *              will make on the way.
 */
export function foldIntoRange(y: number): number
{
  if (!Number.isFinite(y)) return 0;

  /* One full bounce cycle (down, then back up) spans twice the arena height. */
  const height = ARENA_TOP - ARENA_BOTTOM;
  const period = 2 * height;
  const phase  = (((y - ARENA_BOTTOM) % period) + period) % period;

  return ARENA_BOTTOM + (phase <= height ? phase : period - phase);
}

/**
 * @function predictInterceptY
 * @description Where the ball will cross `targetX`, folded back into the
 *              arena.  No randomness; the AI adds its own error on top.
 */
export function predictInterceptY(ball: Readonly<Vec2>, direction: Readonly<Vec2>, targetX: number): number
{
  const t = timeToReach(ball.x, targetX, direction.x);
  return foldIntoRange(ball.y + direction.y * t);
}
