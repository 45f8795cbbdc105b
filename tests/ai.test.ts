/**
 * @file ai.test.ts
 * @description Unit tests for the AIController class in ai.ts.
 *
 * STRATEGY
 * --------
 * Math.random is pinned with vi.spyOn so the prediction error and the
 * accuracy roll are known.  With random() = 0 the error is the full
 * negative predictionError and every accuracy roll succeeds.
 *
 * ORGANISATION
 * ------------
 *   1. profiles      : the difficulty table
 *   2. reaction delay: throttling by frame counter
 *   3. tracking      : prediction, accuracy and clamping
 *   4. recentring    : drift when the ball heads away
 *   5. setDifficulty / reset
 */

import { describe, test, expect, vi, afterEach } from 'vitest';
import { AIController, AI_PROFILES } from '../src/ai.js';
import { PointEntity } from '../src/entity.js';
import { makePaddles } from './helpers.js';
import type { Difficulty, PaddleSide } from '../src/types.js';

afterEach(() =>
{
  vi.restoreAllMocks();
});

interface AIRigOptions
{
  ballX?:   number;
  ballY?:   number;
  paddleY?: number;
  side?:    PaddleSide;
}

function makeAI(
  difficulty: Difficulty = 'MEDIUM',
  { ballX = 0, ballY = 0, paddleY = 0, side = 'RIGHT' }: AIRigOptions = {},
)
{
  const rig = side === 'RIGHT' ? makePaddles(0, paddleY) : makePaddles(paddleY, 0);
  const ball = new PointEntity(ballX, ballY);
  const ai = new AIController(rig.paddles, ball, difficulty, side);
  return { ...rig, ball, ai };
}

/* ═══════════════════════════════════════════════════════════════════════════
   1. Profiles
   ═══════════════════════════════════════════════════════════════════════════ */

describe('AI_PROFILES', () =>
{
  test('EASY', () =>
  {
    expect(AI_PROFILES.EASY).toEqual({ reactionDelay: 15, speed: 0.03, accuracy: 0.7, predictionError: 0.15 });
  });

  test('MEDIUM', () =>
  {
    expect(AI_PROFILES.MEDIUM).toEqual({ reactionDelay: 8, speed: 0.05, accuracy: 0.85, predictionError: 0.08 });
  });

  test('HARD', () =>
  {
    expect(AI_PROFILES.HARD).toEqual({ reactionDelay: 3, speed: 0.08, accuracy: 0.95, predictionError: 0.03 });
  });

  test('no profile reacts faster than every third tick', () =>
  {
    for (const profile of Object.values(AI_PROFILES))
    {
      expect(profile.reactionDelay).toBeGreaterThanOrEqual(3);
    }
  });

  test('profiles are frozen', () =>
  {
    expect(Object.isFrozen(AI_PROFILES)).toBe(true);
    expect(Object.isFrozen(AI_PROFILES.MEDIUM)).toBe(true);
  });

  test('defaults to MEDIUM on the right paddle', () =>
  {
    const { paddles } = makePaddles();
    const ai = new AIController(paddles, new PointEntity());
    expect(ai.difficulty).toBe('MEDIUM');
    expect(ai.profile).toBe(AI_PROFILES.MEDIUM);
    expect(ai.paddleSide).toBe('RIGHT');
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   2. Reaction delay
   ═══════════════════════════════════════════════════════════════════════════ */

describe('AIController.update: reaction delay', () =>
{
  test('MEDIUM (delay 8): seven updates do nothing, the eighth moves', () =>
  {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    const { ai, paddles } = makeAI('MEDIUM');

    for (let i = 0; i < 7; i++)
    {
      ai.update({ x: 0.01, y: 0.01 });
      expect(paddles.position('RIGHT').y).toBe(0);
    }

    ai.update({ x: 0.01, y: 0.01 });
    expect(paddles.position('RIGHT').y).toBeCloseTo(0.05, 12);
  });

  test('HARD (delay 3) reacts on the third update', () =>
  {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    const { ai, paddles } = makeAI('HARD');

    ai.update({ x: 0.01, y: 0.01 });
    ai.update({ x: 0.01, y: 0.01 });
    expect(paddles.position('RIGHT').y).toBe(0);

    ai.update({ x: 0.01, y: 0.01 });
    expect(paddles.position('RIGHT').y).toBeCloseTo(0.08, 12);
  });

  test('reacts again every reactionDelay updates', () =>
  {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    const { ai, paddles } = makeAI('HARD');

    for (let i = 0; i < 6; i++) ai.update({ x: 0.01, y: 0.01 });
    expect(paddles.position('RIGHT').y).toBeCloseTo(0.16, 12);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   3. Tracking
   ═══════════════════════════════════════════════════════════════════════════ */

describe('AIController.update: tracking', () =>
{
  test('target is the folded intercept plus the random error', () =>
  {
    /* intercept at x = 0.9 is y = 0.9; error = (0 - 0.5)·2·0.08 = -0.08 */
    vi.spyOn(Math, 'random').mockReturnValue(0);
    const { ai } = makeAI('MEDIUM');
    for (let i = 0; i < 8; i++) ai.update({ x: 0.01, y: 0.01 });
    expect(ai.targetY).toBeCloseTo(0.82, 9);
  });

  test('a failed accuracy roll leaves the paddle still', () =>
  {
    /* random = 0.99: error = +0.0784, and 0.99 ≥ 0.85 fails the roll */
    vi.spyOn(Math, 'random').mockReturnValue(0.99);
    const { ai, paddles } = makeAI('MEDIUM');
    for (let i = 0; i < 8; i++) ai.update({ x: 0.01, y: 0.01 });
    expect(ai.targetY).toBeCloseTo(0.9784, 9);
    expect(paddles.position('RIGHT').y).toBe(0);
  });

  test('steps land exactly on a target within reach', () =>
  {
    /* ball level at y = 0.5 → target 0.5 - 0.03 = 0.47; paddle at 0.45 */
    vi.spyOn(Math, 'random').mockReturnValue(0);
    const { ai, paddles } = makeAI('HARD', { ballY: 0.5, paddleY: 0.45 });
    for (let i = 0; i < 3; i++) ai.update({ x: 0.01, y: 0 });
    expect(paddles.position('RIGHT').y).toBeCloseTo(0.47, 12);
  });

  test('AI moves are clamped like human moves', () =>
  {
    /* target 0.95 - 0.03 = 0.92; 0.78 + 0.08 = 0.86 → clamped to 0.8 */
    vi.spyOn(Math, 'random').mockReturnValue(0);
    const { ai, paddles } = makeAI('HARD', { ballX: 0.5, ballY: 0.95, paddleY: 0.78 });
    for (let i = 0; i < 3; i++) ai.update({ x: 0.01, y: 0 });
    expect(paddles.position('RIGHT').y).toBeCloseTo(0.8, 12);
  });

  test('a left-side AI tracks balls moving left and leaves the right paddle alone', () =>
  {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    const { ai, paddles } = makeAI('MEDIUM', { side: 'LEFT' });
    for (let i = 0; i < 8; i++) ai.update({ x: -0.01, y: 0.01 });
    expect(paddles.position('LEFT').y).toBeCloseTo(0.05, 12);
    expect(paddles.position('RIGHT').y).toBe(0);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   4. Recentring
   ═══════════════════════════════════════════════════════════════════════════ */

describe('AIController.update: recentring', () =>
{
  test('ball heading away: drift toward centre at half speed', () =>
  {
    const { ai, paddles } = makeAI('MEDIUM', { paddleY: 0.3 });
    for (let i = 0; i < 8; i++) ai.update({ x: -0.01, y: 0 });
    expect(paddles.position('RIGHT').y).toBeCloseTo(0.275, 12);
  });

  test('drift from below moves up', () =>
  {
    const { ai, paddles } = makeAI('HARD', { paddleY: -0.3 });
    for (let i = 0; i < 3; i++) ai.update({ x: -0.01, y: 0 });
    expect(paddles.position('RIGHT').y).toBeCloseTo(-0.26, 12);
  });

  test('drift stops exactly at centre', () =>
  {
    const { ai, paddles } = makeAI('HARD', { paddleY: 0.01 });
    for (let i = 0; i < 3; i++) ai.update({ x: -0.01, y: 0 });
    expect(paddles.position('RIGHT').y).toBe(0);
  });

  test('a stationary ball counts as heading away', () =>
  {
    const { ai, paddles } = makeAI('HARD', { paddleY: 0.3 });
    for (let i = 0; i < 3; i++) ai.update({ x: 0, y: 0.01 });
    expect(paddles.position('RIGHT').y).toBeCloseTo(0.26, 12);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   5. setDifficulty / reset
   ═══════════════════════════════════════════════════════════════════════════ */

describe('AIController.setDifficulty', () =>
{
  test('swaps the profile', () =>
  {
    const { ai } = makeAI('EASY');
    ai.setDifficulty('HARD');
    expect(ai.difficulty).toBe('HARD');
    expect(ai.profile).toBe(AI_PROFILES.HARD);
  });

  test('restarts the frame counter so the new delay applies from the next update', () =>
  {
    const { ai, paddles } = makeAI('MEDIUM', { paddleY: 0.3 });
    for (let i = 0; i < 5; i++) ai.update({ x: -0.01, y: 0 });

    ai.setDifficulty('HARD');
    ai.update({ x: -0.01, y: 0 });
    ai.update({ x: -0.01, y: 0 });
    expect(paddles.position('RIGHT').y).toBe(0.3);

    ai.update({ x: -0.01, y: 0 });
    expect(paddles.position('RIGHT').y).toBeCloseTo(0.26, 12);
  });

  test('discards the last prediction', () =>
  {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    const { ai } = makeAI('HARD');
    for (let i = 0; i < 3; i++) ai.update({ x: 0.01, y: 0.01 });
    expect(ai.targetY).not.toBe(0);

    ai.setDifficulty('EASY');
    expect(ai.targetY).toBe(0);
  });
});

describe('AIController.reset', () =>
{
  test('clears the frame counter and keeps the difficulty', () =>
  {
    const { ai, paddles } = makeAI('HARD', { paddleY: 0.3 });
    ai.update({ x: -0.01, y: 0 });
    ai.update({ x: -0.01, y: 0 });
    ai.reset();
    ai.update({ x: -0.01, y: 0 });
    expect(paddles.position('RIGHT').y).toBe(0.3);
    expect(ai.difficulty).toBe('HARD');
  });
});
