/**
 * @file constants.ts
 * @description Single source of truth for every fixed geometric and tuning
 *              value in Rally Pong.
 *
 * Values that a player may reasonably want to change (ball radius, paddle
 * length, speed-up cadence, win score...) also appear as defaults in
 * config.ts.  Everything here is arena geometry or a game-design constant
 * that the config file does not expose.
 *
 * UNITS
 * -----
 *   - Distances / positions are in arena units; the arena is 2 x 2.
 *   - Velocities are in arena units per tick.
 *   - Durations are in ticks unless the name ends in `_MS`.
 *   - Angles are in degrees unless the name ends in `_RAD`.
 */

/* ═══════════════════════════════════════════════════════════════════════════
   ARENA
   The play field is the square [-1, +1] x [-1, +1].  Paddles sit on fixed
   vertical lines just inside the left and right walls.
   ═══════════════════════════════════════════════════════════════════════════ */

export const ARENA_TOP    =  1.0;
export const ARENA_BOTTOM = -1.0;
export const ARENA_LEFT   = -1.0;
export const ARENA_RIGHT  =  1.0;

/** |X| of the line each paddle sits on. */
export const PADDLE_X = 0.9;

/**
 * |X| of the paddle face the ball strikes.  The strip between PADDLE_FACE_X
 * and PADDLE_X is the collision band: a ball whose leading edge lands in it
 * while travelling toward the paddle is a candidate for a bounce.
 */
export const PADDLE_FACE_X = 0.89;

/** Width of the collision band (0.01). */
export const PADDLE_BAND_WIDTH = PADDLE_X - PADDLE_FACE_X;

/* ═══════════════════════════════════════════════════════════════════════════
   BALL
   ═══════════════════════════════════════════════════════════════════════════ */

/** Default ball radius (arena units). */
export const BALL_RADIUS = 0.02;

/**
 * Magnitude of each component of the opening direction.  A fresh ball
 * moves 0.01 units per tick horizontally; a reset serve keeps |dx| = 0.01
 * and picks dy in [-0.01, 0.01], so the serve angle never exceeds 45°.
 */
export const BALL_SERVE_COMPONENT = 0.01;

/** Cap on the speed carried out of a paddle bounce (units/tick). */
export const BALL_MAX_SPEED = 0.05;

/**
 * Largest angle off the horizontal the ball can leave a paddle at.
 * A dead-centre hit returns flat; an edge hit returns at this angle.
 */
export const BALL_MAX_BOUNCE_ANGLE_DEG = 60;

/** Collision sub-steps per tick.  Keeps fast balls from skipping the band. */
export const SUB_STEPS = 10;

/** Ticks between automatic speed-ups. */
export const SPEED_INCREASE_INTERVAL = 500;

/** Factor applied to the direction on each speed-up. */
export const SPEED_MULTIPLIER = 1.1;

/* ═══════════════════════════════════════════════════════════════════════════
   PADDLES
   ═══════════════════════════════════════════════════════════════════════════ */

/** Default paddle length along Y (arena units).  Half of it is the half-height. */
export const PADDLE_LENGTH = 0.4;

/** Default paddle thickness along X.  Only the renderer uses it. */
export const PADDLE_THICKNESS = 0.02;

/** How far one human key press moves a paddle. */
export const PADDLE_MOVE_SPEED = 0.1;

/* ═══════════════════════════════════════════════════════════════════════════
   MATCH
   ═══════════════════════════════════════════════════════════════════════════ */

/** Points needed to win a match. */
export const WIN_SCORE = 11;

/** Default real-time period between ticks in the terminal driver. */
export const TICK_INTERVAL_MS = 10;

/** Terminal redraw period (~30 fps). */
export const FRAME_INTERVAL_MS = 33;

/* ═══════════════════════════════════════════════════════════════════════════
   AI DIFFICULTY
   Three tiers.  Reaction delay is in ticks; no tier reacts faster than
   every third tick.
   ═══════════════════════════════════════════════════════════════════════════ */

/* ── Easy: slow, late, and often wrong ── */
export const AI_EASY_REACTION_DELAY   = 15;
export const AI_EASY_SPEED            = 0.03;
export const AI_EASY_ACCURACY         = 0.7;
export const AI_EASY_PREDICTION_ERROR = 0.15;

/* ── Medium ── */
export const AI_REACTION_DELAY        = 8;
export const AI_SPEED                 = 0.05;
export const AI_ACCURACY              = 0.85;
export const AI_PREDICTION_ERROR      = 0.08;

/* ── Hard: quick and tight, still beatable on steep edge returns ── */
export const AI_HARD_REACTION_DELAY   = 3;
export const AI_HARD_SPEED            = 0.08;
export const AI_HARD_ACCURACY         = 0.95;
export const AI_HARD_PREDICTION_ERROR = 0.03;

/** Fraction of profile speed used when drifting back to centre. */
export const AI_CENTER_DRIFT_FACTOR = 0.5;

/** Order the difficulty-cycle key steps through. */
export const DIFFICULTY_CYCLE = ['EASY', 'MEDIUM', 'HARD'] as const;
