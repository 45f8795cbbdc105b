/**
 * @file types.ts
 * @description Shared TypeScript interfaces, unions and aliases for Rally Pong.
 *
 * Every value that crosses a controller boundary has its shape defined here.
 *
 * COORDINATE SYSTEM
 * -----------------
 *   The arena spans [-1, +1] on both axes with (0, 0) at the centre.
 *   X increases to the right, Y increases UPWARD.
 *   Velocities are in arena units per tick.
 */

/* ═══════════════════════════════════════════════════════════════════════════
   GEOMETRY
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface Vec2
 * @description A 2D point or vector.  Used for positions (arena units) and
 *              for the ball direction (arena units per tick).
 */
export interface Vec2
{
  x: number;
  y: number;
}

/**
 * @interface MovableEntity
 * @description Opaque handle to something the front end draws.
 *
 * The core only ever reads and writes the simulated coordinates through this
 * capability; it never creates, owns or inspects the visual object behind it.
 * Implementations may carry a z component, which the core never reads.
 */
export interface MovableEntity
{
  getPosition(): Readonly<Vec2>;
  setPosition(x: number, y: number): void;
}

/* ═══════════════════════════════════════════════════════════════════════════
   SIDES, PLAYERS, WALLS
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @typedef PaddleSide
 * @description Which paddle.  The left paddle belongs to player 1 and the
 *              right paddle to player 2 (the AI side when AI mode is on).
 */
export type PaddleSide = 'LEFT' | 'RIGHT';

/** 1 = left player, 2 = right player. */
export type PlayerId = 1 | 2;

/** Top or bottom arena wall. */
export type Wall = 'TOP' | 'BOTTOM';

/* ═══════════════════════════════════════════════════════════════════════════
   AI DIFFICULTY
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @typedef Difficulty
 * @description AI skill level.  Exactly one is active at a time.
 */
export type Difficulty = 'EASY' | 'MEDIUM' | 'HARD';

/**
 * @interface AIProfile
 * @description Tuning values for one difficulty level.  Profiles are frozen
 *              and never mutated; switching difficulty swaps the reference.
 */
export interface AIProfile
{
  /** Ticks between AI decisions.  Lower = more responsive. */
  readonly reactionDelay: number;

  /** Maximum paddle travel per decision (arena units). */
  readonly speed: number;

  /** Probability in [0, 1] that a decision actually moves the paddle. */
  readonly accuracy: number;

  /** Half-width of the uniform random error added to the predicted Y. */
  readonly predictionError: number;
}

/* ═══════════════════════════════════════════════════════════════════════════
   SCORING
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @typedef MatchPhase
 * @description ScoreManager state.  GAME_OVER is terminal until reset().
 */
export type MatchPhase = 'PLAYING' | 'GAME_OVER';

/** [player 1 score, player 2 score]. */
export type ScorePair = readonly [number, number];

/* ═══════════════════════════════════════════════════════════════════════════
   NOTIFICATIONS
   Optional observer hooks for cosmetic collaborators (sound, flashes,
   particles).  Hooks are told what happened; they never feed back into the
   simulation.
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface GameHooks
 * @description Callbacks the core invokes as events happen.  Every hook is
 *              optional; controllers accept a Partial<GameHooks>.
 */
export interface GameHooks
{
  /** The ball bounced off a paddle. */
  onPaddleHit(side: PaddleSide): void;

  /** A point was awarded to `player`. */
  onScore(player: PlayerId): void;

  /** The ball bounced off the top or bottom wall. */
  onWallHit(wall: Wall): void;

  /** A player reached the win score.  Fires once per match. */
  onGameOver(winner: PlayerId): void;
}

/* ═══════════════════════════════════════════════════════════════════════════
   INPUT
   The driver turns timer ticks and key presses into plain data messages and
   hands them to Game.handle().  Keys are resolved to actions by keymap.ts.
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @typedef InputEvent
 * @description One message from the driver: a timer tick or a key press.
 *              `key` is a lower-case key name such as 'w', 'up' or 'space'.
 */
export type InputEvent =
  | { readonly type: 'tick' }
  | { readonly type: 'key'; readonly key: string };

/**
 * @typedef GameAction
 * @description Abstract intents the orchestrator understands.
 */
export type GameAction =
  | { readonly type: 'paddle_up';   readonly side: PaddleSide }
  | { readonly type: 'paddle_down'; readonly side: PaddleSide }
  | { readonly type: 'toggle_pause' }
  | { readonly type: 'reset' }
  | { readonly type: 'toggle_ai' }
  | { readonly type: 'cycle_difficulty' };

/* ═══════════════════════════════════════════════════════════════════════════
   SNAPSHOT
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface GameSnapshot
 * @description Read-only view of a fully resolved tick, handed to the
 *              renderer.  Taken after ball and AI updates have both finished.
 */
export interface GameSnapshot
{
  ball:         Vec2;
  leftPaddle:   Vec2;
  rightPaddle:  Vec2;
  scores:       ScorePair;
  gameOver:     boolean;
  winner:       PlayerId | null;
  paused:       boolean;
  aiEnabled:    boolean;
  difficulty:   Difficulty;
  rallyCount:   number;
  longestRally: number;
  ballSpeed:    number;
}
