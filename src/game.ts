// Game orchestration: input dispatch, tick ordering, pause and reset

import type {
  Difficulty, GameAction, GameHooks, GameSnapshot, InputEvent, MovableEntity, PaddleSide,
} from './types.js';
import { PADDLE_X, DIFFICULTY_CYCLE } from './constants.js';
import { DEFAULT_CONFIG } from './config.js';
import type { GameConfig } from './config.js';
import { PointEntity } from './entity.js';
import { PaddleController } from './paddle.js';
import { ScoreManager } from './score.js';
import { BallController } from './ball.js';
import { AIController } from './ai.js';
import { resolveKey } from './keymap.js';
import { createLogger } from './logger.js';

const log = createLogger('game');

/** Entity handles the game drives.  Built as PointEntities when omitted. */
export interface GameEntities {
  ball: MovableEntity;
  leftPaddle: MovableEntity;
  rightPaddle: MovableEntity;
}

export interface GameOptions {
  config?: GameConfig;
  hooks?: Partial<GameHooks>;
  entities?: GameEntities;
  /** Paddle the AI drives when AI mode is on. */
  aiSide?: PaddleSide;
}

function makeEntities(): GameEntities {
  return {
    ball: new PointEntity(0, 0),
    leftPaddle: new PointEntity(-PADDLE_X, 0),
    rightPaddle: new PointEntity(PADDLE_X, 0),
  };
}

function nextDifficulty(current: Difficulty): Difficulty {
  const idx = DIFFICULTY_CYCLE.indexOf(current);
  return DIFFICULTY_CYCLE[(idx + 1) % DIFFICULTY_CYCLE.length];
}

export class Game {
  readonly paddles: PaddleController;
  readonly score: ScoreManager;
  readonly ball: BallController;
  readonly ai: AIController;

  private readonly entities: GameEntities;
  private readonly moveSpeed: number;
  private readonly aiSide: PaddleSide;

  private paused = false;
  private aiEnabled: boolean;

  // False until a tick or paddle move changes match state
  private dirty = false;

  constructor(options: GameOptions = {}) {
    const config = options.config ?? DEFAULT_CONFIG;
    const hooks = options.hooks ?? {};

    this.entities = options.entities ?? makeEntities();
    this.moveSpeed = config.paddle.moveSpeed;
    this.aiSide = options.aiSide ?? 'RIGHT';
    this.aiEnabled = config.game.aiEnabled;

    this.paddles = new PaddleController(
      this.entities.leftPaddle, this.entities.rightPaddle, config.paddle.yLength,
    );
    this.score = new ScoreManager(config.game.winScore, hooks);
    this.ball = new BallController(this.entities.ball, this.paddles, this.score, {
      radius: config.ball.radius,
      maxSpeed: config.ball.maxSpeed,
      subSteps: config.game.subSteps,
      speedIncreaseInterval: config.game.speedIncreaseInterval,
      speedMultiplier: config.game.speedMultiplier,
      hooks,
    });
    this.ai = new AIController(
      this.paddles, this.entities.ball, config.game.defaultDifficulty, this.aiSide,
    );

    log.info({ aiEnabled: this.aiEnabled, difficulty: this.ai.difficulty }, 'game created');
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get isAiEnabled(): boolean {
    return this.aiEnabled;
  }

  get isGameOver(): boolean {
    return this.score.isGameOver;
  }

  // ── Input ─────────────────────────────────────────────────────────────

  handle(event: InputEvent): void {
    if (event.type === 'tick') {
      this.tick();
      return;
    }

    const action = resolveKey(event.key);
    if (!action) {
      log.trace({ key: event.key }, 'unmapped key ignored');
      return;
    }
    log.debug({ key: event.key, action: action.type }, 'key');
    this.perform(action);
  }

  perform(action: GameAction): void {
    switch (action.type) {
      case 'paddle_up':
        this.movePaddle(action.side, this.moveSpeed);
        break;
      case 'paddle_down':
        this.movePaddle(action.side, -this.moveSpeed);
        break;
      case 'toggle_pause':
        this.togglePause();
        break;
      case 'reset':
        this.reset();
        break;
      case 'toggle_ai':
        this.setAiEnabled(!this.aiEnabled);
        break;
      case 'cycle_difficulty':
        this.setDifficulty(nextDifficulty(this.ai.difficulty));
        break;
    }
  }

  // ── Loop ──────────────────────────────────────────────────────────────

  // Ball first (including any score it causes), then the AI reads the
  // resolved direction.
  tick(): void {
    if (this.paused || this.score.isGameOver) return;

    this.dirty = true;
    this.ball.tick();

    if (this.aiEnabled) {
      this.ai.update(this.ball.direction);
    }
  }

  // ── Actions ───────────────────────────────────────────────────────────

  togglePause(): void {
    if (this.score.isGameOver) return;

    this.paused = !this.paused;
    log.info({ paused: this.paused }, this.paused ? 'game paused' : 'game resumed');
  }

  reset(): void {
    // Untouched match: only the pause flag can differ from the initial state
    if (!this.dirty) {
      this.paused = false;
      log.debug('reset ignored, game already in initial state');
      return;
    }

    this.ball.reset();
    this.paddles.resetPositions();
    this.score.reset();
    this.ai.reset();
    this.paused = false;
    this.dirty = false;

    log.info('game reset');
  }

  setAiEnabled(enabled: boolean): void {
    this.aiEnabled = enabled;
    log.info({ aiEnabled: enabled }, enabled ? 'AI mode on' : 'two-player mode on');
  }

  setDifficulty(difficulty: Difficulty): void {
    this.ai.setDifficulty(difficulty);
  }

  snapshot(): GameSnapshot {
    return {
      ball: this.ball.position,
      leftPaddle: this.paddles.position('LEFT'),
      rightPaddle: this.paddles.position('RIGHT'),
      scores: this.score.scores,
      gameOver: this.score.isGameOver,
      winner: this.score.getWinner(),
      paused: this.paused,
      aiEnabled: this.aiEnabled,
      difficulty: this.ai.difficulty,
      rallyCount: this.ball.rallyCount,
      longestRally: this.ball.longestRally,
      ballSpeed: this.ball.speed,
    };
  }

  private movePaddle(side: PaddleSide, deltaY: number): void {
    if (this.paused || this.score.isGameOver) return;
    if (this.aiEnabled && side === this.aiSide) return;

    this.paddles.move(side, deltaY);
    this.dirty = true;
  }
}
