/**
 * @file index.ts
 * @description Public API of the simulation core, for embedding Rally Pong
 *              behind a different front end.
 */

export type {
  Vec2, MovableEntity, PaddleSide, PlayerId, Wall, Difficulty, AIProfile,
  MatchPhase, ScorePair, GameHooks, InputEvent, GameAction, GameSnapshot,
} from './types.js';

export * from './constants.js';
export { PointEntity } from './entity.js';
export { PaddleController } from './paddle.js';
export { ScoreManager } from './score.js';
export { BallController } from './ball.js';
export type { BallOptions } from './ball.js';
export { AIController, AI_PROFILES } from './ai.js';
export {
  magnitude, isInPaddleBand, pushOutOfPaddle, bounceDirection,
  resolveWallBounce, resolveGoal, timeToReach, foldIntoRange, predictInterceptY,
} from './physics.js';
export type { PaddleContact, WallBounce, Goal } from './physics.js';
export { Game } from './game.js';
export type { GameOptions, GameEntities } from './game.js';
export { KEY_BINDINGS, resolveKey } from './keymap.js';
export { MainMenu, MENU_OPTIONS, MENU_SINGLE_PLAYER, MENU_TWO_PLAYER } from './menu.js';
export {
  GameConfigSchema, DEFAULT_CONFIG, resolveConfig, loadConfig, createDefaultConfig,
} from './config.js';
export type { GameConfig } from './config.js';
export { renderFrame, renderMenu, DEFAULT_RENDER_OPTIONS } from './renderer.js';
export type { RenderOptions } from './renderer.js';
export { logger, createLogger } from './logger.js';
