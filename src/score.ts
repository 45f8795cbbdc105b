/**
 * @file score.ts
 * @description ScoreManager: score counters, win threshold and match state.
 *
 * STATE MACHINE
 * -------------
 *     PLAYING ──(a counter reaches winScore)──▶ GAME_OVER
 *        ▲                                         │
 *        └──────────────── reset() ────────────────┘
 *
 * While GAME_OVER the counters are frozen: scorePoint() is a no-op, so the
 * game-over hook can only ever fire once per match.  On the winning point
 * onScore fires before onGameOver.
 */

import type { GameHooks, MatchPhase, PlayerId, ScorePair } from './types.js';
import { WIN_SCORE } from './constants.js';
import { createLogger } from './logger.js';

const log = createLogger('score');

/**
 * @class ScoreManager
 * @description Sole owner of both counters and of the game-over flag.
 */
export class ScoreManager
{
  private score: [number, number] = [0, 0];
  private phase: MatchPhase = 'PLAYING';
  private winner: PlayerId | null = null;
  private threshold: number;
  private readonly hooks: Partial<GameHooks>;

  /**
   * @param winScore  Points needed to win.  Non-positive or non-integer values
   *                  fall back to WIN_SCORE.
   * @param hooks     Optional observers; onScore and onGameOver are used here.
   */
  constructor(winScore: number = WIN_SCORE, hooks: Partial<GameHooks> = {})
  {
    if (!Number.isInteger(winScore) || winScore < 1)
    {
      log.warn({ winScore, fallback: WIN_SCORE }, 'invalid win score, using default');
      winScore = WIN_SCORE;
    }

    this.threshold = winScore;
    this.hooks     = hooks;
  }

  /* ── Queries ─────────────────────────────────────────────────────────── */

  get scores(): ScorePair
  {
    return [this.score[0], this.score[1]];
  }

  get state(): MatchPhase
  {
    return this.phase;
  }

  get isGameOver(): boolean
  {
    return this.phase === 'GAME_OVER';
  }

  get winScore(): number
  {
    return this.threshold;
  }

  /**
   * @method getWinner
   * @description The player who ended the match, or null while PLAYING.
   */
  getWinner(): PlayerId | null
  {
    return this.winner;
  }

  /* ── Transitions ─────────────────────────────────────────────────────── */

  /**
   * @method scorePoint
   * @description Awards one point.  Ignored once the match is over.
   * @returns true when the point was awarded.
   */
  scorePoint(player: PlayerId): boolean
  {
    if (this.phase === 'GAME_OVER') return false;

    this.score[player - 1] += 1;
    log.info({ player, score: this.score }, 'point scored');
    this.hooks.onScore?.(player);

    if (this.score[player - 1] >= this.threshold)
    {
      this.phase  = 'GAME_OVER';
      this.winner = player;
      log.info({ winner: player, score: this.score }, 'match over');
      this.hooks.onGameOver?.(player);
    }
    return true;
  }

  /**
   * @method reset
   * @description Zeroes both counters and returns to PLAYING.
   */
  reset(): void
  {
    this.score  = [0, 0];
    this.phase  = 'PLAYING';
    this.winner = null;
    log.info('scores reset to 0-0');
  }

  /**
   * @method setWinScore
   * @description Changes the threshold for the current match.  Values below 1
   *              are raised to 1, fractions are floored and non-finite values
   *              fall back to WIN_SCORE.  Does not end a match retroactively.
   */
  setWinScore(winScore: number): void
  {
    if (!Number.isFinite(winScore))
    {
      log.warn({ winScore, fallback: WIN_SCORE }, 'invalid win score, using default');
      winScore = WIN_SCORE;
    }

    this.threshold = Math.max(1, Math.floor(winScore));
    log.info({ winScore: this.threshold }, 'win score set');
  }
}
