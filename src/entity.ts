/**
 * @file entity.ts
 * @description In-memory MovableEntity used by the terminal front end and tests.
 *
 * A PointEntity is the simplest possible visual handle: it stores a
 * position and nothing else.  The terminal renderer reads it back each frame.
 */

import type { MovableEntity, Vec2 } from './types.js';

/**
 * @class PointEntity
 * @description Holds an (x, y, z) position.  setPosition() leaves z untouched;
 *              the core works in 2D and never reads or writes it.
 */
export class PointEntity implements MovableEntity
{
  private x: number;
  private y: number;

  /** Depth, kept for front ends that draw in 3D. */
  readonly z: number;

  constructor(x = 0, y = 0, z = 0)
  {
    this.x = x;
    this.y = y;
    this.z = z;
  }

  getPosition(): Readonly<Vec2>
  {
    return { x: this.x, y: this.y };
  }

  setPosition(x: number, y: number): void
  {
    this.x = x;
    this.y = y;
  }
}
