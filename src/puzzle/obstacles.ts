import type { PuzzleBoard } from './board.ts';
import { compareCoords, coordKey, orthogonalNeighbors } from './coords.ts';
import type { DuplicateSpawnPolicy } from './config.ts';
import type { GridCoord, Obstacle, ObstacleKind, TimedObstacle } from './types.ts';
import { getEligibleSpawnRules } from '../data/obstaclePolicy.ts';
import { pickByChance, randomIndex, type RandomSource } from '../lib/random.ts';

export type ObstacleClearCause = 'direct' | 'adjacent' | 'reset';

export type ObstacleLifecycleEvent =
  | {
      readonly phase: 'spawned';
      readonly cell: GridCoord;
      readonly kind: ObstacleKind;
      readonly remainingTicks?: number;
      readonly replaced?: ObstacleKind;
    }
  | {
      readonly phase: 'ticking';
      readonly cell: GridCoord;
      readonly kind: 'timed';
      readonly remainingTicks: number;
    }
  | {
      readonly phase: 'clearing';
      readonly cell: GridCoord;
      readonly kind: ObstacleKind;
      readonly cause: ObstacleClearCause;
    }
  | {
      readonly phase: 'exploding';
      readonly cell: GridCoord;
      readonly kind: 'timed';
      readonly damage: number;
    };

export type ObstaclePhase = ObstacleLifecycleEvent['phase'];

export interface ObstacleLifecycleOptions {
  readonly timedCountdown: number;
  readonly timedTickIntervalMs: number;
  readonly explosionDamage: number;
  readonly duplicateSpawnPolicy: DuplicateSpawnPolicy;
}

interface ClearTarget {
  readonly cell: GridCoord;
  readonly cause: ObstacleClearCause;
}

/**
 * Spawns, counts down and clears obstacles on a {@link PuzzleBoard}.
 * Every operation mutates the board synchronously and returns the lifecycle
 * events it produced, in board order.
 */
export class ObstacleLifecycle {
  constructor(private readonly options: ObstacleLifecycleOptions) {}

  createObstacle(kind: ObstacleKind): Obstacle {
    if (kind === 'blocking') {
      return { kind: 'blocking' };
    }
    return {
      kind: 'timed',
      remainingTicks: this.options.timedCountdown,
      tickIntervalMs: this.options.timedTickIntervalMs,
      elapsedMs: 0
    } satisfies TimedObstacle;
  }

  /**
   * Rolls one qualifying attack. A single chance draw picks at most one
   * eligible kind, each with its own table rate; a hit then draws a cell
   * index and spawns there.
   */
  rollSpawn(board: PuzzleBoard, wave: number, random: RandomSource): ObstacleLifecycleEvent[] {
    const rules = getEligibleSpawnRules(wave);
    if (rules.length === 0) {
      return [];
    }
    const rule = pickByChance(random, rules);
    if (!rule) {
      return [];
    }
    const index = randomIndex(random, board.size * board.size);
    const cell = { x: index % board.size, y: Math.floor(index / board.size) };
    return this.spawn(board, cell, rule.kind);
  }

  /**
   * Places an obstacle. With the `overwrite` policy an existing obstacle is
   * replaced and a Timed countdown restarts; with `reject` an occupied cell is
   * left alone and nothing is emitted.
   */
  spawn(board: PuzzleBoard, cell: GridCoord, kind: ObstacleKind): ObstacleLifecycleEvent[] {
    const existing = board.getObstacle(cell.x, cell.y);
    if (existing && this.options.duplicateSpawnPolicy === 'reject') {
      return [];
    }
    const obstacle = this.createObstacle(kind);
    board.setObstacle(cell.x, cell.y, obstacle);
    return [
      {
        phase: 'spawned',
        cell,
        kind,
        ...(obstacle.kind === 'timed' ? { remainingTicks: obstacle.remainingTicks } : {}),
        ...(existing ? { replaced: existing.kind } : {})
      }
    ];
  }

  /**
   * Clears obstacles on matched cells and on their orthogonal neighbours as
   * one set, so a cell is cleared at most once per pass. A cell that is both
   * matched and next to another match counts as `direct`.
   */
  applyClearance(board: PuzzleBoard, matched: readonly GridCoord[]): ObstacleLifecycleEvent[] {
    const targets = new Map<string, ClearTarget>();
    for (const cell of matched) {
      targets.set(coordKey(cell), { cell, cause: 'direct' });
    }
    for (const cell of matched) {
      for (const neighbor of orthogonalNeighbors(cell, board.size)) {
        const key = coordKey(neighbor);
        if (!targets.has(key)) {
          targets.set(key, { cell: neighbor, cause: 'adjacent' });
        }
      }
    }

    const events: ObstacleLifecycleEvent[] = [];
    const ordered = Array.from(targets.values()).sort((a, b) => compareCoords(a.cell, b.cell));
    for (const target of ordered) {
      const removed = board.clearObstacle(target.cell.x, target.cell.y);
      if (removed) {
        events.push({ phase: 'clearing', cell: target.cell, kind: removed.kind, cause: target.cause });
      }
    }
    return events;
  }

  /**
   * Advances every Timed obstacle's own clock. Each interval boundary
   * decrements a positive countdown; a boundary reached at zero explodes the
   * obstacle and removes it, so the count never drops below zero.
   */
  advanceCountdowns(board: PuzzleBoard, deltaMs: number): ObstacleLifecycleEvent[] {
    if (!Number.isFinite(deltaMs) || deltaMs <= 0) {
      return [];
    }
    const events: ObstacleLifecycleEvent[] = [];
    for (const { cell, obstacle } of board.obstacleEntries()) {
      if (obstacle.kind !== 'timed') {
        continue;
      }
      let elapsed = obstacle.elapsedMs + deltaMs;
      let remaining = obstacle.remainingTicks;
      let exploded = false;
      while (elapsed >= obstacle.tickIntervalMs) {
        elapsed -= obstacle.tickIntervalMs;
        if (remaining > 0) {
          remaining -= 1;
          events.push({ phase: 'ticking', cell, kind: 'timed', remainingTicks: remaining });
          continue;
        }
        board.clearObstacle(cell.x, cell.y);
        events.push({ phase: 'exploding', cell, kind: 'timed', damage: this.options.explosionDamage });
        exploded = true;
        break;
      }
      if (!exploded) {
        board.setObstacle(cell.x, cell.y, {
          ...obstacle,
          remainingTicks: remaining,
          elapsedMs: elapsed
        });
      }
    }
    return events;
  }
}
