import { describe, expect, it } from 'vitest';
import { ObstacleLifecycle } from './obstacles.ts';
import { DEFAULT_PUZZLE_CONFIG, resolvePuzzleConfig, type PuzzleConfig } from './config.ts';
import { createPatternBoard, sequenceRandom } from '../../tests/support/boards.ts';
import { createSeededRandom } from '../lib/random.ts';

function createLifecycle(overrides: Partial<PuzzleConfig> = {}): ObstacleLifecycle {
  return new ObstacleLifecycle(resolvePuzzleConfig({ ...DEFAULT_PUZZLE_CONFIG, ...overrides }));
}

describe('ObstacleLifecycle.rollSpawn', () => {
  it('never spawns before wave 3 and draws nothing', () => {
    const board = createPatternBoard();
    let draws = 0;
    const random = () => {
      draws += 1;
      return 0;
    };

    expect(createLifecycle().rollSpawn(board, 2, random)).toEqual([]);
    expect(draws).toBe(0);
    expect(board.obstacleEntries()).toEqual([]);
  });

  it('gives Timed the first band once wave 5 is reached', () => {
    const board = createPatternBoard();
    const events = createLifecycle().rollSpawn(board, 5, sequenceRandom([0.1, 0.5]));

    expect(events).toEqual([{ phase: 'spawned', cell: { x: 0, y: 4 }, kind: 'timed', remainingTicks: 3 }]);
    expect(board.getObstacle(0, 4)).toEqual({
      kind: 'timed',
      remainingTicks: 3,
      tickIntervalMs: 1500,
      elapsedMs: 0
    });
  });

  it('gives Blocking the band after Timed', () => {
    const board = createPatternBoard();
    const events = createLifecycle().rollSpawn(board, 5, sequenceRandom([0.2, 0.25]));

    expect(events).toEqual([{ phase: 'spawned', cell: { x: 0, y: 2 }, kind: 'blocking' }]);
    expect(board.isBlockedForSwap(0, 2)).toBe(true);
  });

  it('only rolls Blocking between waves 3 and 4', () => {
    const board = createPatternBoard();
    const events = createLifecycle().rollSpawn(board, 4, sequenceRandom([0.05, 0.999]));

    expect(events).toEqual([{ phase: 'spawned', cell: { x: 7, y: 7 }, kind: 'blocking' }]);
  });

  it('spawns nothing when the draw misses every band', () => {
    const board = createPatternBoard();
    let draws = 0;
    const random = () => {
      draws += 1;
      return 0.25;
    };

    expect(createLifecycle().rollSpawn(board, 9, random)).toEqual([]);
    expect(draws).toBe(1);
    expect(board.obstacleEntries()).toEqual([]);
  });

  it('keeps each kind at its table rate from wave 5 on', () => {
    const board = createPatternBoard();
    const lifecycle = createLifecycle();
    const random = createSeededRandom(7);
    const attacks = 100_000;
    const spawned = { timed: 0, blocking: 0 };

    for (let attack = 0; attack < attacks; attack += 1) {
      for (const event of lifecycle.rollSpawn(board, 5, random)) {
        spawned[event.kind] += 1;
      }
    }

    expect(Math.abs(spawned.timed / attacks - 0.15)).toBeLessThan(0.005);
    expect(Math.abs(spawned.blocking / attacks - 0.1)).toBeLessThan(0.005);
  });
});

describe('ObstacleLifecycle.spawn', () => {
  it('overwrites an existing obstacle and restarts the countdown by default', () => {
    const board = createPatternBoard();
    const lifecycle = createLifecycle();
    lifecycle.spawn(board, { x: 2, y: 2 }, 'timed');
    lifecycle.advanceCountdowns(board, 3000);

    const events = lifecycle.spawn(board, { x: 2, y: 2 }, 'timed');

    expect(events).toEqual([
      { phase: 'spawned', cell: { x: 2, y: 2 }, kind: 'timed', remainingTicks: 3, replaced: 'timed' }
    ]);
    expect(board.getObstacle(2, 2)).toEqual({
      kind: 'timed',
      remainingTicks: 3,
      tickIntervalMs: 1500,
      elapsedMs: 0
    });
  });

  it('leaves an occupied cell alone under the reject policy', () => {
    const board = createPatternBoard();
    const lifecycle = createLifecycle({ duplicateSpawnPolicy: 'reject' });
    lifecycle.spawn(board, { x: 2, y: 2 }, 'timed');
    lifecycle.advanceCountdowns(board, 3000);

    expect(lifecycle.spawn(board, { x: 2, y: 2 }, 'blocking')).toEqual([]);
    expect(board.getObstacle(2, 2)).toEqual({
      kind: 'timed',
      remainingTicks: 1,
      tickIntervalMs: 1500,
      elapsedMs: 0
    });
  });

  it('does not touch the tile layer', () => {
    const board = createPatternBoard();
    const before = board.snapshot();
    createLifecycle().spawn(board, { x: 5, y: 6 }, 'blocking');
    expect(board.snapshot()).toEqual(before);
  });
});

describe('ObstacleLifecycle.applyClearance', () => {
  const run = [
    { x: 2, y: 0 },
    { x: 3, y: 0 },
    { x: 4, y: 0 }
  ];

  it('clears matched cells and their orthogonal neighbours', () => {
    const board = createPatternBoard();
    const lifecycle = createLifecycle();
    lifecycle.spawn(board, { x: 3, y: 0 }, 'blocking');
    lifecycle.spawn(board, { x: 3, y: 1 }, 'timed');
    lifecycle.spawn(board, { x: 5, y: 0 }, 'blocking');
    lifecycle.spawn(board, { x: 6, y: 0 }, 'blocking');
    lifecycle.spawn(board, { x: 2, y: 2 }, 'timed');

    const events = lifecycle.applyClearance(board, run);

    expect(events).toEqual([
      { phase: 'clearing', cell: { x: 3, y: 0 }, kind: 'blocking', cause: 'direct' },
      { phase: 'clearing', cell: { x: 5, y: 0 }, kind: 'blocking', cause: 'adjacent' },
      { phase: 'clearing', cell: { x: 3, y: 1 }, kind: 'timed', cause: 'adjacent' }
    ]);
    expect(board.obstacleEntries().map((entry) => entry.cell)).toEqual([
      { x: 6, y: 0 },
      { x: 2, y: 2 }
    ]);
  });

  it('reports a cell that is matched and adjacent as direct', () => {
    const board = createPatternBoard();
    const lifecycle = createLifecycle();
    lifecycle.spawn(board, { x: 4, y: 1 }, 'timed');

    const events = lifecycle.applyClearance(board, [...run, { x: 4, y: 1 }, { x: 4, y: 2 }]);

    expect(events).toEqual([{ phase: 'clearing', cell: { x: 4, y: 1 }, kind: 'timed', cause: 'direct' }]);
  });

  it('clears each cell at most once', () => {
    const board = createPatternBoard();
    const lifecycle = createLifecycle();
    lifecycle.spawn(board, { x: 3, y: 1 }, 'blocking');

    expect(lifecycle.applyClearance(board, run)).toHaveLength(1);
    expect(lifecycle.applyClearance(board, run)).toEqual([]);
  });

  it('does not touch the tile layer', () => {
    const board = createPatternBoard();
    const before = board.snapshot();
    createLifecycle().applyClearance(board, run);
    expect(board.snapshot()).toEqual(before);
  });
});

describe('ObstacleLifecycle.advanceCountdowns', () => {
  it('ticks down at each interval boundary', () => {
    const board = createPatternBoard();
    const lifecycle = createLifecycle();
    lifecycle.spawn(board, { x: 1, y: 1 }, 'timed');

    expect(lifecycle.advanceCountdowns(board, 1499)).toEqual([]);
    expect(lifecycle.advanceCountdowns(board, 1)).toEqual([
      { phase: 'ticking', cell: { x: 1, y: 1 }, kind: 'timed', remainingTicks: 2 }
    ]);
    expect(lifecycle.advanceCountdowns(board, 3000)).toEqual([
      { phase: 'ticking', cell: { x: 1, y: 1 }, kind: 'timed', remainingTicks: 1 },
      { phase: 'ticking', cell: { x: 1, y: 1 }, kind: 'timed', remainingTicks: 0 }
    ]);
    expect(board.getObstacle(1, 1)).toEqual({
      kind: 'timed',
      remainingTicks: 0,
      tickIntervalMs: 1500,
      elapsedMs: 0
    });
  });

  it('explodes at the fourth boundary and removes the obstacle', () => {
    const board = createPatternBoard();
    const lifecycle = createLifecycle();
    lifecycle.spawn(board, { x: 1, y: 1 }, 'timed');

    const events = lifecycle.advanceCountdowns(board, 6000);

    expect(events.map((event) => event.phase)).toEqual(['ticking', 'ticking', 'ticking', 'exploding']);
    expect(events[3]).toEqual({ phase: 'exploding', cell: { x: 1, y: 1 }, kind: 'timed', damage: 10 });
    expect(board.getObstacle(1, 1)).toBeNull();
    expect(lifecycle.advanceCountdowns(board, 10_000)).toEqual([]);
  });

  it('uses the configured damage', () => {
    const board = createPatternBoard();
    const lifecycle = createLifecycle({ explosionDamage: 25, timedCountdown: 0 });
    lifecycle.spawn(board, { x: 0, y: 0 }, 'timed');

    expect(lifecycle.advanceCountdowns(board, 1500)).toEqual([
      { phase: 'exploding', cell: { x: 0, y: 0 }, kind: 'timed', damage: 25 }
    ]);
  });

  it('never explodes a defused obstacle', () => {
    const board = createPatternBoard();
    const lifecycle = createLifecycle();
    lifecycle.spawn(board, { x: 1, y: 1 }, 'timed');
    lifecycle.advanceCountdowns(board, 4500);

    const cleared = lifecycle.applyClearance(board, [{ x: 1, y: 2 }]);

    expect(cleared).toEqual([{ phase: 'clearing', cell: { x: 1, y: 1 }, kind: 'timed', cause: 'adjacent' }]);
    expect(lifecycle.advanceCountdowns(board, 1500)).toEqual([]);
  });

  it('keeps one clock per obstacle', () => {
    const board = createPatternBoard();
    const lifecycle = createLifecycle();
    lifecycle.spawn(board, { x: 0, y: 0 }, 'timed');
    lifecycle.advanceCountdowns(board, 1000);
    lifecycle.spawn(board, { x: 5, y: 0 }, 'timed');

    expect(lifecycle.advanceCountdowns(board, 500)).toEqual([
      { phase: 'ticking', cell: { x: 0, y: 0 }, kind: 'timed', remainingTicks: 2 }
    ]);
  });

  it('ignores Blocking obstacles and non-positive deltas', () => {
    const board = createPatternBoard();
    const lifecycle = createLifecycle();
    lifecycle.spawn(board, { x: 3, y: 3 }, 'blocking');
    lifecycle.spawn(board, { x: 4, y: 4 }, 'timed');

    expect(lifecycle.advanceCountdowns(board, 0)).toEqual([]);
    expect(lifecycle.advanceCountdowns(board, -1500)).toEqual([]);
    expect(lifecycle.advanceCountdowns(board, 1500)).toEqual([
      { phase: 'ticking', cell: { x: 4, y: 4 }, kind: 'timed', remainingTicks: 2 }
    ]);
    expect(board.getObstacle(3, 3)).toEqual({ kind: 'blocking' });
  });
});
