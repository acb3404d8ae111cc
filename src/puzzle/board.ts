import { OutOfRangeError } from './errors.ts';
import { isInBounds } from './coords.ts';
import {
  BOARD_SIZE,
  TILE_CATEGORIES,
  type BoardSnapshot,
  type GridCoord,
  type Obstacle,
  type TileCategory
} from './types.ts';
import { randomIndex, type RandomSource } from '../lib/random.ts';

export interface ObstacleEntry {
  readonly cell: GridCoord;
  readonly obstacle: Obstacle;
}

/** Query-only view handed to renderers and HUDs. */
export type ReadonlyPuzzleBoard = Pick<
  PuzzleBoard,
  'size' | 'get' | 'getObstacle' | 'isBlockedForSwap' | 'snapshot' | 'obstacleEntries' | 'countEmpty'
>;

/**
 * Tile layer and obstacle layer of the puzzle grid, stored as two flat
 * arrays addressed by coordinate. Clearing one layer never touches the other.
 * Every accessor throws {@link OutOfRangeError} outside the grid.
 */
export class PuzzleBoard {
  readonly size: number;

  private readonly tiles: (TileCategory | null)[];

  private readonly obstacles: (Obstacle | null)[];

  constructor(size = BOARD_SIZE) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new Error(`Board size must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.tiles = new Array<TileCategory | null>(size * size).fill(null);
    this.obstacles = new Array<Obstacle | null>(size * size).fill(null);
  }

  private indexOf(x: number, y: number): number {
    if (!isInBounds({ x, y }, this.size)) {
      throw new OutOfRangeError({ x, y }, this.size);
    }
    return y * this.size + x;
  }

  get(x: number, y: number): TileCategory | null {
    return this.tiles[this.indexOf(x, y)];
  }

  set(x: number, y: number, tile: TileCategory | null): void {
    this.tiles[this.indexOf(x, y)] = tile;
  }

  getObstacle(x: number, y: number): Obstacle | null {
    return this.obstacles[this.indexOf(x, y)];
  }

  setObstacle(x: number, y: number, obstacle: Obstacle | null): void {
    this.obstacles[this.indexOf(x, y)] = obstacle;
  }

  /** Removes the obstacle at the cell and returns what was there. */
  clearObstacle(x: number, y: number): Obstacle | null {
    const index = this.indexOf(x, y);
    const previous = this.obstacles[index];
    this.obstacles[index] = null;
    return previous;
  }

  isBlockedForSwap(x: number, y: number): boolean {
    return this.getObstacle(x, y)?.kind === 'blocking';
  }

  /**
   * Exchanges both layers of two cells, so a Timed obstacle travels with its
   * tile. Swaps touching a Blocking obstacle are rejected before this point.
   */
  swap(a: GridCoord, b: GridCoord): void {
    const ia = this.indexOf(a.x, a.y);
    const ib = this.indexOf(b.x, b.y);

    const tile = this.tiles[ia];
    this.tiles[ia] = this.tiles[ib];
    this.tiles[ib] = tile;

    const obstacle = this.obstacles[ia];
    this.obstacles[ia] = this.obstacles[ib];
    this.obstacles[ib] = obstacle;
  }

  snapshot(): BoardSnapshot {
    const rows: (TileCategory | null)[][] = [];
    for (let y = 0; y < this.size; y += 1) {
      rows.push(this.tiles.slice(y * this.size, (y + 1) * this.size));
    }
    return rows;
  }

  /** Obstacles in row-major order from the bottom-left. */
  obstacleEntries(): ObstacleEntry[] {
    const entries: ObstacleEntry[] = [];
    this.obstacles.forEach((obstacle, index) => {
      if (obstacle) {
        entries.push({
          cell: { x: index % this.size, y: Math.floor(index / this.size) },
          obstacle
        });
      }
    });
    return entries;
  }

  countEmpty(): number {
    return this.tiles.reduce((count, tile) => (tile === null ? count + 1 : count), 0);
  }

  /** Empties both layers. */
  clear(): void {
    this.tiles.fill(null);
    this.obstacles.fill(null);
  }

  clone(): PuzzleBoard {
    const copy = new PuzzleBoard(this.size);
    this.tiles.forEach((tile, index) => {
      copy.tiles[index] = tile;
    });
    this.obstacles.forEach((obstacle, index) => {
      copy.obstacles[index] = obstacle;
    });
    return copy;
  }
}

/** Builds a board from a `[y][x]` grid; `layout[0]` is the bottom row. */
export function createBoardFromLayout(
  layout: readonly (readonly (TileCategory | null)[])[]
): PuzzleBoard {
  const size = layout.length;
  if (size === 0) {
    throw new Error('Layout must have at least one row');
  }
  const board = new PuzzleBoard(size);
  layout.forEach((row, y) => {
    if (row.length !== size) {
      throw new Error('Layout must be square');
    }
    row.forEach((tile, x) => board.set(x, y, tile));
  });
  return board;
}

function completesRun(board: PuzzleBoard, x: number, y: number, category: TileCategory): boolean {
  if (x >= 2 && board.get(x - 1, y) === category && board.get(x - 2, y) === category) {
    return true;
  }
  return y >= 2 && board.get(x, y - 1) === category && board.get(x, y - 2) === category;
}

/**
 * Fills a fresh board so that no run of three exists at the start. Each cell
 * draws once from the categories that would not complete a run with the
 * cells already placed to its left and below.
 */
export function createInitialBoard(random: RandomSource, size = BOARD_SIZE): PuzzleBoard {
  const board = new PuzzleBoard(size);
  for (let y = 0; y < size; y += 1) {
    for (let x = 0; x < size; x += 1) {
      const allowed = TILE_CATEGORIES.filter((category) => !completesRun(board, x, y, category));
      const pool = allowed.length > 0 ? allowed : TILE_CATEGORIES;
      board.set(x, y, pool[randomIndex(random, pool.length)]);
    }
  }
  return board;
}
