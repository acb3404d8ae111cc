export const BOARD_SIZE = 8;

export const TILE_CATEGORIES = ['red', 'blue', 'green', 'yellow', 'purple'] as const;

export type TileCategory = (typeof TILE_CATEGORIES)[number];

/** `x` is the column, `y` the row; `y = 0` is the bottom edge tiles fall toward. */
export interface GridCoord {
  readonly x: number;
  readonly y: number;
}

export type ObstacleKind = 'blocking' | 'timed';

export interface BlockingObstacle {
  readonly kind: 'blocking';
}

export interface TimedObstacle {
  readonly kind: 'timed';
  readonly remainingTicks: number;
  readonly tickIntervalMs: number;
  /** Time accumulated toward the next tick boundary. */
  readonly elapsedMs: number;
}

export type Obstacle = BlockingObstacle | TimedObstacle;

/** Read-only category grid indexed `[y][x]`; `null` marks an empty cell. */
export type BoardSnapshot = readonly (readonly (TileCategory | null)[])[];

export type MatchOrientation = 'horizontal' | 'vertical';

export interface MatchGroup {
  readonly category: TileCategory;
  readonly orientation: MatchOrientation;
  readonly cells: readonly GridCoord[];
  readonly size: number;
  readonly touchesCore: boolean;
}

export interface MatchResult {
  /** Every matched cell once, row-major from the bottom-left. */
  readonly matched: readonly GridCoord[];
  readonly groups: readonly MatchGroup[];
}
