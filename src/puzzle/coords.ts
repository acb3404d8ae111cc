import { BOARD_SIZE, type GridCoord } from './types.ts';

export const ORTHOGONAL_OFFSETS: readonly GridCoord[] = Object.freeze([
  { x: -1, y: 0 },
  { x: 1, y: 0 },
  { x: 0, y: -1 },
  { x: 0, y: 1 }
]);

/** Centre 2x2 of the board. Matches touching it charge a core ability. */
export const CORE_POSITIONS: readonly GridCoord[] = Object.freeze([
  { x: 3, y: 3 },
  { x: 3, y: 4 },
  { x: 4, y: 3 },
  { x: 4, y: 4 }
]);

export function coordKey(coord: GridCoord): string {
  return `${coord.x},${coord.y}`;
}

export function sameCoord(a: GridCoord, b: GridCoord): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isInBounds(coord: GridCoord, size = BOARD_SIZE): boolean {
  return (
    Number.isInteger(coord.x) &&
    Number.isInteger(coord.y) &&
    coord.x >= 0 &&
    coord.y >= 0 &&
    coord.x < size &&
    coord.y < size
  );
}

/** True for cells sharing an edge. Diagonals and identical cells are not adjacent. */
export function isOrthogonallyAdjacent(a: GridCoord, b: GridCoord): boolean {
  const dx = Math.abs(a.x - b.x);
  const dy = Math.abs(a.y - b.y);
  return dx + dy === 1;
}

export function orthogonalNeighbors(coord: GridCoord, size = BOARD_SIZE): GridCoord[] {
  return ORTHOGONAL_OFFSETS.map((offset) => ({ x: coord.x + offset.x, y: coord.y + offset.y })).filter(
    (neighbor) => isInBounds(neighbor, size)
  );
}

export function isCoreOrAdjacent(coord: GridCoord): boolean {
  return CORE_POSITIONS.some((core) => sameCoord(core, coord) || isOrthogonallyAdjacent(core, coord));
}

/** Row-major order from the bottom-left corner. */
export function compareCoords(a: GridCoord, b: GridCoord): number {
  return a.y - b.y || a.x - b.x;
}
