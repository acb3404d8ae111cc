import { createBoardFromLayout, type PuzzleBoard } from './board.ts';
import type { TileCategory } from './types.ts';

const CATEGORY_BY_SYMBOL: Readonly<Record<string, TileCategory>> = Object.freeze({
  R: 'red',
  B: 'blue',
  G: 'green',
  Y: 'yellow',
  P: 'purple'
});

const SYMBOL_BY_CATEGORY: Readonly<Record<TileCategory, string>> = Object.freeze({
  red: 'R',
  blue: 'B',
  green: 'G',
  yellow: 'Y',
  purple: 'P'
});

const EMPTY_SYMBOL = '.';

/**
 * Parses rows written top row first, one letter per cell (`R`, `B`, `G`,
 * `Y`, `P`, `.` for empty), as they read on screen.
 */
export function parseBoardLayout(rows: readonly string[]): PuzzleBoard {
  const grid = rows
    .slice()
    .reverse()
    .map((row, index) =>
      Array.from(row.replace(/\s+/g, '')).map((symbol) => {
        if (symbol === EMPTY_SYMBOL) {
          return null;
        }
        const category = CATEGORY_BY_SYMBOL[symbol.toUpperCase()];
        if (!category) {
          throw new Error(`Unknown tile symbol "${symbol}" in layout row ${rows.length - 1 - index}`);
        }
        return category;
      })
    );
  return createBoardFromLayout(grid);
}

/** Inverse of {@link parseBoardLayout}. */
export function formatBoard(board: PuzzleBoard): string[] {
  return board
    .snapshot()
    .map((row) => row.map((tile) => (tile ? SYMBOL_BY_CATEGORY[tile] : EMPTY_SYMBOL)).join(''))
    .reverse();
}
