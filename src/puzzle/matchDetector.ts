import { compareCoords, coordKey, isCoreOrAdjacent } from './coords.ts';
import type {
  BoardSnapshot,
  GridCoord,
  MatchGroup,
  MatchOrientation,
  MatchResult,
  TileCategory
} from './types.ts';

export const MIN_MATCH_LENGTH = 3;

type CellReader = (line: number, step: number) => TileCategory | null;
type CoordMapper = (line: number, step: number) => GridCoord;

function scanLines(
  lineCount: number,
  lineLength: number,
  read: CellReader,
  toCoord: CoordMapper,
  orientation: MatchOrientation
): MatchGroup[] {
  const groups: MatchGroup[] = [];
  for (let line = 0; line < lineCount; line += 1) {
    let start = 0;
    while (start < lineLength) {
      const category = read(line, start);
      let end = start + 1;
      if (category !== null) {
        while (end < lineLength && read(line, end) === category) {
          end += 1;
        }
        const length = end - start;
        if (length >= MIN_MATCH_LENGTH) {
          const cells: GridCoord[] = [];
          for (let step = start; step < end; step += 1) {
            cells.push(toCoord(line, step));
          }
          groups.push({
            category,
            orientation,
            cells,
            size: length,
            touchesCore: cells.some(isCoreOrAdjacent)
          });
        }
      }
      start = end;
    }
  }
  return groups;
}

/**
 * Finds every run of three or more identical tiles along a row or column.
 *
 * Runs crossing at a shared cell stay separate groups, each with its own size;
 * the shared cell appears once in `matched`. Pure: the same snapshot always
 * yields the same result.
 */
export function detectMatches(snapshot: BoardSnapshot): MatchResult {
  const height = snapshot.length;
  const width = height > 0 ? snapshot[0].length : 0;

  const horizontal = scanLines(
    height,
    width,
    (y, x) => snapshot[y][x],
    (y, x) => ({ x, y }),
    'horizontal'
  );
  const vertical = scanLines(
    width,
    height,
    (x, y) => snapshot[y][x],
    (x, y) => ({ x, y }),
    'vertical'
  );
  const groups = [...horizontal, ...vertical];

  const unique = new Map<string, GridCoord>();
  for (const group of groups) {
    for (const cell of group.cells) {
      unique.set(coordKey(cell), cell);
    }
  }
  const matched = Array.from(unique.values()).sort(compareCoords);

  return { matched, groups };
}

export function hasMatches(result: MatchResult): boolean {
  return result.groups.length > 0;
}

export const EMPTY_MATCH_RESULT: MatchResult = Object.freeze({
  matched: Object.freeze([]),
  groups: Object.freeze([])
});
