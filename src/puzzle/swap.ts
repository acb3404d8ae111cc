import type { PuzzleBoard } from './board.ts';
import { OutOfRangeError } from './errors.ts';
import { isInBounds, isOrthogonallyAdjacent } from './coords.ts';
import type { GridCoord } from './types.ts';

export type InvalidSwapReason = 'not-adjacent' | 'blocked' | 'busy';

export interface SwapRequest {
  readonly from: GridCoord;
  readonly to: GridCoord;
}

export type SwapValidation =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: InvalidSwapReason };

function assertInBounds(board: PuzzleBoard, coord: GridCoord): void {
  if (!isInBounds(coord, board.size)) {
    throw new OutOfRangeError(coord, board.size);
  }
}

/**
 * Checks a player swap without touching the board. Coordinates outside the
 * grid are a caller bug and throw; everything else is a recoverable rejection.
 */
export function validateSwap(board: PuzzleBoard, request: SwapRequest): SwapValidation {
  assertInBounds(board, request.from);
  assertInBounds(board, request.to);

  if (!isOrthogonallyAdjacent(request.from, request.to)) {
    return { valid: false, reason: 'not-adjacent' };
  }
  if (
    board.isBlockedForSwap(request.from.x, request.from.y) ||
    board.isBlockedForSwap(request.to.x, request.to.y)
  ) {
    return { valid: false, reason: 'blocked' };
  }
  return { valid: true };
}
