import type { GridCoord } from './types.ts';

/** A coordinate outside the board reached a bounds-checked accessor. */
export class OutOfRangeError extends Error {
  readonly code = 'OutOfRange';

  constructor(
    readonly coord: GridCoord,
    readonly size: number
  ) {
    super(`Cell (${coord.x}, ${coord.y}) is outside the ${size}x${size} board`);
    this.name = 'OutOfRangeError';
  }
}

export function isOutOfRangeError(error: unknown): error is OutOfRangeError {
  return error instanceof OutOfRangeError;
}
