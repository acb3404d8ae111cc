import { describe, expect, it } from 'vitest';
import {
  BOARD_SIZE,
  PuzzleSession,
  createSeededRandom,
  detectMatches,
  formatBoard,
  parseBoardLayout
} from '../../src/index.ts';

describe('package entry point', () => {
  it('deals a run-free board of the standard size', () => {
    const session = new PuzzleSession({ random: createSeededRandom(42), log: () => undefined });
    const board = session.getBoard();

    expect(board.size).toBe(BOARD_SIZE);
    expect(board.countEmpty()).toBe(0);
    expect(detectMatches(board.snapshot()).groups).toEqual([]);
    expect(session.peekPreview()).toHaveLength(3);
  });

  it('replays the same board for the same seed', () => {
    const first = new PuzzleSession({ random: createSeededRandom(7), log: () => undefined });
    const second = new PuzzleSession({ random: createSeededRandom(7), log: () => undefined });
    expect(second.getBoard().snapshot()).toEqual(first.getBoard().snapshot());
  });

  it('round trips a layout through the text helpers', () => {
    const rows = ['RGB', 'YP.', 'BRG'];
    expect(formatBoard(parseBoardLayout(rows))).toEqual(rows);
  });
});
