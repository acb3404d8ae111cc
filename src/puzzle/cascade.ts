import type { PuzzleBoard } from './board.ts';
import { EMPTY_MATCH_RESULT, detectMatches, hasMatches } from './matchDetector.ts';
import type { ObstacleLifecycle, ObstacleLifecycleEvent } from './obstacles.ts';
import type { GridCoord, MatchGroup, MatchResult, TileCategory } from './types.ts';

/** Passes allowed in one resolution before it is forced back to idle. */
export const MAX_CASCADE_PASSES = 64;

export type CascadePhase = 'idle' | 'cascading';

export interface CascadeState {
  readonly phase: CascadePhase;
  /** Depth of the pass waiting to be cleared; 0 while idle. */
  readonly combo: number;
  readonly maxCombo: number;
  readonly pending: MatchResult;
}

export type CascadeEvent =
  | {
      readonly type: 'matchPass';
      readonly combo: number;
      readonly groups: readonly MatchGroup[];
      readonly matched: readonly GridCoord[];
    }
  | { readonly type: 'comboChanged'; readonly combo: number; readonly maxCombo: number }
  | { readonly type: 'manaReward'; readonly amount: number; readonly combo: number };

export interface CascadeContext {
  readonly lifecycle: ObstacleLifecycle;
  /** Next refill tile, normally the preview queue. */
  readonly draw: () => TileCategory;
  readonly baseMana: number;
}

export interface CascadeStep {
  readonly state: CascadeState;
  readonly events: CascadeEvent[];
  readonly obstacleEvents: ObstacleLifecycleEvent[];
}

export interface GravityMove {
  readonly x: number;
  readonly fromY: number;
  readonly toY: number;
}

const IDLE_STATE: CascadeState = Object.freeze({
  phase: 'idle',
  combo: 0,
  maxCombo: 0,
  pending: EMPTY_MATCH_RESULT
});

export function createCascadeState(): CascadeState {
  return IDLE_STATE;
}

export function isCascading(state: CascadeState): boolean {
  return state.phase === 'cascading';
}

export function comboMultiplier(combo: number): number {
  if (!Number.isFinite(combo) || combo <= 0) {
    return 0;
  }
  const depth = Math.floor(combo);
  switch (depth) {
    case 1:
      return 1;
    case 2:
      return 1.5;
    case 3:
      return 2;
    case 4:
      return 3;
    default:
      return 3 + (depth - 4) * 0.5;
  }
}

export function calculateManaReward(combo: number, baseMana: number): number {
  return baseMana * comboMultiplier(combo);
}

/**
 * Starts a resolution from a swap's detection. An empty result leaves the
 * state untouched, so a matchless swap never enters the cascade.
 */
export function beginCascade(state: CascadeState, result: MatchResult): CascadeStep {
  if (isCascading(state) || !hasMatches(result)) {
    return { state, events: [], obstacleEvents: [] };
  }
  const next: CascadeState = { phase: 'cascading', combo: 1, maxCombo: 1, pending: result };
  return {
    state: next,
    events: [{ type: 'comboChanged', combo: next.combo, maxCombo: next.maxCombo }],
    obstacleEvents: []
  };
}

/**
 * Compacts every column toward `y = 0`, keeping the relative order of its
 * tiles. Only the tile layer moves; obstacles stay on their cells.
 */
export function applyGravity(board: PuzzleBoard): GravityMove[] {
  const moves: GravityMove[] = [];
  for (let x = 0; x < board.size; x += 1) {
    let target = 0;
    for (let y = 0; y < board.size; y += 1) {
      const tile = board.get(x, y);
      if (tile === null) {
        continue;
      }
      if (y !== target) {
        board.set(x, target, tile);
        board.set(x, y, null);
        moves.push({ x, fromY: y, toY: target });
      }
      target += 1;
    }
  }
  return moves;
}

/** Fills empty cells column by column, bottom to top, one draw per cell. */
export function refillBoard(board: PuzzleBoard, draw: () => TileCategory): GridCoord[] {
  const filled: GridCoord[] = [];
  for (let x = 0; x < board.size; x += 1) {
    for (let y = 0; y < board.size; y += 1) {
      if (board.get(x, y) === null) {
        board.set(x, y, draw());
        filled.push({ x, y });
      }
    }
  }
  return filled;
}

function finish(state: CascadeState, events: CascadeEvent[], baseMana: number): CascadeState {
  const amount = calculateManaReward(state.combo, baseMana);
  if (amount > 0) {
    events.push({ type: 'manaReward', amount, combo: state.combo });
  }
  events.push({ type: 'comboChanged', combo: 0, maxCombo: state.maxCombo });
  return createCascadeState();
}

/**
 * Runs one atomic sub-cycle: clear the pending pass (tiles, then obstacle
 * clearance), apply gravity, refill and detect again. New matches deepen the
 * combo; none ends the resolution with its mana reward.
 *
 * A resolution that reaches {@link MAX_CASCADE_PASSES} settles even though the
 * refill still holds runs. Those runs stay on the board unresolved and are
 * picked up by the detection of the next committed swap.
 */
export function advanceCascade(
  state: CascadeState,
  board: PuzzleBoard,
  context: CascadeContext
): CascadeStep {
  if (!isCascading(state)) {
    return { state, events: [], obstacleEvents: [] };
  }

  const events: CascadeEvent[] = [
    {
      type: 'matchPass',
      combo: state.combo,
      groups: state.pending.groups,
      matched: state.pending.matched
    }
  ];

  for (const cell of state.pending.matched) {
    board.set(cell.x, cell.y, null);
  }
  const obstacleEvents = context.lifecycle.applyClearance(board, state.pending.matched);
  applyGravity(board);
  refillBoard(board, context.draw);

  const result = detectMatches(board.snapshot());
  if (!hasMatches(result) || state.combo >= MAX_CASCADE_PASSES) {
    return { state: finish(state, events, context.baseMana), events, obstacleEvents };
  }

  const combo = state.combo + 1;
  const next: CascadeState = {
    phase: 'cascading',
    combo,
    maxCombo: Math.max(state.maxCombo, combo),
    pending: result
  };
  events.push({ type: 'comboChanged', combo: next.combo, maxCombo: next.maxCombo });
  return { state: next, events, obstacleEvents };
}

/** Abandons any resolution in progress without a reward. */
export function cancelCascade(): CascadeState {
  return createCascadeState();
}
