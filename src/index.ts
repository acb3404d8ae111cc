export { PuzzleSession } from './game/PuzzleSession.ts';
export type {
  PuzzleSessionEvents,
  PuzzleSessionOptions,
  PuzzleSessionState,
  PuzzleStepReport,
  SwapOutcome
} from './game/PuzzleSession.ts';

export { PuzzleBoard, createBoardFromLayout, createInitialBoard } from './puzzle/board.ts';
export type { ObstacleEntry, ReadonlyPuzzleBoard } from './puzzle/board.ts';
export { parseBoardLayout, formatBoard } from './puzzle/layout.ts';
export { CORE_POSITIONS, isCoreOrAdjacent, isInBounds } from './puzzle/coords.ts';
export { OutOfRangeError, isOutOfRangeError } from './puzzle/errors.ts';
export { detectMatches, hasMatches, MIN_MATCH_LENGTH } from './puzzle/matchDetector.ts';
export { validateSwap } from './puzzle/swap.ts';
export type { InvalidSwapReason, SwapRequest, SwapValidation } from './puzzle/swap.ts';
export { ObstacleLifecycle } from './puzzle/obstacles.ts';
export type { ObstacleClearCause, ObstacleLifecycleEvent, ObstaclePhase } from './puzzle/obstacles.ts';
export {
  MAX_CASCADE_PASSES,
  advanceCascade,
  applyGravity,
  beginCascade,
  calculateManaReward,
  cancelCascade,
  comboMultiplier,
  createCascadeState,
  refillBoard
} from './puzzle/cascade.ts';
export type { CascadeContext, CascadeEvent, CascadeState, CascadeStep } from './puzzle/cascade.ts';
export { TilePreview } from './puzzle/preview.ts';
export {
  DEFAULT_PUZZLE_CONFIG,
  loadPuzzleConfig,
  resolvePuzzleConfig,
  savePuzzleConfig
} from './puzzle/config.ts';
export type { DuplicateSpawnPolicy, PuzzleConfig } from './puzzle/config.ts';
export { BOARD_SIZE, TILE_CATEGORIES } from './puzzle/types.ts';
export type {
  GridCoord,
  MatchGroup,
  MatchResult,
  Obstacle,
  ObstacleKind,
  TileCategory
} from './puzzle/types.ts';

export { BridgeTranslator } from './bridge/translator.ts';
export { SummonLedger } from './bridge/ledger.ts';
export type { LedgerUnit, MergeOutcome } from './bridge/ledger.ts';
export { COMBAT_ARCHETYPES, MAX_UNIT_RANK } from './bridge/commands.ts';
export type { CombatArchetype, CombatCommand, SkillOrbEffect, UnitRank } from './bridge/commands.ts';

export { EventBus } from './events/EventBus.ts';
export { TickClock } from './core/TickClock.ts';
export { LogStore, clearLogs, getLogHistory, logEvent, subscribeToLogs } from './core/logging.ts';
export type { LogEntry, LogEventPayload, LogFn, StorageLike } from './core/logging.ts';
export { createSeededRandom } from './lib/random.ts';
export type { RandomSource } from './lib/random.ts';
