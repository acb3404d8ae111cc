import { BridgeTranslator } from '../bridge/translator.ts';
import type { CombatCommand } from '../bridge/commands.ts';
import { TickClock } from '../core/TickClock.ts';
import { logEvent, type LogFn } from '../core/logging.ts';
import { EventBus } from '../events/EventBus.ts';
import type { RandomSource } from '../lib/random.ts';
import { createInitialBoard, type PuzzleBoard, type ReadonlyPuzzleBoard } from '../puzzle/board.ts';
import {
  advanceCascade,
  beginCascade,
  cancelCascade,
  createCascadeState,
  isCascading,
  type CascadeEvent,
  type CascadePhase,
  type CascadeState,
  type CascadeStep
} from '../puzzle/cascade.ts';
import { resolvePuzzleConfig, type PuzzleConfig } from '../puzzle/config.ts';
import { coordKey } from '../puzzle/coords.ts';
import { detectMatches, hasMatches } from '../puzzle/matchDetector.ts';
import { ObstacleLifecycle, type ObstacleLifecycleEvent } from '../puzzle/obstacles.ts';
import { TilePreview } from '../puzzle/preview.ts';
import { validateSwap, type InvalidSwapReason, type SwapRequest } from '../puzzle/swap.ts';
import type { TileCategory } from '../puzzle/types.ts';

type MatchPassEvent = Extract<CascadeEvent, { type: 'matchPass' }>;

export interface PuzzleSessionEvents {
  command: CombatCommand;
  obstacle: ObstacleLifecycleEvent;
  pass: MatchPassEvent;
  reward: { readonly amount: number; readonly combo: number };
  combo: { readonly combo: number; readonly maxCombo: number };
  /** A fresh board was dealt; read it through `getBoard()`. */
  reset: { readonly cancelledCascade: boolean };
}

export interface PuzzleSessionOptions {
  readonly config?: Partial<PuzzleConfig>;
  readonly random?: RandomSource;
  /** Starting board; a fresh run-free board is drawn when omitted. */
  readonly board?: PuzzleBoard;
  readonly bus?: EventBus<PuzzleSessionEvents>;
  readonly translator?: BridgeTranslator;
  readonly log?: LogFn;
}

export type SwapOutcome =
  | { readonly accepted: true; readonly matched: boolean }
  | { readonly accepted: false; readonly reason: InvalidSwapReason };

export interface PuzzleSessionState {
  readonly phase: CascadePhase;
  readonly combo: number;
  readonly maxCombo: number;
  readonly obstacles: number;
}

export interface PuzzleStepReport {
  readonly steps: number;
  readonly commands: CombatCommand[];
}

/**
 * Owns one puzzle board and everything that resolves on it. Inbound calls
 * are swaps, attack signals and elapsed time; outbound traffic is published
 * on the session bus and mirrored into the log.
 *
 * Random draws happen in a fixed order: the initial board, the preview
 * queue, then refills and spawn rolls as they occur.
 */
export class PuzzleSession {
  readonly config: PuzzleConfig;

  readonly bus: EventBus<PuzzleSessionEvents>;

  private readonly random: RandomSource;
  private readonly lifecycle: ObstacleLifecycle;
  private readonly preview: TilePreview;
  private readonly translator: BridgeTranslator;
  private readonly clock: TickClock;
  private readonly log: LogFn;

  private readonly board: PuzzleBoard;
  private cascade: CascadeState = createCascadeState();
  /** Commands produced during the current inbound call, if one is collecting. */
  private outbox: CombatCommand[] | null = null;

  constructor(options: PuzzleSessionOptions = {}) {
    this.config = resolvePuzzleConfig(options.config ?? null);
    this.random = options.random ?? Math.random;
    this.bus = options.bus ?? new EventBus<PuzzleSessionEvents>();
    this.translator = options.translator ?? new BridgeTranslator();
    this.log = options.log ?? logEvent;
    this.lifecycle = new ObstacleLifecycle(this.config);
    this.board = options.board ?? createInitialBoard(this.random);
    this.preview = new TilePreview(this.random, this.config.previewSize);
    this.clock = new TickClock(this.config.tickMs, (stepMs) => this.step(stepMs));
  }

  getBoard(): ReadonlyPuzzleBoard {
    return this.board;
  }

  getState(): PuzzleSessionState {
    return {
      phase: this.cascade.phase,
      combo: this.cascade.combo,
      maxCombo: this.cascade.maxCombo,
      obstacles: this.board.obstacleEntries().length
    };
  }

  peekPreview(): TileCategory[] {
    return this.preview.peekAll();
  }

  /**
   * Validates and commits a player swap. Coordinates off the board throw;
   * other rejections leave every piece of state untouched.
   */
  requestSwap(request: SwapRequest): SwapOutcome {
    const validation = validateSwap(this.board, request);
    if (!validation.valid) {
      return this.rejectSwap(request, validation.reason);
    }
    if (isCascading(this.cascade)) {
      return this.rejectSwap(request, 'busy');
    }

    this.board.swap(request.from, request.to);
    const result = detectMatches(this.board.snapshot());
    this.log({
      type: 'puzzle',
      message: hasMatches(result) ? 'Swap matched' : 'Swap committed without a match',
      metadata: { from: request.from, to: request.to, groups: result.groups.length }
    });
    this.applyCascadeStep(beginCascade(this.cascade, result));
    return { accepted: true, matched: hasMatches(result) };
  }

  /** Attack-occurred signal from the combat side; may spawn one obstacle. */
  reportAttack(wave: number): ObstacleLifecycleEvent[] {
    const events = this.lifecycle.rollSpawn(this.board, wave, this.random);
    for (const event of events) {
      this.publishObstacleEvent(event);
    }
    return events;
  }

  /**
   * Feeds elapsed time to the clock. Each whole step runs one cascade
   * sub-cycle, when one is in progress, and then the obstacle countdowns.
   */
  update(deltaMs: number): PuzzleStepReport {
    const previous = this.outbox;
    const commands: CombatCommand[] = [];
    this.outbox = commands;
    try {
      const steps = this.clock.advance(deltaMs);
      return { steps, commands };
    } finally {
      this.outbox = previous;
    }
  }

  start(): void {
    this.clock.start();
  }

  stop(): void {
    this.clock.stop();
  }

  setSpeed(multiplier: number): void {
    this.clock.setSpeed(multiplier);
  }

  releaseUnit(unitId: string): boolean {
    const released = this.translator.releaseUnit(unitId);
    if (released) {
      this.log({ type: 'bridge', message: `Released ${unitId}`, metadata: { unitId } });
    }
    return released;
  }

  /**
   * Aborts any resolution, drops every obstacle and deals a fresh board into
   * the same board instance. Each dropped obstacle is published as a
   * `clearing` event with cause `reset` before the board is dealt.
   */
  reset(): void {
    const wasCascading = isCascading(this.cascade);
    this.cascade = cancelCascade();
    this.clock.reset();
    for (const { cell, obstacle } of this.board.obstacleEntries()) {
      this.publishObstacleEvent({ phase: 'clearing', cell, kind: obstacle.kind, cause: 'reset' });
    }
    const fresh = createInitialBoard(this.random, this.board.size).snapshot();
    this.board.clear();
    fresh.forEach((row, y) => row.forEach((tile, x) => this.board.set(x, y, tile)));
    this.preview.reset();
    this.translator.reset();
    this.bus.emit('combo', { combo: 0, maxCombo: 0 });
    this.bus.emit('reset', { cancelledCascade: wasCascading });
    this.log({
      type: 'system',
      message: 'Puzzle session reset',
      metadata: { cancelledCascade: wasCascading }
    });
  }

  dispose(): void {
    this.clock.stop();
    this.bus.clear();
  }

  private step(stepMs: number): void {
    if (isCascading(this.cascade)) {
      this.applyCascadeStep(
        advanceCascade(this.cascade, this.board, {
          lifecycle: this.lifecycle,
          draw: () => this.preview.consumeNext(),
          baseMana: this.config.baseMana
        })
      );
    }
    for (const event of this.lifecycle.advanceCountdowns(this.board, stepMs)) {
      this.publishObstacleEvent(event);
    }
  }

  private rejectSwap(request: SwapRequest, reason: InvalidSwapReason): SwapOutcome {
    this.log({
      type: 'puzzle',
      message: `Swap rejected: ${reason}`,
      metadata: { from: request.from, to: request.to, reason, aggregateKey: `swap-rejected:${reason}` }
    });
    return { accepted: false, reason };
  }

  private applyCascadeStep(step: CascadeStep): void {
    this.cascade = step.state;
    for (const event of step.events) {
      this.publishCascadeEvent(event);
      if (event.type === 'matchPass') {
        for (const obstacleEvent of step.obstacleEvents) {
          this.publishObstacleEvent(obstacleEvent);
        }
      }
    }
  }

  private publishCascadeEvent(event: CascadeEvent): void {
    switch (event.type) {
      case 'matchPass':
        this.bus.emit('pass', event);
        this.log({
          type: 'cascade',
          message: `Pass ${event.combo} cleared ${event.matched.length} tiles`,
          metadata: { combo: event.combo, groups: event.groups.length }
        });
        break;
      case 'manaReward':
        this.bus.emit('reward', { amount: event.amount, combo: event.combo });
        this.log({
          type: 'cascade',
          message: `Cascade settled at combo ${event.combo} for ${event.amount} mana`,
          metadata: { amount: event.amount, combo: event.combo }
        });
        break;
      case 'comboChanged':
        this.bus.emit('combo', { combo: event.combo, maxCombo: event.maxCombo });
        break;
    }
    this.dispatchCommands(this.translator.translateCascadeEvent(event));
  }

  private publishObstacleEvent(event: ObstacleLifecycleEvent): void {
    this.bus.emit('obstacle', event);
    this.log({
      type: 'obstacle',
      message: `${event.kind} obstacle ${event.phase} at (${event.cell.x}, ${event.cell.y})`,
      metadata: {
        ...event,
        ...(event.phase === 'ticking' ? { aggregateKey: `tick:${coordKey(event.cell)}` } : {})
      }
    });
    this.dispatchCommands(this.translator.translateObstacleEvent(event));
  }

  private dispatchCommands(commands: readonly CombatCommand[]): void {
    for (const command of commands) {
      this.outbox?.push(command);
      this.bus.emit('command', command);
      this.log({ type: 'bridge', message: `Command ${command.type}`, metadata: { ...command } });
    }
  }
}
