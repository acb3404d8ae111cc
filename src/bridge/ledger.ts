import { MAX_UNIT_RANK, type CombatArchetype, type CombatCommand, type UnitRank } from './commands.ts';

export interface LedgerUnit {
  readonly unitId: string;
  readonly archetype: CombatArchetype;
  readonly rank: UnitRank;
}

export type MergeOutcome =
  | { readonly merged: true; readonly command: CombatCommand; readonly unit: LedgerUnit }
  | { readonly merged: false; readonly reason: 'no-pair' | 'rank-at-maximum' };

function nextRank(rank: UnitRank): UnitRank | null {
  if (rank >= MAX_UNIT_RANK) {
    return null;
  }
  return rank === 1 ? 2 : 3;
}

/**
 * Tracks the units the bridge has summoned so that two of the same archetype
 * and rank merge into one of the next rank. Units leave the ledger when merged
 * or when the combat side reports them gone.
 */
export class SummonLedger {
  private readonly units = new Map<string, LedgerUnit>();

  private sequence = 0;

  private allocateId(): string {
    this.sequence += 1;
    return `unit-${this.sequence}`;
  }

  private add(archetype: CombatArchetype, rank: UnitRank): LedgerUnit {
    const unit: LedgerUnit = { unitId: this.allocateId(), archetype, rank };
    this.units.set(unit.unitId, unit);
    return unit;
  }

  /**
   * Records a new unit and then folds every pair it completes. Returns the
   * summon command followed by one merge command per fold.
   */
  summon(archetype: CombatArchetype, rank: UnitRank): CombatCommand[] {
    const unit = this.add(archetype, rank);
    const commands: CombatCommand[] = [
      { type: 'summonUnit', unitId: unit.unitId, archetype, rank }
    ];
    let outcome = this.mergePair(unit.archetype, unit.rank);
    while (outcome.merged) {
      commands.push(outcome.command);
      outcome = this.mergePair(outcome.unit.archetype, outcome.unit.rank);
    }
    return commands;
  }

  /**
   * Merges the two oldest units of the given archetype and rank. A pair at
   * the top rank stays as it is.
   */
  mergePair(archetype: CombatArchetype, rank: UnitRank): MergeOutcome {
    const pair = this.findPair(archetype, rank);
    if (!pair) {
      return { merged: false, reason: 'no-pair' };
    }
    const resulting = nextRank(rank);
    if (resulting === null) {
      return { merged: false, reason: 'rank-at-maximum' };
    }
    const [first, second] = pair;
    this.units.delete(first.unitId);
    this.units.delete(second.unitId);
    const unit = this.add(archetype, resulting);
    return {
      merged: true,
      unit,
      command: {
        type: 'mergeUnits',
        archetype,
        rank: resulting,
        consumed: [first.unitId, second.unitId],
        unitId: unit.unitId
      }
    };
  }

  private findPair(archetype: CombatArchetype, rank: UnitRank): [LedgerUnit, LedgerUnit] | null {
    const matches: LedgerUnit[] = [];
    for (const unit of this.units.values()) {
      if (unit.archetype === archetype && unit.rank === rank) {
        matches.push(unit);
        if (matches.length === 2) {
          return [matches[0], matches[1]];
        }
      }
    }
    return null;
  }

  /** Removes a unit the combat side no longer has. Unknown ids are ignored. */
  releaseUnit(unitId: string): boolean {
    return this.units.delete(unitId);
  }

  getUnits(): LedgerUnit[] {
    return Array.from(this.units.values());
  }

  reset(): void {
    this.units.clear();
    this.sequence = 0;
  }
}
