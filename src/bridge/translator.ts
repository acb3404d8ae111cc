import { archetypeFor, summonRankFor } from './archetypes.ts';
import type { CombatCommand } from './commands.ts';
import { SummonLedger } from './ledger.ts';
import { SKILL_ORB_MIN_MATCH, getSkillOrb } from '../data/skillOrbs.ts';
import type { CascadeEvent } from '../puzzle/cascade.ts';
import type { ObstacleLifecycleEvent } from '../puzzle/obstacles.ts';
import type { MatchGroup } from '../puzzle/types.ts';

export interface BridgeTranslatorOptions {
  readonly ledger?: SummonLedger;
}

/**
 * One-way translation from resolved puzzle events to combat commands. It
 * holds no board reference and sees only event payloads.
 */
export class BridgeTranslator {
  private readonly ledger: SummonLedger;

  constructor(options: BridgeTranslatorOptions = {}) {
    this.ledger = options.ledger ?? new SummonLedger();
  }

  translateGroup(group: MatchGroup): CombatCommand[] {
    const archetype = archetypeFor(group.category);
    const commands = this.ledger.summon(archetype, summonRankFor(group.size));

    if (group.size >= SKILL_ORB_MIN_MATCH) {
      const orb = getSkillOrb(group.category);
      commands.push({
        type: 'castSkillOrb',
        effect: orb.effect,
        magnitude: orb.magnitude,
        source: group.category
      });
    }
    if (group.touchesCore) {
      commands.push({ type: 'coreAbility', archetype, count: group.size, cells: group.cells });
    }
    return commands;
  }

  translateCascadeEvent(event: CascadeEvent): CombatCommand[] {
    switch (event.type) {
      case 'matchPass':
        return event.groups.flatMap((group) => this.translateGroup(group));
      case 'manaReward':
        return event.amount > 0 ? [{ type: 'grantMana', amount: event.amount }] : [];
      case 'comboChanged':
        return [];
    }
  }

  translateObstacleEvent(event: ObstacleLifecycleEvent): CombatCommand[] {
    if (event.phase !== 'exploding') {
      return [];
    }
    return [{ type: 'damageAllies', amount: event.damage, cell: event.cell }];
  }

  releaseUnit(unitId: string): boolean {
    return this.ledger.releaseUnit(unitId);
  }

  getLedger(): SummonLedger {
    return this.ledger;
  }

  reset(): void {
    this.ledger.reset();
  }
}
