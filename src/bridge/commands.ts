import type { GridCoord, TileCategory } from '../puzzle/types.ts';

export const COMBAT_ARCHETYPES = ['warrior', 'tank', 'archer', 'assassin', 'mage'] as const;

export type CombatArchetype = (typeof COMBAT_ARCHETYPES)[number];

export const MAX_UNIT_RANK = 3;

export type UnitRank = 1 | 2 | 3;

export type SkillOrbEffect = 'meteor' | 'attackBuff' | 'heal';

/**
 * Instructions for the combat simulation. Payloads are plain data; the
 * combat side decides placement, stats and targeting.
 */
export type CombatCommand =
  | {
      readonly type: 'summonUnit';
      readonly unitId: string;
      readonly archetype: CombatArchetype;
      readonly rank: UnitRank;
    }
  | {
      readonly type: 'mergeUnits';
      readonly archetype: CombatArchetype;
      /** Rank of the unit the merge produces. */
      readonly rank: UnitRank;
      readonly consumed: readonly [string, string];
      readonly unitId: string;
    }
  | {
      readonly type: 'castSkillOrb';
      readonly effect: SkillOrbEffect;
      readonly magnitude: number;
      readonly source: TileCategory;
    }
  | {
      readonly type: 'coreAbility';
      readonly archetype: CombatArchetype;
      readonly count: number;
      readonly cells: readonly GridCoord[];
    }
  | { readonly type: 'damageAllies'; readonly amount: number; readonly cell: GridCoord }
  | { readonly type: 'grantMana'; readonly amount: number };
