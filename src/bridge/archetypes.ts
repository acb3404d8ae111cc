import type { CombatArchetype, UnitRank } from './commands.ts';
import type { TileCategory } from '../puzzle/types.ts';

const ARCHETYPE_BY_CATEGORY: Readonly<Record<TileCategory, CombatArchetype>> = Object.freeze({
  red: 'warrior',
  blue: 'tank',
  green: 'archer',
  yellow: 'assassin',
  purple: 'mage'
});

export function archetypeFor(category: TileCategory): CombatArchetype {
  return ARCHETYPE_BY_CATEGORY[category];
}

/** Runs of five or more summon at rank 2; shorter runs at rank 1. */
export function summonRankFor(matchSize: number): UnitRank {
  return matchSize >= 5 ? 2 : 1;
}
