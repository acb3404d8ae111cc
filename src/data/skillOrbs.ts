import type { SkillOrbEffect } from '../bridge/commands.ts';
import type { TileCategory } from '../puzzle/types.ts';

export interface SkillOrbDefinition {
  readonly effect: SkillOrbEffect;
  /**
   * Damage dealt to every enemy for `meteor`, attack multiplier for
   * `attackBuff`, fraction of max health restored for `heal`.
   */
  readonly magnitude: number;
}

/** Match size that earns a skill orb on top of the summon. */
export const SKILL_ORB_MIN_MATCH = 4;

const METEOR: SkillOrbDefinition = Object.freeze({ effect: 'meteor', magnitude: 50 });
const ATTACK_BUFF: SkillOrbDefinition = Object.freeze({ effect: 'attackBuff', magnitude: 1.2 });
const HEAL: SkillOrbDefinition = Object.freeze({ effect: 'heal', magnitude: 0.3 });

const SKILL_ORBS: Readonly<Record<TileCategory, SkillOrbDefinition>> = Object.freeze({
  red: METEOR,
  blue: ATTACK_BUFF,
  green: HEAL,
  yellow: ATTACK_BUFF,
  purple: METEOR
});

export function getSkillOrb(category: TileCategory): SkillOrbDefinition {
  return SKILL_ORBS[category];
}
