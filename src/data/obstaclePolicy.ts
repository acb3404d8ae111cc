import type { ObstacleKind } from '../puzzle/types.ts';

export interface ObstacleSpawnRule {
  readonly kind: ObstacleKind;
  readonly minWave: number;
  /** Chance per qualifying attack, `0..1`. */
  readonly chance: number;
}

/**
 * Each rule owns its own band of one spawn draw, laid out in this order, so
 * every kind keeps its table rate and at most one obstacle spawns per attack.
 */
const OBSTACLE_SPAWN_RULES: readonly ObstacleSpawnRule[] = Object.freeze([
  { kind: 'timed', minWave: 5, chance: 0.15 },
  { kind: 'blocking', minWave: 3, chance: 0.1 }
]);

export function getEligibleSpawnRules(wave: number): readonly ObstacleSpawnRule[] {
  const sanitized = Number.isFinite(wave) ? Math.floor(wave) : 0;
  return OBSTACLE_SPAWN_RULES.filter((rule) => sanitized >= rule.minWave);
}
