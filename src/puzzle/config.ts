import type { StorageLike } from '../core/logging.ts';

export type DuplicateSpawnPolicy = 'overwrite' | 'reject';

export interface PuzzleConfig {
  readonly tickMs: number;
  readonly baseMana: number;
  readonly timedCountdown: number;
  readonly timedTickIntervalMs: number;
  readonly explosionDamage: number;
  readonly previewSize: number;
  readonly duplicateSpawnPolicy: DuplicateSpawnPolicy;
}

export const PUZZLE_CONFIG_STORAGE_KEY = 'puzzle-core:config';

export const DEFAULT_PUZZLE_CONFIG: PuzzleConfig = Object.freeze({
  tickMs: 100,
  baseMana: 10,
  timedCountdown: 3,
  timedTickIntervalMs: 1500,
  explosionDamage: 10,
  previewSize: 3,
  duplicateSpawnPolicy: 'overwrite'
});

function sanitizeNumber(
  value: unknown,
  fallback: number,
  min: number,
  max = Number.POSITIVE_INFINITY
): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  if (value < min || value > max) {
    return fallback;
  }
  return value;
}

function sanitizeInteger(value: unknown, fallback: number, min: number, max?: number): number {
  const numeric = sanitizeNumber(value, fallback, min, max);
  return Number.isInteger(numeric) ? numeric : fallback;
}

function sanitizePolicy(value: unknown): DuplicateSpawnPolicy {
  return value === 'reject' ? 'reject' : 'overwrite';
}

/** Fills missing or invalid fields from the defaults. */
export function resolvePuzzleConfig(
  record: Partial<Record<keyof PuzzleConfig, unknown>> | null = null
): PuzzleConfig {
  const defaults = DEFAULT_PUZZLE_CONFIG;
  return Object.freeze({
    tickMs: sanitizeNumber(record?.tickMs, defaults.tickMs, 1, 60_000),
    baseMana: sanitizeNumber(record?.baseMana, defaults.baseMana, 0),
    timedCountdown: sanitizeInteger(record?.timedCountdown, defaults.timedCountdown, 0, 99),
    timedTickIntervalMs: sanitizeNumber(
      record?.timedTickIntervalMs,
      defaults.timedTickIntervalMs,
      1,
      600_000
    ),
    explosionDamage: sanitizeNumber(record?.explosionDamage, defaults.explosionDamage, 0),
    previewSize: sanitizeInteger(record?.previewSize, defaults.previewSize, 1, 16),
    duplicateSpawnPolicy: sanitizePolicy(record?.duplicateSpawnPolicy)
  } satisfies PuzzleConfig);
}

export function loadPuzzleConfig(storage: StorageLike | null = null): PuzzleConfig {
  if (!storage) {
    return resolvePuzzleConfig();
  }
  try {
    const raw = storage.getItem(PUZZLE_CONFIG_STORAGE_KEY);
    if (!raw) {
      return resolvePuzzleConfig();
    }
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      return resolvePuzzleConfig();
    }
    return resolvePuzzleConfig(Object.fromEntries(Object.entries(parsed)));
  } catch (error) {
    console.warn('Failed to load puzzle config from storage', error);
    return resolvePuzzleConfig();
  }
}

export function savePuzzleConfig(config: PuzzleConfig, storage: StorageLike | null = null): void {
  if (!storage) {
    return;
  }
  try {
    storage.setItem(PUZZLE_CONFIG_STORAGE_KEY, JSON.stringify(resolvePuzzleConfig(config)));
  } catch (error) {
    console.warn('Failed to persist puzzle config', error);
  }
}
