import { randomIndex, type RandomSource } from '../lib/random.ts';
import { TILE_CATEGORIES, type TileCategory } from './types.ts';

export const DEFAULT_PREVIEW_SIZE = 3;

export function randomCategory(random: RandomSource): TileCategory {
  return TILE_CATEGORIES[randomIndex(random, TILE_CATEGORIES.length)];
}

/**
 * Queue of upcoming refill tiles shown to the player. Refill consumes from
 * the front; the queue is topped up immediately so it never runs short.
 */
export class TilePreview {
  private readonly queue: TileCategory[] = [];

  constructor(
    private readonly random: RandomSource,
    private readonly size = DEFAULT_PREVIEW_SIZE
  ) {
    this.fill();
  }

  private fill(): void {
    while (this.queue.length < this.size) {
      this.queue.push(randomCategory(this.random));
    }
  }

  peekAll(): TileCategory[] {
    return this.queue.slice();
  }

  consumeNext(): TileCategory {
    const next = this.queue.shift() ?? randomCategory(this.random);
    this.fill();
    return next;
  }

  get length(): number {
    return this.queue.length;
  }

  /** Discards the queue and draws a fresh one. */
  reset(): void {
    this.queue.length = 0;
    this.fill();
  }
}
