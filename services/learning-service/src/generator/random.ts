import { DAY_MS } from '../services/context';

/**
 * Random source returning floats in [0, 1), like Math.random.
 */
export type RandomSource = () => number;

/**
 * Seeded generator (mulberry32) for reproducible fixtures.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class RandomPicker {
  constructor(private readonly random: RandomSource = Math.random) {}

  /** Integer in [min, max], both inclusive */
  int(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  coin(): boolean {
    return this.random() < 0.5;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error('Cannot pick from an empty list');
    }
    return items[this.int(0, items.length - 1)];
  }

  /** `count` distinct items in random order */
  sample<T>(items: readonly T[], count: number): T[] {
    const pool = [...items];
    for (let i = pool.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, Math.min(count, pool.length));
  }

  daysAgo(now: Date, min: number, max: number): Date {
    return new Date(now.getTime() - this.int(min, max) * DAY_MS);
  }

  daysAhead(now: Date, min: number, max: number): Date {
    return new Date(now.getTime() + this.int(min, max) * DAY_MS);
  }
}
