import { ExerciseCatalogService } from "./exerciseCatalog.service";

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export class ExerciseSamplerService {
  constructor(
    private readonly catalog: ExerciseCatalogService,
    private readonly random: RandomSource = Math.random
  ) {}

  /**
   * Draws up to `n` distinct exercises for `label`, uniformly without
   * replacement. Asking for more than the entry holds returns the whole entry
   * in shuffled order.
   */
  sample(label: string, n: number): string[] {
    if (!Number.isFinite(n) || n <= 0) {
      return [];
    }

    const pool = [...this.catalog.lookup(label)];
    const count = Math.min(Math.floor(n), pool.length);

    // partial Fisher-Yates: the first `count` slots end up as the sample
    for (let i = 0; i < count; i++) {
      const j = i + Math.floor(this.random() * (pool.length - i));
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }

    return pool.slice(0, count);
  }
}
