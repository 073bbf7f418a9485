export type Rand = () => number;

export function round(x: number, dp: number): number {
  const f = 10 ** dp;
  return Math.round(x * f) / f;
}

/** Thin wrapper over a [0, 1) source so device models can be driven deterministically. */
export class Sampler {
  constructor(private readonly rand: Rand = Math.random) {}

  raw(lo: number, hi: number): number {
    return lo + (hi - lo) * this.rand();
  }

  uniform(lo: number, hi: number, dp = 2): number {
    return round(this.raw(lo, hi), dp);
  }

  /** inclusive on both ends */
  int(lo: number, hi: number): number {
    return lo + Math.floor(this.rand() * (hi - lo + 1));
  }

  chance(p: number): boolean {
    return this.rand() < p;
  }

  pick<T>(items: readonly [T, ...T[]]): T {
    const i = Math.min(items.length - 1, Math.floor(this.rand() * items.length));
    return items[i] ?? items[0];
  }
}
