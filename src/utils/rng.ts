export class RNG {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = seed >>> 0 || 1;
  }

  next(): number {
    // xorshift32
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state / 0x100000000;
  }

  range(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  /** Uniform integer in `[min, max]`, both ends included. */
  intInclusive(min: number, max: number): number {
    if (max <= min) {
      return min;
    }
    return Math.min(max, Math.floor(this.range(min, max + 1)));
  }

  chance(probability: number): boolean {
    if (probability <= 0) {
      return false;
    }
    if (probability >= 1) {
      return true;
    }
    return this.next() < probability;
  }

  pick<T>(array: readonly T[]): T {
    if (array.length === 0) {
      throw new Error('Attempted to pick from an empty list.');
    }
    const idx = Math.floor(this.range(0, array.length));
    return array[Math.min(idx, array.length - 1)];
  }
}
