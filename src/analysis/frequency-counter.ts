export type FrequencyEntry = [key: string, count: number];

/** Read-only view over a key -> occurrence count table. */
export interface FrequencyTable {
  readonly size: number;
  get(key: string): number;
  entries(): FrequencyEntry[];
  /**
   * Entries by descending count. Ties keep the order in which keys were first
   * counted.
   */
  mostCommon(limit?: number): FrequencyEntry[];
  toRecord(): Record<string, number>;
}

export class FrequencyCounter implements FrequencyTable {
  private readonly counts = new Map<string, number>();

  increment(key: string, by = 1): void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + by);
  }

  get size(): number {
    return this.counts.size;
  }

  get(key: string): number {
    return this.counts.get(key) ?? 0;
  }

  entries(): FrequencyEntry[] {
    return Array.from(this.counts.entries());
  }

  mostCommon(limit?: number): FrequencyEntry[] {
    // Array.prototype.sort is stable, Map iterates in insertion order
    const sorted = this.entries().sort((a, b) => b[1] - a[1]);
    return limit === undefined ? sorted : sorted.slice(0, Math.max(limit, 0));
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}
