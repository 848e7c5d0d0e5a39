export interface RankedEntry<T> {
  value: T;
  score: number;
}

/**
 * Keeps the `limit` highest-scoring entries in descending order. Equal scores
 * keep arrival order, and a newcomer that only ties the lowest kept entry of
 * a full list is turned away.
 */
export class TopNSelector<T> {
  private readonly entries: RankedEntry<T>[] = [];
  private readonly limit: number;

  constructor(limit: number) {
    this.limit = limit;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Returns true when the entry was kept. */
  offer(value: T, score: number): boolean {
    if (this.limit <= 0) return false;
    if (this.entries.length >= this.limit && score <= this.entries[this.entries.length - 1].score) {
      return false;
    }
    // First position whose score is strictly lower.
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.entries[mid].score >= score) lo = mid + 1;
      else hi = mid;
    }
    this.entries.splice(lo, 0, { value, score });
    if (this.entries.length > this.limit) this.entries.pop();
    return true;
  }

  results(): RankedEntry<T>[] {
    return [...this.entries];
  }
}
