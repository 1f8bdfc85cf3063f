interface IndexItem {
  key: string;
  value: number;
}

/**
 * Keys ordered by a numeric value, with inclusive range lookups.
 * A key appears at most once; setting it again moves it.
 */
export class SortedIndex {
  private readonly items: Array<IndexItem> = [];
  private readonly values = new Map<string, number>();

  get size(): number {
    return this.items.length;
  }

  set(key: string, value: number): void {
    this.remove(key);
    this.items.splice(this.lowerBound(value, key), 0, { key, value });
    this.values.set(key, value);
  }

  remove(key: string): void {
    const value = this.values.get(key);
    if (value === undefined) return;

    const idx = this.lowerBound(value, key);
    if (this.items[idx]?.key === key) {
      this.items.splice(idx, 1);
    }
    this.values.delete(key);
  }

  /** Keys whose value lies within [low, high], in ascending order. */
  between(low: number, high: number): Array<string> {
    if (Number.isNaN(low) || Number.isNaN(high) || low > high) return [];

    const keys: Array<string> = [];
    for (let i = this.lowerBound(low); i < this.items.length; i++) {
      const item = this.items[i];
      if (!item || item.value > high) break;
      keys.push(item.key);
    }
    return keys;
  }

  clear(): void {
    this.items.length = 0;
    this.values.clear();
  }

  /**
   * First position whose (value, key) is not less than the given pair.
   * Without a key, the first position whose value is >= `value`.
   */
  private lowerBound(value: number, key?: string): number {
    let lo = 0;
    let hi = this.items.length;

    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const item = this.items[mid];
      if (!item) break;

      const isLess =
        item.value < value ||
        (key !== undefined && item.value === value && item.key < key);

      if (isLess) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }

    return lo;
  }
}
