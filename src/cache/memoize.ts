type MemoTable = {
  size(): number;
  clear(): void;
};

/**
 * Holds one result table per memoized function.
 *
 * Entries are keyed by the function's registered name plus its serialized
 * argument tuple. Tables fill lazily and are never evicted; `clear()` exists
 * for tests and for starting a fresh configuration run.
 */
export class MemoStore {
  private readonly tables = new Map<string, MemoTable>();

  memoize<A extends readonly (string | number | boolean)[], R>(
    name: string,
    fn: (...args: A) => R,
  ): (...args: A) => R {
    if (this.tables.has(name)) {
      throw new Error(`Memoized function already registered: ${name}`);
    }

    const results = new Map<string, { value: R }>();
    this.tables.set(name, {
      size: () => results.size,
      clear: () => results.clear(),
    });

    return (...args: A): R => {
      const key = JSON.stringify(args);
      const hit = results.get(key);
      if (hit) return hit.value;
      // Thrown errors are not cached: a later call retries.
      const value = fn(...args);
      results.set(key, { value });
      return value;
    };
  }

  /** Number of cached results for one function, or across all of them. */
  size(name?: string): number {
    if (name !== undefined) return this.tables.get(name)?.size() ?? 0;
    let total = 0;
    for (const table of this.tables.values()) total += table.size();
    return total;
  }

  clear(): void {
    for (const table of this.tables.values()) table.clear();
  }
}
