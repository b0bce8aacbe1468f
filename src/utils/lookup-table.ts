/**
 * Frozen lookup tables keyed by text read from records (unit symbols) or by
 * atomic number. Keys like `"__proto__"` are plain misses, never prototype hits.
 *
 * @packageDocumentation
 */

/**
 * Immutable key/value table. Later duplicates win at construction.
 *
 * @example
 * ```ts
 * const scale = new LookupTable([
 *   ['J/mol', 1],
 *   ['kJ/mol', 1000],
 * ]);
 * scale.get('kJ/mol'); // 1000
 * scale.get('toString'); // undefined
 * ```
 */
export class LookupTable<K, V> {
  private readonly entries: ReadonlyMap<K, V>;

  constructor(entries: Iterable<readonly [K, V]>) {
    const map = new Map<K, V>();
    for (const [key, value] of entries) {
      map.set(key, value);
    }
    this.entries = map;
  }

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  /** Like `get`, but a miss is reported through `onMissing`. */
  require(key: K, onMissing: (key: K) => Error): V {
    const value = this.entries.get(key);
    if (value === undefined) {
      throw onMissing(key);
    }
    return value;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
