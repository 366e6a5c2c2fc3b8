/**
 * A read-mostly map which can hold several values for each key, preserving arrival order
 * both per key and overall (like `URLSearchParams`, but for any value type).
 */
export class MultiValueMap<T> implements Iterable<[string, T]> {
  /** @internal */ declare private readonly _entries: [string, T][];
  /** @internal */ declare private readonly _byKey: Map<string, T[]>;

  constructor(entries: Iterable<readonly [string, T]> = []) {
    this._entries = [];
    this._byKey = new Map();
    for (const [key, value] of entries) {
      this.append(key, value);
    }
  }

  append(key: string, value: T) {
    this._entries.push([key, value]);
    const values = this._byKey.get(key);
    if (values) {
      values.push(value);
    } else {
      this._byKey.set(key, [value]);
    }
  }

  /** the first value for the key */
  get(key: string): T | undefined {
    return this._byKey.get(key)?.[0];
  }

  /** a copy of every value for the key */
  getAll(key: string): T[] {
    const values = this._byKey.get(key);
    return values ? [...values] : [];
  }

  has(key: string) {
    return this._byKey.has(key);
  }

  /** the number of entries (not the number of distinct keys) */
  get size() {
    return this._entries.length;
  }

  keys() {
    return this._byKey.keys();
  }

  values() {
    return this._entries.map(([, value]) => value);
  }

  entries(): IterableIterator<[string, T]> {
    return this._entries[Symbol.iterator]();
  }

  [Symbol.iterator]() {
    return this.entries();
  }

  toObject(): Record<string, T[]> {
    const result: Record<string, T[]> = {};
    for (const [key, values] of this._byKey) {
      result[key] = [...values];
    }
    return result;
  }
}
