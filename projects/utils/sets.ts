export type ConstSet<T> = Pick<Set<T>, 'size' | 'has'> & Iterable<T>;

/**
 * A map whose keys are compared through a string hash rather than by
 * reference. Iteration follows insertion order.
 */
export class HashMap<K, V> {
  private hasher: (item: K) => string;
  private data: Map<string, [K, V]> = new Map();
  constructor(hasher: (item: K) => string, pairs?: Iterable<[K, V]>) {
    this.hasher = hasher;
    if (pairs) {
      for (const [key, value] of pairs) {
        this.set(key, value);
      }
    }
  }
  clear(): void {
    this.data.clear();
  }
  delete(key: K): boolean {
    return this.data.delete(this.hasher(key));
  }
  get(key: K): V | undefined {
    return this.data.get(this.hasher(key))?.[1];
  }
  has(key: K): boolean {
    return this.data.has(this.hasher(key));
  }
  set(key: K, value: V): this {
    this.data.set(this.hasher(key), [key, value]);
    return this;
  }
  get size(): number {
    return this.data.size;
  }
  *entries(): IterableIterator<[K, V]> {
    for (const [key, value] of this.data.values()) {
      yield [key, value];
    }
  }
  *keys(): IterableIterator<K> {
    for (const [key] of this.data.values()) {
      yield key;
    }
  }
  *values(): IterableIterator<V> {
    for (const [, value] of this.data.values()) {
      yield value;
    }
  }
  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }
  get [Symbol.toStringTag](): string {
    return 'HashMap';
  }
}

/**
 * A set whose members are compared through a string hash rather than by
 * reference. The hasher must be injective for the set to be exact.
 */
export class HashSet<T> implements ConstSet<T> {
  private data: Map<string, T> = new Map();
  private hasher: (item: T) => string;
  constructor(hasher: (item: T) => string, items?: Iterable<T>) {
    this.hasher = hasher;
    if (items) {
      for (const item of items) {
        this.add(item);
      }
    }
  }
  get size() {
    return this.data.size;
  }
  add(value: T): this {
    this.data.set(this.hasher(value), value);
    return this;
  }
  /**
   * Add every item of `values`.
   * @returns whether the set grew
   */
  addAll(values: Iterable<T>): boolean {
    const before = this.size;
    for (const value of values) {
      this.add(value);
    }
    return this.size > before;
  }
  clear(): void {
    this.data.clear();
  }
  delete(value: T): boolean {
    return this.data.delete(this.hasher(value));
  }
  has(value: T): boolean {
    return this.data.has(this.hasher(value));
  }
  values(): IterableIterator<T> {
    return this.data.values();
  }
  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  equals(other: HashSet<T>): boolean {
    if (this.size != other.size) {
      return false;
    }
    for (const key of this.data.keys()) {
      if (!other.data.has(key)) {
        return false;
      }
    }
    return true;
  }

  /**
   * A canonical string for the whole set, independent of insertion order.
   */
  hash(): string {
    const keys = [...this.data.keys()];
    keys.sort();
    return `{${keys.join(',')}}`;
  }

  get [Symbol.toStringTag](): string {
    return 'HashSet';
  }
}
