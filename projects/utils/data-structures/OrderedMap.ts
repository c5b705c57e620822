/**
 * A map that remembers the order in which keys were first inserted.
 */
export class OrderedMap<K, V> {
  private keyMap: Map<K, V>;
  private keyList: K[];

  constructor(pairs: Iterable<[K, V]> = []) {
    this.keyMap = new Map();
    this.keyList = [];
    for (const [key, value] of pairs) {
      this.push(key, value);
    }
  }

  get(key: K) {
    return this.keyMap.get(key);
  }

  push(key: K, value: V) {
    if (this.keyMap.has(key)) {
      throw new Error(`key ${String(key)} already in map`);
    }
    this.keyMap.set(key, value);
    this.keyList.push(key);
  }

  keys(): readonly K[] {
    return this.keyList;
  }

  // Map iteration already follows first insertion
  values(): IterableIterator<V> {
    return this.keyMap.values();
  }
}
