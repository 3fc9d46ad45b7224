import { RecencyList } from "./recency-list.js";
import type { EvictionListener, Evicted, LRUOptions } from "./types.js";

type Entry<V> = {
  value: V;
  // slot of the key in `order`
  node: number;
};

export class LRUCache<K, V> {
  private storage: Map<K, Entry<V>>;
  private order: RecencyList<K>;
  private readonly limit: number;
  private readonly onEvict?: EvictionListener<K, V>;
  private readonly debug: boolean;

  constructor(capacity: number, options: LRUOptions<K, V> = {}) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new Error(
        `[lru]: capacity must be a positive integer, got ${capacity}`
      );
    }
    this.limit = capacity;
    this.storage = new Map();
    this.order = new RecencyList();
    this.onEvict = options.onEvict;
    this.debug = options.debug ?? false;
  }

  /**
   * insert or overwrite, the key becomes most-recently-used
   *
   * returns the entry evicted to make room for a new key
   */
  insert(key: K, value: V): Evicted<K, V> | undefined {
    const entry = this.storage.get(key);

    // existing → overwrite and move to MRU, size stays the same
    if (entry) {
      entry.value = value;
      this.order.moveToFront(entry.node);
      return undefined;
    }

    const evicted =
      this.order.size === this.limit ? this.evictLRU() : undefined;

    this.storage.set(key, { value, node: this.order.pushFront(key) });

    if (evicted) {
      if (this.debug) {
        console.log("[lru]: evicted", evicted.key);
      }
      this.onEvict?.(evicted.key, evicted.value);
    }

    return evicted;
  }

  /**
   * read a value, a hit moves the key to the front
   */
  get(key: K): V | undefined {
    const entry = this.storage.get(key);
    if (!entry) return undefined;

    this.order.moveToFront(entry.node);
    return entry.value;
  }

  /**
   * read a value without touching recency
   */
  peek(key: K): V | undefined {
    return this.storage.get(key)?.value;
  }

  has(key: K): boolean {
    return this.storage.has(key);
  }

  delete(key: K): boolean {
    const entry = this.storage.get(key);
    if (!entry) return false;

    this.order.remove(entry.node);
    this.storage.delete(key);
    return true;
  }

  clear(): void {
    this.storage.clear();
    this.order.clear();
  }

  get size(): number {
    return this.storage.size;
  }

  get capacity(): number {
    return this.limit;
  }

  /**
   * least recently used key
   */
  lru(): K | undefined {
    return this.order.back;
  }

  /**
   * most recently used key
   */
  mru(): K | undefined {
    return this.order.front;
  }

  /**
   * keys from most to least recently used
   *
   * mutating the cache while looping does not change what is visited
   */
  keys(): IterableIterator<K> {
    return this.order.keys();
  }

  *entries(): IterableIterator<[K, V]> {
    for (const key of this.order.keys()) {
      const entry = this.storage.get(key);
      if (entry) yield [key, entry.value];
    }
  }

  private evictLRU(): Evicted<K, V> | undefined {
    const key = this.order.popBack();
    const entry = this.storage.get(key);
    this.storage.delete(key);
    return entry && { key, value: entry.value };
  }
}
