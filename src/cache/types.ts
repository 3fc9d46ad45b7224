export type EvictionListener<K, V> = (key: K, value: V) => void;

export type LRUOptions<K, V> = {
  /**
   * Called once per eviction, after the cache is consistent again
   *
   * not called for overwrites, `delete()` or `clear()`
   */
  onEvict?: EvictionListener<K, V>;
  /**
   * Logs every eviction to the console
   */
  debug?: boolean;
};

export type Evicted<K, V> = {
  key: K;
  value: V;
};
