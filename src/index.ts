export { LRUCache } from "./cache/lru.js";
export { RecencyList } from "./cache/recency-list.js";
export type { EvictionListener, Evicted, LRUOptions } from "./cache/types.js";
