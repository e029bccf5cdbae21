/**
 * One serialized event fragment as stored in the cache.
 *
 * Records are immutable; `order` is a cache-wide emission counter, so
 * comparing two records' `order` tells which was recorded first regardless
 * of the session it belongs to.
 */
export interface EventRecord {
  readonly sessionId: number;
  readonly order: number;
  /** Epoch milliseconds at which the event was recorded. */
  readonly timestamp: number;
  readonly data: string;
  /** UTF-8 length of `data`. */
  readonly sizeBytes: number;
}

/** A fragment handed to the cache; the cache assigns order and size. */
export interface EventFragment {
  timestamp: number;
  data: string;
}

export type EvictionReason = "space" | "age";

export interface EventCacheEvents {
  evicted: [sessionId: number, recordCount: number, reason: EvictionReason];
}

export interface EventCacheOptions {
  /** Eviction starts once total buffered bytes exceed this value. */
  upperMemoryBoundaryBytes: number;
  /** Space eviction stops as soon as total buffered bytes are at or below this value. */
  lowerMemoryBoundaryBytes: number;
}
