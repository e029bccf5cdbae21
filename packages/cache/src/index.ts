export type {
  EventRecord,
  EventFragment,
  EventCacheEvents,
  EventCacheOptions,
  EvictionReason,
} from "./types.js";
export { EventCache } from "./event-cache.js";
