export type {
  BeaconKitConfig,
  BeaconKitConfigInput,
  CacheConfig,
} from "./config.js";
export { beaconKitConfigSchema, cacheConfigSchema, DEFAULT_CACHE_CONFIG } from "./config.js";

export type { CapturePolicy } from "./policy.js";
export {
  createDefaultCapturePolicy,
  DEFAULT_SERVER_ID,
  DEFAULT_MAX_BEACON_SIZE_BYTES,
} from "./policy.js";
