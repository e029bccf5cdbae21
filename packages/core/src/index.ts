export type {
  BeaconKitConfig,
  BeaconKitConfigInput,
  CacheConfig,
  CapturePolicy,
} from "./types/index.js";
export {
  beaconKitConfigSchema,
  cacheConfigSchema,
  DEFAULT_CACHE_CONFIG,
  createDefaultCapturePolicy,
  DEFAULT_SERVER_ID,
  DEFAULT_MAX_BEACON_SIZE_BYTES,
} from "./types/index.js";

export { resolveBeaconKitConfig } from "./resolve-config.js";
export {
  TransportError,
  ProtocolError,
  ConfigurationError,
  isRetryableError,
} from "./errors.js";
export { calculateBackoff, sleep } from "./backoff.js";
