/**
 * Backend-controlled capture settings.
 *
 * Snapshots are immutable; a new snapshot with a higher `version` replaces
 * the previous one after every successful exchange with the collector.
 */
export interface CapturePolicy {
  readonly version: number;
  readonly captureEnabled: boolean;
  readonly serverId: number;
  readonly maxBeaconSizeBytes: number;
  /** Sampling factor, forwarded untouched in every beacon. */
  readonly multiplicity: number;
  readonly monitorName: string | null;
  readonly sendIntervalMs: number;
  readonly captureErrors: boolean;
  readonly captureCrashes: boolean;
}

export const DEFAULT_SERVER_ID = 1;
export const DEFAULT_MAX_BEACON_SIZE_BYTES = 30 * 1024;

export function createDefaultCapturePolicy(sendIntervalMs: number): CapturePolicy {
  return Object.freeze({
    version: 0,
    captureEnabled: true,
    serverId: DEFAULT_SERVER_ID,
    maxBeaconSizeBytes: DEFAULT_MAX_BEACON_SIZE_BYTES,
    multiplicity: 1,
    monitorName: null,
    sendIntervalMs,
    captureErrors: true,
    captureCrashes: true,
  });
}
