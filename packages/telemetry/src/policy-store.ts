import type { CapturePolicy } from "@beaconkit/core";
import type { CapturePolicySource, StatusResponse } from "@beaconkit/protocol";

/**
 * Holds the current capture policy snapshot.
 *
 * Readers call {@link current} and keep the frozen object they get; only the
 * dispatch sender calls {@link apply}, which swaps in a whole new snapshot
 * with the next version number.
 */
export class CapturePolicyStore implements CapturePolicySource {
  private snapshot: CapturePolicy;

  constructor(initial: CapturePolicy) {
    this.snapshot = Object.freeze({ ...initial });
  }

  current(): CapturePolicy {
    return this.snapshot;
  }

  /** Merge a collector response; fields it leaves out keep their value. */
  apply(response: StatusResponse): CapturePolicy {
    const prev = this.snapshot;
    this.snapshot = Object.freeze({
      version: prev.version + 1,
      captureEnabled: response.captureEnabled ?? prev.captureEnabled,
      serverId: response.serverId ?? prev.serverId,
      maxBeaconSizeBytes:
        response.maxBeaconSizeKB !== undefined
          ? response.maxBeaconSizeKB * 1024
          : prev.maxBeaconSizeBytes,
      multiplicity: response.multiplicity ?? prev.multiplicity,
      monitorName: response.monitorName ?? prev.monitorName,
      sendIntervalMs:
        response.sendIntervalSeconds !== undefined
          ? response.sendIntervalSeconds * 1000
          : prev.sendIntervalMs,
      captureErrors: response.captureErrors ?? prev.captureErrors,
      captureCrashes: response.captureCrashes ?? prev.captureCrashes,
    });
    return this.snapshot;
  }
}
