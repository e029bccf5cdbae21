import { TransportError } from "@beaconkit/core";
import { EventCache } from "@beaconkit/cache";
import { BeaconBuilder, type StatusResponse, type TransportClient } from "@beaconkit/protocol";
import type { Clock } from "@beaconkit/providers";
import type { CapturePolicyStore } from "./policy-store.js";

export function statusResponse(overrides: Partial<StatusResponse> = {}): StatusResponse {
  return {
    captureEnabled: undefined,
    serverId: undefined,
    maxBeaconSizeKB: undefined,
    multiplicity: undefined,
    monitorName: undefined,
    sendIntervalSeconds: undefined,
    captureErrors: undefined,
    captureCrashes: undefined,
    ...overrides,
  };
}

export interface StubTransport extends TransportClient {
  /** Decoded beacon payloads, in send order. */
  payloads: string[];
  statusRequests: number;
  /** Fail the next `n` beacon requests. */
  failBeacons(n: number): void;
  /** Fail the next `n` status requests. */
  failStatus(n: number): void;
  /** Response returned for beacon and status requests from now on. */
  respondWith(response: StatusResponse): void;
}

/** In-process collector stand-in. */
export function stubTransport(): StubTransport {
  const decoder = new TextDecoder();
  let response = statusResponse({ captureEnabled: true });
  let beaconFailures = 0;
  let statusFailures = 0;

  const transport: StubTransport = {
    payloads: [],
    statusRequests: 0,
    failBeacons: (n) => {
      beaconFailures = n;
    },
    failStatus: (n) => {
      statusFailures = n;
    },
    respondWith: (r) => {
      response = r;
    },
    sendStatusRequest: async () => {
      transport.statusRequests++;
      if (statusFailures > 0) {
        statusFailures--;
        throw new TransportError("HTTP 503: unavailable", { status: 503 });
      }
      return response;
    },
    sendBeaconRequest: async (_serverId, payload) => {
      if (beaconFailures > 0) {
        beaconFailures--;
        throw new TransportError("HTTP 503: unavailable", { status: 503 });
      }
      transport.payloads.push(decoder.decode(payload));
      return response;
    },
  };
  return transport;
}

export function createTestCache(): EventCache {
  return new EventCache({ upperMemoryBoundaryBytes: 1_000_000, lowerMemoryBoundaryBytes: 800_000 });
}

export function createTestBeacon(
  sessionNumber: number,
  cache: EventCache,
  policy: CapturePolicyStore,
  clock: Clock,
): BeaconBuilder {
  return new BeaconBuilder({
    sessionNumber,
    cache,
    policy,
    clock,
    workerIds: { currentWorkerId: () => 0 },
    device: {
      applicationId: "app-1",
      applicationName: "Demo",
      applicationVersion: "1.0.0",
      deviceId: "device-1",
    },
  });
}
