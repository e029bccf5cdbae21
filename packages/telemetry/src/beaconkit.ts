import {
  createDefaultCapturePolicy,
  resolveBeaconKitConfig,
  type BeaconKitConfig,
  type BeaconKitConfigInput,
  type CapturePolicy,
} from "@beaconkit/core";
import { EventCache } from "@beaconkit/cache";
import { BeaconBuilder, HttpTransportClient, type TransportClient } from "@beaconkit/protocol";
import {
  createSessionNumberProvider,
  defaultClock,
  defaultWorkerIdProvider,
  getDeviceIdOrRandom,
  type Clock,
  type SessionNumberProvider,
  type WorkerIdProvider,
} from "@beaconkit/providers";
import { createLogger } from "@beaconkit/logger";
import { CapturePolicyStore } from "./policy-store.js";
import { DispatchSender } from "./dispatch-sender.js";
import { Session } from "./session.js";

const log = createLogger("telemetry:beaconkit");

export interface BeaconKitOptions {
  /** Defaults to an {@link HttpTransportClient} for the configured endpoint. */
  transport?: TransportClient;
  clock?: Clock;
  workerIds?: WorkerIdProvider;
  sessionNumbers?: SessionNumberProvider;
  /** Start the background dispatch loop immediately (default: true). */
  autoStart?: boolean;
}

/**
 * Entry point for host applications: owns the cache, the capture policy and
 * the dispatch sender, and creates sessions wired to all three.
 */
export class BeaconKit {
  readonly config: BeaconKitConfig;

  private readonly cache: EventCache;
  private readonly policy: CapturePolicyStore;
  private readonly sender: DispatchSender;
  private readonly clock: Clock;
  private readonly workerIds: WorkerIdProvider;
  private readonly sessionNumbers: SessionNumberProvider;
  private readonly deviceId: string;

  constructor(config: BeaconKitConfig, options: BeaconKitOptions = {}) {
    this.config = config;
    this.clock = options.clock ?? defaultClock;
    this.workerIds = options.workerIds ?? defaultWorkerIdProvider;
    this.sessionNumbers = options.sessionNumbers ?? createSessionNumberProvider();
    this.deviceId = config.deviceId ?? getDeviceIdOrRandom();

    this.cache = new EventCache({
      lowerMemoryBoundaryBytes: config.cache.lowerMemoryBoundaryBytes,
      upperMemoryBoundaryBytes: config.cache.upperMemoryBoundaryBytes,
    });
    this.policy = new CapturePolicyStore(createDefaultCapturePolicy(config.sendIntervalMs));

    const transport =
      options.transport ??
      new HttpTransportClient({
        endpoint: config.endpoint,
        applicationId: config.applicationId,
        requestTimeoutMs: config.requestTimeoutMs,
      });

    this.sender = new DispatchSender({
      transport,
      cache: this.cache,
      policy: this.policy,
      clock: this.clock,
      maxRecordAgeMs: config.cache.maxRecordAgeMs,
      captureOffRetryIntervalMs: config.captureOffRetryIntervalMs,
      initialRetryDelayMs: config.initialRetryDelayMs,
      maxRetryDelayMs: config.maxRetryDelayMs,
      statusRetries: config.statusRetries,
    });

    if (options.autoStart ?? true) {
      this.sender.start();
    }
    log.info(`BeaconKit started for application ${config.applicationId}`);
  }

  /** Create and register a new session. */
  createSession(clientIp?: string): Session {
    const beacon = new BeaconBuilder({
      sessionNumber: this.sessionNumbers.next(),
      cache: this.cache,
      policy: this.policy,
      clock: this.clock,
      workerIds: this.workerIds,
      device: {
        applicationId: this.config.applicationId,
        applicationName: this.config.applicationName,
        applicationVersion: this.config.applicationVersion,
        deviceId: this.deviceId,
        operatingSystem: this.config.operatingSystem,
        manufacturer: this.config.manufacturer,
        modelId: this.config.modelId,
        clientIp,
      },
    });
    return new Session(this.sender, beacon);
  }

  /**
   * Wait until the first status exchange finished, at most `timeoutMs`.
   * @returns whether the collector answered in time
   */
  async waitForInitCompletion(timeoutMs?: number): Promise<boolean> {
    if (timeoutMs === undefined) {
      return this.sender.waitForInit();
    }
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
      timer.unref();
    });
    try {
      return await Promise.race([this.sender.waitForInit(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  getPolicy(): CapturePolicy {
    return this.policy.current();
  }

  /** The dispatcher, for hosts that drive cycles themselves. */
  getSender(): DispatchSender {
    return this.sender;
  }

  /** Flush once and stop. Safe to call more than once. */
  shutdown(): Promise<void> {
    return this.sender.shutdown();
  }
}

/**
 * Validate raw configuration and create a BeaconKit instance.
 *
 * @throws {ConfigurationError} when the configuration is invalid
 */
export function createBeaconKit(
  config: BeaconKitConfigInput,
  options?: BeaconKitOptions,
): BeaconKit {
  return new BeaconKit(resolveBeaconKitConfig(config), options);
}
