import { EventEmitter } from "node:events";
import { calculateBackoff, isRetryableError, sleep, type CapturePolicy } from "@beaconkit/core";
import type { EventCache } from "@beaconkit/cache";
import type { BeaconSendResult, StatusResponse, TransportClient } from "@beaconkit/protocol";
import type { Clock } from "@beaconkit/providers";
import { createLogger } from "@beaconkit/logger";
import type { CapturePolicyStore } from "./policy-store.js";
import type { Session, SessionRegistry } from "./session.js";

const log = createLogger("telemetry:sender");

export interface DispatchSenderEvents {
  policyChanged: [policy: CapturePolicy];
  sessionClosed: [sessionId: number];
}

export interface DispatchSenderOptions {
  transport: TransportClient;
  cache: EventCache;
  policy: CapturePolicyStore;
  clock: Clock;
  /** Pending records older than this are dropped at the start of each cycle. */
  maxRecordAgeMs: number;
  /** Status polling interval while the collector has capture disabled. */
  captureOffRetryIntervalMs: number;
  initialRetryDelayMs: number;
  maxRetryDelayMs: number;
  /** Extra status request attempts during initialization. */
  statusRetries: number;
}

interface RetryState {
  failures: number;
  nextAttemptAt: number;
}

/**
 * Background dispatcher for every session of one SDK instance.
 *
 * Sessions register as "open" when created and move to "finishing" when
 * they end. Each cycle sends open sessions first, then finishing ones, and
 * closes a finishing session once its cache is empty. Collector responses
 * replace the capture policy; a response that disables capture drops every
 * session and its data.
 *
 * A session whose sends keep failing is skipped for an exponentially
 * growing, capped interval; other sessions keep their normal schedule.
 */
export class DispatchSender extends EventEmitter<DispatchSenderEvents> implements SessionRegistry {
  private readonly options: DispatchSenderOptions;
  private readonly open = new Set<Session>();
  private readonly finishing = new Set<Session>();
  private readonly retries = new Map<Session, RetryState>();
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private initResult: Promise<boolean> | null = null;
  private stopped = false;

  constructor(options: DispatchSenderOptions) {
    super();
    this.options = options;
  }

  // ---------------------------------------------------------------------------
  // Registry
  // ---------------------------------------------------------------------------

  /** Register a new session. Repeat calls for the same session do nothing. */
  startSession(session: Session): void {
    if (this.stopped) {
      log.warn(`Session ${session.id} created after shutdown; its data will not be sent`);
      session.markClosed();
      return;
    }
    if (this.open.has(session) || this.finishing.has(session)) return;
    this.open.add(session);
  }

  /** Move an ended session to the finishing set for its final flush. */
  finishSession(session: Session): void {
    if (!this.open.delete(session)) return;
    this.finishing.add(session);
  }

  openSessions(): Session[] {
    return [...this.open];
  }

  finishingSessions(): Session[] {
    return [...this.finishing];
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Start the background loop. Calling it again while running does nothing. */
  start(): void {
    if (this.loop || this.stopped) return;

    const controller = new AbortController();
    this.controller = controller;
    this.initResult = this.initialize(controller.signal);
    this.loop = this.run(controller.signal).catch((err) => {
      log.error(`Dispatch loop terminated unexpectedly: ${err}`);
    });
  }

  /**
   * Resolve once the initial status exchange finished: `true` when the
   * collector answered, `false` when every attempt failed or the loop was
   * never started.
   */
  waitForInit(): Promise<boolean> {
    return this.initResult ?? Promise.resolve(false);
  }

  /**
   * Stop the loop after the chunk currently on the wire, end every open
   * session, and give each registered session one flush attempt. Whatever
   * is still buffered afterwards is dropped.
   */
  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    this.controller?.abort();
    if (this.loop) {
      await this.loop;
    }
    this.loop = null;
    this.controller = null;

    for (const session of [...this.open]) {
      session.end();
    }

    for (const session of [...this.finishing]) {
      const policy = this.options.policy.current();
      if (!policy.captureEnabled) break;

      const result = await session.sendBeacon(this.options.transport, policy);
      if (result.status === "failed") {
        log.debug(`Abandoning unsent data of session ${session.id} at shutdown`);
      } else if (result.status === "sent" && result.response) {
        this.applyResponse(result.response);
      }
    }

    for (const session of [...this.open, ...this.finishing]) {
      session.clearCapturedData();
      this.close(session);
    }
    log.info("Dispatch sender stopped");
  }

  // ---------------------------------------------------------------------------
  // Cycle
  // ---------------------------------------------------------------------------

  /**
   * Run one dispatch cycle: age eviction, then every due open session, then
   * every due finishing session. Exposed so hosts and tests can drive the
   * sender deterministically; the background loop calls it on its interval.
   */
  async runCycle(signal?: AbortSignal): Promise<void> {
    if (!this.options.policy.current().captureEnabled) return;

    const { cache, clock, maxRecordAgeMs } = this.options;
    const evicted = cache.evictOlderThan(clock.now() - maxRecordAgeMs);
    if (evicted > 0) {
      log.info(`Dropped ${evicted} record(s) older than ${maxRecordAgeMs}ms`);
    }

    for (const session of [...this.open]) {
      if (signal?.aborted) return;
      if (!this.isDue(session)) continue;

      const result = await session.sendBeacon(
        this.options.transport,
        this.options.policy.current(),
        signal,
      );
      if (!this.handleResult(session, result)) return;
    }

    for (const session of [...this.finishing]) {
      if (signal?.aborted) return;
      if (!this.isDue(session)) continue;

      const result = await session.sendBeacon(
        this.options.transport,
        this.options.policy.current(),
        signal,
      );
      if (!this.handleResult(session, result)) return;
      if (result.status !== "failed" && session.isEmpty()) {
        this.close(session);
      }
    }
  }

  /** Consecutive failed attempts recorded for the session. */
  failureCount(session: Session): number {
    return this.retries.get(session)?.failures ?? 0;
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async run(signal: AbortSignal): Promise<void> {
    await this.initResult;

    while (!signal.aborted) {
      if (this.options.policy.current().captureEnabled) {
        try {
          await this.runCycle(signal);
        } catch (err) {
          log.error(`Dispatch cycle failed: ${err}`);
        }
        await sleep(this.options.policy.current().sendIntervalMs, signal);
      } else {
        await sleep(this.options.captureOffRetryIntervalMs, signal);
        if (!signal.aborted) {
          await this.requestStatus();
        }
      }
    }
  }

  /** Status exchange with capped exponential backoff between attempts. */
  private async initialize(signal: AbortSignal): Promise<boolean> {
    const { statusRetries, initialRetryDelayMs, maxRetryDelayMs } = this.options;

    for (let attempt = 1; attempt <= statusRetries + 1; attempt++) {
      if (await this.requestStatus()) {
        return true;
      }
      if (attempt > statusRetries || signal.aborted) break;
      await sleep(calculateBackoff(attempt, initialRetryDelayMs, maxRetryDelayMs), signal);
      if (signal.aborted) break;
    }

    log.warn("Initial status request failed; continuing with the default capture policy");
    return false;
  }

  private async requestStatus(): Promise<boolean> {
    try {
      const response = await this.options.transport.sendStatusRequest(
        this.options.policy.current().serverId,
      );
      this.applyResponse(response);
      return true;
    } catch (err) {
      if (isRetryableError(err)) {
        log.warn(`Status request failed: ${err.message}`);
      } else {
        log.error(`Status request failed unexpectedly: ${err}`);
      }
      return false;
    }
  }

  private isDue(session: Session): boolean {
    const retry = this.retries.get(session);
    return !retry || retry.nextAttemptAt <= this.options.clock.now();
  }

  /**
   * Record the outcome of one session's send.
   * @returns false when the cycle must stop because capture was disabled
   */
  private handleResult(session: Session, result: BeaconSendResult): boolean {
    if (result.status === "failed") {
      const failures = this.failureCount(session) + 1;
      const delay = calculateBackoff(
        failures,
        this.options.initialRetryDelayMs,
        this.options.maxRetryDelayMs,
      );
      this.retries.set(session, { failures, nextAttemptAt: this.options.clock.now() + delay });
      log.warn(`Session ${session.id} send failed ${failures} time(s); retrying in ${delay}ms`);
    } else {
      this.retries.delete(session);
    }

    if (result.status !== "empty" && result.response) {
      return this.applyResponse(result.response).captureEnabled;
    }
    return true;
  }

  private applyResponse(response: StatusResponse): CapturePolicy {
    const before = this.options.policy.current();
    const after = this.options.policy.apply(response);

    if (policyDiffers(before, after)) {
      log.info(
        `Capture policy v${after.version}: capture=${after.captureEnabled} server=${after.serverId} ` +
          `maxBeacon=${after.maxBeaconSizeBytes}B multiplicity=${after.multiplicity}`,
      );
      this.emit("policyChanged", after);
    }

    if (before.captureEnabled && !after.captureEnabled) {
      this.disableCapture();
    }
    return after;
  }

  /** Drop every registered session together with all buffered data. */
  private disableCapture(): void {
    const sessions = [...this.open, ...this.finishing];
    for (const session of sessions) {
      session.clearCapturedData();
      this.close(session);
    }
    this.options.cache.purgeAll();
    log.info(`Capture disabled by collector; discarded ${sessions.length} session(s)`);
  }

  private close(session: Session): void {
    this.open.delete(session);
    this.finishing.delete(session);
    this.retries.delete(session);
    session.markClosed();
    this.emit("sessionClosed", session.id);
  }
}

function policyDiffers(a: CapturePolicy, b: CapturePolicy): boolean {
  return (
    a.captureEnabled !== b.captureEnabled ||
    a.serverId !== b.serverId ||
    a.maxBeaconSizeBytes !== b.maxBeaconSizeBytes ||
    a.multiplicity !== b.multiplicity ||
    a.monitorName !== b.monitorName ||
    a.sendIntervalMs !== b.sendIntervalMs ||
    a.captureErrors !== b.captureErrors ||
    a.captureCrashes !== b.captureCrashes
  );
}
