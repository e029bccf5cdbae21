import type { CapturePolicy } from "@beaconkit/core";
import type { EventCache, EventRecord } from "@beaconkit/cache";
import type { Clock, WorkerIdProvider } from "@beaconkit/providers";
import { createLogger } from "@beaconkit/logger";
import {
  AGENT_TECHNOLOGY,
  EventType,
  PLATFORM_TYPE,
  PROTOCOL_VERSION,
  SDK_VERSION,
  WireKey,
} from "./event-types.js";
import { encodeFields, FIELD_DELIMITER, type WireField } from "./wire.js";
import type { TransportClient } from "./transport.js";
import type { StatusResponse } from "./status-response.js";
import type {
  ActionData,
  BeaconDeviceInfo,
  BeaconSendResult,
  CapturePolicySource,
} from "./types.js";

const log = createLogger("protocol:beacon-builder");

const encoder = new TextEncoder();

export interface BeaconBuilderOptions {
  sessionNumber: number;
  cache: EventCache;
  policy: CapturePolicySource;
  clock: Clock;
  workerIds: WorkerIdProvider;
  device: BeaconDeviceInfo;
}

/**
 * Serializes one session's events into wire fragments and ships them.
 *
 * Reporting methods are synchronous and never throw: they encode the event,
 * hand it to the cache and return. Nothing here touches the network except
 * {@link send}, which only the dispatch loop calls.
 */
export class BeaconBuilder {
  readonly sessionNumber: number;
  readonly sessionStartTime: number;

  private readonly cache: EventCache;
  private readonly policy: CapturePolicySource;
  private readonly clock: Clock;
  private readonly workerIds: WorkerIdProvider;
  private readonly device: BeaconDeviceInfo;
  private nextSequence = 1;
  private nextActionId = 1;

  constructor(options: BeaconBuilderOptions) {
    this.sessionNumber = options.sessionNumber;
    this.cache = options.cache;
    this.policy = options.policy;
    this.clock = options.clock;
    this.workerIds = options.workerIds;
    this.device = options.device;
    this.sessionStartTime = options.clock.now();
  }

  createActionId(): number {
    return this.nextActionId++;
  }

  createSequenceNumber(): number {
    return this.nextSequence++;
  }

  currentTimestamp(): number {
    return this.clock.now();
  }

  startSession(): void {
    this.record(this.sessionStartTime, EventType.SESSION_START, [
      [WireKey.PARENT_ACTION_ID, 0],
      [WireKey.START_SEQUENCE, this.createSequenceNumber()],
      [WireKey.TIME_0, 0],
    ]);
  }

  reportAction(action: ActionData): void {
    this.record(action.startTime, EventType.ACTION, [
      [WireKey.NAME, action.name],
      [WireKey.ACTION_ID, action.id],
      [WireKey.PARENT_ACTION_ID, action.parentId],
      [WireKey.START_SEQUENCE, action.startSequence],
      [WireKey.TIME_0, this.offset(action.startTime)],
      [WireKey.END_SEQUENCE, action.endSequence],
      [WireKey.TIME_1, action.endTime - action.startTime],
    ]);
  }

  reportEvent(parentActionId: number, name: string | null | undefined): void {
    const now = this.clock.now();
    this.record(now, EventType.NAMED_EVENT, [
      [WireKey.NAME, name],
      [WireKey.PARENT_ACTION_ID, parentActionId],
      [WireKey.START_SEQUENCE, this.createSequenceNumber()],
      [WireKey.TIME_0, this.offset(now)],
    ]);
  }

  /** Strings, integers and doubles are sent as distinct event types. */
  reportValue(
    parentActionId: number,
    name: string | null | undefined,
    value: string | number | null | undefined,
  ): void {
    const now = this.clock.now();
    this.record(now, valueEventType(value), [
      [WireKey.NAME, name],
      [WireKey.PARENT_ACTION_ID, parentActionId],
      [WireKey.START_SEQUENCE, this.createSequenceNumber()],
      [WireKey.TIME_0, this.offset(now)],
      [WireKey.VALUE, value],
    ]);
  }

  reportError(
    parentActionId: number,
    name: string | null | undefined,
    code: number,
    reason: string | null | undefined,
  ): void {
    if (!this.policy.current().captureErrors) return;
    const now = this.clock.now();
    this.record(now, EventType.ERROR, [
      [WireKey.NAME, name],
      [WireKey.PARENT_ACTION_ID, parentActionId],
      [WireKey.START_SEQUENCE, this.createSequenceNumber()],
      [WireKey.TIME_0, this.offset(now)],
      [WireKey.ERROR_CODE, code],
      [WireKey.REASON, reason],
    ]);
  }

  identifyUser(userTag: string | null | undefined): void {
    const now = this.clock.now();
    this.record(now, EventType.IDENTIFY_USER, [
      [WireKey.NAME, userTag],
      [WireKey.PARENT_ACTION_ID, 0],
      [WireKey.START_SEQUENCE, this.createSequenceNumber()],
      [WireKey.TIME_0, this.offset(now)],
    ]);
  }

  reportCrash(
    errorName: string | null | undefined,
    reason: string | null | undefined,
    stacktrace: string | null | undefined,
  ): void {
    if (!this.policy.current().captureCrashes) return;
    const now = this.clock.now();
    this.record(now, EventType.CRASH, [
      [WireKey.NAME, errorName],
      [WireKey.PARENT_ACTION_ID, 0],
      [WireKey.START_SEQUENCE, this.createSequenceNumber()],
      [WireKey.TIME_0, this.offset(now)],
      [WireKey.REASON, reason],
      [WireKey.STACKTRACE, stacktrace],
    ]);
  }

  endSession(endTime: number): void {
    this.record(endTime, EventType.SESSION_END, [
      [WireKey.PARENT_ACTION_ID, 0],
      [WireKey.START_SEQUENCE, this.createSequenceNumber()],
      [WireKey.TIME_0, this.offset(endTime)],
    ]);
  }

  clearData(): void {
    this.cache.purge(this.sessionNumber);
  }

  isEmpty(): boolean {
    return this.cache.isEmpty(this.sessionNumber);
  }

  /**
   * Send everything pending for this session, one chunk of at most
   * `policy.maxBeaconSizeBytes` per request, oldest records first.
   *
   * A failed chunk goes back to the head of the queue and ends the attempt;
   * later chunks stay pending for the next cycle. `signal` is checked
   * between chunks, never in the middle of one.
   */
  async send(
    transport: TransportClient,
    policy: CapturePolicy,
    signal?: AbortSignal,
  ): Promise<BeaconSendResult> {
    if (this.cache.isEmpty(this.sessionNumber)) {
      return { status: "empty" };
    }

    let chunks = 0;
    let response: StatusResponse | undefined;

    while (!signal?.aborted) {
      const prefix = this.buildPrefix(policy);
      const budget = policy.maxBeaconSizeBytes - encoder.encode(prefix).length;
      const records = this.cache.drain(this.sessionNumber, budget, FIELD_DELIMITER.length);
      if (records.length === 0) break;

      const payload = encoder.encode(joinChunk(prefix, records));
      try {
        response = await transport.sendBeaconRequest(policy.serverId, payload);
      } catch (err) {
        this.cache.requeue(this.sessionNumber, records);
        const error = err instanceof Error ? err : new Error(String(err));
        log.warn(
          `Beacon chunk for session ${this.sessionNumber} failed (${records.length} records): ${error.message}`,
        );
        return { status: "failed", chunks, response, error };
      }

      this.cache.confirmSent(this.sessionNumber, records);
      chunks++;
      log.debug(
        `Sent chunk ${chunks} for session ${this.sessionNumber}: ${records.length} records, ${payload.length} bytes`,
      );
    }

    return { status: "sent", chunks, response };
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private record(timestamp: number, type: EventType, fields: readonly WireField[]): void {
    if (!this.policy.current().captureEnabled) return;

    const data = encodeFields([
      [WireKey.EVENT_TYPE, type],
      [WireKey.SESSION_NUMBER, this.sessionNumber],
      [WireKey.WORKER_ID, this.workerIds.currentWorkerId()],
      ...fields,
    ]);
    this.cache.put(this.sessionNumber, { timestamp, data });
  }

  private offset(timestamp: number): number {
    return timestamp - this.sessionStartTime;
  }

  private buildPrefix(policy: CapturePolicy): string {
    const d = this.device;
    return encodeFields([
      [WireKey.PROTOCOL_VERSION, PROTOCOL_VERSION],
      [WireKey.SDK_VERSION, SDK_VERSION],
      [WireKey.APPLICATION_ID, d.applicationId],
      [WireKey.APPLICATION_NAME, d.applicationName],
      [WireKey.APPLICATION_VERSION, d.applicationVersion],
      [WireKey.PLATFORM_TYPE, PLATFORM_TYPE],
      [WireKey.AGENT_TECHNOLOGY, AGENT_TECHNOLOGY],
      [WireKey.VISITOR_ID, d.deviceId],
      [WireKey.SESSION_NUMBER, this.sessionNumber],
      [WireKey.CLIENT_IP, d.clientIp],
      [WireKey.OPERATING_SYSTEM, d.operatingSystem],
      [WireKey.MANUFACTURER, d.manufacturer],
      [WireKey.MODEL_ID, d.modelId],
      [WireKey.MULTIPLICITY, policy.multiplicity],
      [WireKey.SESSION_START_TIME, this.sessionStartTime],
      [WireKey.TIMESYNC_TIME, this.sessionStartTime],
      [WireKey.TRANSMISSION_TIME, this.clock.now()],
    ]);
  }
}

function valueEventType(value: string | number | null | undefined): EventType {
  if (typeof value === "number") {
    return Number.isInteger(value) ? EventType.VALUE_INT : EventType.VALUE_DOUBLE;
  }
  return EventType.VALUE_STRING;
}

function joinChunk(prefix: string, records: readonly EventRecord[]): string {
  let chunk = prefix;
  for (const record of records) {
    chunk += FIELD_DELIMITER + record.data;
  }
  return chunk;
}
