import type { CapturePolicy } from "@beaconkit/core";
import type { BeaconBuilder, BeaconSendResult, TransportClient } from "@beaconkit/protocol";
import { createLogger } from "@beaconkit/logger";
import { ActionTracker, NULL_ACTION, type RootAction } from "./action.js";

const log = createLogger("telemetry:session");

export type SessionState = "active" | "ending" | "closed";

/** Where sessions announce themselves; implemented by the dispatch sender. */
export interface SessionRegistry {
  startSession(session: Session): void;
  finishSession(session: Session): void;
}

/**
 * A bounded period of host-application activity.
 *
 * State machine: `active` → `ending` (on {@link end}) → `closed` (once the
 * dispatch sender has flushed or discarded the session). Recording calls
 * never throw, whatever the state; in `closed` there is nobody left to ship
 * the data, so they are dropped.
 */
export class Session {
  readonly id: number;

  private readonly beacon: BeaconBuilder;
  private readonly registry: SessionRegistry;
  private readonly actions: ActionTracker;
  private state: SessionState = "active";
  private endTime = -1;

  constructor(registry: SessionRegistry, beacon: BeaconBuilder) {
    this.id = beacon.sessionNumber;
    this.beacon = beacon;
    this.registry = registry;
    this.actions = new ActionTracker(beacon);

    registry.startSession(this);
    if (this.state === "active") {
      beacon.startSession();
    }
  }

  getState(): SessionState {
    return this.state;
  }

  getStartTime(): number {
    return this.beacon.sessionStartTime;
  }

  /** Epoch ms at which {@link end} was called, or -1. */
  getEndTime(): number {
    return this.endTime;
  }

  /**
   * Open a root action. A missing name is recorded as the empty string.
   * After {@link end} an inert action is returned.
   */
  enterAction(actionName?: string | null): RootAction {
    if (this.state !== "active") {
      log.debug(`enterAction on ${this.state} session ${this.id} ignored`);
      return NULL_ACTION;
    }
    return this.actions.enter(actionName ?? "");
  }

  openActionCount(): number {
    return this.actions.openCount();
  }

  identifyUser(userTag?: string | null): void {
    if (this.state === "closed") return;
    this.beacon.identifyUser(userTag);
  }

  reportCrash(
    errorName?: string | null,
    reason?: string | null,
    stacktrace?: string | null,
  ): void {
    if (this.state === "closed") return;
    this.beacon.reportCrash(errorName, reason, stacktrace);
  }

  reportValue(valueName: string | null | undefined, value: string | number | null | undefined): void {
    if (this.state === "closed") return;
    this.beacon.reportValue(0, valueName, value);
  }

  /**
   * End the session: timestamp it, record the end fragment and hand it to
   * the dispatch sender for its final flush. Only the first call has any
   * effect. Actions still open are not closed; one reaches the cache only
   * if the caller leaves it later.
   */
  end(): void {
    if (this.state !== "active") return;

    this.state = "ending";
    this.endTime = this.beacon.currentTimestamp();
    this.beacon.endSession(this.endTime);
    this.registry.finishSession(this);
    log.debug(
      `Session ${this.id} ending with ${this.actions.openCount()} action(s) still open`,
    );
  }

  isEmpty(): boolean {
    return this.beacon.isEmpty();
  }

  clearCapturedData(): void {
    this.beacon.clearData();
  }

  /** Ship buffered data; called from the dispatch loop only. */
  sendBeacon(
    transport: TransportClient,
    policy: CapturePolicy,
    signal?: AbortSignal,
  ): Promise<BeaconSendResult> {
    return this.beacon.send(transport, policy, signal);
  }

  /** Called by the dispatch sender once the session leaves its registry. */
  markClosed(): void {
    this.state = "closed";
  }
}
