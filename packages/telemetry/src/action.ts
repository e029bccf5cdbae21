import type { ActionData, BeaconBuilder } from "@beaconkit/protocol";

/** Handle returned by `Session.enterAction`. */
export interface RootAction {
  readonly id: number;
  readonly name: string;
  reportEvent(eventName: string | null | undefined): RootAction;
  reportValue(valueName: string | null | undefined, value: string | number | null | undefined): RootAction;
  reportError(
    errorName: string | null | undefined,
    errorCode: number,
    reason: string | null | undefined,
  ): RootAction;
  /** Close the action and record it. Calling it again does nothing. */
  leaveAction(): void;
  isLeft(): boolean;
}

/**
 * Tracks the open root actions of one session and writes each action's
 * fragment once it is left.
 *
 * The tracker owns its actions; an action knows its session only by number
 * and reaches the tracker through the narrow `leave` callback.
 */
export class ActionTracker {
  private readonly openActions = new Map<number, Action>();

  constructor(private readonly beacon: BeaconBuilder) {}

  enter(name: string): RootAction {
    const action = new Action(
      this.beacon.createActionId(),
      name,
      this.beacon.sessionNumber,
      this.beacon,
      (id) => this.leave(id),
    );
    this.openActions.set(action.id, action);
    return action;
  }

  openCount(): number {
    return this.openActions.size;
  }

  private leave(actionId: number): void {
    const action = this.openActions.get(actionId);
    if (!action) return;
    this.openActions.delete(actionId);
    this.beacon.reportAction(action.toActionData());
  }
}

class Action implements RootAction {
  private readonly startTime: number;
  private readonly startSequence: number;
  private endTime = -1;
  private endSequence = -1;

  constructor(
    readonly id: number,
    readonly name: string,
    readonly sessionNumber: number,
    private readonly beacon: BeaconBuilder,
    private readonly onLeave: (actionId: number) => void,
  ) {
    this.startTime = beacon.currentTimestamp();
    this.startSequence = beacon.createSequenceNumber();
  }

  reportEvent(eventName: string | null | undefined): RootAction {
    if (!this.isLeft()) {
      this.beacon.reportEvent(this.id, eventName);
    }
    return this;
  }

  reportValue(
    valueName: string | null | undefined,
    value: string | number | null | undefined,
  ): RootAction {
    if (!this.isLeft()) {
      this.beacon.reportValue(this.id, valueName, value);
    }
    return this;
  }

  reportError(
    errorName: string | null | undefined,
    errorCode: number,
    reason: string | null | undefined,
  ): RootAction {
    if (!this.isLeft()) {
      this.beacon.reportError(this.id, errorName, errorCode, reason);
    }
    return this;
  }

  leaveAction(): void {
    if (this.isLeft()) return;
    this.endTime = this.beacon.currentTimestamp();
    this.endSequence = this.beacon.createSequenceNumber();
    this.onLeave(this.id);
  }

  isLeft(): boolean {
    return this.endTime !== -1;
  }

  toActionData(): ActionData {
    return {
      id: this.id,
      name: this.name,
      parentId: 0,
      startTime: this.startTime,
      endTime: this.endTime,
      startSequence: this.startSequence,
      endSequence: this.endSequence,
    };
  }
}

/** Returned once a session has ended; every call is a no-op. */
export const NULL_ACTION: RootAction = Object.freeze({
  id: 0,
  name: "",
  reportEvent: () => NULL_ACTION,
  reportValue: () => NULL_ACTION,
  reportError: () => NULL_ACTION,
  leaveAction: () => undefined,
  isLeft: () => true,
});
