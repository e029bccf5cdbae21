export type { BeaconKitOptions } from "./beaconkit.js";
export { BeaconKit, createBeaconKit } from "./beaconkit.js";

export type { SessionState, SessionRegistry } from "./session.js";
export { Session } from "./session.js";

export type { RootAction } from "./action.js";
export { ActionTracker, NULL_ACTION } from "./action.js";

export type { DispatchSenderEvents, DispatchSenderOptions } from "./dispatch-sender.js";
export { DispatchSender } from "./dispatch-sender.js";

export { CapturePolicyStore } from "./policy-store.js";
