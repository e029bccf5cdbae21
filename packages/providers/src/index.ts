export type { Clock, WorkerIdProvider, SessionNumberProvider } from "./types.js";
export { defaultClock, ManualClock } from "./clock.js";
export { defaultWorkerIdProvider } from "./worker-id.js";
export { createSessionNumberProvider } from "./session-number.js";
export { getDeviceId, getDeviceIdOrRandom } from "./fingerprint.js";
