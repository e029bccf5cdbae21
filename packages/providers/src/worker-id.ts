import { threadId } from "node:worker_threads";
import type { WorkerIdProvider } from "./types.js";

/** Node's thread id: 0 on the main thread, a positive integer inside workers. */
export const defaultWorkerIdProvider: WorkerIdProvider = {
  currentWorkerId: () => threadId,
};
