/** Wall-clock source; tests inject a fake for deterministic timestamps. */
export interface Clock {
  /** Milliseconds since the Unix epoch. */
  now(): number;
}

/** Identifies the worker (thread) on which an event was recorded. */
export interface WorkerIdProvider {
  currentWorkerId(): number;
}

/** Hands out process-unique session numbers. */
export interface SessionNumberProvider {
  next(): number;
}
