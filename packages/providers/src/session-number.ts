import type { SessionNumberProvider } from "./types.js";

const MAX_SESSION_NUMBER = 0x7fffffff;

/**
 * Sequential session numbers starting at `first`, wrapping back to 1 after
 * the signed 32-bit maximum so the value always fits the wire format.
 */
export function createSessionNumberProvider(first = 1): SessionNumberProvider {
  let next = first;
  return {
    next: () => {
      const current = next;
      next = current >= MAX_SESSION_NUMBER ? 1 : current + 1;
      return current;
    },
  };
}
