import { Logger } from "tslog";

/** Environment variable overriding the minimum tslog level (0 = silly … 6 = fatal). */
export const LOG_LEVEL_ENV = "BEACONKIT_LOG_LEVEL";

/**
 * Resolve the minimum log level.
 * An explicit, valid `BEACONKIT_LOG_LEVEL` wins; otherwise production logs
 * from `info` upward and everything else logs all levels.
 */
export function resolveMinLevel(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env[LOG_LEVEL_ENV];
  if (raw !== undefined && /^[0-6]$/.test(raw.trim())) {
    return Number(raw.trim());
  }
  return env.NODE_ENV === "production" ? 3 : 0;
}

export function createLogger(name: string): Logger<unknown> {
  return new Logger({
    name,
    type: "pretty",
    minLevel: resolveMinLevel(),
  });
}
