import { beaconKitConfigSchema, type BeaconKitConfig } from "./types/config.js";
import { ConfigurationError } from "./errors.js";

/**
 * Validate raw configuration and apply defaults.
 *
 * @throws {ConfigurationError} listing every failing field
 */
export function resolveBeaconKitConfig(input: unknown): BeaconKitConfig {
  const result = beaconKitConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => {
        const path = issue.path.map((p) => String(p)).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join("; ");
    throw new ConfigurationError(details);
  }
  return result.data;
}
