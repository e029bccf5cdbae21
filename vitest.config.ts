import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    alias: {
      "@beaconkit/logger": pkg("logger"),
      "@beaconkit/core": pkg("core"),
      "@beaconkit/providers": pkg("providers"),
      "@beaconkit/cache": pkg("cache"),
      "@beaconkit/protocol": pkg("protocol"),
      "@beaconkit/telemetry": pkg("telemetry"),
    },
  },
});
