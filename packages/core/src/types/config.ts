import { z } from "zod/v4";

export const DEFAULT_CACHE_CONFIG = {
  maxRecordAgeMs: 105 * 60 * 1000,
  lowerMemoryBoundaryBytes: 80 * 1024 * 1024,
  upperMemoryBoundaryBytes: 100 * 1024 * 1024,
} as const;

export const cacheConfigSchema = z
  .object({
    maxRecordAgeMs: z.number().int().positive(),
    lowerMemoryBoundaryBytes: z.number().int().nonnegative(),
    upperMemoryBoundaryBytes: z.number().int().positive(),
  })
  .refine((c) => c.lowerMemoryBoundaryBytes <= c.upperMemoryBoundaryBytes, {
    message: "lowerMemoryBoundaryBytes must not exceed upperMemoryBoundaryBytes",
  });

export const beaconKitConfigSchema = z.object({
  endpoint: z.url(),
  applicationId: z.string().min(1),
  applicationName: z.string().min(1),
  applicationVersion: z.string().default("0.0.0"),
  deviceId: z.string().min(1).optional(),
  operatingSystem: z.string().optional(),
  manufacturer: z.string().optional(),
  modelId: z.string().optional(),
  cache: cacheConfigSchema.default({ ...DEFAULT_CACHE_CONFIG }),
  sendIntervalMs: z.number().int().positive().default(2 * 60 * 1000),
  captureOffRetryIntervalMs: z.number().int().positive().default(2 * 60 * 60 * 1000),
  initialRetryDelayMs: z.number().int().positive().default(1000),
  maxRetryDelayMs: z.number().int().positive().default(5 * 60 * 1000),
  statusRetries: z.number().int().nonnegative().default(5),
  requestTimeoutMs: z.number().int().positive().default(30_000),
});

export type CacheConfig = z.infer<typeof cacheConfigSchema>;
export type BeaconKitConfig = z.output<typeof beaconKitConfigSchema>;
export type BeaconKitConfigInput = z.input<typeof beaconKitConfigSchema>;
