import { z } from "zod/v4";
import { ProtocolError } from "@beaconkit/core";
import { decodePairs } from "./wire.js";

/**
 * Settings reported by the collector. Fields the collector leaves out are
 * `undefined` and keep their previous value when applied.
 */
export interface StatusResponse {
  captureEnabled: boolean | undefined;
  serverId: number | undefined;
  maxBeaconSizeKB: number | undefined;
  multiplicity: number | undefined;
  /** Opaque to the SDK. */
  monitorName: string | undefined;
  sendIntervalSeconds: number | undefined;
  captureErrors: boolean | undefined;
  captureCrashes: boolean | undefined;
}

const flag = z.enum(["0", "1"]).transform((v) => v === "1");
const integer = z
  .string()
  .regex(/^-?\d+$/)
  .transform(Number);
const positiveInteger = integer.pipe(z.number().int().positive());

const statusLineSchema = z.object({
  type: z.literal("m"),
  cp: flag.optional(),
  id: integer.optional(),
  bl: positiveInteger.optional(),
  mp: integer.optional(),
  bn: z.string().optional(),
  si: positiveInteger.optional(),
  er: flag.optional(),
  cr: flag.optional(),
});

/**
 * Parse the collector's `type=m&cp=1&id=…` status line.
 * Unknown keys are ignored.
 *
 * @throws {ProtocolError} when the line is not a valid status response
 */
export function parseStatusResponse(body: string): StatusResponse {
  const line = body.trim();

  let pairs: Array<[string, string]>;
  try {
    pairs = decodePairs(line);
  } catch (err) {
    throw new ProtocolError(`Malformed status response encoding: ${err}`, body);
  }

  const result = statusLineSchema.safeParse(Object.fromEntries(pairs));
  if (!result.success) {
    const fields = result.error.issues.map((i) => i.path.map((p) => String(p)).join(".")).join(", ");
    throw new ProtocolError(`Malformed status response (${fields})`, body);
  }

  const s = result.data;
  return {
    captureEnabled: s.cp,
    serverId: s.id,
    maxBeaconSizeKB: s.bl,
    multiplicity: s.mp,
    monitorName: s.bn,
    sendIntervalSeconds: s.si,
    captureErrors: s.er,
    captureCrashes: s.cr,
  };
}
