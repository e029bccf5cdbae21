/**
 * Beacon wire format: `key=value` pairs joined by `&`, values percent-encoded
 * as UTF-8. A beacon is the session prefix followed by one run of pairs per
 * event record; every record starts with the event type key.
 */

import { WireKey } from "./event-types.js";

export type WireValue = string | number;

/** A key with an optional value; absent values are left out of the line. */
export type WireField = readonly [key: string, value: WireValue | null | undefined];

export const FIELD_DELIMITER = "&";

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/** Unpaired surrogates become U+FFFD; `encodeURIComponent` rejects them. */
export function toWellFormed(value: string): string {
  return value.replace(LONE_SURROGATE, "\uFFFD");
}

export function encodeFields(fields: readonly WireField[]): string {
  const parts: string[] = [];
  for (const [key, value] of fields) {
    if (value === null || value === undefined) continue;
    parts.push(`${key}=${encodeURIComponent(toWellFormed(String(value)))}`);
  }
  return parts.join(FIELD_DELIMITER);
}

/**
 * Split a line into decoded key/value pairs, keeping their order.
 * A pair without `=` decodes to an empty value.
 *
 * @throws {URIError} on malformed percent-encoding
 */
export function decodePairs(line: string): Array<[string, string]> {
  if (line.length === 0) return [];
  return line.split(FIELD_DELIMITER).map((pair) => {
    const eq = pair.indexOf("=");
    if (eq < 0) return [decodeURIComponent(pair), ""];
    return [decodeURIComponent(pair.slice(0, eq)), decodeURIComponent(pair.slice(eq + 1))];
  });
}

export function decodeFields(line: string): Map<string, string> {
  return new Map(decodePairs(line));
}

export interface DecodedBeacon {
  prefix: Map<string, string>;
  records: Array<Map<string, string>>;
}

/** Split a beacon back into its prefix and per-record field sets. */
export function decodeBeacon(payload: string): DecodedBeacon {
  const prefix = new Map<string, string>();
  const records: Array<Map<string, string>> = [];
  let current: Map<string, string> | undefined;

  for (const [key, value] of decodePairs(payload)) {
    if (key === WireKey.EVENT_TYPE) {
      current = new Map();
      records.push(current);
    }
    (current ?? prefix).set(key, value);
  }
  return { prefix, records };
}
