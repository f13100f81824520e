/**
 * Canonical serialization — deterministic CBOR encoding.
 *
 * Rules:
 *   1. Stable field order (lexicographic by key)
 *   2. No floats: numbers must be safe integers, quantities are bigint
 *   3. Deterministic encoding (same state → identical bytes, always)
 *   4. CBOR (RFC 8949)
 */

import { Encoder } from "cbor-x";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

/** Sort object keys (recursive) and reject non-integer numbers. */
function normalize(value: unknown, path: string): unknown {
  if (value === null || value === undefined) return value;
  if (value instanceof Uint8Array) return value;
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new Error(`Non-integer number at ${path || "<root>"}: ${value}`);
    }
    return value;
  }
  if (Array.isArray(value)) return value.map((v, i) => normalize(v, `${path}[${i}]`));
  if (typeof value === "object") {
    const record = value as Record<string, unknown>;
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(record).sort()) {
      sorted[key] = normalize(record[key], path ? `${path}.${key}` : key);
    }
    return sorted;
  }
  return value;
}

export function canonicalEncode(obj: unknown): Uint8Array {
  return encoder.encode(normalize(obj, ""));
}

export function canonicalDecode(bytes: Uint8Array): unknown {
  return encoder.decode(bytes);
}
