/**
 * State roots — SHA-256 over canonical CBOR.
 *
 * Two ledgers hold identical state iff their snapshots share a root.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";

/** 32-byte hex-encoded SHA-256 digest. */
export type StateRoot = string;

export function rootFromBytes(bytes: Uint8Array): StateRoot {
  return bytesToHex(sha256(bytes));
}
