/**
 * Snapshot persistence on the local filesystem.
 *
 * Written to `{path}.tmp` then renamed, so a crash mid-write never
 * leaves a truncated snapshot behind.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import {
  encodeSnapshot,
  decodeSnapshot,
  rootFromBytes,
  type LedgerSnapshot,
  type StateRoot,
} from "@tithe/rules";

export async function saveSnapshot(path: string, snapshot: LedgerSnapshot): Promise<StateRoot> {
  const bytes = encodeSnapshot(snapshot);
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  await writeFile(tmp, bytes);
  await rename(tmp, path);
  return rootFromBytes(bytes);
}

/**
 * Load a snapshot. Returns null if the file does not exist;
 * throws if it exists but does not decode.
 */
export async function loadSnapshot(path: string): Promise<LedgerSnapshot | null> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
  return decodeSnapshot(new Uint8Array(bytes));
}
