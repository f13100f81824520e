import { Type } from "@sinclair/typebox";

/** Account identity: 64-char lowercase hex public key. */
export const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

/** Unsigned integer carried as a decimal string (JSON has no bigint). */
export const UintString = Type.String({ pattern: "^(0|[1-9][0-9]*)$", maxLength: 78 });
