/**
 * Mutation request bodies.
 * Caller identity travels out of band (authenticated by the host).
 */

import { Type, type Static } from "@sinclair/typebox";
import { MAX_BATCH_BENEFICIARIES } from "../constants.js";
import { Hex32, UintString } from "./common.js";

export const MintRequest = Type.Object(
  {
    recipient: Hex32,
    amount: UintString,
  },
  { additionalProperties: false },
);

export type MintRequest = Static<typeof MintRequest>;

export const TransferRequest = Type.Object(
  {
    recipient: Hex32,
    amount: UintString,
  },
  { additionalProperties: false },
);

export type TransferRequest = Static<typeof TransferRequest>;

export const RedistributionToggleRequest = Type.Object(
  { active: Type.Boolean() },
  { additionalProperties: false },
);

export type RedistributionToggleRequest = Static<typeof RedistributionToggleRequest>;

/**
 * The list bound is enforced by the engine (batch_too_large), not here,
 * so oversize batches get the ledger's own error code.
 */
export const RedistributionExecuteRequest = Type.Object(
  { beneficiaries: Type.Array(Hex32, { maxItems: MAX_BATCH_BENEFICIARIES * 10 }) },
  { additionalProperties: false },
);

export type RedistributionExecuteRequest = Static<typeof RedistributionExecuteRequest>;

export const ClockAdvanceRequest = Type.Object(
  { blocks: UintString },
  { additionalProperties: false },
);

export type ClockAdvanceRequest = Static<typeof ClockAdvanceRequest>;
