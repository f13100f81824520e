/**
 * Account wire record.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Hex32, UintString } from "./common.js";

export const AccountV1 = Type.Object(
  {
    id: Hex32,
    registered: Type.Boolean(),
    balance: UintString,
    participation_score: UintString,
    last_activity_block: UintString,
    last_claim_block: UintString,
    cumulative_holdings: UintString,
    pending_rewards: UintString,
  },
  { additionalProperties: false },
);

export type AccountV1 = Static<typeof AccountV1>;
