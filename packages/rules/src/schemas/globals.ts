/**
 * Global ledger record + state root.
 */

import { Type, type Static } from "@sinclair/typebox";
import { UintString } from "./common.js";

export const LedgerStateV1 = Type.Object(
  {
    block: UintString,
    redistribution_pool: UintString,
    total_supply: UintString,
    total_participation_score: UintString,
    redistribution_active: Type.Boolean(),
    registered_count: UintString,
    state_root: Type.String({ pattern: "^[0-9a-f]{64}$" }),
  },
  { additionalProperties: false },
);

export type LedgerStateV1 = Static<typeof LedgerStateV1>;
