/**
 * Schema barrel export.
 * All V1 wire types of the ledger API.
 */

export { Hex32, UintString } from "./common.js";
export { AccountV1 } from "./account.js";
export { LedgerStateV1 } from "./globals.js";
export {
  MintRequest,
  TransferRequest,
  RedistributionToggleRequest,
  RedistributionExecuteRequest,
  ClockAdvanceRequest,
} from "./requests.js";
