/**
 * @collegium/ledger - Settlement ledger and integer money math.
 *
 * Provides the organization's Ledger collaborator as an in-process
 * implementation, plus the bigint helpers every payout computation uses.
 *
 * Design rules:
 * - All amounts are bigint base units (no floating point)
 * - Movements are atomic: settle fully or throw
 * - The transfer journal is append-only
 */

// Ledger
export { TokenLedger } from "./token-ledger.js";

// Money arithmetic
export {
  formatAmount,
  parseBaseUnits,
  assertNonNegative,
  mulDivFloor,
  sumAmounts,
} from "./money-math.js";

// Types
export type {
  TokenLedgerConfig,
  TransferKind,
  TransferRecord,
  TransferFilter,
  LedgerErrorCode,
  SerializedTransfer,
  SerializedAllowance,
  LedgerSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
