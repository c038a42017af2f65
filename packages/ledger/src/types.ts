/**
 * @collegium/ledger - Internal types for the token ledger.
 *
 * Rules:
 * - All types are readonly
 * - Journal records are never mutated or removed
 * - Fail-closed: invalid transfers throw, never silently succeed
 */

import type { Account, Amount } from "@collegium/types";

// ─── Configuration ───────────────────────────────────────────────────────

export interface TokenLedgerConfig {
  /** Asset symbol (e.g. "EDU") */
  readonly asset: string;
  /** Decimal places used when formatting amounts for display */
  readonly decimals: number;
}

// ─── Journal ─────────────────────────────────────────────────────────────

export type TransferKind = "mint" | "transfer" | "transfer-from";

/**
 * One settled movement of funds. Mints have no `from`.
 */
export interface TransferRecord {
  /** Journal position (1-based, monotonically increasing) */
  readonly sequence: number;
  readonly kind: TransferKind;
  readonly from: Account | null;
  readonly to: Account;
  readonly amount: Amount;
  /** Account that spent an allowance (transfer-from only) */
  readonly spender?: Account | undefined;
  /** Records settled together share a correlation ID */
  readonly correlationId: string;
}

export interface TransferFilter {
  /** Match records where the account is sender or recipient */
  readonly account?: Account | undefined;
  readonly correlationId?: string | undefined;
  readonly kind?: TransferKind | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "EMPTY_BATCH"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger.
 * Always thrown - never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface SerializedTransfer {
  readonly sequence: number;
  readonly kind: TransferKind;
  readonly from: string | null;
  readonly to: string;
  readonly amount: string;
  readonly spender?: string | undefined;
  readonly correlationId: string;
}

export interface SerializedAllowance {
  readonly owner: string;
  readonly spender: string;
  readonly amount: string;
}

/**
 * Serializable snapshot of the ledger. Amounts are decimal strings of
 * base units so the snapshot survives JSON.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly config: TokenLedgerConfig;
  readonly journal: readonly SerializedTransfer[];
  readonly allowances: readonly SerializedAllowance[];
}
