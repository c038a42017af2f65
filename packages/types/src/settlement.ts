/**
 * External collaborator contracts.
 *
 * The organization never holds balances itself. Funds live in a
 * SettlementLedger keyed by account; time comes from a Clock.
 */

import type { Account, Amount } from "./account.js";

/**
 * One leg of a multi-recipient payout.
 */
export interface TransferLeg {
  readonly to: Account;
  readonly amount: Amount;
}

/**
 * A fungible-balance ledger capable of moving funds atomically.
 *
 * Failure is signalled by throwing. A call that throws must leave
 * every balance and allowance exactly as it was.
 */
export interface SettlementLedger {
  /** Asset symbol this ledger settles (e.g. "EDU"). */
  readonly asset: string;

  /** Decimal places of the asset, for display only. */
  readonly decimals: number;

  balanceOf(account: Account): Amount;

  /** Allowance `owner` has granted to `spender`. */
  allowance(owner: Account, spender: Account): Amount;

  /** Move `amount` from `from` to `to`. */
  transfer(from: Account, to: Account, amount: Amount): void;

  /**
   * Move `amount` from `payer` to `recipient` on behalf of `spender`,
   * consuming the allowance `payer` granted to `spender`.
   */
  transferFrom(
    spender: Account,
    payer: Account,
    recipient: Account,
    amount: Amount,
  ): void;

  /**
   * Move several amounts out of `from` as one unit: either every leg
   * settles or none does.
   */
  transferBatch(from: Account, legs: readonly TransferLeg[]): void;
}

/**
 * Monotonically non-decreasing time source, in whole seconds.
 */
export interface Clock {
  now(): number;
}
