/**
 * Treasury - the organization's account on the settlement ledger.
 *
 * Holds no balance itself; every figure is read from the ledger. Ledger
 * refusals surface as TRANSFER_FAILED with the ledger's error as `cause`.
 *
 * Rules:
 * - Payments are pulled with the student's allowance to the treasury
 * - Multi-recipient payouts settle as one batch or not at all
 * - Rescue moves any registered asset, including the payment asset
 */

import type { Account, Amount, SettlementLedger } from "@collegium/types";
import { isAccount } from "@collegium/types";
import { sumAmounts } from "@collegium/ledger";
import { AcademyError } from "./errors.js";
import type { Payout } from "./types.js";

export class Treasury {
  private readonly _assets = new Map<string, SettlementLedger>();

  constructor(
    private readonly _ledger: SettlementLedger,
    public readonly account: Account,
    otherAssets: readonly SettlementLedger[] = [],
  ) {
    if (!isAccount(account)) {
      throw new AcademyError("INVALID_ACCOUNT", `Invalid treasury account: "${account}"`);
    }
    for (const ledger of [_ledger, ...otherAssets]) {
      this._assets.set(ledger.asset, ledger);
    }
  }

  get asset(): string {
    return this._ledger.asset;
  }

  get decimals(): number {
    return this._ledger.decimals;
  }

  balance(): Amount {
    return this._ledger.balanceOf(this.account);
  }

  /** Assets the treasury can rescue, payment asset first */
  assets(): readonly string[] {
    return [...this._assets.keys()];
  }

  /**
   * @throws AcademyError INSUFFICIENT_TREASURY
   */
  assertCovers(amount: Amount): void {
    const balance = this.balance();
    if (balance < amount) {
      throw new AcademyError(
        "INSUFFICIENT_TREASURY",
        `Treasury holds ${balance.toString()} ${this.asset}, needs ${amount.toString()}`,
      );
    }
  }

  /**
   * Pull `amount` from `payer` into the treasury.
   */
  collect(payer: Account, amount: Amount): void {
    settle(() => this._ledger.transferFrom(this.account, payer, this.account, amount));
  }

  payOut(to: Account, amount: Amount): void {
    assertPayout(to, amount);
    this.assertCovers(amount);
    settle(() => this._ledger.transfer(this.account, to, amount));
  }

  /**
   * Pay several recipients atomically. Zero payouts are skipped.
   */
  distribute(payouts: readonly Payout[]): void {
    const legs = payouts.filter((p) => p.amount > 0n);
    if (legs.length === 0) {
      return;
    }
    this.assertCovers(sumAmounts(legs.map((l) => l.amount)));
    settle(() => this._ledger.transferBatch(this.account, legs));
  }

  /**
   * @throws AcademyError UNKNOWN_ASSET if no ledger for `asset` is registered
   */
  rescue(asset: string, to: Account, amount: Amount): void {
    const ledger = this._assets.get(asset);
    if (ledger === undefined) {
      throw new AcademyError("UNKNOWN_ASSET", `No ledger registered for asset "${asset}"`);
    }
    assertPayout(to, amount);
    settle(() => ledger.transfer(this.account, to, amount));
  }
}

function assertPayout(to: Account, amount: Amount): void {
  if (amount < 0n) {
    throw new AcademyError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount.toString()}`);
  }
  if (amount === 0n) {
    throw new AcademyError("ZERO_AMOUNT", "Amount must be greater than zero");
  }
  if (!isAccount(to)) {
    throw new AcademyError("INVALID_ACCOUNT", `Invalid recipient: "${to}"`);
  }
}

function settle(move: () => void): void {
  try {
    move();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new AcademyError("TRANSFER_FAILED", `Settlement refused: ${reason}`, { cause: err });
  }
}
