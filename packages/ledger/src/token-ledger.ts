/**
 * @collegium/ledger - In-process settlement ledger.
 *
 * Holds fungible balances and allowances for a single asset and moves
 * funds between accounts. Every movement is journaled; the journal is
 * append-only and replayable.
 *
 * API surface:
 * - mint() - Issue new units to an account
 * - approve() / allowance() - Spending allowances
 * - transfer() / transferFrom() - Single movements
 * - transferBatch() - Several movements out of one account, all or nothing
 * - balanceOf() / totalSupply - Queries
 * - getTransfers() - Journal queries
 * - snapshot() / fromSnapshot() - Persistence
 */

import type {
  Account,
  Amount,
  SettlementLedger,
  TransferLeg,
} from "@collegium/types";
import { isAccount } from "@collegium/types";
import { assertNonNegative, formatAmount, sumAmounts } from "./money-math.js";
import type {
  LedgerSnapshot,
  SerializedAllowance,
  SerializedTransfer,
  TokenLedgerConfig,
  TransferFilter,
  TransferKind,
  TransferRecord,
} from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Single-asset token ledger.
 *
 * A call either settles completely or throws before touching state.
 */
export class TokenLedger implements SettlementLedger {
  readonly asset: string;
  readonly decimals: number;

  private readonly _balances = new Map<Account, Amount>();
  private readonly _allowances = new Map<Account, Map<Account, Amount>>();
  private readonly _journal: TransferRecord[] = [];
  private _supply = 0n;
  private _nextCorrelation = 1;

  constructor(config: TokenLedgerConfig) {
    this.asset = config.asset;
    this.decimals = config.decimals;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(account: Account): Amount {
    return this._balances.get(account) ?? 0n;
  }

  allowance(owner: Account, spender: Account): Amount {
    return this._allowances.get(owner)?.get(spender) ?? 0n;
  }

  get totalSupply(): Amount {
    return this._supply;
  }

  /**
   * Render an amount in whole-asset units, e.g. "12.500000 EDU".
   */
  format(amount: Amount): string {
    return `${formatAmount(amount, this.decimals)} ${this.asset}`;
  }

  getTransfers(filter?: TransferFilter): readonly TransferRecord[] {
    if (filter === undefined) {
      return [...this._journal];
    }
    return this._journal.filter((record) => {
      if (
        filter.account !== undefined &&
        record.from !== filter.account &&
        record.to !== filter.account
      ) {
        return false;
      }
      if (filter.correlationId !== undefined && record.correlationId !== filter.correlationId) {
        return false;
      }
      if (filter.kind !== undefined && record.kind !== filter.kind) {
        return false;
      }
      return true;
    });
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Issue new units. Used to fund accounts in development and tests.
   */
  mint(to: Account, amount: Amount): void {
    this._assertAccount(to);
    this._assertPositive(amount);

    const correlationId = this._correlation();
    this._credit(to, amount);
    this._supply += amount;
    this._record("mint", null, to, amount, correlationId);
  }

  /**
   * Set the allowance `owner` grants to `spender` (replaces any previous value).
   */
  approve(owner: Account, spender: Account, amount: Amount): void {
    this._assertAccount(owner);
    this._assertAccount(spender);
    assertNonNegative(amount);

    let spenders = this._allowances.get(owner);
    if (spenders === undefined) {
      spenders = new Map();
      this._allowances.set(owner, spenders);
    }
    spenders.set(spender, amount);
  }

  transfer(from: Account, to: Account, amount: Amount): void {
    this._assertAccount(from);
    this._assertAccount(to);
    this._assertPositive(amount);
    this._assertFunds(from, amount);

    const correlationId = this._correlation();
    this._move(from, to, amount);
    this._record("transfer", from, to, amount, correlationId);
  }

  transferFrom(
    spender: Account,
    payer: Account,
    recipient: Account,
    amount: Amount,
  ): void {
    this._assertAccount(spender);
    this._assertAccount(payer);
    this._assertAccount(recipient);
    this._assertPositive(amount);

    const allowed = this.allowance(payer, spender);
    if (allowed < amount) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOWANCE",
        `Allowance of "${spender}" over "${payer}" is ${allowed.toString()}, needs ${amount.toString()}`,
      );
    }
    this._assertFunds(payer, amount);

    const correlationId = this._correlation();
    this._allowances.get(payer)?.set(spender, allowed - amount);
    this._move(payer, recipient, amount);
    this._record("transfer-from", payer, recipient, amount, correlationId, spender);
  }

  /**
   * Settle every leg or none. Zero-amount legs are accepted and skipped.
   */
  transferBatch(from: Account, legs: readonly TransferLeg[]): void {
    if (legs.length === 0) {
      throw new LedgerError("EMPTY_BATCH", "Cannot settle an empty batch");
    }
    this._assertAccount(from);
    for (const leg of legs) {
      this._assertAccount(leg.to);
      assertNonNegative(leg.amount, `Leg to "${leg.to}"`);
    }
    this._assertFunds(from, sumAmounts(legs.map((leg) => leg.amount)));

    const correlationId = this._correlation();
    for (const leg of legs) {
      if (leg.amount === 0n) continue;
      this._move(from, leg.to, leg.amount);
      this._record("transfer", from, leg.to, leg.amount, correlationId);
    }
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    const allowances: SerializedAllowance[] = [];
    for (const [owner, spenders] of this._allowances) {
      for (const [spender, amount] of spenders) {
        allowances.push({ owner, spender, amount: amount.toString() });
      }
    }

    return {
      version: 1,
      config: { asset: this.asset, decimals: this.decimals },
      journal: this._journal.map(serializeTransfer),
      allowances,
    };
  }

  /**
   * Restore a ledger by replaying its journal, preserving full validation.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): TokenLedger {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported ledger snapshot version: ${String(snapshot.version)}`,
      );
    }

    const ledger = new TokenLedger(snapshot.config);

    for (const record of snapshot.journal) {
      const amount = BigInt(record.amount);
      if (record.from === null) {
        ledger._assertAccount(record.to);
        ledger._credit(record.to, amount);
        ledger._supply += amount;
      } else {
        ledger._assertAccount(record.from);
        ledger._assertAccount(record.to);
        ledger._assertFunds(record.from, amount);
        ledger._move(record.from, record.to, amount);
      }
      ledger._journal.push({
        sequence: record.sequence,
        kind: record.kind,
        from: record.from,
        to: record.to,
        amount,
        spender: record.spender,
        correlationId: record.correlationId,
      });
    }
    ledger._nextCorrelation = snapshot.journal.length + 1;

    for (const allowance of snapshot.allowances) {
      ledger.approve(allowance.owner, allowance.spender, BigInt(allowance.amount));
    }

    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _assertAccount(account: Account): void {
    if (!isAccount(account)) {
      throw new LedgerError("INVALID_ACCOUNT", `Invalid account: "${account}"`);
    }
  }

  private _assertPositive(amount: Amount): void {
    if (amount <= 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Amount must be positive, got ${amount.toString()}`,
      );
    }
  }

  private _assertFunds(account: Account, amount: Amount): void {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Balance of "${account}" is ${balance.toString()}, needs ${amount.toString()}`,
      );
    }
  }

  private _credit(account: Account, amount: Amount): void {
    this._balances.set(account, this.balanceOf(account) + amount);
  }

  private _move(from: Account, to: Account, amount: Amount): void {
    this._balances.set(from, this.balanceOf(from) - amount);
    this._credit(to, amount);
  }

  private _correlation(): string {
    return `${this.asset.toLowerCase()}-tx-${String(this._nextCorrelation++)}`;
  }

  private _record(
    kind: TransferKind,
    from: Account | null,
    to: Account,
    amount: Amount,
    correlationId: string,
    spender?: Account,
  ): void {
    this._journal.push({
      sequence: this._journal.length + 1,
      kind,
      from,
      to,
      amount,
      spender,
      correlationId,
    });
  }
}

function serializeTransfer(record: TransferRecord): SerializedTransfer {
  return {
    sequence: record.sequence,
    kind: record.kind,
    from: record.from,
    to: record.to,
    amount: record.amount.toString(),
    ...(record.spender !== undefined ? { spender: record.spender } : {}),
    correlationId: record.correlationId,
  };
}
