/**
 * AcademyService - Composition root for the organization.
 *
 * Wires the academy to its settlement ledger and an event store that
 * receives every committed event. Route handlers reach the domain only
 * through this service.
 */

import pino from "pino";
import type { Logger } from "pino";
import { Academy } from "@collegium/academy";
import { TokenLedger } from "@collegium/ledger";
import { InMemoryEventStore, createAcademyCatalog } from "@collegium/event-store";
import type {
  StoredEvent,
  ReadOptions,
  ReadAllOptions,
  EventStoreIntegrityResult,
} from "@collegium/event-store";
import type { Account, Amount, Clock, DomainEvent } from "@collegium/types";

// =============================================================================
// Configuration
// =============================================================================

export interface AcademyServiceConfig {
  readonly owner: Account;
  readonly treasuryAccount: Account;
  readonly initialBoard: readonly Account[];
  readonly proposalDurationSeconds: number;
  readonly paymentAsset: string;
  readonly paymentDecimals: number;
}

export interface AcademyServiceOptions {
  /** Default: silent */
  readonly logger?: Logger;
  /** Default: the system clock */
  readonly clock?: Clock;
}

export interface LedgerAccountView {
  readonly account: Account;
  readonly asset: string;
  readonly decimals: number;
  readonly balance: string;
  /** What the treasury may still collect from this account */
  readonly allowance: string;
}

// =============================================================================
// Service
// =============================================================================

export class AcademyService {
  readonly academy: Academy;
  readonly ledger: TokenLedger;
  readonly eventStore: InMemoryEventStore;

  private readonly _logger: Logger;
  private _ready = false;

  constructor(config: AcademyServiceConfig, options: AcademyServiceOptions = {}) {
    this._logger = options.logger ?? pino({ level: "silent" });
    this.ledger = new TokenLedger({
      asset: config.paymentAsset,
      decimals: config.paymentDecimals,
    });
    this.eventStore = new InMemoryEventStore({ catalog: createAcademyCatalog() });

    this.academy = new Academy({
      owner: config.owner,
      treasuryAccount: config.treasuryAccount,
      initialBoard: config.initialBoard,
      proposalDurationSeconds: config.proposalDurationSeconds,
      ledger: this.ledger,
      clock: options.clock,
      sink: { publish: (streamId, event) => this._commit(streamId, event) },
    });

    this._ready = true;
  }

  // ─── Settlement Ledger ─────────────────────────────────────────────

  ledgerAccount(account: Account): LedgerAccountView {
    return {
      account,
      asset: this.ledger.asset,
      decimals: this.ledger.decimals,
      balance: this.ledger.balanceOf(account).toString(),
      allowance: this.ledger.allowance(account, this.academy.treasuryAccount).toString(),
    };
  }

  /**
   * Let the treasury collect up to `amount` from `owner`. Replaces any
   * earlier allowance.
   */
  approveTreasury(owner: Account, amount: Amount): LedgerAccountView {
    this.ledger.approve(owner, this.academy.treasuryAccount, amount);
    return this.ledgerAccount(owner);
  }

  /**
   * Development faucet.
   */
  mint(to: Account, amount: Amount): LedgerAccountView {
    this.ledger.mint(to, amount);
    this._logger.info({ to, amount: amount.toString() }, "Faucet mint");
    return this.ledgerAccount(to);
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(
    streamId: string,
    options?: ReadOptions,
  ): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  // ─── Health & Integrity ──────────────────────────────────────────

  /**
   * Verify event store integrity. Called by /ready.
   */
  checkEventStore(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._ready = false;
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _commit(streamId: string, event: DomainEvent): void {
    const result = this.eventStore.append(streamId, [event]);
    this._logger.debug(
      {
        type: event.type,
        streamId,
        version: result.toVersion,
        correlationId: event.metadata.correlationId,
      },
      "Event committed",
    );
  }
}
