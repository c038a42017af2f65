/**
 * In-memory EventStore.
 *
 * The organization's history lives for the lifetime of the process; the
 * service rebuilds nothing from it. Every record is hash-chained on append
 * and subscribers are called synchronously, in order.
 */

import type { DomainEvent } from "@collegium/types";
import type { EventCatalog } from "./catalog.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";

export interface InMemoryEventStoreOptions {
  /** When set, every appended event must pass `catalog.validateEvent` */
  readonly catalog?: EventCatalog;

  /** Source of `appendedAt`. Default: wall clock */
  readonly now?: () => Date;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _catalog: EventCatalog | undefined;
  private readonly _now: () => Date;
  private _lastHash: string = GENESIS_HASH;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._catalog = options.catalog;
    this._now = options.now ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    // Validate the whole batch before anything is written
    if (this._catalog !== undefined) {
      for (const event of events) {
        const check = this._catalog.validateEvent(event);
        if (!check.valid) {
          throw new EventStoreError("INVALID_EVENT", check.reason, streamId);
        }
      }
    }

    const currentVersion = this.streamVersion(streamId);
    const expected = options?.expectedVersion ?? "any";
    if (expected === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expected === "number" && expected !== currentVersion) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = currentVersion + 1;
    const appendedAt = this._now().toISOString();
    const stored: StoredEvent[] = [];

    for (const [i, event] of events.entries()) {
      const base = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const record: StoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = record.hash;

      stream.push(record);
      this._globalLog.push(record);
      stored.push(record);
    }

    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const direction = options?.direction ?? "forward";
    const fromVersion =
      options?.fromVersion ?? (direction === "forward" ? 1 : stream.length);

    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      direction === "forward"
        ? stream.filter((e) => e.version >= fromVersion)
        : stream.filter((e) => e.version <= fromVersion).reverse();

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const direction = options?.direction ?? "forward";
    const fromPosition =
      options?.fromPosition ??
      (direction === "forward" ? 1 : this._globalLog.length);
    const types = options?.types;

    let result =
      direction === "forward"
        ? this._globalLog.filter((e) => e.globalPosition >= fromPosition)
        : this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse();

    if (types !== undefined) {
      result = result.filter((e) => types.includes(e.event.type));
    }

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  listStreams(): readonly string[] {
    return [...this._streams.keys()];
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.trim().length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    if (streamSubs !== undefined) {
      for (const handler of streamSubs) {
        for (const event of events) {
          handler(event);
        }
      }
    }

    for (const handler of this._globalSubscribers) {
      for (const event of events) {
        handler(event);
      }
    }
  }
}

function limit(
  events: readonly StoredEvent[],
  maxCount: number | undefined,
): readonly StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
