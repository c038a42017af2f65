/**
 * Event store types.
 *
 * Append-only persistence for the organization's domain events.
 *
 * Rules:
 * - Stored events are never updated or deleted
 * - Stream versions are contiguous (1, 2, 3, ...)
 * - Global positions are contiguous across all streams
 * - Optimistic concurrency via an expected stream version
 */

import type { DomainEvent } from "@collegium/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A domain event as persisted, with its position and chain link.
 */
export interface StoredEvent {
  readonly event: DomainEvent;

  readonly streamId: string;

  /** 1-based position within the stream */
  readonly version: number;

  /** 1-based position across all streams */
  readonly globalPosition: number;

  /** Wall-clock time of persistence (not the domain timestamp) */
  readonly appendedAt: string;

  /** SHA-256 of this record chained to its predecessor */
  readonly hash: string;

  /** Hash of the preceding record, or "genesis" */
  readonly previousHash: string;
}

/**
 * The part of a StoredEvent covered by its hash.
 */
export type UnhashedStoredEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append / Read
// =============================================================================

/**
 * - A number: the stream must be at exactly this version
 * - "no_stream": the stream must not exist yet
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Inclusive, 1-based. Default: 1 (or the head when reading backward) */
  readonly fromVersion?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Inclusive, 1-based. Default: 1 (or the head when reading backward) */
  readonly fromPosition?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
  /** Only events of these types */
  readonly types?: readonly string[];
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

export interface EventStore {
  /**
   * Append events to a stream as one unit.
   *
   * @throws EventStoreError on a concurrency conflict, an empty batch
   *   or a payload the configured catalog rejects
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** 0 when the stream does not exist */
  streamVersion(streamId: string): number;

  /** 0 when the store is empty */
  globalPosition(): number;

  /** IDs of every stream, in first-append order */
  listStreams(): readonly string[];

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION"
  | "INVALID_EVENT";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
