/**
 * Event Types
 *
 * Every committed state change of the organization is announced as a
 * DomainEvent. External displays rebuild history from these events;
 * the engine itself keeps only entity state.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which subsystem)
 * - Payloads are plain JSON (amounts as decimal strings)
 */

/**
 * Subsystems that emit events.
 */
export type EventSource =
  | "governance"
  | "catalog"
  | "enrollment"
  | "rating"
  | "treasury"
  | "admin";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp, derived from the organization clock */
  readonly timestamp: string;

  /** Account that caused this event */
  readonly actor: string;

  /** ID for grouping events raised by the same operation */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "governance.proposal.created") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
