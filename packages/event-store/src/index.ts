/**
 * @collegium/event-store - Append-only, hash-chained event history.
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  UnhashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

export { EventCatalog, CatalogError } from "./catalog.js";
export type { EventSchema, EventValidation } from "./catalog.js";

export { ACADEMY_EVENTS, createAcademyCatalog } from "./academy-events.js";
export type {
  AcademyEventType,
  ProposalCreatedPayload,
  ProposalVotedPayload,
  ProposalExecutedPayload,
  CourseCreatedPayload,
  CourseRemovedPayload,
  ApplicationSubmittedPayload,
  EnrollmentVoteRecordedPayload,
  EnrollmentConfirmedPayload,
  PayoutLine,
  CourseCompletedPayload,
  RatingGivenPayload,
  BonusDistributedPayload,
  TreasuryPayoutPayload,
  ProposalDurationSetPayload,
  FundsRescuedPayload,
} from "./academy-events.js";
