/**
 * @collegium/types - Shared domain types for the Collegium stack.
 *
 * Used across all Collegium packages:
 * - Identity (accounts, roles)
 * - External collaborator contracts (settlement ledger, clock)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types - meaning lives in consuming code
 */

// Identity
export type { Account, Role, MemberRole, Amount, BasisPoints } from "./account.js";
export { ZERO_ACCOUNT, MEMBER_ROLES, TOTAL_BASIS_POINTS } from "./account.js";

// Collaborators
export type { SettlementLedger, TransferLeg, Clock } from "./settlement.js";

// Events
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isAccount,
  isZeroAccount,
  isRole,
  isMemberRole,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
