/**
 * Runtime Type Guards
 *
 * Narrowing functions used at system boundaries
 * (API inputs, restored snapshots, deserialized events).
 */

import type { Account, MemberRole, Role } from "./account.js";
import { ZERO_ACCOUNT } from "./account.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Identity guards
// =============================================================================

const ROLES = new Set<string>(["none", "board", "teacher", "student"]);
const MEMBER_ROLE_SET = new Set<string>(["board", "teacher", "student"]);

/**
 * A usable account: a non-empty, trimmed string that is not the zero sentinel.
 */
export function isAccount(value: unknown): value is Account {
  return (
    typeof value === "string" &&
    value.length > 0 &&
    value.trim() === value &&
    value !== ZERO_ACCOUNT
  );
}

export function isZeroAccount(value: unknown): boolean {
  return value === ZERO_ACCOUNT;
}

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLES.has(value);
}

export function isMemberRole(value: unknown): value is MemberRole {
  return typeof value === "string" && MEMBER_ROLE_SET.has(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>([
  "governance",
  "catalog",
  "enrollment",
  "rating",
  "treasury",
  "admin",
]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  return (
    "eventId" in value && typeof value.eventId === "string" &&
    "timestamp" in value && typeof value.timestamp === "string" &&
    "actor" in value && typeof value.actor === "string" &&
    "correlationId" in value && typeof value.correlationId === "string" &&
    "source" in value && isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  return (
    "type" in value && typeof value.type === "string" &&
    "metadata" in value && isEventMetadata(value.metadata) &&
    "payload" in value && value.payload !== null &&
    typeof value.payload === "object"
  );
}
