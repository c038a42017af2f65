/**
 * Event catalog.
 *
 * The registry of every event type the organization emits, with the
 * subsystem that owns it and a payload validator.
 *
 * Rules:
 * - One schema per event type; re-registering the same version is a no-op
 * - A newer version replaces the older schema
 * - Registering an older version than the current one is rejected
 * - An event is valid only when its type is known, its metadata source
 *   matches the owning subsystem and its payload passes the validator
 */

import type { DomainEvent, EventSource } from "@collegium/types";

// =============================================================================
// Event Schema
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "governance.proposal.created") */
  readonly type: string;

  /** Schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Subsystem that emits this event */
  readonly source: EventSource;

  validate(payload: unknown): boolean;
}

export type EventValidation =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: string };

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Usage:
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "catalog.course.removed",
 *   version: 1,
 *   description: "A course was soft-deleted",
 *   source: "catalog",
 *   validate: (p) => isObject(p) && hasNumber(p, "courseId"),
 * });
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * @throws CatalogError on a non-positive version or a downgrade
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${schema.version}`,
      );
    }

    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version > schema.version) {
      throw new CatalogError(
        `"${schema.type}" is registered at version ${existing.version}; cannot register version ${schema.version}`,
      );
    }
    if (existing !== undefined && existing.version === schema.version) {
      return;
    }

    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /** Sorted */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listSchemas(): readonly EventSchema[] {
    return [...this._schemas.values()];
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Payload check only. False for unregistered types.
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  /**
   * Full check of a domain event against its schema.
   */
  validateEvent(event: DomainEvent): EventValidation {
    const schema = this._schemas.get(event.type);
    if (schema === undefined) {
      return { valid: false, reason: `Unknown event type "${event.type}"` };
    }
    if (event.metadata.source !== schema.source) {
      return {
        valid: false,
        reason: `"${event.type}" belongs to "${schema.source}", got source "${event.metadata.source}"`,
      };
    }
    if (!schema.validate(event.payload)) {
      return { valid: false, reason: `Invalid payload for "${event.type}"` };
    }
    return { valid: true };
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
