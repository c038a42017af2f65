/**
 * Domain event publication.
 *
 * Each committed operation announces what changed as one or more
 * DomainEvents sharing a correlation id. Publication happens only after
 * every state change of the operation has been applied.
 */

import { randomUUID } from "node:crypto";
import type { Account, Clock, DomainEvent, EventSource } from "@collegium/types";

/**
 * Receiver of committed events, e.g. an EventStore adapter.
 */
export interface EventSink {
  publish(streamId: string, event: DomainEvent): void;
}

export interface Notification {
  readonly streamId: string;
  readonly type: string;
  readonly source: EventSource;
  readonly payload: Readonly<Record<string, unknown>>;
}

export class Notifier {
  constructor(
    private readonly _sink: EventSink | undefined,
    private readonly _clock: Clock,
    private readonly _newId: () => string = randomUUID,
  ) {}

  /**
   * Publish the notifications of one operation, in order.
   */
  emit(actor: Account, notifications: readonly Notification[]): readonly DomainEvent[] {
    const correlationId = this._newId();
    const timestamp = new Date(this._clock.now() * 1000).toISOString();

    const events = notifications.map((n) => {
      const event: DomainEvent = {
        type: n.type,
        metadata: {
          eventId: this._newId(),
          timestamp,
          actor,
          correlationId,
          source: n.source,
        },
        payload: n.payload,
      };
      return { streamId: n.streamId, event };
    });

    if (this._sink !== undefined) {
      for (const { streamId, event } of events) {
        this._sink.publish(streamId, event);
      }
    }

    return events.map((e) => e.event);
  }
}

// ─── Stream Names ────────────────────────────────────────────────────

export const streams = {
  proposal: (id: number): string => `proposal-${id}`,
  course: (id: number): string => `course-${id}`,
  enrollment: (courseId: number, student: Account): string =>
    `enrollment-${courseId}-${student}`,
  teacher: (account: Account): string => `teacher-${account}`,
  treasury: (): string => "treasury",
  admin: (): string => "admin",
};
