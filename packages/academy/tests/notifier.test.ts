/**
 * Tests for Notifier and ManualClock.
 */

import { describe, it, expect } from "vitest";
import { ManualClock } from "../src/clock.js";
import { Notifier, streams } from "../src/notifier.js";
import { RecordingSink } from "./helpers.js";

describe("Notifier", () => {
  it("stamps every event of one operation with a shared correlation id", () => {
    const sink = new RecordingSink();
    let next = 0;
    const notifier = new Notifier(sink, new ManualClock(60), () => `n-${++next}`);

    const events = notifier.emit("tom", [
      { streamId: "course-1", type: "a", source: "catalog", payload: { x: 1 } },
      { streamId: "course-2", type: "b", source: "catalog", payload: {} },
    ]);

    expect(events.map((e) => e.metadata.eventId)).toEqual(["n-2", "n-3"]);
    expect(events.map((e) => e.metadata.correlationId)).toEqual(["n-1", "n-1"]);
    expect(events[0]?.metadata.timestamp).toBe("1970-01-01T00:01:00.000Z");
    expect(sink.published.map((p) => p.streamId)).toEqual(["course-1", "course-2"]);
  });

  it("returns the events without a sink", () => {
    const notifier = new Notifier(undefined, new ManualClock());

    const [event] = notifier.emit("tom", [
      { streamId: "admin", type: "a", source: "admin", payload: {} },
    ]);

    expect(event?.metadata.actor).toBe("tom");
    expect(event?.metadata.correlationId).not.toBe(event?.metadata.eventId);
  });

  it("names streams per entity", () => {
    expect(streams.enrollment(3, "sam")).toBe("enrollment-3-sam");
    expect(streams.teacher("tom")).toBe("teacher-tom");
  });
});

describe("ManualClock", () => {
  it("moves forward only", () => {
    const clock = new ManualClock(10);
    clock.advance(5);
    clock.set(20);

    expect(clock.now()).toBe(20);
    expect(() => clock.advance(-1)).toThrow(RangeError);
    expect(() => clock.set(19)).toThrow(RangeError);
  });
});
