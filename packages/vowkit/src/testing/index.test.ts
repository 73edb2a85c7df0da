import { describe, it, expect } from "vitest";
import { err, ok } from "../core";
import { reject, resolve } from "../index";
import {
  assertEventSequence,
  createEventRecorder,
  createManualScheduler,
  createSequentialIds,
  createTestClock,
  createTestRuntime,
  expectFulfilled,
  expectRejected,
  formatEvent,
  formatEvents,
  formatOutcome,
  formatValue,
  unwrapFulfilled,
  unwrapRejected,
} from ".";

describe("testing utilities", () => {
  describe("createManualScheduler", () => {
    it("runs tasks only when asked, oldest first", () => {
      const scheduler = createManualScheduler();
      const ran: string[] = [];
      scheduler.schedule(() => ran.push("a"));
      scheduler.schedule(() => ran.push("b"));

      expect(ran).toEqual([]);
      expect(scheduler.pending()).toBe(2);
      expect(scheduler.runNext()).toBe(true);
      expect(ran).toEqual(["a"]);
    });

    it("returns false from runNext on an empty queue", () => {
      expect(createManualScheduler().runNext()).toBe(false);
    });

    it("flush runs tasks queued by other tasks", () => {
      const scheduler = createManualScheduler();
      const ran: string[] = [];
      scheduler.schedule(() => {
        ran.push("outer");
        scheduler.schedule(() => ran.push("inner"));
      });

      expect(scheduler.flush()).toBe(2);
      expect(ran).toEqual(["outer", "inner"]);
      expect(scheduler.pending()).toBe(0);
    });

    it("flush stops a task that keeps rescheduling itself", () => {
      const scheduler = createManualScheduler();
      const loop = (): void => {
        scheduler.schedule(loop);
      };
      scheduler.schedule(loop);

      expect(() => scheduler.flush(3)).toThrow(
        "ManualScheduler.flush(): still 1 task(s) queued after running 3. " +
          "A vow chain is probably scheduling itself forever."
      );
    });
  });

  describe("createEventRecorder", () => {
    it("records, filters and clears events", () => {
      const recorder = createEventRecorder();
      recorder.handler({ type: "vow_created", vowId: "v-1", ts: 0 });
      recorder.handler({ type: "vow_fulfilled", vowId: "v-1", ts: 2, durationMs: 2 });

      expect(recorder.types()).toEqual(["vow_created", "vow_fulfilled"]);
      expect(recorder.ofType("vow_fulfilled").map((e) => e.durationMs)).toEqual([2]);

      recorder.clear();
      expect(recorder.events).toEqual([]);
    });
  });

  describe("createTestClock", () => {
    it("advances, sets and resets", () => {
      const clock = createTestClock(100);
      clock.advance(50);
      expect(clock.now()).toBe(150);
      clock.set(10);
      expect(clock.now()).toBe(10);
      clock.reset();
      expect(clock.now()).toBe(100);
    });
  });

  describe("createSequentialIds", () => {
    it("counts from 1 with the prefix", () => {
      const next = createSequentialIds("v");
      expect([next(), next()]).toEqual(["v-1", "v-2"]);
    });
  });

  describe("createTestRuntime", () => {
    it("wires scheduler, recorder, clock and ids together", () => {
      const { runtime, scheduler, recorder, clock } = createTestRuntime();
      const v = runtime.vow<number>((resolve) => resolve(1), { label: "load" });
      clock.advance(5);

      expect(v.state).toBe("pending");
      scheduler.flush();

      expect(v.outcome).toEqual({ ok: true, value: 1 });
      expect(recorder.ofType("vow_fulfilled")).toEqual([
        { type: "vow_fulfilled", vowId: "id-1", label: "load", ts: 5, durationMs: 5 },
      ]);
    });
  });

  describe("assertEventSequence", () => {
    const { runtime, scheduler, recorder } = createTestRuntime();
    runtime.vow<number>((resolve) => resolve(1), { label: "load" });
    scheduler.flush();

    it("passes on the exact sequence", () => {
      const result = assertEventSequence(recorder.events, ["vow_created:load", "vow_fulfilled:load"]);
      expect(result.passed).toBe(true);
      expect(result.message).toBe("Event sequence matches: vow_created:load → vow_fulfilled:load");
    });

    it("skips unlisted event types when not strict", () => {
      const result = assertEventSequence(recorder.events, ["vow_fulfilled:load"], { strict: false });
      expect(result.passed).toBe(true);
    });

    it("reports both sequences on mismatch", () => {
      const result = assertEventSequence(recorder.events, ["vow_rejected:load"]);
      expect(result.passed).toBe(false);
      expect(result.message).toBe(
        "Event sequence mismatch.\nExpected: vow_rejected:load\nActual: vow_created:load → vow_fulfilled:load"
      );
      expect(result.actual).toEqual(["vow_created:load", "vow_fulfilled:load"]);
    });
  });

  describe("outcome assertions", () => {
    it("expectFulfilled throws on a rejection", () => {
      expect(() => expectFulfilled(err("NOT_FOUND"))).toThrow(
        "Expected a fulfilled outcome, got rejection: 'NOT_FOUND'"
      );
      expect(() => expectFulfilled(ok(1))).not.toThrow();
    });

    it("expectRejected throws on a value", () => {
      expect(() => expectRejected(ok({ id: 1 }))).toThrow(
        "Expected a rejected outcome, got value: { id: 1 }"
      );
      expect(() => expectRejected(err("E"))).not.toThrow();
    });

    it("unwrapFulfilled and unwrapRejected await the vow", async () => {
      expect(await unwrapFulfilled(resolve(3))).toBe(3);
      expect(await unwrapRejected(reject("E"))).toBe("E");
      await expect(unwrapFulfilled(reject("E"))).rejects.toThrow(
        "Expected a fulfilled outcome, got rejection: 'E'"
      );
    });
  });

  describe("formatting", () => {
    it("formats outcomes", () => {
      expect(formatOutcome(undefined)).toBe("Pending");
      expect(formatOutcome(ok(42))).toBe("Ok(42)");
      expect(formatOutcome(err("NOT_FOUND"))).toBe("Err('NOT_FOUND')");
    });

    it("formats values", () => {
      function load(): void {}
      expect(formatValue(null)).toBe("null");
      expect(formatValue(true)).toBe("true");
      expect(formatValue(load)).toBe("[Function: load]");
      expect(formatValue([1, 2, 3, 4])).toBe("[1, 2, 3, ... (4 items)]");
      expect(formatValue(new TypeError("bad"))).toBe("TypeError: bad");
      expect(formatValue({ a: 1, b: 2, c: 3, d: 4, e: 5 })).toBe("{ a: 1, b: 2, c: 3, ... (5 keys) }");
      expect(formatValue({})).toBe("{}");
    });

    it("formats events", () => {
      expect(formatEvent({ type: "vow_created", vowId: "v-1", ts: 0 })).toBe("vow_created");
      expect(
        formatEvents([
          { type: "scope_start", scopeId: "s-1", scopeType: "all", label: "batch", size: 2, ts: 0 },
          { type: "scope_end", scopeId: "s-1", scopeType: "all", label: "batch", ts: 1, durationMs: 1 },
        ])
      ).toBe("scope_start:batch → scope_end:batch");
    });
  });
});
