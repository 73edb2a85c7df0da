import { describe, it, expect } from "vitest";
import { all, allSettled, any, delay, race, reject, resolve, vow } from "./index";
import { createTestRuntime } from "./testing";

describe("combinators", () => {
  describe("all()", () => {
    it("fulfills with index-aligned values", async () => {
      const result = await all([resolve(1), resolve("a"), resolve([2, 3])]).await();
      expect(result).toEqual({ ok: true, value: [1, "a", [2, 3]] });
    });

    it("accepts plain values and native promises", async () => {
      const result = await all([1, Promise.resolve("two"), resolve(3)]).await();
      expect(result).toEqual({ ok: true, value: [1, "two", 3] });
    });

    it("rejects with the first rejection", async () => {
      const result = await all([resolve(1), reject("boom"), resolve(2)]).await();
      expect(result).toEqual({ ok: false, error: "boom" });
    });

    it("keeps input order when values arrive out of order", async () => {
      const result = await all([delay(20, "late"), delay(0, "early")]).await();
      expect(result).toEqual({ ok: true, value: ["late", "early"] });
    });

    it("fulfills an empty input immediately", () => {
      const combined = all([]);
      expect(combined.state).toBe("fulfilled");
      expect(combined.outcome).toEqual({ ok: true, value: [] });
    });

    it("does not wait for pending inputs once one rejects", () => {
      const { runtime, scheduler, recorder } = createTestRuntime();
      const combined = runtime.all([runtime.deferred<number>().vow, runtime.reject("x")]);
      scheduler.flush();

      expect(combined.outcome).toEqual({ ok: false, error: "x" });
      expect(recorder.ofType("scope_end").map((e) => e.winnerIndex)).toEqual([1]);
    });
  });

  describe("allSettled()", () => {
    it("fulfills with every outcome", async () => {
      const result = await allSettled([resolve(1), reject("err")]).await();
      expect(result).toEqual({
        ok: true,
        value: [
          { ok: true, value: 1 },
          { ok: false, error: "err" },
        ],
      });
    });

    it("includes unexpected errors", async () => {
      const failure = new Error("boom");
      const result = await allSettled([
        vow<number>(() => {
          throw failure;
        }),
      ]).await();
      expect(result).toEqual({
        ok: true,
        value: [
          {
            ok: false,
            error: { type: "UNEXPECTED_ERROR", cause: { type: "UNCAUGHT_EXCEPTION", thrown: failure } },
          },
        ],
      });
    });

    it("fulfills an empty input immediately", () => {
      expect(allSettled([]).outcome).toEqual({ ok: true, value: [] });
    });
  });

  describe("race()", () => {
    it("fulfills with the first input to settle", async () => {
      const result = await race([delay(100, "slow"), delay(0, "fast")]).await();
      expect(result).toEqual({ ok: true, value: "fast" });
    });

    it("rejects when the first input to settle rejects", async () => {
      const result = await race([reject("first"), delay(10, "late")]).await();
      expect(result).toEqual({ ok: false, error: "first" });
    });

    it("rejects an empty input", () => {
      const combined = race([]);
      expect(combined.state).toBe("rejected");
      expect(combined.outcome).toEqual({
        ok: false,
        error: { type: "EMPTY_INPUT", message: "race() requires at least one input" },
      });
    });

    it("reports the scope with the winning index", () => {
      const { runtime, scheduler, recorder } = createTestRuntime();
      const combined = runtime.race([runtime.deferred<number>().vow, runtime.resolve(2)], {
        label: "pick",
      });
      scheduler.flush();

      expect(combined.outcome).toEqual({ ok: true, value: 2 });
      expect(combined.label).toBe("pick");
      expect(recorder.ofType("scope_start")).toEqual([
        { type: "scope_start", scopeId: "id-3", scopeType: "race", label: "pick", size: 2, ts: 0 },
      ]);
      expect(recorder.ofType("scope_end")).toEqual([
        {
          type: "scope_end",
          scopeId: "id-3",
          scopeType: "race",
          label: "pick",
          ts: 0,
          durationMs: 0,
          winnerIndex: 1,
        },
      ]);
    });
  });

  describe("any()", () => {
    it("fulfills with the first fulfillment", async () => {
      const result = await any([reject("a"), resolve(2)]).await();
      expect(result).toEqual({ ok: true, value: 2 });
    });

    it("rejects with the lowest-index error when every input rejects", async () => {
      const slowA = vow<never, string>((_, reject) => {
        setTimeout(() => reject("slow-a"), 5);
      });
      const result = await any([slowA, reject("b")]).await();
      expect(result).toEqual({ ok: false, error: "slow-a" });
    });

    it("rejects an empty input", () => {
      expect(any([]).outcome).toEqual({
        ok: false,
        error: { type: "EMPTY_INPUT", message: "any() requires at least one input" },
      });
    });
  });
});
