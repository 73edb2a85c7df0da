import { describe, it, expect } from "vitest";
import { inlineScheduler, macrotaskScheduler, microtaskScheduler } from "./scheduler";

describe("schedulers", () => {
  describe("microtaskScheduler", () => {
    it("runs tasks after the current synchronous code, in order", async () => {
      const log: string[] = [];
      microtaskScheduler.schedule(() => log.push("a"));
      microtaskScheduler.schedule(() => log.push("b"));
      log.push("sync");

      expect(log).toEqual(["sync"]);
      await Promise.resolve();
      expect(log).toEqual(["sync", "a", "b"]);
    });
  });

  describe("macrotaskScheduler", () => {
    it("runs tasks after pending microtasks", async () => {
      const log: string[] = [];
      macrotaskScheduler.schedule(() => log.push("macro"));
      queueMicrotask(() => log.push("micro"));

      await new Promise<void>((resolve) => setImmediate(resolve));
      expect(log).toEqual(["micro", "macro"]);
    });
  });

  describe("inlineScheduler", () => {
    it("runs tasks inside the schedule call", () => {
      const log: string[] = [];
      inlineScheduler.schedule(() => log.push("inline"));
      log.push("after");
      expect(log).toEqual(["inline", "after"]);
    });

    it("queues tasks scheduled by a running task behind it", () => {
      const log: string[] = [];
      inlineScheduler.schedule(() => {
        log.push("a");
        inlineScheduler.schedule(() => log.push("c"));
        log.push("b");
      });
      log.push("after");
      expect(log).toEqual(["a", "b", "c", "after"]);
    });
  });
});
