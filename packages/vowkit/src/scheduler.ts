/**
 * Schedulers decide where vow work runs.
 *
 * A vow never runs its executor or its callbacks inside the call that created or
 * settled it: everything goes through `scheduler.schedule(task)`. The core relies on
 * nothing else, so any queue that eventually runs each task once, in FIFO order, will do.
 */

/** A task queue. Tasks must run once each, in the order they were scheduled. */
export interface Scheduler {
  schedule(task: () => void): void;
}

/**
 * Runs tasks as microtasks. The default: work starts as soon as the current
 * synchronous code finishes, before any I/O callback.
 */
export const microtaskScheduler: Scheduler = {
  schedule: (task) => queueMicrotask(task),
};

/**
 * Runs tasks with `setImmediate`, yielding to pending I/O between tasks.
 * Use this when long vow chains must not starve timers or sockets.
 */
export const macrotaskScheduler: Scheduler = {
  schedule: (task) => {
    setImmediate(task);
  },
};

const inlineQueue: Array<() => void> = [];
let inlineDraining = false;

/**
 * Runs tasks synchronously, inside the outermost `schedule()` call.
 *
 * Intended for unit tests that want every step to happen before the next line runs.
 * A task scheduled while another one is running is queued behind it, so order stays FIFO.
 * Under this scheduler executors and callbacks run inline, so code relying on
 * "then() never calls back before it returns" must not use it.
 */
export const inlineScheduler: Scheduler = {
  schedule: (task) => {
    inlineQueue.push(task);
    if (inlineDraining) return;
    inlineDraining = true;
    try {
      for (let next = inlineQueue.shift(); next; next = inlineQueue.shift()) {
        next();
      }
    } finally {
      inlineDraining = false;
    }
  },
};
