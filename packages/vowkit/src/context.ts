import { randomUUID } from "node:crypto";
import {
  defaultCatchUnexpected,
  type UnexpectedCause,
  type UnexpectedError,
} from "./core";
import type { VowEvent, VowEventHandler } from "./events";
import { microtaskScheduler, type Scheduler } from "./scheduler";

/**
 * Everything a vow needs from its surroundings.
 * Created once per runtime and shared by every vow the runtime creates.
 *
 * @template U - What unexpected failures are mapped to
 */
export interface VowContext<U = UnexpectedError> {
  readonly scheduler: Scheduler;
  catchUnexpected(cause: UnexpectedCause): U;
  now(): number;
  nextId(): string;
  emit(event: VowEvent): void;
}

type BaseRuntimeOptions = {
  /** Where executors and callbacks run (default: microtaskScheduler) */
  scheduler?: Scheduler;
  /** Receives lifecycle events for every vow and combinator */
  onEvent?: VowEventHandler;
  /** Id generator for vows and combinator scopes (default: crypto.randomUUID) */
  generateId?: () => string;
  /** Clock used for event timestamps and durations (default: Date.now) */
  clock?: () => number;
};

export type VowRuntimeOptionsWithCatch<U> = BaseRuntimeOptions & {
  /**
   * Maps thrown exceptions and foreign rejections into your own error type.
   * Without it they become `UnexpectedError`.
   */
  catchUnexpected: (cause: UnexpectedCause) => U;
};

export type VowRuntimeOptionsWithoutCatch = BaseRuntimeOptions & {
  catchUnexpected?: undefined;
};

export type VowRuntimeOptions<U = UnexpectedError> =
  | VowRuntimeOptionsWithCatch<U>
  | VowRuntimeOptionsWithoutCatch;

/**
 * Build a context from runtime options, filling in defaults.
 */
export function createVowContext(options?: VowRuntimeOptionsWithoutCatch): VowContext<UnexpectedError>;
export function createVowContext<U>(options: VowRuntimeOptionsWithCatch<U>): VowContext<U>;
export function createVowContext<U>(
  options: VowRuntimeOptions<U> = {}
): VowContext<U | UnexpectedError> {
  const {
    scheduler = microtaskScheduler,
    onEvent,
    generateId = randomUUID,
    clock = Date.now,
  } = options;
  const catchUnexpected: (cause: UnexpectedCause) => U | UnexpectedError =
    options.catchUnexpected ?? defaultCatchUnexpected;

  return {
    scheduler,
    catchUnexpected: (cause) => catchUnexpected(cause),
    now: () => clock(),
    nextId: () => generateId(),
    emit: (event) => {
      if (!onEvent) return;
      try {
        onEvent(event);
      } catch (thrown) {
        console.warn(
          `vowkit: onEvent handler threw while handling "${event.type}". ` +
            `The event was dropped; the vow is not affected.`,
          thrown
        );
      }
    },
  };
}
