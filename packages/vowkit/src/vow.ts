/**
 * The Vow: an asynchronous result container.
 *
 * A vow runs its executor on the context scheduler, settles exactly once (fulfilled
 * with a value or rejected with an error), and dispatches every reaction registered
 * through `then()`, `catch()` or `finally()`, whether it was registered before or
 * after settlement. Values that are themselves vows or thenables are adopted, so a
 * chain of nested vows collapses into a single settlement.
 *
 * @example
 * ```typescript
 * const user = vow<User, "NOT_FOUND">((resolve, reject) => {
 *   const found = db.find(id);
 *   found ? resolve(found) : reject("NOT_FOUND");
 * });
 *
 * const result = await user.then((u) => u.name).await();
 * if (result.ok) console.log(result.value);
 * ```
 */

import {
  err,
  ok,
  type AsyncResult,
  type Result,
  type UnexpectedCause,
  type UnexpectedError,
} from "./core";
import type { VowContext } from "./context";
import type { SettleAttempt } from "./events";

// =============================================================================
// Types
// =============================================================================

export type VowState = "pending" | "fulfilled" | "rejected";

/** Settles a vow with a value, or adopts the outcome of a vow or thenable. */
export type VowResolve<T, E = unknown, U = UnexpectedError> = (
  value: T | Vow<T, E, U> | PromiseLike<T>
) => void;

/** Rejects a vow. */
export type VowReject<E, U = UnexpectedError> = (error: E | U) => void;

/**
 * The work a vow runs in the background.
 * Anything it throws becomes a rejection mapped by the context's `catchUnexpected`.
 */
export type VowExecutor<T, E = unknown, U = UnexpectedError> = (
  resolve: VowResolve<T, E, U>,
  reject: VowReject<E, U>
) => void;

export interface VowOptions {
  /** Human-readable name used in events and trace spans */
  label?: string;
}

/** A vow together with the functions that settle it. */
export interface Deferred<T, E = unknown, U = UnexpectedError> {
  readonly vow: Vow<T, E, U>;
  resolve: VowResolve<T, E, U>;
  reject: VowReject<E, U>;
}

// =============================================================================
// Recovery marker
// =============================================================================

export const RECOVERED: unique symbol = Symbol("vowkit.recovered");

/** Returned from a rejection handler to recover the chain with a value. */
export type Recovered<V> = { readonly [RECOVERED]: true; readonly value: V };

/**
 * Recover a rejected chain with a value.
 *
 * A rejection handler that returns `undefined`/`null` recovers with `undefined`;
 * any other plain value keeps the chain rejected with that value as the new error.
 * Wrap the value in `recovered()` to fulfill the chain with it instead.
 *
 * @example
 * ```typescript
 * const price = fetchPrice(sku)
 *   .catch((error) => (error === "NOT_FOUND" ? recovered(0) : error));
 * // Vow<number, Exclude<PriceError, "NOT_FOUND">> ...
 * ```
 */
export const recovered = <V>(value: V): Recovered<V> => ({ [RECOVERED]: true, value });

export const isRecovered = (x: unknown): x is Recovered<unknown> =>
  typeof x === "object" && x !== null && RECOVERED in x;

// =============================================================================
// Type-level flattening
// =============================================================================

/** The value a settling value flattens to. */
export type ValueOf<R> = R extends Vow<infer V, infer _E, infer _U>
  ? V
  : R extends PromiseLike<infer V>
    ? ValueOf<V>
    : R;

/** The errors a settling value can reject with (foreign thenables reject through `U`). */
export type ErrorOf<R> = R extends Vow<infer _V, infer E, infer U> ? E | U : never;

/** The value a rejection handler's return recovers with. */
export type RecoveredValueOf<R> = R extends Recovered<infer V>
  ? V
  : R extends Vow<infer V, infer _E, infer _U>
    ? V
    : R extends PromiseLike<infer V>
      ? ValueOf<V>
      : R extends null | undefined | void
        ? undefined
        : never;

/** The errors a rejection handler's return keeps the chain rejected with. */
export type StillFailingOf<R> = R extends Recovered<unknown>
  ? never
  : R extends Vow<infer _V, infer E, infer U>
    ? E | U
    : R extends PromiseLike<unknown>
      ? never
      : R extends null | undefined | void
        ? never
        : R;

type ThenValue<R, R2> = ValueOf<R> | RecoveredValueOf<R2>;
type ThenError<E, R, R2> = ErrorOf<R> | ([R2] extends [never] ? E : StillFailingOf<R2>);

// =============================================================================
// Guards
// =============================================================================

/** True for any object or function with a callable `then`. */
export function isThenable(value: unknown): value is PromiseLike<unknown> {
  if ((typeof value !== "object" && typeof value !== "function") || value === null) {
    return false;
  }
  try {
    return "then" in value && typeof value.then === "function";
  } catch {
    // a throwing `then` getter is not a thenable
    return false;
  }
}

export const isVow = (value: unknown): value is Vow<unknown, unknown, unknown> =>
  value instanceof Vow;

// =============================================================================
// Vow
// =============================================================================

/**
 * @template T - Fulfillment value
 * @template E - Typed rejection error
 * @template U - What unexpected failures are mapped to (see `catchUnexpected`)
 */
export class Vow<T, E = unknown, U = UnexpectedError> {
  /** Unique id, used in events */
  readonly id: string;
  /** Optional name, used in events and trace spans */
  readonly label: string | undefined;

  private _outcome: Result<T, E | U> | undefined = undefined;
  // set by the first resolve/reject; later calls are ignored even while adoption is pending
  private _locked = false;
  private _fulfillmentCallbacks: Array<() => void> = [];
  private _rejectionCallbacks: Array<() => void> = [];
  private _waiters: Array<() => void> = [];
  private readonly _context: VowContext<U>;
  private readonly _createdAt: number;

  private constructor(context: VowContext<U>, options: VowOptions = {}) {
    this._context = context;
    this.id = context.nextId();
    this.label = options.label;
    this._createdAt = context.now();
    context.emit({ type: "vow_created", ...this._tag(), ts: this._createdAt });
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Schedule `executor` on the context scheduler and return the pending vow.
   * Prefer `vow()` or `runtime.vow()`, which supply the context.
   */
  static create<T, E = unknown, U = UnexpectedError>(
    executor: VowExecutor<T, E, U>,
    context: VowContext<U>,
    options?: VowOptions
  ): Vow<T, E, U> {
    if (typeof executor !== "function") {
      throw new TypeError(
        "vow(): executor must be a function. Example: vow((resolve, reject) => resolve(42))"
      );
    }
    const created = new Vow<T, E, U>(context, options);
    context.scheduler.schedule(() => created._execute(executor));
    return created;
  }

  /** A vow that is already settled with `outcome` when this returns. */
  static settled<T, E = unknown, U = UnexpectedError>(
    outcome: Result<T, E | U>,
    context: VowContext<U>,
    options?: VowOptions
  ): Vow<T, E, U> {
    const created = new Vow<T, E, U>(context, options);
    created._locked = true;
    created._settle(outcome, false);
    return created;
  }

  /**
   * A vow settled by `value`: fulfilled at once for a plain value, adopting the
   * outcome of a vow or thenable otherwise. `mapRejection` maps the rejection of a
   * foreign thenable into `E`; without it the rejection goes through `catchUnexpected`.
   */
  static follow<T, E = unknown, U = UnexpectedError>(
    value: unknown,
    context: VowContext<U>,
    options?: VowOptions,
    mapRejection?: (reason: unknown) => E
  ): Vow<T, E, U> {
    const created = new Vow<T, E, U>(context, options);
    created._locked = true;
    created._follow(value, mapRejection);
    return created;
  }

  /**
   * Run `fn` on the scheduler and settle with what it returns (adopting thenables).
   * A throw, or the rejection of a returned foreign thenable, is mapped by `mapError`
   * when given and by `catchUnexpected` otherwise.
   */
  static attempt<T, E = unknown, U = UnexpectedError>(
    fn: () => unknown,
    context: VowContext<U>,
    options?: VowOptions,
    mapError?: (cause: unknown) => E
  ): Vow<T, E, U> {
    const created = new Vow<T, E, U>(context, options);
    created._locked = true;
    context.scheduler.schedule(() =>
      created._guard(fn, (returned) => created._follow(returned, mapError), mapError)
    );
    return created;
  }

  /** A pending vow whose resolve/reject are handed to the caller. */
  static deferred<T, E = unknown, U = UnexpectedError>(
    context: VowContext<U>,
    options?: VowOptions
  ): Deferred<T, E, U> {
    const created = new Vow<T, E, U>(context, options);
    return {
      vow: created,
      resolve: (value) => created._resolve(value),
      reject: (error) => created._reject(error),
    };
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  get state(): VowState {
    if (this._outcome === undefined) return "pending";
    return this._outcome.ok ? "fulfilled" : "rejected";
  }

  /** The settled outcome, or `undefined` while pending. */
  get outcome(): Result<T, E | U> | undefined {
    return this._outcome;
  }

  // ===========================================================================
  // Chaining
  // ===========================================================================

  /**
   * Register a continuation for fulfillment, and optionally one for rejection.
   *
   * The returned vow fulfills with what `onFulfilled` returns (adopting vows and
   * thenables). While this vow is rejected, `onFulfilled` is skipped and the
   * rejection propagates, unless `onRejected` is given; `onRejected` follows the
   * same recovery rules as `catch()`.
   *
   * Also makes a vow awaitable: `await vow` yields the value or throws the error.
   */
  then<R, R2 = never>(
    onFulfilled: (value: T) => R,
    onRejected?: (error: E | U) => R2
  ): Vow<ThenValue<R, R2>, ThenError<E, R, R2>, U> {
    const next = new Vow<ThenValue<R, R2>, ThenError<E, R, R2>, U>(this._context);
    this._subscribe(
      (value) => next._guard(() => onFulfilled(value), (returned) => next._follow(returned)),
      (error) => {
        if (onRejected) {
          next._guard(() => onRejected(error), (returned) => next._recover(returned));
        } else {
          next._settleError(error);
        }
      }
    );
    return next;
  }

  /**
   * Register a continuation for rejection.
   *
   * What the handler returns decides the returned vow:
   * - `undefined` / `null` / nothing: fulfilled with `undefined` (recovered)
   * - `recovered(value)`: fulfilled with `value`
   * - a vow or thenable: follows its outcome
   * - anything else: rejected with that value as the new error
   *
   * While this vow is fulfilled the handler is skipped and the value passes through.
   */
  catch<R>(
    onRejected: (error: E | U) => R
  ): Vow<T | RecoveredValueOf<R>, StillFailingOf<R>, U> {
    const next = new Vow<T | RecoveredValueOf<R>, StillFailingOf<R>, U>(this._context);
    this._subscribe(
      (value) => next._settle(ok(value), false),
      (error) => next._guard(() => onRejected(error), (returned) => next._recover(returned))
    );
    return next;
  }

  /**
   * Run `onFinally` once this vow settles either way, then pass the outcome through.
   * A throw from `onFinally` rejects the returned vow instead.
   */
  finally(onFinally: () => void): Vow<T, E, U> {
    const next = new Vow<T, E, U>(this._context);
    const passThrough = (outcome: Result<T, E | U>) =>
      next._guard(onFinally, () => next._settle(outcome, false));
    this._subscribe(
      (value) => passThrough(ok(value)),
      (error) => passThrough(err(error))
    );
    return next;
  }

  /**
   * Wait for settlement and return the outcome. Never throws.
   * Every caller receives the same outcome object.
   */
  await(): AsyncResult<T, E | U> {
    const outcome = this._outcome;
    if (outcome !== undefined) {
      return Promise.resolve(outcome);
    }
    return new Promise((resolve) => {
      this._waiters.push(() => {
        if (this._outcome !== undefined) resolve(this._outcome);
      });
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private _tag(): { vowId: string; label?: string } {
    return this.label !== undefined ? { vowId: this.id, label: this.label } : { vowId: this.id };
  }

  private _execute(executor: VowExecutor<T, E, U>): void {
    try {
      executor(
        (value) => this._resolve(value),
        (error) => this._reject(error)
      );
    } catch (thrown) {
      if (this._locked) {
        this._ignored("throw");
        return;
      }
      this._locked = true;
      this._fail({ type: "UNCAUGHT_EXCEPTION", thrown });
    }
  }

  private _resolve(value: T | Vow<T, E, U> | PromiseLike<T>): void {
    if (this._locked) {
      this._ignored("resolve");
      return;
    }
    this._locked = true;
    this._follow(value);
  }

  private _reject(error: E | U): void {
    if (this._locked) {
      this._ignored("reject");
      return;
    }
    this._locked = true;
    this._settle(err(error), false);
  }

  private _ignored(attempted: SettleAttempt): void {
    this._context.emit({
      type: "settle_ignored",
      ...this._tag(),
      ts: this._context.now(),
      attempted,
    });
  }

  /**
   * Register reactions. Each reaction reads the outcome when it runs, so the
   * lists stay untyped and a late registration sees the stored outcome.
   */
  private _subscribe(onFulfilled: (value: T) => void, onRejected: (error: E | U) => void): void {
    const whenFulfilled = () => {
      const outcome = this._outcome;
      if (outcome?.ok) onFulfilled(outcome.value);
    };
    const whenRejected = () => {
      const outcome = this._outcome;
      if (outcome !== undefined && !outcome.ok) onRejected(outcome.error);
    };

    if (this._outcome === undefined) {
      this._fulfillmentCallbacks.push(whenFulfilled);
      this._rejectionCallbacks.push(whenRejected);
      return;
    }
    this._context.scheduler.schedule(this._outcome.ok ? whenFulfilled : whenRejected);
  }

  /** Run user code; a throw rejects this vow (mapped by `mapError` when given). */
  private _guard<R>(
    fn: () => R,
    onReturn: (returned: R) => void,
    mapError?: (cause: unknown) => E
  ): void {
    let result: Result<R, unknown>;
    try {
      result = ok(fn());
    } catch (thrown) {
      result = err(thrown);
    }
    if (result.ok) {
      onReturn(result.value);
    } else {
      this._fail({ type: "UNCAUGHT_EXCEPTION", thrown: result.error }, mapError);
    }
  }

  /** Settle with `value`, adopting it first when it is a vow or thenable. */
  private _follow(value: unknown, mapRejection?: (reason: unknown) => E): void {
    if (value === this) {
      this._fail({
        type: "UNCAUGHT_EXCEPTION",
        thrown: new TypeError(`Chaining cycle detected for vow ${this.id}`),
      });
      return;
    }

    if (isVow(value)) {
      this._context.emit({
        type: "vow_adopted",
        ...this._tag(),
        ts: this._context.now(),
        sourceId: value.id,
      });
      value._subscribe(
        (inner) => this._follow(inner, mapRejection),
        (error) => this._settleError(error)
      );
      return;
    }

    if (isThenable(value)) {
      this._context.emit({ type: "vow_adopted", ...this._tag(), ts: this._context.now() });
      this._context.scheduler.schedule(() => this._followThenable(value, mapRejection));
      return;
    }

    this._settleValue(value);
  }

  private _followThenable(thenable: PromiseLike<unknown>, mapRejection?: (reason: unknown) => E): void {
    let called = false;
    try {
      void thenable.then(
        (inner) => {
          if (called) return;
          called = true;
          this._follow(inner, mapRejection);
        },
        (reason: unknown) => {
          if (called) return;
          called = true;
          this._fail({ type: "PROMISE_REJECTION", reason }, mapRejection);
        }
      );
    } catch (thrown) {
      if (called) return;
      called = true;
      this._fail({ type: "UNCAUGHT_EXCEPTION", thrown });
    }
  }

  /** Apply the rejection-handler return rules of `catch()`. */
  private _recover(returned: unknown): void {
    if (returned === undefined || returned === null) {
      this._settleValue(undefined);
      return;
    }
    if (isRecovered(returned)) {
      this._follow(returned.value);
      return;
    }
    if (isThenable(returned)) {
      this._follow(returned);
      return;
    }
    this._settleError(returned);
  }

  private _fail(cause: UnexpectedCause, mapError?: (cause: unknown) => E): void {
    if (!mapError) {
      this._settle(err(this._context.catchUnexpected(cause)), true);
      return;
    }
    const raw = cause.type === "UNCAUGHT_EXCEPTION" ? cause.thrown : cause.reason;
    let mapped: Result<E, unknown>;
    try {
      mapped = ok(mapError(raw));
    } catch (thrown) {
      mapped = err(thrown);
    }
    if (mapped.ok) {
      this._settle(err(mapped.value), false);
    } else {
      this._fail({ type: "UNCAUGHT_EXCEPTION", thrown: mapped.error });
    }
  }

  // Values and errors reaching these two have been flattened at run time; their
  // static types were computed by the then()/catch()/follow() signatures.
  private _settleValue(value: unknown): void {
    this._settle(ok(value as T), false);
  }

  private _settleError(error: unknown): void {
    this._settle(err(error as E | U), false);
  }

  /**
   * The one place state changes. Takes both callback lists in the same step that
   * stores the outcome, so a reaction registered afterwards sees the settled state
   * and schedules itself instead.
   */
  private _settle(outcome: Result<T, E | U>, unexpected: boolean): void {
    if (this._outcome !== undefined) return;
    this._outcome = outcome;

    const reactions = outcome.ok ? this._fulfillmentCallbacks : this._rejectionCallbacks;
    const waiters = this._waiters;
    this._fulfillmentCallbacks = [];
    this._rejectionCallbacks = [];
    this._waiters = [];

    const ts = this._context.now();
    const durationMs = ts - this._createdAt;
    if (outcome.ok) {
      this._context.emit({ type: "vow_fulfilled", ...this._tag(), ts, durationMs });
    } else {
      this._context.emit({
        type: "vow_rejected",
        ...this._tag(),
        ts,
        durationMs,
        error: outcome.error,
        unexpected,
      });
    }

    for (const wake of waiters) wake();
    if (reactions.length === 0) return;
    // queued from one task, so a reaction registered by an earlier one lands behind the rest
    const { scheduler } = this._context;
    scheduler.schedule(() => {
      for (const react of reactions) scheduler.schedule(react);
    });
  }
}
