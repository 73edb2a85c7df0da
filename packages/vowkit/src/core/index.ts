/**
 * vowkit/core
 *
 * Result primitives shared by every vow.
 * A settled vow reports its outcome as a `Result`: `{ ok: true, value }` when it
 * fulfilled, `{ ok: false, error }` when it rejected. Callers check `ok` before
 * trusting `value`, the same way they would check an error return.
 *
 * This module provides:
 * 1. `Result` types and constructors
 * 2. The defect types produced when user code throws or a foreign promise rejects
 * 3. Small helpers for inspecting and unwrapping Results
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 *
 * @example
 * ```typescript
 * const success = ok(42);
 * // Type shown: Ok<number>
 * ```
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 *
 * @template E - The type of the error value
 * @template C - The type of the cause (defaults to unknown)
 */
export type Err<E, C = unknown> = { ok: false; error: E; cause?: C };

/**
 * The outcome of an operation that might fail.
 * Every settled vow exposes exactly one of these.
 */
export type Result<T, E = unknown, C = unknown> = Ok<T> | Err<E, C>;

/**
 * A Promise that resolves to a Result.
 * `vow.await()` returns one of these.
 */
export type AsyncResult<T, E = unknown, C = unknown> = Promise<Result<T, E, C>>;

/** Discriminant for UnexpectedError type - use in switch statements */
export const UNEXPECTED_ERROR = "UNEXPECTED_ERROR" as const;

/** Discriminant for PromiseRejectedError type - use in switch statements */
export const PROMISE_REJECTED = "PROMISE_REJECTED" as const;

/** Discriminant for EmptyInputError type - use in switch statements */
export const EMPTY_INPUT = "EMPTY_INPUT" as const;

// =============================================================================
// Defects
// =============================================================================

/**
 * What went wrong outside the typed error channel.
 *
 * - `UNCAUGHT_EXCEPTION`: an executor or callback threw
 * - `PROMISE_REJECTION`: an adopted foreign thenable (e.g. a native Promise) rejected
 */
export type UnexpectedCause =
  | { type: "UNCAUGHT_EXCEPTION"; thrown: unknown }
  | { type: "PROMISE_REJECTION"; reason: unknown };

export type UnexpectedError = {
  type: typeof UNEXPECTED_ERROR;
  cause: UnexpectedCause;
};

/**
 * Default mapper for unexpected causes.
 * Used when a runtime is created without `catchUnexpected`, so the rejection
 * channel of every vow is `E | UnexpectedError`.
 *
 * @param cause - The thrown value or foreign rejection, already tagged
 * @returns UnexpectedError carrying the original payload
 */
export function defaultCatchUnexpected(cause: UnexpectedCause): UnexpectedError {
  return { type: UNEXPECTED_ERROR, cause };
}

export type PromiseRejectedError = { type: typeof PROMISE_REJECTED; cause: unknown };

/**
 * Ready-made `onError` mapper for `fromPromise()` and `attempt()`.
 * Keeps the rejection in the typed error channel instead of the unexpected one.
 *
 * @example
 * ```typescript
 * const user = fromPromise(fetchUser(id), toPromiseRejectedError);
 * // Vow<User, PromiseRejectedError>
 * ```
 */
export function toPromiseRejectedError(cause: unknown): PromiseRejectedError {
  return { type: PROMISE_REJECTED, cause };
}

export type EmptyInputError = { type: typeof EMPTY_INPUT; message: string };

/** Builds the error `race()` and `any()` reject with when given no inputs. */
export function emptyInputError(operation: string): EmptyInputError {
  return {
    type: EMPTY_INPUT,
    message: `${operation}() requires at least one input`,
  };
}

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 *
 * @example
 * ```typescript
 * const success = ok(42);
 * // Type: Ok<number>
 * ```
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 *
 * @param error - The error value describing what went wrong
 * @param options - Optional cause to keep alongside the error
 *
 * @example
 * ```typescript
 * const r1 = err("NOT_FOUND");
 * const r2 = err({ type: "PARSE_FAILED" }, { cause: syntaxError });
 * ```
 */
export const err = <E, C = unknown>(
  error: E,
  options?: { cause?: C }
): Err<E, C> =>
  options?.cause !== undefined
    ? { ok: false, error, cause: options.cause }
    : { ok: false, error };

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if a Result is successful, narrowing it to `Ok<T>`.
 */
export const isOk = <T, E, C>(r: Result<T, E, C>): r is Ok<T> => r.ok;

/**
 * Checks if a Result is a failure, narrowing it to `Err<E, C>`.
 */
export const isErr = <T, E, C>(r: Result<T, E, C>): r is Err<E, C> => !r.ok;

function hasType(e: unknown, type: string): boolean {
  return typeof e === "object" && e !== null && "type" in e && e.type === type;
}

/**
 * Checks if an error is an UnexpectedError.
 * Distinguishes thrown exceptions and foreign rejections from your typed error union.
 *
 * @example
 * ```typescript
 * const result = await parseConfig(raw).await();
 * if (!result.ok && isUnexpectedError(result.error)) {
 *   report(result.error.cause);
 * }
 * ```
 */
export const isUnexpectedError = (e: unknown): e is UnexpectedError =>
  hasType(e, UNEXPECTED_ERROR);

/**
 * Checks if an error is a PromiseRejectedError.
 */
export const isPromiseRejectedError = (e: unknown): e is PromiseRejectedError =>
  hasType(e, PROMISE_REJECTED);

/**
 * Checks if an error is an EmptyInputError.
 */
export const isEmptyInputError = (e: unknown): e is EmptyInputError =>
  hasType(e, EMPTY_INPUT);

// =============================================================================
// Unwrapping
// =============================================================================

/**
 * Thrown by `unwrap()` when the Result is an Err.
 * Keeps the original error and cause for inspection.
 */
export class UnwrapError<E = unknown, C = unknown> extends Error {
  constructor(
    public readonly error: E,
    public readonly cause?: C
  ) {
    super(`Unwrap called on an error result: ${String(error)}`);
    this.name = "UnwrapError";
  }
}

/**
 * Returns the value of an Ok, throws `UnwrapError` for an Err.
 *
 * @remarks When to use: tests and scripts where a failure should abort.
 */
export const unwrap = <T, E, C>(r: Result<T, E, C>): T => {
  if (r.ok) {
    return r.value;
  }
  throw new UnwrapError<E, C>(r.error, r.cause);
};

/**
 * Returns the value of an Ok, or `defaultValue` for an Err.
 */
export const unwrapOr = <T, E, C>(r: Result<T, E, C>, defaultValue: T): T =>
  r.ok ? r.value : defaultValue;

/**
 * Folds a Result into a single value.
 *
 * @example
 * ```typescript
 * const message = match(await download.await(), {
 *   ok: (bytes) => `received ${bytes.length} bytes`,
 *   err: (error) => `download failed: ${String(error)}`,
 * });
 * ```
 */
export function match<T, E, C, R>(
  r: Result<T, E, C>,
  handlers: { ok: (value: T) => R; err: (error: E, cause?: C) => R }
): R {
  return r.ok ? handlers.ok(r.value) : handlers.err(r.error, r.cause);
}

// =============================================================================
// Type Utilities
// =============================================================================

/** Extract the value type from a Result. */
export type ExtractValue<T> = T extends { ok: true; value: infer U } ? U : never;

/** Extract the error type from a Result. */
export type ExtractError<T> = T extends { ok: false; error: infer E } ? E : never;
