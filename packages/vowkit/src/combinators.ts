/**
 * Combinators over several vows: all, allSettled, race, any.
 *
 * Inputs may mix vows, foreign thenables and plain values; each is normalized with
 * `Vow.follow()` first. Every call emits a `scope_start`/`scope_end` pair.
 */

import { emptyInputError, err, ok, type EmptyInputError, type Result } from "./core";
import type { VowContext } from "./context";
import type { ScopeType } from "./events";
import { Vow, type ErrorOf, type ValueOf, type VowOptions } from "./vow";

// =============================================================================
// Types
// =============================================================================

/** Values of `all()`, position for position. */
export type AllValues<T extends readonly unknown[]> = { -readonly [K in keyof T]: ValueOf<T[K]> };

/** Any error one of the inputs can reject with. */
export type AnyError<T extends readonly unknown[]> = ErrorOf<T[number]>;

/** Outcomes of `allSettled()`, position for position. */
export type SettledOutcomes<T extends readonly unknown[], U> = {
  -readonly [K in keyof T]: Result<ValueOf<T[K]>, ErrorOf<T[K]> | U>;
};

// =============================================================================
// Scopes
// =============================================================================

type Scope = { end: (winnerIndex?: number) => void };

function openScope<U>(
  scopeType: ScopeType,
  size: number,
  context: VowContext<U>,
  label: string | undefined
): Scope {
  const scopeId = context.nextId();
  const startedAt = context.now();
  const named = label !== undefined ? { label } : {};
  context.emit({ type: "scope_start", scopeId, scopeType, ...named, size, ts: startedAt });

  let ended = false;
  return {
    end: (winnerIndex) => {
      if (ended) return;
      ended = true;
      const ts = context.now();
      context.emit({
        type: "scope_end",
        scopeId,
        scopeType,
        ...named,
        ts,
        durationMs: ts - startedAt,
        ...(winnerIndex !== undefined ? { winnerIndex } : {}),
      });
    },
  };
}

// =============================================================================
// Combinators
// =============================================================================

/**
 * Fulfills with every value, in input order, once all inputs fulfill.
 * Rejects with the first rejection to arrive; later outcomes are ignored.
 * An empty input fulfills with `[]`.
 */
export function all<const T extends readonly unknown[], U>(
  inputs: T,
  context: VowContext<U>,
  options: VowOptions = {}
): Vow<AllValues<T>, AnyError<T>, U> {
  const scope = openScope("all", inputs.length, context, options.label);
  const { vow: combined, resolve, reject } = Vow.deferred<AllValues<T>, AnyError<T>, U>(
    context,
    options
  );

  const values: unknown[] = new Array(inputs.length);
  let pending = inputs.length;
  let done = false;

  if (pending === 0) {
    scope.end();
    resolve(values as AllValues<T>);
    return combined;
  }

  inputs.forEach((input, index) => {
    Vow.follow<unknown, AnyError<T>, U>(input, context).then(
      (value) => {
        if (done) return;
        values[index] = value;
        pending--;
        if (pending === 0) {
          done = true;
          scope.end();
          resolve(values as AllValues<T>);
        }
      },
      (error) => {
        if (done) return;
        done = true;
        scope.end(index);
        reject(error);
      }
    );
  });

  return combined;
}

/**
 * Fulfills with the outcome of every input, in input order, once all have settled.
 * Never rejects.
 */
export function allSettled<const T extends readonly unknown[], U>(
  inputs: T,
  context: VowContext<U>,
  options: VowOptions = {}
): Vow<SettledOutcomes<T, U>, never, U> {
  const scope = openScope("allSettled", inputs.length, context, options.label);
  const { vow: combined, resolve } = Vow.deferred<SettledOutcomes<T, U>, never, U>(
    context,
    options
  );

  const outcomes: Result<unknown, unknown>[] = new Array(inputs.length);
  let pending = inputs.length;

  const record = (index: number, outcome: Result<unknown, unknown>) => {
    outcomes[index] = outcome;
    pending--;
    if (pending === 0) {
      scope.end();
      resolve(outcomes as SettledOutcomes<T, U>);
    }
  };

  if (pending === 0) {
    scope.end();
    resolve(outcomes as SettledOutcomes<T, U>);
    return combined;
  }

  inputs.forEach((input, index) => {
    Vow.follow<unknown, unknown, U>(input, context).then(
      (value) => record(index, ok(value)),
      (error) => record(index, err(error))
    );
  });

  return combined;
}

/**
 * Settles like the first input to settle, fulfilled or rejected.
 * An empty input rejects with `EmptyInputError`.
 */
export function race<const T extends readonly unknown[], U>(
  inputs: T,
  context: VowContext<U>,
  options: VowOptions = {}
): Vow<ValueOf<T[number]>, AnyError<T> | EmptyInputError, U> {
  const scope = openScope("race", inputs.length, context, options.label);

  if (inputs.length === 0) {
    scope.end();
    return Vow.settled<ValueOf<T[number]>, AnyError<T> | EmptyInputError, U>(
      err(emptyInputError("race")),
      context,
      options
    );
  }

  const { vow: combined, resolve, reject } = Vow.deferred<
    ValueOf<T[number]>,
    AnyError<T> | EmptyInputError,
    U
  >(context, options);
  let done = false;

  inputs.forEach((input, index) => {
    Vow.follow<ValueOf<T[number]>, AnyError<T>, U>(input, context).then(
      (value) => {
        if (done) return;
        done = true;
        scope.end(index);
        resolve(value);
      },
      (error) => {
        if (done) return;
        done = true;
        scope.end(index);
        reject(error);
      }
    );
  });

  return combined;
}

/**
 * Fulfills like the first input to fulfill.
 * When every input rejects, rejects with the error of the lowest-index input.
 * An empty input rejects with `EmptyInputError`.
 */
export function any<const T extends readonly unknown[], U>(
  inputs: T,
  context: VowContext<U>,
  options: VowOptions = {}
): Vow<ValueOf<T[number]>, AnyError<T> | EmptyInputError, U> {
  const scope = openScope("any", inputs.length, context, options.label);

  if (inputs.length === 0) {
    scope.end();
    return Vow.settled<ValueOf<T[number]>, AnyError<T> | EmptyInputError, U>(
      err(emptyInputError("any")),
      context,
      options
    );
  }

  const { vow: combined, resolve, reject } = Vow.deferred<
    ValueOf<T[number]>,
    AnyError<T> | EmptyInputError,
    U
  >(context, options);
  const errors: Array<AnyError<T> | U> = new Array(inputs.length);
  let pending = inputs.length;
  let done = false;

  inputs.forEach((input, index) => {
    Vow.follow<ValueOf<T[number]>, AnyError<T>, U>(input, context).then(
      (value) => {
        if (done) return;
        done = true;
        scope.end(index);
        resolve(value);
      },
      (error) => {
        if (done) return;
        errors[index] = error;
        pending--;
        if (pending === 0) {
          done = true;
          scope.end();
          reject(errors[0]);
        }
      }
    );
  });

  return combined;
}
