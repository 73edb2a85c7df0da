/**
 * vowkit/core
 *
 * Result primitives and helpers, without the vow runtime.
 *
 * @example
 * ```typescript
 * import { ok, err, match, type Result } from "vowkit/core";
 *
 * const parsePort = (raw: string): Result<number, "NOT_A_PORT"> => {
 *   const port = Number(raw);
 *   return Number.isInteger(port) && port > 0 ? ok(port) : err("NOT_A_PORT");
 * };
 * ```
 */

export {
  // Types
  type Ok,
  type Err,
  type Result,
  type AsyncResult,
  type UnexpectedError,
  type UnexpectedCause,
  type PromiseRejectedError,
  type EmptyInputError,

  // Type utilities
  type ExtractValue,
  type ExtractError,

  // Error discriminants
  UNEXPECTED_ERROR,
  PROMISE_REJECTED,
  EMPTY_INPUT,

  // Constructors
  ok,
  err,
  defaultCatchUnexpected,
  toPromiseRejectedError,
  emptyInputError,

  // Type guards
  isOk,
  isErr,
  isUnexpectedError,
  isPromiseRejectedError,
  isEmptyInputError,

  // Unwrapping
  UnwrapError,
  unwrap,
  unwrapOr,
  match,
} from "./core";
