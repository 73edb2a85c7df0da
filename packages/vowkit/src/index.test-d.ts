/**
 * Type tests for vowkit
 * Run with: npm run test:types -w vowkit
 */
import { expectType } from "tsd";
import {
  all,
  allSettled,
  createVowRuntime,
  race,
  recovered,
  reject,
  resolve,
  vow,
  type AsyncResult,
  type EmptyInputError,
  type Result,
  type UnexpectedError,
  type Vow,
} from "./index";

const loaded = vow<number, "NOT_FOUND">((fulfill) => fulfill(1));
expectType<Vow<number, "NOT_FOUND", UnexpectedError>>(loaded);
expectType<AsyncResult<number, "NOT_FOUND" | UnexpectedError>>(loaded.await());

// resolve flattens
expectType<Vow<number, never, UnexpectedError>>(resolve(1));
expectType<Vow<number, "NOT_FOUND" | UnexpectedError, UnexpectedError>>(resolve(loaded));
expectType<Vow<string, never, UnexpectedError>>(resolve(Promise.resolve("a")));

// then
expectType<Vow<string, "NOT_FOUND", UnexpectedError>>(loaded.then((n) => String(n)));
expectType<Vow<string, "NOT_FOUND" | UnexpectedError, UnexpectedError>>(
  loaded.then((n) => resolve(String(n)))
);

// catch
const fallback: number = 0;
expectType<Vow<number | undefined, never, UnexpectedError>>(loaded.catch(() => undefined));
expectType<Vow<number, never, UnexpectedError>>(loaded.catch(() => recovered(fallback)));
expectType<Vow<number, "GONE", UnexpectedError>>(loaded.catch((): "GONE" => "GONE"));

// combinators
expectType<Vow<[number, string], UnexpectedError, UnexpectedError>>(all([resolve(1), resolve("a")]));
expectType<Vow<[Result<number, "NOT_FOUND" | UnexpectedError>], never, UnexpectedError>>(
  allSettled([loaded])
);
expectType<Vow<number, "E" | UnexpectedError | EmptyInputError, UnexpectedError>>(
  race([resolve(1), reject<"E">("E")])
);

// custom unexpected type
const runtime = createVowRuntime({ catchUnexpected: () => "DEFECT" as const });
expectType<Vow<number, never, "DEFECT">>(runtime.resolve(1));
