/**
 * Lifecycle events emitted by vows and combinators.
 *
 * Pass `onEvent` to `createVowRuntime()` to receive them. Handlers run synchronously
 * on the task that produced the event; a handler that throws is reported with
 * `console.warn` and does not affect the vow.
 */

export type ScopeType = "all" | "allSettled" | "race" | "any";

/** How a late settlement attempt was made. */
export type SettleAttempt = "resolve" | "reject" | "throw";

export type VowEvent =
  | { type: "vow_created"; vowId: string; label?: string; ts: number }
  | { type: "vow_fulfilled"; vowId: string; label?: string; ts: number; durationMs: number }
  | {
      type: "vow_rejected";
      vowId: string;
      label?: string;
      ts: number;
      durationMs: number;
      error: unknown;
      /** True when the error was produced by `catchUnexpected` on this vow */
      unexpected: boolean;
    }
  | {
      type: "vow_adopted";
      vowId: string;
      label?: string;
      ts: number;
      /** Id of the adopted vow; absent when a foreign thenable was adopted */
      sourceId?: string;
    }
  | { type: "settle_ignored"; vowId: string; label?: string; ts: number; attempted: SettleAttempt }
  | { type: "scope_start"; scopeId: string; scopeType: ScopeType; label?: string; size: number; ts: number }
  | {
      type: "scope_end";
      scopeId: string;
      scopeType: ScopeType;
      label?: string;
      ts: number;
      durationMs: number;
      /** Index of the input that decided the outcome (race, any, and a failed all) */
      winnerIndex?: number;
    };

export type VowEventType = VowEvent["type"];

export type VowEventHandler = (event: VowEvent) => void;
