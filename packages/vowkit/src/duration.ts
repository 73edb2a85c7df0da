/**
 * Duration input for `delay()`: milliseconds, or a string such as "100ms", "5s", "2m", "1h", "1d".
 */
export type DurationInput = number | string;

const MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60000,
  h: 3600000,
  d: 86400000,
};

/** Longest delay a Node timer honours; larger values fire after 1ms. */
export const MAX_DURATION_MS = 2_147_483_647;

/** Parse a duration string like "100ms", "5s", "2m", "1h", "1d" */
export function parseDurationString(input: string): number | undefined {
  const match = input.trim().match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/i);
  if (!match) return undefined;
  const value = parseFloat(match[1]);
  const unit = match[2].toLowerCase();
  return value * (MULTIPLIERS[unit] ?? 1);
}

/**
 * Convert a DurationInput to milliseconds.
 *
 * @throws {TypeError} For negative or non-finite numbers, unparseable strings and
 * durations above MAX_DURATION_MS
 */
export function toMillis(input: DurationInput): number {
  const millis = parseMillis(input);
  if (millis > MAX_DURATION_MS) {
    const shown = typeof input === "string" ? `"${input}"` : String(input);
    throw new TypeError(
      `Invalid duration: ${shown}. Expected at most ${MAX_DURATION_MS} milliseconds (about 24.8 days).`
    );
  }
  return millis;
}

function parseMillis(input: DurationInput): number {
  if (typeof input === "number") {
    if (!Number.isFinite(input) || input < 0) {
      throw new TypeError(
        `Invalid duration: ${input}. Expected a non-negative number of milliseconds.`
      );
    }
    return input;
  }
  const millis = parseDurationString(input);
  if (millis === undefined) {
    throw new TypeError(
      `Invalid duration: "${input}". Expected a number followed by ms, s, m, h or d (e.g. "100ms", "5s").`
    );
  }
  return millis;
}
