/**
 * Time Utilities
 */

/**
 * Source of the current time, injectable for tests
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** Fractional second digits kept on stored outcome timestamps */
export const TIMESTAMP_FRACTION_DIGITS = 6;

const UTC_TIMESTAMP = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d+))?Z$/;

/**
 * Get current ISO timestamp
 */
export function now(clock: Clock = systemClock): string {
  return clock().toISOString();
}

/**
 * Rewrite a UTC ISO timestamp with exactly six fractional digits, so
 * stored values sort chronologically as text. Returns undefined for
 * anything else, including more than six fractional digits.
 */
export function normalizeTimestamp(iso: string): string | undefined {
  const match = UTC_TIMESTAMP.exec(iso);
  if (!match?.[1] || Number.isNaN(Date.parse(iso))) return undefined;

  const fraction = match[2] ?? '';
  if (fraction.length > TIMESTAMP_FRACTION_DIGITS) return undefined;

  return `${match[1]}.${fraction.padEnd(TIMESTAMP_FRACTION_DIGITS, '0')}Z`;
}

/**
 * Current time with microseconds. The system clock reads the
 * high-resolution timer; an injected clock only has milliseconds.
 */
export function preciseNow(clock: Clock = systemClock): string {
  if (clock !== systemClock) {
    return `${clock().toISOString().slice(0, -1)}000Z`;
  }

  const epochMs = performance.timeOrigin + performance.now();
  const wholeMs = Math.floor(epochMs);
  const micros = Math.min(999, Math.floor((epochMs - wholeMs) * 1000));
  return `${new Date(wholeMs).toISOString().slice(0, -1)}${String(micros).padStart(3, '0')}Z`;
}
