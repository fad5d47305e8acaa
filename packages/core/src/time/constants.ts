/**
 * Time constants. Market data timestamps are microseconds, durations in
 * configuration are milliseconds.
 */

export const MICROS_PER_MS = 1_000;

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

export const MINUTE_US = MINUTE_MS * MICROS_PER_MS;
export const DAY_US = DAY_MS * MICROS_PER_MS;
