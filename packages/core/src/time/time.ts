import { MICROS_PER_MS } from "./constants";

/**
 * Convert a millisecond duration to microseconds.
 * @example msToMicros(10_000) => 10_000_000
 */
export const msToMicros = (ms: number): number => ms * MICROS_PER_MS;

/**
 * Bucket a timestamp to the start of its period
 * @param ts - Timestamp (any unit)
 * @param period - Bucket width in the same unit
 * @example bucketTimestamp(1_250, 1_000) => 1_000
 */
export const bucketTimestamp = (ts: number, period: number): number => {
	if (!Number.isFinite(ts)) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isFinite(period) || period <= 0) {
		throw new Error(`Invalid bucket period: ${period}`);
	}
	return Math.floor(ts / period) * period;
};

/**
 * UTC calendar day ("YYYY-MM-DD") of a microsecond timestamp
 */
export const formatDayMicros = (tsMicros: number): string =>
	new Date(Math.floor(tsMicros / MICROS_PER_MS)).toISOString().slice(0, 10);
