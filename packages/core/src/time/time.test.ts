import { describe, it, expect } from "vitest";
import {
	bucketTimestamp,
	formatDayMicros,
	msToMicros,
} from "./time";
import { DAY_US, MINUTE_US } from "./constants";

describe("time utilities", () => {
	describe("msToMicros", () => {
		it("should multiply milliseconds by 1000", () => {
			expect(msToMicros(1)).toBe(1_000);
			expect(msToMicros(10_000)).toBe(10_000_000);
			expect(msToMicros(0)).toBe(0);
		});
	});

	describe("bucketTimestamp", () => {
		it("should bucket to period boundaries", () => {
			expect(bucketTimestamp(0, 1_000)).toBe(0);
			expect(bucketTimestamp(999, 1_000)).toBe(0);
			expect(bucketTimestamp(1_000, 1_000)).toBe(1_000);
			expect(bucketTimestamp(1_250, 1_000)).toBe(1_000);
		});

		it("should bucket hour-long candles in microseconds", () => {
			const hourUs = 60 * MINUTE_US;
			expect(bucketTimestamp(hourUs + 5, hourUs)).toBe(hourUs);
		});

		it("should throw on invalid timestamp", () => {
			expect(() => bucketTimestamp(NaN, 1_000)).toThrow("Invalid timestamp");
			expect(() => bucketTimestamp(Infinity, 1_000)).toThrow(
				"Invalid timestamp"
			);
		});

		it("should throw on invalid period", () => {
			expect(() => bucketTimestamp(1_000, 0)).toThrow("Invalid bucket period");
			expect(() => bucketTimestamp(1_000, -1)).toThrow(
				"Invalid bucket period"
			);
		});
	});

	describe("formatDayMicros", () => {
		it("should format the UTC day of a microsecond timestamp", () => {
			expect(formatDayMicros(0)).toBe("1970-01-01");
			expect(formatDayMicros(DAY_US - 1)).toBe("1970-01-01");
			expect(formatDayMicros(DAY_US)).toBe("1970-01-02");
		});
	});
});
