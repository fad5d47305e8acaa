import { describe, expect, it } from "vitest";
import { DAY_US, type FillHistoryEntry } from "@bbo-sim/core";
import {
	calculateAverageHoldingTime,
	calculateFlips,
	calculateMaxDrawdown,
	calculateMetrics,
	calculateSharpe,
	calculateSortino,
	calculateTotalPnl,
	calculateTradedVolume,
	groupDailyPnl,
} from "./calcPerformance";

const entry = (
	timestamp: number,
	instrument: string,
	pnlDelta: number,
	instrumentDelta: number
): FillHistoryEntry => ({ timestamp, instrument, pnlDelta, instrumentDelta });

const history: FillHistoryEntry[] = [
	entry(0, "DOGE", -100, 10),
	entry(1000, "PEPE", -50, 5),
	entry(DAY_US, "DOGE", 130, -10),
	entry(DAY_US + 10, "PEPE", 40, -8),
	entry(2 * DAY_US, "DOGE", -20, 2),
	entry(2 * DAY_US + 5, "PEPE", -10, 3),
];

const populationStd = (values: number[]): number => {
	const avg = values.reduce((a, b) => a + b, 0) / values.length;
	return Math.sqrt(
		values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / values.length
	);
};

describe("calculateTotalPnl", () => {
	it("sums pnl deltas", () => {
		expect(calculateTotalPnl(history)).toBe(-10);
		expect(calculateTotalPnl([])).toBe(0);
	});
});

describe("calculateMaxDrawdown", () => {
	it("measures the deepest drop from a running peak", () => {
		// cumulative: -100, -150, -20, 20, 0, -10
		expect(calculateMaxDrawdown(history)).toBe(50);
	});

	it("is zero for an empty or rising history", () => {
		expect(calculateMaxDrawdown([])).toBe(0);
		expect(calculateMaxDrawdown([entry(0, "DOGE", 5, 1), entry(1, "DOGE", 5, 1)])).toBe(0);
	});
});

describe("groupDailyPnl", () => {
	it("sums pnl per UTC day for one instrument", () => {
		expect(groupDailyPnl(history, "PEPE")).toEqual([
			{ day: "1970-01-01", pnl: -50 },
			{ day: "1970-01-02", pnl: 40 },
			{ day: "1970-01-03", pnl: -10 },
		]);
	});
});

describe("calculateSharpe", () => {
	it("divides mean daily pnl by its population deviation", () => {
		const daily = [-100, 130, -20];
		expect(calculateSharpe(history, "DOGE")).toBeCloseTo(
			10 / 3 / populationStd(daily),
			12
		);
	});

	it("subtracts the risk free rate", () => {
		const daily = [-100, 130, -20];
		expect(calculateSharpe(history, "DOGE", 1)).toBeCloseTo(
			(10 / 3 - 1) / populationStd(daily),
			12
		);
	});

	it("is null without entries or variation", () => {
		expect(calculateSharpe(history, "SHIB")).toBeNull();
		expect(calculateSharpe([entry(0, "DOGE", 5, 1)], "DOGE")).toBeNull();
	});
});

describe("calculateSortino", () => {
	it("uses the deviation of losing days", () => {
		// losing days -100 and -20 deviate by 40
		expect(calculateSortino(history, "DOGE")).toBeCloseTo(10 / 3 / 40, 12);
		// PEPE: mean -20/3, losing days -50 and -10 deviate by 20
		expect(calculateSortino(history, "PEPE")).toBeCloseTo(-1 / 3, 12);
	});

	it("is null without losing days or with a single one", () => {
		expect(calculateSortino([entry(0, "DOGE", 5, 1)], "DOGE")).toBeNull();
		expect(calculateSortino([entry(0, "DOGE", -5, 1)], "DOGE")).toBeNull();
	});
});

describe("position based metrics", () => {
	it("counts sign flips per instrument", () => {
		expect(calculateFlips(history)).toEqual({ DOGE: 0, PEPE: 1 });
	});

	it("sums absolute quantity per instrument", () => {
		expect(calculateTradedVolume(history)).toEqual({ DOGE: 22, PEPE: 16 });
	});

	it("averages closed holding periods", () => {
		expect(calculateAverageHoldingTime(history)).toEqual({
			DOGE: DAY_US,
			PEPE: DAY_US - 497.5,
		});
	});

	it("reports requested instruments even without entries", () => {
		expect(calculateTradedVolume(history, ["DOGE", "SHIB"])).toEqual({
			DOGE: 22,
			SHIB: 0,
		});
		expect(calculateAverageHoldingTime([], ["SHIB"])).toEqual({ SHIB: null });
	});
});

describe("calculateMetrics", () => {
	it("bundles every metric per instrument", () => {
		const report = calculateMetrics(history);
		expect(report.totalPnl).toBe(-10);
		expect(report.maxDrawdown).toBe(50);
		expect(report.entryCount).toBe(6);
		expect(Object.keys(report.instruments)).toEqual(["DOGE", "PEPE"]);
		expect(report.instruments.PEPE).toMatchObject({
			instrument: "PEPE",
			pnl: -20,
			flips: 1,
			tradedVolume: 16,
			averageHoldingTimeUs: DAY_US - 497.5,
		});
		expect(report.instruments.DOGE.dailyPnl).toHaveLength(3);
	});
});
