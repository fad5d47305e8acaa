import { describe, expect, it, vi } from "vitest";
import type { Intent, MarketData, Snapshot } from "@bbo-sim/core";
import { runBacktest, type BacktestLogger } from "./backtestRunner";

const snap = (
	timestamp: number,
	bidPrice: number,
	bidSize: number,
	askPrice: number,
	askSize: number
): Snapshot => ({ timestamp, bidPrice, bidSize, askPrice, askSize });

const silentLogger = (): BacktestLogger => ({
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
});

const marketData: MarketData = {
	DOGE: [
		snap(0, 9, 100, 10, 100),
		snap(1000, 10, 100, 11, 100),
		snap(2000, 11, 100, 12, 100),
	],
	PEPE: [snap(0, 1, 50, 2, 50), snap(1000, 2, 50, 3, 50)],
};

const buildIntents = (): Intent[] => [
	{
		timestamp: 1000,
		baseIntents: [
			{ instrument: "DOGE", quantity: -40 },
			{ instrument: "PEPE", quantity: 10 },
		],
	},
	{ timestamp: 0, baseIntents: [{ instrument: "DOGE", quantity: 60 }] },
	{ timestamp: 500, baseIntents: [{ instrument: "PEPE", quantity: 70 }] },
];

describe("runBacktest", () => {
	it("fills a single buy within liquidity", () => {
		const result = runBacktest({
			intents: [{ timestamp: 0, baseIntents: [{ instrument: "DOGE", quantity: 3 }] }],
			actionDurationMs: 1,
			marketData: { DOGE: [snap(0, 9, 5, 10, 5)] },
			logger: silentLogger(),
		});
		expect(result.pnl).toBe(-30);
		expect(result.positions).toEqual({ DOGE: 3 });
		expect(result.history.entries()).toEqual([
			{ timestamp: 0, instrument: "DOGE", pnlDelta: -30, instrumentDelta: 3 },
		]);
	});

	it("runs sorted intents across two instruments", () => {
		const result = runBacktest({
			intents: buildIntents(),
			actionDurationMs: 2,
			marketData,
			logger: silentLogger(),
		});

		expect(result.history.entries()).toEqual([
			{ timestamp: 0, instrument: "DOGE", pnlDelta: -660, instrumentDelta: 60 },
			{ timestamp: 500, instrument: "PEPE", pnlDelta: -150, instrumentDelta: 50 },
			{ timestamp: 1000, instrument: "DOGE", pnlDelta: 480, instrumentDelta: -40 },
			{ timestamp: 1000, instrument: "PEPE", pnlDelta: -30, instrumentDelta: 10 },
		]);
		expect(result.positions).toEqual({ DOGE: 20, PEPE: 60 });
		expect(result.pnl).toBe(-360);
	});

	it("keeps positions equal to the summed deltas per instrument", () => {
		const result = runBacktest({
			intents: buildIntents(),
			actionDurationMs: 2,
			marketData,
			logger: silentLogger(),
		});
		const sums: Record<string, number> = { DOGE: 0, PEPE: 0 };
		for (const entry of result.history) {
			sums[entry.instrument] += entry.instrumentDelta;
		}
		expect(result.positions).toEqual(sums);
		expect(result.history.size).toBeLessThanOrEqual(4);
	});

	it("conserves pnl between the total and the history", () => {
		const result = runBacktest({
			intents: buildIntents(),
			actionDurationMs: 2,
			marketData,
			logger: silentLogger(),
		});
		let total = 0;
		for (const entry of result.history) {
			total += entry.pnlDelta;
		}
		expect(result.pnl).toBe(total);
	});

	it("converts the action duration from milliseconds to microseconds", () => {
		// A 1ms window ends exactly at the next DOGE snapshot, so nothing fills.
		const result = runBacktest({
			intents: [{ timestamp: 0, baseIntents: [{ instrument: "DOGE", quantity: 5 }] }],
			actionDurationMs: 1,
			marketData,
			logger: silentLogger(),
		});
		expect(result.positions.DOGE).toBe(0);
		expect(result.history.get(0, "DOGE")).toEqual({
			timestamp: 0,
			instrument: "DOGE",
			pnlDelta: 0,
			instrumentDelta: 0,
		});
	});

	it("keeps only the later fill for a shared timestamp and instrument", () => {
		const logger = silentLogger();
		const result = runBacktest({
			intents: [
				{ timestamp: 0, baseIntents: [{ instrument: "DOGE", quantity: 3 }] },
				{ timestamp: 0, baseIntents: [{ instrument: "DOGE", quantity: -2 }] },
			],
			actionDurationMs: 1,
			marketData: { DOGE: [snap(0, 9, 5, 10, 5)] },
			logger,
		});

		expect(result.history.size).toBe(1);
		expect(result.history.get(0, "DOGE")).toEqual({
			timestamp: 0,
			instrument: "DOGE",
			pnlDelta: 20,
			instrumentDelta: -2,
		});
		expect(result.pnl).toBe(-10);
		expect(result.positions).toEqual({ DOGE: 1 });
		expect(logger.warn).toHaveBeenCalledWith("fill_history_overwrite", {
			timestamp: 0,
			instrument: "DOGE",
		});
	});

	it("records every fill in the ledger with sequence numbers", () => {
		const result = runBacktest({
			intents: [
				{ timestamp: 0, baseIntents: [{ instrument: "DOGE", quantity: 3 }] },
				{ timestamp: 0, baseIntents: [{ instrument: "DOGE", quantity: -2 }] },
			],
			actionDurationMs: 1,
			marketData: { DOGE: [snap(0, 9, 5, 10, 5)] },
			logger: silentLogger(),
		});
		expect(result.ledger).toEqual([
			{
				sequence: 0,
				timestamp: 0,
				instrument: "DOGE",
				requestedQuantity: 3,
				instrumentDelta: 3,
				pnlDelta: -30,
				remainingQuantity: 0,
			},
			{
				sequence: 1,
				timestamp: 0,
				instrument: "DOGE",
				requestedQuantity: -2,
				instrumentDelta: -2,
				pnlDelta: 20,
				remainingQuantity: 0,
			},
		]);
		const ledgerPnl = result.ledger.reduce((sum, record) => sum + record.pnlDelta, 0);
		expect(ledgerPnl).toBe(result.pnl);
	});

	it("does not mutate or reorder the input intents", () => {
		const intents = buildIntents();
		runBacktest({ intents, actionDurationMs: 2, marketData, logger: silentLogger() });
		expect(intents.map((intent) => intent.timestamp)).toEqual([1000, 0, 500]);
		expect(intents[2].baseIntents[0].quantity).toBe(70);
	});

	it("treats an empty series as a zero fill", () => {
		const result = runBacktest({
			intents: [{ timestamp: 0, baseIntents: [{ instrument: "DOGE", quantity: 5 }] }],
			actionDurationMs: 1,
			marketData: { DOGE: [] },
			logger: silentLogger(),
		});
		expect(result.pnl).toBe(0);
		expect(result.positions).toEqual({ DOGE: 0 });
	});

	it("rejects intents for instruments without market data", () => {
		expect(() =>
			runBacktest({
				intents: [{ timestamp: 7, baseIntents: [{ instrument: "SHIB", quantity: 1 }] }],
				actionDurationMs: 1,
				marketData,
				logger: silentLogger(),
			})
		).toThrowError("No market data for instrument 'SHIB' (intent at 7)");
	});

	it("logs a completion summary", () => {
		const logger = silentLogger();
		runBacktest({ intents: buildIntents(), actionDurationMs: 2, marketData, logger });
		expect(logger.info).toHaveBeenCalledWith("backtest_complete", {
			pnl: -360,
			positions: { DOGE: 20, PEPE: 60 },
			historyEntries: 4,
			fills: 4,
		});
	});
});
