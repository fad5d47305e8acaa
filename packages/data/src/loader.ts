import { promises as fs } from "node:fs";
import type { BacktestConfig, MarketData } from "@bbo-sim/core";
import { parseBboCsv } from "./bbo";
import { parseTradesCsv } from "./trades";
import type { DataProviderLogger, LoadedMarketData, TradesByInstrument } from "./types";

const readText = async (filePath: string): Promise<string> => {
	try {
		return await fs.readFile(filePath, "utf-8");
	} catch (error) {
		throw new Error(
			`Failed to read ${filePath}: ${error instanceof Error ? error.message : "unknown"}`
		);
	}
};

/**
 * Read every configured instrument's BBO file. The returned range spans the
 * earliest and latest snapshot across instruments.
 */
export const loadMarketData = async (
	config: BacktestConfig,
	logger?: DataProviderLogger
): Promise<LoadedMarketData> => {
	const entries = await Promise.all(
		Object.entries(config.instruments).map(async ([instrument, sources]) => {
			const snapshots = parseBboCsv(await readText(sources.bbo), sources.bbo);
			logger?.info?.("market_data_loaded", {
				instrument,
				path: sources.bbo,
				snapshots: snapshots.length,
			});
			return [instrument, snapshots] as const;
		})
	);

	const marketData: MarketData = Object.fromEntries(entries);
	let timeStart = Infinity;
	let timeEnd = -Infinity;
	for (const [, snapshots] of entries) {
		if (!snapshots.length) {
			continue;
		}
		timeStart = Math.min(timeStart, snapshots[0].timestamp);
		timeEnd = Math.max(timeEnd, snapshots[snapshots.length - 1].timestamp);
	}
	if (!Number.isFinite(timeStart)) {
		throw new Error("No BBO snapshots found in the configured files");
	}

	return { marketData, timeStart, timeEnd };
};

export const loadTrades = async (
	config: BacktestConfig,
	logger?: DataProviderLogger
): Promise<TradesByInstrument> => {
	const entries = await Promise.all(
		Object.entries(config.instruments).map(async ([instrument, sources]) => {
			if (!sources.trades) {
				throw new Error(`No trades file configured for instrument '${instrument}'`);
			}
			const trades = parseTradesCsv(await readText(sources.trades), sources.trades);
			logger?.info?.("trades_loaded", {
				instrument,
				path: sources.trades,
				trades: trades.length,
			});
			return [instrument, trades] as const;
		})
	);
	return Object.fromEntries(entries);
};
