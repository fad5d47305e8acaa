import type { InstrumentId, MarketData, Trade } from "@bbo-sim/core";

export interface DataProviderLogger {
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

export interface CsvTable {
	header: string[];
	rows: string[][];
}

export type TradesByInstrument = Record<InstrumentId, Trade[]>;

export interface LoadedMarketData {
	marketData: MarketData;
	/** Earliest and latest snapshot timestamps across all instruments. */
	timeStart: number;
	timeEnd: number;
}
