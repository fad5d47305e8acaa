import type { InstrumentId } from "@bbo-sim/core";

export interface DailyPnl {
	/** UTC calendar day, "YYYY-MM-DD". */
	day: string;
	pnl: number;
}

export interface InstrumentMetrics {
	instrument: InstrumentId;
	pnl: number;
	/** Null when there is no daily variation to divide by. */
	sharpe: number | null;
	sortino: number | null;
	flips: number;
	tradedVolume: number;
	/** Microseconds; null when no holding period was closed. */
	averageHoldingTimeUs: number | null;
	dailyPnl: DailyPnl[];
}

export interface MetricsReport {
	totalPnl: number;
	maxDrawdown: number;
	entryCount: number;
	instruments: Record<InstrumentId, InstrumentMetrics>;
}

export interface MetricsOptions {
	riskFreeRate?: number;
	/** Instruments to report on; defaults to those present in the history. */
	instruments?: readonly InstrumentId[];
}
