import {
	formatDayMicros,
	type FillHistoryEntry,
	type InstrumentId,
} from "@bbo-sim/core";
import type {
	DailyPnl,
	InstrumentMetrics,
	MetricsOptions,
	MetricsReport,
} from "./metricsSchema";

type History = readonly FillHistoryEntry[];

const mean = (values: number[]): number =>
	values.reduce((sum, value) => sum + value, 0) / values.length;

const standardDeviation = (values: number[]): number => {
	const avg = mean(values);
	const variance =
		values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / values.length;
	return Math.sqrt(variance);
};

const instrumentsOf = (history: History): InstrumentId[] =>
	Array.from(new Set(history.map((entry) => entry.instrument)));

export const calculateTotalPnl = (history: History): number =>
	history.reduce((sum, entry) => sum + entry.pnlDelta, 0);

/**
 * Largest peak-to-trough drop of cumulative PnL. The peak starts at the
 * first cumulative value, not at zero.
 */
export const calculateMaxDrawdown = (history: History): number => {
	if (!history.length) {
		return 0;
	}
	let cumulative = 0;
	let peak = -Infinity;
	let maxDrawdown = 0;
	for (const entry of history) {
		cumulative += entry.pnlDelta;
		if (cumulative > peak) {
			peak = cumulative;
		}
		maxDrawdown = Math.max(maxDrawdown, peak - cumulative);
	}
	return maxDrawdown;
};

export const groupDailyPnl = (
	history: History,
	instrument: InstrumentId
): DailyPnl[] => {
	const byDay = new Map<string, number>();
	for (const entry of history) {
		if (entry.instrument !== instrument) {
			continue;
		}
		const day = formatDayMicros(entry.timestamp);
		byDay.set(day, (byDay.get(day) ?? 0) + entry.pnlDelta);
	}
	return Array.from(byDay.entries())
		.sort(([a], [b]) => a.localeCompare(b))
		.map(([day, pnl]) => ({ day, pnl }));
};

/** Daily PnL mean over its population standard deviation. */
export const calculateSharpe = (
	history: History,
	instrument: InstrumentId,
	riskFreeRate = 0
): number | null => {
	const returns = groupDailyPnl(history, instrument).map((day) => day.pnl);
	if (!returns.length) {
		return null;
	}
	const std = standardDeviation(returns);
	return std === 0 ? null : (mean(returns) - riskFreeRate) / std;
};

/** Like Sharpe, but divides by the deviation of the losing days only. */
export const calculateSortino = (
	history: History,
	instrument: InstrumentId,
	riskFreeRate = 0
): number | null => {
	const returns = groupDailyPnl(history, instrument).map((day) => day.pnl);
	const negative = returns.filter((value) => value < 0);
	if (!negative.length) {
		return null;
	}
	const std = standardDeviation(negative);
	return std === 0 ? null : (mean(returns) - riskFreeRate) / std;
};

/** Number of times each position crosses from long to short or back. */
export const calculateFlips = (
	history: History,
	instruments: readonly InstrumentId[] = instrumentsOf(history)
): Record<InstrumentId, number> => {
	const flips: Record<InstrumentId, number> = {};
	const positions = new Map<InstrumentId, number>();
	for (const instrument of instruments) {
		flips[instrument] = 0;
		positions.set(instrument, 0);
	}
	for (const entry of history) {
		const position = positions.get(entry.instrument);
		if (position === undefined) {
			continue;
		}
		const next = position + entry.instrumentDelta;
		if (position * next < 0) {
			flips[entry.instrument] += 1;
		}
		positions.set(entry.instrument, next);
	}
	return flips;
};

export const calculateTradedVolume = (
	history: History,
	instruments: readonly InstrumentId[] = instrumentsOf(history)
): Record<InstrumentId, number> => {
	const volume: Record<InstrumentId, number> = {};
	for (const instrument of instruments) {
		volume[instrument] = 0;
	}
	for (const entry of history) {
		if (Object.hasOwn(volume, entry.instrument)) {
			volume[entry.instrument] += Math.abs(entry.instrumentDelta);
		}
	}
	return volume;
};

/**
 * Mean time a position stays open, in microseconds. A holding period starts
 * when the position leaves zero and ends when it returns to zero; a sign flip
 * ends one period and starts the next. Periods still open at the end of the
 * history are not counted.
 */
export const calculateAverageHoldingTime = (
	history: History,
	instruments: readonly InstrumentId[] = instrumentsOf(history)
): Record<InstrumentId, number | null> => {
	const state = new Map<
		InstrumentId,
		{ position: number; openedAt: number | null; periods: number[] }
	>();
	for (const instrument of instruments) {
		state.set(instrument, { position: 0, openedAt: null, periods: [] });
	}

	for (const entry of history) {
		const current = state.get(entry.instrument);
		if (!current) {
			continue;
		}
		const previous = current.position;
		const next = previous + entry.instrumentDelta;

		if (previous === 0 && next !== 0) {
			current.openedAt = entry.timestamp;
		} else if (current.openedAt !== null && (next === 0 || previous * next < 0)) {
			current.periods.push(entry.timestamp - current.openedAt);
			current.openedAt = next === 0 ? null : entry.timestamp;
		}
		current.position = next;
	}

	const averages: Record<InstrumentId, number | null> = {};
	for (const [instrument, { periods }] of state) {
		averages[instrument] = periods.length ? mean(periods) : null;
	}
	return averages;
};

export const calculateMetrics = (
	history: History,
	options: MetricsOptions = {}
): MetricsReport => {
	const instruments = options.instruments ?? instrumentsOf(history);
	const riskFreeRate = options.riskFreeRate ?? 0;
	const flips = calculateFlips(history, instruments);
	const volume = calculateTradedVolume(history, instruments);
	const holding = calculateAverageHoldingTime(history, instruments);

	const perInstrument: Record<InstrumentId, InstrumentMetrics> = {};
	for (const instrument of instruments) {
		perInstrument[instrument] = {
			instrument,
			pnl: calculateTotalPnl(
				history.filter((entry) => entry.instrument === instrument)
			),
			sharpe: calculateSharpe(history, instrument, riskFreeRate),
			sortino: calculateSortino(history, instrument, riskFreeRate),
			flips: flips[instrument],
			tradedVolume: volume[instrument],
			averageHoldingTimeUs: holding[instrument],
			dailyPnl: groupDailyPnl(history, instrument),
		};
	}

	return {
		totalPnl: calculateTotalPnl(history),
		maxDrawdown: calculateMaxDrawdown(history),
		entryCount: history.length,
		instruments: perInstrument,
	};
};
