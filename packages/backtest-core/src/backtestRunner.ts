import {
	createLogger,
	msToMicros,
	type FillRecord,
	type Intent,
	type MarketData,
	type ModuleLogger,
	type Positions,
} from "@bbo-sim/core";
import { fill } from "./fillEngine";
import { FillHistory } from "./fillHistory";

export type BacktestLogger = Pick<ModuleLogger, "debug" | "info" | "warn">;

export interface BacktestOptions {
	intents: readonly Intent[];
	/** Execution window per base intent, in milliseconds. */
	actionDurationMs: number;
	marketData: MarketData;
	logger?: BacktestLogger;
}

export interface BacktestResult {
	pnl: number;
	positions: Positions;
	history: FillHistory;
	/** Every fill in processing order, including ones the history overwrote. */
	ledger: FillRecord[];
}

const defaultLogger = createLogger("backtest-core");

const assertKnownInstruments = (
	intents: readonly Intent[],
	marketData: MarketData
): void => {
	for (const intent of intents) {
		for (const base of intent.baseIntents) {
			if (!Object.hasOwn(marketData, base.instrument)) {
				throw new Error(
					`No market data for instrument '${base.instrument}' (intent at ${intent.timestamp})`
				);
			}
		}
	}
};

/**
 * Replay intents against historical BBO snapshots.
 *
 * Intents run in ascending timestamp order (stable for equal timestamps).
 * Each base intent gets `actionDurationMs * 1000` microseconds to fill. PnL
 * and positions accumulate across the run; the input intents are left
 * untouched.
 */
export const runBacktest = (options: BacktestOptions): BacktestResult => {
	const logger = options.logger ?? defaultLogger;
	const { marketData } = options;
	if (!Number.isFinite(options.actionDurationMs)) {
		throw new Error(`Invalid actionDurationMs: ${options.actionDurationMs}`);
	}
	assertKnownInstruments(options.intents, marketData);

	const timeBudget = msToMicros(options.actionDurationMs);
	const ordered = [...options.intents].sort((a, b) => a.timestamp - b.timestamp);
	const positions: Positions = {};
	for (const instrument of Object.keys(marketData)) {
		positions[instrument] = 0;
	}
	const history = new FillHistory();
	const ledger: FillRecord[] = [];
	let pnl = 0;

	logger.info("backtest_start", {
		intents: ordered.length,
		instruments: Object.keys(marketData),
		timeBudgetUs: timeBudget,
	});

	for (const intent of ordered) {
		for (const base of intent.baseIntents) {
			const { instrument } = base;
			const result = fill(
				intent.timestamp,
				base,
				marketData[instrument],
				timeBudget
			);

			pnl += result.pnlDelta;
			positions[instrument] += result.instrumentDelta;

			const overwritten = history.record({
				timestamp: intent.timestamp,
				instrument,
				pnlDelta: result.pnlDelta,
				instrumentDelta: result.instrumentDelta,
			});
			if (overwritten) {
				logger.warn("fill_history_overwrite", {
					timestamp: intent.timestamp,
					instrument,
				});
			}

			ledger.push({
				sequence: ledger.length,
				timestamp: intent.timestamp,
				instrument,
				requestedQuantity: base.quantity,
				instrumentDelta: result.instrumentDelta,
				pnlDelta: result.pnlDelta,
				remainingQuantity: result.remainingQuantity,
			});

			logger.debug("fill_executed", {
				timestamp: intent.timestamp,
				instrument,
				requested: base.quantity,
				filled: result.instrumentDelta,
				pnlDelta: result.pnlDelta,
			});
		}
	}

	logger.info("backtest_complete", {
		pnl,
		positions,
		historyEntries: history.size,
		fills: ledger.length,
	});

	return { pnl, positions, history, ledger };
};
