import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import {
	createLogger,
	type BacktestConfig,
	type Candle,
	type FillHistoryEntry,
	type FillRecord,
	type InstrumentId,
	type Intent,
	type ModuleLogger,
	type Positions,
} from "@bbo-sim/core";
import { runBacktest } from "@bbo-sim/backtest-core";
import { loadMarketData, loadTrades, makeCandles } from "@bbo-sim/data";
import { calculateMetrics, type MetricsReport } from "@bbo-sim/metrics";
import { buildIntents, requiresTrades } from "@bbo-sim/strategy-engine";

export type JobLogger = Pick<ModuleLogger, "debug" | "info" | "warn">;

export interface BacktestJobResult {
	config: BacktestConfig;
	timeStart: number;
	timeEnd: number;
	intents: Intent[];
	pnl: number;
	positions: Positions;
	history: FillHistoryEntry[];
	ledger: FillRecord[];
	metrics: MetricsReport;
}

const defaultLogger = createLogger("backtest-cli");

const buildCandles = async (
	config: BacktestConfig,
	logger: JobLogger
): Promise<Record<InstrumentId, Candle[]>> => {
	const trades = await loadTrades(config, logger);
	const candles: Record<InstrumentId, Candle[]> = {};
	for (const [instrument, series] of Object.entries(trades)) {
		candles[instrument] = makeCandles(series, config.strategy.candleDurationMs);
	}
	return candles;
};

/**
 * Load data for every configured instrument, generate the configured
 * strategy's intents, replay them and compute metrics.
 */
export const executeBacktestJob = async (
	config: BacktestConfig,
	logger: JobLogger = defaultLogger
): Promise<BacktestJobResult> => {
	const { marketData, timeStart, timeEnd } = await loadMarketData(config, logger);
	const instruments = Object.keys(marketData);
	const candles = requiresTrades(config.strategy)
		? await buildCandles(config, logger)
		: undefined;

	const intents = buildIntents({
		settings: config.strategy,
		instruments,
		timeStart,
		timeEnd,
		candles,
	});
	logger.info("intents_generated", {
		strategy: config.strategy.id,
		intents: intents.length,
		timeStart,
		timeEnd,
	});

	const result = runBacktest({
		intents,
		actionDurationMs: config.actionDurationMs,
		marketData,
		logger,
	});
	const history = result.history.entries();
	const metrics = calculateMetrics(history, { instruments });

	logger.info("metrics_summary", {
		totalPnl: metrics.totalPnl,
		maxDrawdown: metrics.maxDrawdown,
		perInstrument: Object.values(metrics.instruments).map((entry) => ({
			instrument: entry.instrument,
			pnl: entry.pnl,
			sharpe: entry.sharpe,
			sortino: entry.sortino,
			flips: entry.flips,
			tradedVolume: entry.tradedVolume,
			averageHoldingTimeUs: entry.averageHoldingTimeUs,
		})),
	});

	return {
		config,
		timeStart,
		timeEnd,
		intents,
		pnl: result.pnl,
		positions: result.positions,
		history,
		ledger: result.ledger,
		metrics,
	};
};

export const configFingerprint = (config: BacktestConfig): string =>
	createHash("sha1")
		.update(
			JSON.stringify({
				instruments: config.instruments,
				actionDurationMs: config.actionDurationMs,
				strategy: config.strategy,
			})
		)
		.digest("hex")
		.slice(0, 12);

/**
 * Write the run to `<outputDir>/<strategy>-<timestamp>.json`. Intents are
 * left out; they can be regenerated from the seeded config.
 */
export const persistBacktestResult = (
	job: BacktestJobResult,
	outputDir: string,
	now: Date = new Date()
): string => {
	const stamp = now.toISOString().replace(/[:.]/g, "-");
	const fileName = `${job.config.strategy.id}-${stamp}.json`;
	fs.mkdirSync(outputDir, { recursive: true });
	const payload = {
		metadata: {
			strategy: job.config.strategy,
			instruments: Object.keys(job.config.instruments),
			actionDurationMs: job.config.actionDurationMs,
			timeStart: job.timeStart,
			timeEnd: job.timeEnd,
			intents: job.intents.length,
			configFingerprint: configFingerprint(job.config),
		},
		pnl: job.pnl,
		positions: job.positions,
		history: job.history,
		ledger: job.ledger,
		metrics: job.metrics,
	};
	const outputPath = path.join(outputDir, fileName);
	fs.writeFileSync(outputPath, JSON.stringify(payload, null, 2));
	return outputPath;
};
