import path from "node:path";
import process from "node:process";
import {
	STRATEGY_IDS,
	getWorkspaceRoot,
	loadBacktestConfig,
	setLogLevel,
	type BacktestConfig,
	type StrategyId,
} from "@bbo-sim/core";
import type { MetricsReport } from "@bbo-sim/metrics";
import {
	getBooleanArg,
	getNumberArg,
	getStringArg,
	parseCliArgs,
	type ArgMap,
} from "./cliArgs";
import { executeBacktestJob, persistBacktestResult } from "./backtestJob";

const USAGE = `Usage:
  npm run backtest -- --strategy <random|lookahead> [options]

Options:
  --strategy <id>            Strategy to replay (defaults to config)
  --config <path>            Backtest config JSON (default config/backtest.json)
  --envPath <path>           Custom .env path
  --actionDurationMs <ms>    Execution window per intent
  --seed <n>                 Seed for the random strategy
  --count <n>                Number of random intents
  --amount <n>               Lookahead size / random upper bound
  --save                     Write the run to output/backtests/*.json
  --json                     Print full JSON result payload
  --help                     Show this message
`;

const isStrategyId = (value: string): value is StrategyId =>
	STRATEGY_IDS.some((id) => id === value);

const applyOverrides = (config: BacktestConfig, args: ArgMap): BacktestConfig => {
	const strategyArg = getStringArg(args, "strategy");
	if (strategyArg !== undefined && !isStrategyId(strategyArg)) {
		throw new Error(
			`Unknown strategy "${strategyArg}". Expected one of ${STRATEGY_IDS.join(", ")}`
		);
	}
	const seed = getNumberArg(args, "seed");
	return {
		...config,
		actionDurationMs:
			getNumberArg(args, "actionDurationMs") ?? config.actionDurationMs,
		strategy: {
			...config.strategy,
			id: strategyArg ?? config.strategy.id,
			count: getNumberArg(args, "count") ?? config.strategy.count,
			amount: getNumberArg(args, "amount") ?? config.strategy.amount,
			...(seed !== undefined ? { seed } : {}),
		},
	};
};

const formatNumber = (value: number | null, digits = 4): string =>
	value === null ? "n/a" : value.toFixed(digits);

const formatHours = (micros: number | null): string =>
	micros === null ? "n/a" : `${(micros / 3_600_000_000).toFixed(2)}h`;

const printSummary = (metrics: MetricsReport): void => {
	console.log("---- Summary ----");
	console.log(`History entries: ${metrics.entryCount}`);
	console.log(`Total PnL: ${formatNumber(metrics.totalPnl, 2)}`);
	console.log(`Max drawdown: ${formatNumber(metrics.maxDrawdown, 2)}`);
	for (const entry of Object.values(metrics.instruments)) {
		console.log(
			`${entry.instrument}: pnl=${formatNumber(entry.pnl, 2)} sharpe=${formatNumber(
				entry.sharpe
			)} sortino=${formatNumber(entry.sortino)} flips=${entry.flips} volume=${
				entry.tradedVolume
			} avgHold=${formatHours(entry.averageHoldingTimeUs)}`
		);
	}
};

/** Parse `argv` and run one backtest. */
export const runCli = async (argv: string[]): Promise<void> => {
	const args = parseCliArgs(argv);
	const jsonOutput = getBooleanArg(args, "json");
	if (args.help) {
		console.log(USAGE);
		return;
	}

	const config = applyOverrides(
		loadBacktestConfig({
			configPath: getStringArg(args, "config"),
			envPath: getStringArg(args, "envPath"),
		}),
		args
	);

	// stdout carries only the JSON payload in --json mode
	if (jsonOutput) {
		setLogLevel("error");
	} else {
		console.log(
			`Running ${config.strategy.id} backtest over ${Object.keys(
				config.instruments
			).join(", ")} (action window ${config.actionDurationMs}ms)...`
		);
	}
	const job = await executeBacktestJob(config);

	if (jsonOutput) {
		console.log(
			JSON.stringify(
				{
					pnl: job.pnl,
					positions: job.positions,
					history: job.history,
					metrics: job.metrics,
				},
				null,
				2
			)
		);
	} else {
		printSummary(job.metrics);
	}

	if (getBooleanArg(args, "save")) {
		const outputPath = persistBacktestResult(
			job,
			path.join(getWorkspaceRoot(), "output", "backtests")
		);
		const relative = path.relative(process.cwd(), outputPath) || outputPath;
		const notice = `Backtest saved to ${relative}`;
		if (jsonOutput) {
			console.error(notice);
		} else {
			console.log(notice);
		}
	}
};
