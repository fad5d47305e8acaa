import path from "node:path";
import process from "node:process";
import { getWorkspaceRoot } from "@bbo-sim/core";
import { processBacktestFile, resolveLatestBacktest } from "@bbo-sim/metrics";

interface CliOptions {
	file?: string;
	riskFreeRate?: number;
}

const parseArgs = (): CliOptions => {
	const args = process.argv.slice(2);
	const options: CliOptions = {};
	for (let i = 0; i < args.length; i += 1) {
		const token = args[i];
		if (token === "--file" || token === "--riskFreeRate") {
			const next = args[i + 1];
			if (!next) {
				throw new Error(`${token} requires a value`);
			}
			if (token === "--file") {
				options.file = next;
			} else {
				options.riskFreeRate = Number(next);
			}
			i += 1;
		} else if (token.startsWith("--file=")) {
			options.file = token.slice("--file=".length);
		}
	}
	if (options.riskFreeRate !== undefined && !Number.isFinite(options.riskFreeRate)) {
		throw new Error("--riskFreeRate must be a number");
	}
	return options;
};

const main = async (): Promise<void> => {
	const options = parseArgs();
	const outputRoot = path.join(getWorkspaceRoot(), "output");
	const targetFile = options.file
		? path.resolve(options.file)
		: await resolveLatestBacktest(path.join(outputRoot, "backtests"));
	if (!targetFile) {
		console.error(
			"No backtest result found. Provide --file <path> or run the backtest CLI with --save."
		);
		process.exitCode = 1;
		return;
	}

	const processed = await processBacktestFile(
		targetFile,
		path.join(outputRoot, "metrics"),
		{ riskFreeRate: options.riskFreeRate }
	);
	console.log(`Metrics summary saved to ${processed.summaryPath}`);
	console.log(`Instrument CSV saved to ${processed.instrumentsPath}`);
	console.log(`Daily PnL CSV saved to ${processed.dailyPath}`);
};

main().catch((error: unknown) => {
	console.error(
		"metrics_runner_failed",
		error instanceof Error ? error.message : String(error)
	);
	process.exitCode = 1;
});
