import { promises as fs } from "node:fs";
import path from "node:path";
import type { FillHistoryEntry } from "@bbo-sim/core";
import { calculateMetrics } from "./calcPerformance";
import { formatMetricsCsv } from "./formatCSV";
import type { MetricsOptions, MetricsReport } from "./metricsSchema";

export interface ProcessedMetricsFiles {
	report: MetricsReport;
	summaryPath: string;
	instrumentsPath: string;
	dailyPath: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isHistoryEntry = (value: unknown): value is FillHistoryEntry =>
	isRecord(value) &&
	typeof value.timestamp === "number" &&
	typeof value.instrument === "string" &&
	typeof value.pnlDelta === "number" &&
	typeof value.instrumentDelta === "number";

/** Extract the fill history from a saved backtest result payload. */
export const parseSavedHistory = (payload: unknown, source: string): FillHistoryEntry[] => {
	if (!isRecord(payload) || !Array.isArray(payload.history)) {
		throw new Error(`${source}: saved backtest has no history array`);
	}
	return payload.history.map((entry, index) => {
		if (!isHistoryEntry(entry)) {
			throw new Error(`${source}: malformed history entry at index ${index}`);
		}
		return entry;
	});
};

export const resolveLatestBacktest = async (backtestDir: string): Promise<string | null> => {
	let files: string[];
	try {
		files = await fs.readdir(backtestDir);
	} catch {
		return null;
	}
	const candidates = await Promise.all(
		files
			.filter((file) => file.endsWith(".json"))
			.map(async (file) => {
				const fullPath = path.join(backtestDir, file);
				const stats = await fs.stat(fullPath);
				return { file: fullPath, mtimeMs: stats.isFile() ? stats.mtimeMs : -1 };
			})
	);
	const latest = candidates
		.filter((candidate) => candidate.mtimeMs >= 0)
		.sort((a, b) => b.mtimeMs - a.mtimeMs)[0];
	return latest?.file ?? null;
};

/**
 * Recompute metrics for a saved backtest and write
 * `<name>.summary.json`, `<name>.instruments.csv` and `<name>.daily.csv`
 * into `metricsDir`.
 */
export const processBacktestFile = async (
	filePath: string,
	metricsDir: string,
	options: MetricsOptions = {}
): Promise<ProcessedMetricsFiles> => {
	const payload: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
	const report = calculateMetrics(parseSavedHistory(payload, filePath), options);

	await fs.mkdir(metricsDir, { recursive: true });
	const baseName = path.basename(filePath, path.extname(filePath));
	const summaryPath = path.join(metricsDir, `${baseName}.summary.json`);
	const instrumentsPath = path.join(metricsDir, `${baseName}.instruments.csv`);
	const dailyPath = path.join(metricsDir, `${baseName}.daily.csv`);

	await fs.writeFile(summaryPath, JSON.stringify(report, null, 2), "utf8");
	await fs.writeFile(
		instrumentsPath,
		formatMetricsCsv(report, { mode: "instruments" }),
		"utf8"
	);
	await fs.writeFile(dailyPath, formatMetricsCsv(report, { mode: "daily" }), "utf8");

	return { report, summaryPath, instrumentsPath, dailyPath };
};
