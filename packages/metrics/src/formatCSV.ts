import type { MetricsReport } from "./metricsSchema";

export type CsvMode = "summary" | "instruments" | "daily";

export interface FormatCsvOptions {
	mode?: CsvMode;
	includeHeader?: boolean;
}

export const formatMetricsCsv = (
	report: MetricsReport,
	options: FormatCsvOptions = {}
): string => {
	const mode = options.mode ?? "instruments";
	const includeHeader = options.includeHeader ?? true;
	switch (mode) {
		case "summary":
			return toCsv([buildSummaryRow(report)], includeHeader);
		case "daily":
			return toCsv(buildDailyRows(report), includeHeader);
		case "instruments":
		default:
			return toCsv(buildInstrumentRows(report), includeHeader);
	}
};

const buildSummaryRow = (report: MetricsReport): Record<string, unknown> => ({
	totalPnl: report.totalPnl,
	maxDrawdown: report.maxDrawdown,
	entryCount: report.entryCount,
	instruments: Object.keys(report.instruments).join(","),
});

const buildInstrumentRows = (
	report: MetricsReport
): Record<string, unknown>[] =>
	Object.values(report.instruments).map((metrics) => ({
		instrument: metrics.instrument,
		pnl: metrics.pnl,
		sharpe: metrics.sharpe,
		sortino: metrics.sortino,
		flips: metrics.flips,
		tradedVolume: metrics.tradedVolume,
		averageHoldingTimeUs: metrics.averageHoldingTimeUs,
	}));

const buildDailyRows = (report: MetricsReport): Record<string, unknown>[] =>
	Object.values(report.instruments).flatMap((metrics) =>
		metrics.dailyPnl.map((day) => ({
			instrument: metrics.instrument,
			day: day.day,
			pnl: day.pnl,
		}))
	);

const toCsv = (
	rows: Record<string, unknown>[],
	includeHeader: boolean
): string => {
	if (!rows.length) {
		return "";
	}
	const headers = Object.keys(rows[0]);
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(headers.join(","));
	}
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return lines.join("\n");
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (value.includes(",")) {
			return `"${value}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value.toString() : "";
	}
	return String(value);
};
