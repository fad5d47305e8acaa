import type { CsvTable } from "./types";

const splitLine = (line: string): string[] => {
	const cells: string[] = [];
	let current = "";
	let quoted = false;
	for (const char of line) {
		if (char === '"') {
			quoted = !quoted;
			continue;
		}
		if (char === "," && !quoted) {
			cells.push(current);
			current = "";
			continue;
		}
		current += char;
	}
	cells.push(current);
	return cells.map((cell) => cell.trim());
};

/**
 * Parse comma separated text with a header row. Blank lines are skipped and
 * CRLF line endings are accepted; `"a,b"` keeps its comma.
 */
export const parseCsv = (text: string): CsvTable => {
	const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
	if (!lines.length) {
		return { header: [], rows: [] };
	}
	const [headerLine, ...body] = lines;
	return {
		header: splitLine(headerLine),
		rows: body.map(splitLine),
	};
};

export type ColumnIndex<K extends string> = (column: K) => number;

/**
 * Check that every required column is present and return an index lookup.
 */
export const requireColumns = <K extends string>(
	header: string[],
	columns: readonly K[],
	source: string
): ColumnIndex<K> => {
	const missing = columns.filter((column) => !header.includes(column));
	if (missing.length) {
		throw new Error(`${source}: missing column(s) ${missing.join(", ")}`);
	}
	return (column) => header.indexOf(column);
};

export const readNumber = (
	row: string[],
	index: number,
	column: string,
	source: string,
	line: number
): number => {
	const raw = row[index];
	const value = raw === undefined || raw === "" ? NaN : Number(raw);
	if (!Number.isFinite(value)) {
		throw new Error(
			`${source}: invalid number in column ${column} at line ${line}: "${raw ?? ""}"`
		);
	}
	return value;
};
