import type { Trade, TradeSide } from "@bbo-sim/core";
import { parseCsv, readNumber, requireColumns } from "./csv";

const TRADE_COLUMNS = ["local_timestamp", "price", "amount", "side"] as const;

const parseSide = (raw: string | undefined, source: string, line: number): TradeSide => {
	const value = raw?.toLowerCase();
	if (value === "buy" || value === "sell") {
		return value;
	}
	throw new Error(`${source}: invalid side at line ${line}: "${raw ?? ""}"`);
};

/**
 * Parse a public trades CSV. Rows stay in file order; candle aggregation
 * relies on that order for open/close prices.
 */
export const parseTradesCsv = (text: string, source = "trades"): Trade[] => {
	const { header, rows } = parseCsv(text);
	const column = requireColumns(header, TRADE_COLUMNS, source);

	return rows.map((row, i): Trade => {
		const line = i + 2;
		return {
			timestamp: readNumber(row, column("local_timestamp"), "local_timestamp", source, line),
			price: readNumber(row, column("price"), "price", source, line),
			amount: readNumber(row, column("amount"), "amount", source, line),
			side: parseSide(row[column("side")], source, line),
		};
	});
};
