import type { Snapshot } from "@bbo-sim/core";
import { parseCsv, readNumber, requireColumns } from "./csv";

const BBO_COLUMNS = [
	"local_timestamp",
	"ask_amount",
	"ask_price",
	"bid_price",
	"bid_amount",
] as const;

/**
 * Parse a BBO quotes CSV into snapshots sorted ascending by
 * `local_timestamp`. Rows sharing a timestamp keep their file order.
 */
export const parseBboCsv = (text: string, source = "bbo"): Snapshot[] => {
	const { header, rows } = parseCsv(text);
	const column = requireColumns(header, BBO_COLUMNS, source);

	const snapshots = rows.map((row, i): Snapshot => {
		const line = i + 2;
		return {
			timestamp: readNumber(row, column("local_timestamp"), "local_timestamp", source, line),
			bidPrice: readNumber(row, column("bid_price"), "bid_price", source, line),
			bidSize: readNumber(row, column("bid_amount"), "bid_amount", source, line),
			askPrice: readNumber(row, column("ask_price"), "ask_price", source, line),
			askSize: readNumber(row, column("ask_amount"), "ask_amount", source, line),
		};
	});

	return snapshots.sort((a, b) => a.timestamp - b.timestamp);
};
