import { bucketTimestamp, msToMicros, type Candle, type Trade } from "@bbo-sim/core";

const mean = (values: number[]): number | null =>
	values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : null;

const buildCandle = (trades: Trade[]): Candle => {
	const [first] = trades;
	let timeStart = first.timestamp;
	let timeEnd = first.timestamp;
	let high = first.price;
	let low = first.price;
	for (const trade of trades) {
		if (trade.timestamp < timeStart) timeStart = trade.timestamp;
		if (trade.timestamp > timeEnd) timeEnd = trade.timestamp;
		if (trade.price > high) high = trade.price;
		if (trade.price < low) low = trade.price;
	}
	const buys = trades.filter((trade) => trade.side === "buy");
	const sells = trades.filter((trade) => trade.side === "sell");

	return {
		timeStart,
		timeEnd,
		open: first.price,
		close: trades[trades.length - 1].price,
		high,
		low,
		buyVolume: mean(buys.map((trade) => trade.amount)),
		sellVolume: mean(sells.map((trade) => trade.amount)),
		buyMeanPrice: mean(buys.map((trade) => trade.price)),
		sellMeanPrice: mean(sells.map((trade) => trade.price)),
	};
};

/**
 * Aggregate trades into fixed-width candles.
 *
 * Trades are bucketed by `floor(ts / width) * width` with the width converted
 * from milliseconds to microseconds. Open and close follow input order within
 * a bucket; `timeStart`/`timeEnd` are the first and last trade times actually
 * seen, not the bucket edges. Volumes are mean trade sizes per side.
 */
export const makeCandles = (
	trades: readonly Trade[],
	candleDurationMs: number
): Candle[] => {
	const width = msToMicros(candleDurationMs);
	const buckets = new Map<number, Trade[]>();

	for (const trade of trades) {
		const bucket = bucketTimestamp(trade.timestamp, width);
		const group = buckets.get(bucket);
		if (group) {
			group.push(trade);
		} else {
			buckets.set(bucket, [trade]);
		}
	}

	return Array.from(buckets.entries())
		.sort(([a], [b]) => a - b)
		.map(([, group]) => buildCandle(group));
};
