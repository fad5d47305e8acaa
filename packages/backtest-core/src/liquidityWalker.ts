import type { OrderSide, Snapshot } from "@bbo-sim/core";

export interface Liquidity {
	price: number;
	size: number;
}

/**
 * Index of the first snapshot strictly after `targetTime`.
 *
 * The series must be sorted ascending by timestamp. Snapshots exactly at
 * `targetTime` are skipped. Returns `series.length` when every snapshot is at
 * or before the target, so callers go through {@link clampIndex}.
 */
export const locate = (series: readonly Snapshot[], targetTime: number): number => {
	let left = 0;
	let right = series.length - 1;

	while (left <= right) {
		const mid = (left + right) >> 1;
		if (series[mid].timestamp > targetTime) {
			right = mid - 1;
		} else {
			left = mid + 1;
		}
	}

	return left;
};

/**
 * Resolve a raw search result into `[0, series.length - 1]`.
 * An empty series has no valid index and yields -1.
 */
export const clampIndex = (series: readonly Snapshot[], index: number): number => {
	if (series.length === 0) {
		return -1;
	}
	return Math.min(Math.max(index, 0), series.length - 1);
};

/** Buys lift the ask, sells hit the bid. */
export const availableLiquidity = (
	snapshot: Snapshot,
	side: OrderSide
): Liquidity =>
	side === "buy"
		? { price: snapshot.askPrice, size: snapshot.askSize }
		: { price: snapshot.bidPrice, size: snapshot.bidSize };

export const sideOf = (quantity: number): OrderSide | null => {
	if (quantity > 0) {
		return "buy";
	}
	if (quantity < 0) {
		return "sell";
	}
	return null;
};
