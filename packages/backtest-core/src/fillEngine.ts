import type { BaseIntent, FillResult, Snapshot } from "@bbo-sim/core";
import { availableLiquidity, clampIndex, locate, sideOf } from "./liquidityWalker";

/**
 * Execute one base intent against the snapshot series.
 *
 * Walks forward from the first snapshot after `startTime` (clamped into the
 * series) and takes liquidity until the request is filled, the snapshot
 * timestamp reaches `startTime + timeBudget`, or the series runs out. The
 * unfilled remainder is dropped and reported as `remainingQuantity`.
 *
 * Every partial fill is booked at the ask price, sells included: sells are
 * capped by bid size but still priced off the ask.
 *
 * The intent is not modified.
 */
export const fill = (
	startTime: number,
	baseIntent: BaseIntent,
	series: readonly Snapshot[],
	timeBudget: number
): FillResult => {
	const deadline = startTime + timeBudget;
	let remaining = baseIntent.quantity;
	let instrumentDelta = 0;
	let pnlDelta = 0;

	let idx = clampIndex(series, locate(series, startTime));
	if (idx === -1) {
		return { instrumentDelta, pnlDelta, remainingQuantity: remaining };
	}

	while (idx < series.length && remaining !== 0) {
		const snapshot = series[idx];
		if (snapshot.timestamp >= deadline) {
			break;
		}

		const side = sideOf(remaining);
		if (!side) {
			break;
		}
		const { size } = availableLiquidity(snapshot, side);
		const quantity =
			side === "buy" ? Math.min(size, remaining) : Math.max(-size, remaining);

		remaining -= quantity;
		instrumentDelta += quantity;
		pnlDelta -= snapshot.askPrice * quantity;

		idx += 1;
	}

	return { instrumentDelta, pnlDelta, remainingQuantity: remaining };
};
