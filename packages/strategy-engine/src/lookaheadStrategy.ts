import { MINUTE_US, type Candle, type InstrumentId, type Intent } from "@bbo-sim/core";

export interface LookaheadIntentOptions {
	candles: Record<InstrumentId, readonly Candle[]>;
	timeStart: number;
	timeEnd: number;
	amount?: number;
}

/**
 * Peeks at each candle's outcome: buys at the candle start when it closes up
 * (sells when it closes down) and reverses at the candle end. Candles within
 * a minute of either end of the range are skipped.
 *
 * Useful as an upper bound when judging the simulator, never as a strategy.
 */
export const generateLookaheadIntents = (
	options: LookaheadIntentOptions
): Intent[] => {
	const amount = options.amount ?? 1000;
	const earliest = options.timeStart + MINUTE_US;
	const latest = options.timeEnd - MINUTE_US;
	const intents: Intent[] = [];

	for (const [instrument, candles] of Object.entries(options.candles)) {
		for (const candle of candles) {
			if (candle.timeEnd >= latest || candle.timeStart <= earliest) {
				continue;
			}
			const sign = candle.open > candle.close ? -1 : 1;
			intents.push({
				timestamp: candle.timeStart,
				baseIntents: [{ instrument, quantity: amount * sign }],
			});
			intents.push({
				timestamp: candle.timeEnd,
				baseIntents: [{ instrument, quantity: -amount * sign }],
			});
		}
	}

	return intents;
};
