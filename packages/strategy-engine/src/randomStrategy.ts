import { MINUTE_US, type InstrumentId, type Intent } from "@bbo-sim/core";
import { randomInt, type RandomSource } from "./random";

export interface RandomIntentOptions {
	timeStart: number;
	timeEnd: number;
	instruments: readonly InstrumentId[];
	count?: number;
	maxAmount?: number;
	random?: RandomSource;
}

/**
 * Evenly spaced intents with random size, sign and instrument, followed by
 * one intent per instrument that flattens the accumulated position. Nothing
 * is scheduled in the final minute of the range.
 */
export const generateRandomIntents = (options: RandomIntentOptions): Intent[] => {
	const { timeStart, instruments } = options;
	const count = options.count ?? 100;
	const maxAmount = options.maxAmount ?? 1000;
	const random = options.random ?? Math.random;
	if (!instruments.length) {
		throw new Error("Random strategy needs at least one instrument");
	}

	const timeStop = options.timeEnd - MINUTE_US;
	const step = (timeStop - timeStart) / count;
	const totals = new Map<InstrumentId, number>(
		instruments.map((instrument) => [instrument, 0])
	);
	const intents: Intent[] = [];

	for (let i = 0; i < count; i += 1) {
		const quantity = randomInt(random, -maxAmount, maxAmount);
		const instrument = instruments[randomInt(random, 0, instruments.length - 1)];
		intents.push({
			timestamp: timeStart + i * step,
			baseIntents: [{ instrument, quantity }],
		});
		totals.set(instrument, (totals.get(instrument) ?? 0) + quantity);
	}

	for (const [instrument, total] of totals) {
		intents.push({
			timestamp: timeStop,
			baseIntents: [{ instrument, quantity: total === 0 ? 0 : -total }],
		});
	}

	return intents;
};
