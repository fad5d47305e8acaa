import type {
	Candle,
	InstrumentId,
	Intent,
	StrategySettings,
} from "@bbo-sim/core";
import { generateLookaheadIntents } from "./lookaheadStrategy";
import { createSeededRandom, type RandomSource } from "./random";
import { generateRandomIntents } from "./randomStrategy";

export interface StrategyBuildContext {
	settings: StrategySettings;
	instruments: readonly InstrumentId[];
	timeStart: number;
	timeEnd: number;
	/** Required by the lookahead strategy. */
	candles?: Record<InstrumentId, readonly Candle[]>;
	random?: RandomSource;
}

const resolveRandom = (context: StrategyBuildContext): RandomSource => {
	if (context.random) {
		return context.random;
	}
	return context.settings.seed !== undefined
		? createSeededRandom(context.settings.seed)
		: Math.random;
};

export const buildIntents = (context: StrategyBuildContext): Intent[] => {
	const { settings } = context;
	switch (settings.id) {
		case "random":
			return generateRandomIntents({
				timeStart: context.timeStart,
				timeEnd: context.timeEnd,
				instruments: context.instruments,
				count: settings.count,
				maxAmount: settings.amount,
				random: resolveRandom(context),
			});
		case "lookahead": {
			if (!context.candles) {
				throw new Error("Lookahead strategy requires candles");
			}
			return generateLookaheadIntents({
				candles: context.candles,
				timeStart: context.timeStart,
				timeEnd: context.timeEnd,
				amount: settings.amount,
			});
		}
		default: {
			const unreachable: never = settings.id;
			throw new Error(`Unsupported strategy: ${String(unreachable)}`);
		}
	}
};

/** Whether a strategy needs public trades (for candles) besides BBO data. */
export const requiresTrades = (settings: StrategySettings): boolean =>
	settings.id === "lookahead";
