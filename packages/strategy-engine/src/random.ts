/** Uniform source in [0, 1), same contract as Math.random. */
export type RandomSource = () => number;

/**
 * Deterministic 32-bit generator (mulberry32) for reproducible runs.
 */
export const createSeededRandom = (seed: number): RandomSource => {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
};

/** Integer in [min, max], both ends included. */
export const randomInt = (random: RandomSource, min: number, max: number): number =>
	min + Math.floor(random() * (max - min + 1));
