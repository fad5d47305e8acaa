export * from "./time";

/** Instruments are identified by plain string ids such as "DOGE". */
export type InstrumentId = string;

/**
 * Top-of-book quote at one point in time.
 * `timestamp` is the exchange-local timestamp in microseconds.
 */
export interface Snapshot {
	timestamp: number;
	bidPrice: number;
	bidSize: number;
	askPrice: number;
	askSize: number;
}

/** Snapshot series per instrument, each sorted ascending by timestamp. */
export type MarketData = Record<InstrumentId, readonly Snapshot[]>;

/**
 * Signed quantity request for one instrument.
 * Positive buys, negative sells, zero is a no-op.
 */
export interface BaseIntent {
	readonly instrument: InstrumentId;
	readonly quantity: number;
}

export interface Intent {
	readonly timestamp: number;
	readonly baseIntents: readonly BaseIntent[];
}

export type OrderSide = "buy" | "sell";

export interface FillResult {
	instrumentDelta: number;
	pnlDelta: number;
	/** Signed quantity left unfilled when the walk stopped. */
	remainingQuantity: number;
}

export interface FillHistoryEntry {
	timestamp: number;
	instrument: InstrumentId;
	pnlDelta: number;
	instrumentDelta: number;
}

export interface FillRecord extends FillHistoryEntry {
	sequence: number;
	requestedQuantity: number;
	remainingQuantity: number;
}

export type Positions = Record<InstrumentId, number>;

export type TradeSide = "buy" | "sell";

/** Public trade print, used for candle aggregation. */
export interface Trade {
	timestamp: number;
	price: number;
	amount: number;
	side: TradeSide;
}

export interface Candle {
	timeStart: number;
	timeEnd: number;
	open: number;
	close: number;
	high: number;
	low: number;
	buyVolume: number | null;
	sellVolume: number | null;
	buyMeanPrice: number | null;
	sellMeanPrice: number | null;
}
