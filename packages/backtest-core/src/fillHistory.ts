import type { FillHistoryEntry, InstrumentId } from "@bbo-sim/core";

const keyOf = (timestamp: number, instrument: InstrumentId): string =>
	`${timestamp}|${instrument}`;

/**
 * Insertion-ordered fill history holding one entry per
 * (timestamp, instrument) pair.
 *
 * Recording a pair that already exists replaces the stored values but keeps
 * the entry at its original position. Runs that need every fill read the
 * ledger returned by `runBacktest` instead.
 */
export class FillHistory implements Iterable<FillHistoryEntry> {
	private readonly entriesByKey = new Map<string, FillHistoryEntry>();

	/** @returns true when an existing entry was overwritten */
	record(entry: FillHistoryEntry): boolean {
		const key = keyOf(entry.timestamp, entry.instrument);
		const overwritten = this.entriesByKey.has(key);
		this.entriesByKey.set(key, { ...entry });
		return overwritten;
	}

	get(timestamp: number, instrument: InstrumentId): FillHistoryEntry | undefined {
		const entry = this.entriesByKey.get(keyOf(timestamp, instrument));
		return entry ? { ...entry } : undefined;
	}

	has(timestamp: number, instrument: InstrumentId): boolean {
		return this.entriesByKey.has(keyOf(timestamp, instrument));
	}

	get size(): number {
		return this.entriesByKey.size;
	}

	entries(): FillHistoryEntry[] {
		return Array.from(this.entriesByKey.values(), (entry) => ({ ...entry }));
	}

	[Symbol.iterator](): Iterator<FillHistoryEntry> {
		return this.entries()[Symbol.iterator]();
	}
}
