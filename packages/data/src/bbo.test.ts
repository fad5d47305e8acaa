import { describe, expect, it } from "vitest";
import { parseBboCsv } from "./bbo";
import { parseTradesCsv } from "./trades";

const BBO_CSV = [
	"exchange,symbol,timestamp,local_timestamp,ask_amount,ask_price,bid_price,bid_amount",
	"binance-futures,DOGEUSDT,1,300,10,0.12,0.11,20",
	"binance-futures,DOGEUSDT,1,100,11,0.13,0.12,21",
	"binance-futures,DOGEUSDT,1,300,12,0.14,0.13,22",
].join("\n");

describe("parseBboCsv", () => {
	it("maps columns into snapshots sorted by local timestamp", () => {
		expect(parseBboCsv(BBO_CSV)).toEqual([
			{ timestamp: 100, bidPrice: 0.12, bidSize: 21, askPrice: 0.13, askSize: 11 },
			{ timestamp: 300, bidPrice: 0.11, bidSize: 20, askPrice: 0.12, askSize: 10 },
			{ timestamp: 300, bidPrice: 0.13, bidSize: 22, askPrice: 0.14, askSize: 12 },
		]);
	});

	it("reports missing columns with the source name", () => {
		expect(() => parseBboCsv("local_timestamp,ask_price\n1,2", "doge.csv")).toThrowError(
			"doge.csv: missing column(s) ask_amount, bid_price, bid_amount"
		);
	});

	it("reports the line of a bad cell", () => {
		const text = "local_timestamp,ask_amount,ask_price,bid_price,bid_amount\n1,2,3,4,5\n2,x,3,4,5";
		expect(() => parseBboCsv(text, "doge.csv")).toThrowError(
			'doge.csv: invalid number in column ask_amount at line 3: "x"'
		);
	});
});

describe("parseTradesCsv", () => {
	it("keeps file order and normalizes side", () => {
		const text = "local_timestamp,price,amount,side\n20,1.5,3,BUY\n10,1.4,2,sell";
		expect(parseTradesCsv(text)).toEqual([
			{ timestamp: 20, price: 1.5, amount: 3, side: "buy" },
			{ timestamp: 10, price: 1.4, amount: 2, side: "sell" },
		]);
	});

	it("rejects unknown sides", () => {
		const text = "local_timestamp,price,amount,side\n20,1.5,3,hold";
		expect(() => parseTradesCsv(text, "t.csv")).toThrowError(
			't.csv: invalid side at line 2: "hold"'
		);
	});
});
