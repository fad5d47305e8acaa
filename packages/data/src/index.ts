export * from "./types";
export { parseCsv, requireColumns, readNumber } from "./csv";
export type { ColumnIndex } from "./csv";
export { parseBboCsv } from "./bbo";
export { parseTradesCsv } from "./trades";
export { makeCandles } from "./candles";
export { loadMarketData, loadTrades } from "./loader";
