export * from "./liquidityWalker";
export * from "./fillEngine";
export * from "./fillHistory";
export * from "./backtestRunner";
