export * from "./metricsSchema";
export * from "./calcPerformance";
export * from "./formatCSV";
export * from "./metricsRunner";
