export * from "./random";
export * from "./randomStrategy";
export * from "./lookaheadStrategy";
export * from "./strategyBuilders";
