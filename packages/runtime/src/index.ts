export * from "./StrategyRunner";
export * from "./strategyBuilders";
export * from "./fingerprints";
export * from "./backtest/replayCandles";
