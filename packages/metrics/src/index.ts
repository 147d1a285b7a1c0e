export * from "./metricsSchema";
export * from "./calcTradeSummary";
