/**
 * Core package centralizes shared contracts, configuration and candle plumbing.
 * Everything else in the monorepo depends on these primitives.
 */
export * from "./types";
export * from "./time";
export * from "./errors";
export * from "./config";
export * from "./data/validateCandle";
export * from "./data/CandleStream";
export * from "./data/TimeframeAligner";
export * from "./data/aggregateCandles";
export * from "./utils/logger";
export * from "./utils/fingerprint";
