/**
 * Strategy engine turns closed candles into LONG/SHORT/FLAT signals.
 * Each strategy keeps its transition table as a pure exported function.
 */
export * from "./types";
export * from "./decision";
export * from "./VWAPStrategy";
export * from "./MultiMomentumStrategy";
export * from "./ATRBreakoutStrategy";
