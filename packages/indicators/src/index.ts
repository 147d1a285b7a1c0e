export * from "./window";
export * from "./ema";
export * from "./vwap";
export * from "./rsi";
export * from "./macd";
export * from "./atr";
export * from "./channel";
