import { DEFAULT_ENGINE_CONFIG, timeframeToMs } from "@bandwise/core";
import type { Candle, EngineConfig } from "@bandwise/core";

export const SYMBOL = "ETH/USDT";

/**
 * Short warm-ups so a few dozen bars exercise every strategy
 */
export const testConfig = (overrides: Partial<EngineConfig["runtime"]> = {}): EngineConfig => ({
	runtime: { ...DEFAULT_ENGINE_CONFIG.runtime, ...overrides },
	vwap: { threshold: 0.002, sessionReset: "daily" },
	momentum: {
		fastInterval: "1m",
		slowInterval: "5m",
		rsiPeriod: 3,
		oversoldBound: 40,
		overboughtBound: 60,
		macdFast: 2,
		macdSlow: 3,
		macdSignal: 2,
	},
	atr: { period: 3, channelPeriod: 4, kStop: 1.5, kTarget: 3, minBreakout: 0 },
});

/**
 * Deterministic oscillating 1m series; each bar opens at the previous close
 */
export const syntheticCandles = (count: number, timeframe = "1m", startTime = 0): Candle[] => {
	const tfMs = timeframeToMs(timeframe);
	const candles: Candle[] = [];
	let previousClose = 100;
	for (let i = 0; i < count; i += 1) {
		const close = 100 + 5 * Math.sin(i / 5) + (i % 7) * 0.3;
		const openTime = startTime + i * tfMs;
		candles.push({
			symbol: SYMBOL,
			timeframe,
			openTime,
			closeTime: openTime + tfMs - 1,
			open: previousClose,
			high: Math.max(previousClose, close) + 0.5,
			low: Math.min(previousClose, close) - 0.5,
			close,
			volume: 1 + (i % 5),
		});
		previousClose = close;
	}
	return candles;
};
