import { timeframeToMs } from "@bandwise/core";
import type { Candle } from "@bandwise/core";
import type { MarketView } from "../types";

export const SYMBOL = "BTC/USDT";

export interface Bar {
	open?: number;
	high?: number;
	low?: number;
	close: number;
	volume?: number;
}

/**
 * Consecutive candles starting at `startTime`. Missing OHLC fields collapse
 * to the close.
 */
export const buildCandles = (
	timeframe: string,
	bars: readonly Bar[],
	startTime = 0
): Candle[] => {
	const tfMs = timeframeToMs(timeframe);
	return bars.map((bar, index) => {
		const openTime = startTime + index * tfMs;
		return {
			symbol: SYMBOL,
			timeframe,
			openTime,
			closeTime: openTime + tfMs - 1,
			open: bar.open ?? bar.close,
			high: bar.high ?? bar.close,
			low: bar.low ?? bar.close,
			close: bar.close,
			volume: bar.volume ?? 1,
		};
	});
};

export const closes = (timeframe: string, values: readonly number[], startTime = 0): Candle[] =>
	buildCandles(
		timeframe,
		values.map((close) => ({ close })),
		startTime
	);

/**
 * View over fixed candle arrays that hides every candle not yet closed
 */
export const viewAt = (
	timestamp: number,
	candlesByTimeframe: Record<string, readonly Candle[]>
): MarketView => ({
	symbol: SYMBOL,
	timestamp,
	candles: (timeframe) =>
		(candlesByTimeframe[timeframe] ?? []).filter((c) => c.closeTime <= timestamp),
});

/**
 * Feed candles one at a time and collect one decision per bar
 */
export const evaluateEach = <T>(
	candles: readonly Candle[],
	evaluate: (view: MarketView) => T,
	extra: Record<string, readonly Candle[]> = {}
): T[] =>
	candles.map((candle) =>
		evaluate(viewAt(candle.closeTime, { ...extra, [candle.timeframe]: candles }))
	);
