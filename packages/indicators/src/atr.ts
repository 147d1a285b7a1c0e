import type { Candle, IndicatorSeries, IndicatorValue } from "@bandwise/core";
import { requireCandles, requirePeriod } from "./window";
import type { CandleWindow } from "./window";

export const trueRange = (candle: Candle, previousClose: number): number =>
	Math.max(
		candle.high - candle.low,
		Math.abs(candle.high - previousClose),
		Math.abs(candle.low - previousClose)
	);

/**
 * Wilder ATR. The first candle has no previous close and yields no true
 * range, so the first value belongs to candle index `period`.
 */
export function atr(window: CandleWindow, period = 14): IndicatorSeries {
	requirePeriod(period, "atr.period");
	requireCandles(window, period + 1, "atr");

	let sum = 0;
	for (let i = 1; i <= period; i += 1) {
		sum += trueRange(window[i], window[i - 1].close);
	}

	let value = sum / period;
	const series: IndicatorValue[] = [
		{ timestamp: window[period].closeTime, value },
	];

	for (let i = period + 1; i < window.length; i += 1) {
		value = (value * (period - 1) + trueRange(window[i], window[i - 1].close)) / period;
		series.push({ timestamp: window[i].closeTime, value });
	}

	return series;
}
