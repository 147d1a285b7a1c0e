import type { IndicatorSeries, IndicatorValue } from "@bandwise/core";
import { requireCandles, requirePeriod } from "./window";
import type { CandleWindow } from "./window";

const toRsi = (avgGain: number, avgLoss: number): number => {
	if (avgLoss === 0) {
		return 100;
	}
	const rsi = 100 - 100 / (1 + avgGain / avgLoss);
	return Math.min(100, Math.max(0, rsi));
};

/**
 * Wilder RSI over closes. The first `period` candles are warm-up; the first
 * value belongs to candle index `period`.
 */
export function rsi(window: CandleWindow, period = 14): IndicatorSeries {
	requirePeriod(period, "rsi.period");
	requireCandles(window, period + 1, "rsi");

	let gains = 0;
	let losses = 0;
	for (let i = 1; i <= period; i += 1) {
		const change = window[i].close - window[i - 1].close;
		if (change >= 0) {
			gains += change;
		} else {
			losses -= change;
		}
	}

	let avgGain = gains / period;
	let avgLoss = losses / period;
	const series: IndicatorValue[] = [
		{ timestamp: window[period].closeTime, value: toRsi(avgGain, avgLoss) },
	];

	for (let i = period + 1; i < window.length; i += 1) {
		const change = window[i].close - window[i - 1].close;
		const gain = Math.max(change, 0);
		const loss = Math.max(-change, 0);
		avgGain = (avgGain * (period - 1) + gain) / period;
		avgLoss = (avgLoss * (period - 1) + loss) / period;
		series.push({ timestamp: window[i].closeTime, value: toRsi(avgGain, avgLoss) });
	}

	return series;
}
