import type { IndicatorSeries, IndicatorValue } from "@bandwise/core";
import { requireCandles, requirePeriod } from "./window";
import type { CandleWindow } from "./window";

export interface ChannelPoint {
	high: number;
	low: number;
}

/**
 * Highest high and lowest low of the `period` candles before each candle.
 * The candle a value is stamped with never contributes to it.
 */
export function priceChannel(
	window: CandleWindow,
	period = 20
): IndicatorSeries<ChannelPoint> {
	requirePeriod(period, "channel.period");
	requireCandles(window, period + 1, "price channel");

	const series: IndicatorValue<ChannelPoint>[] = [];
	for (let i = period; i < window.length; i += 1) {
		let high = -Infinity;
		let low = Infinity;
		for (let j = i - period; j < i; j += 1) {
			high = Math.max(high, window[j].high);
			low = Math.min(low, window[j].low);
		}
		series.push({ timestamp: window[i].closeTime, value: { high, low } });
	}
	return series;
}
