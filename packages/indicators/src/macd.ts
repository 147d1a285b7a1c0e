import { ConfigurationError } from "@bandwise/core";
import type { IndicatorSeries, IndicatorValue } from "@bandwise/core";
import { emaSeries } from "./ema";
import { requireCandles, requirePeriod } from "./window";
import type { CandleWindow } from "./window";

export interface MacdPoint {
	macdLine: number;
	/** null until `signal` MACD values exist */
	signalLine: number | null;
	histogram: number | null;
}

/**
 * MACD line from candle index `slow - 1` onwards; signal line and histogram
 * from index `slow + signal - 2`.
 */
export function macd(
	window: CandleWindow,
	fast = 12,
	slow = 26,
	signal = 9
): IndicatorSeries<MacdPoint> {
	requirePeriod(fast, "macd.fast");
	requirePeriod(slow, "macd.slow");
	requirePeriod(signal, "macd.signal");
	if (fast >= slow) {
		throw new ConfigurationError(
			"macd.fast",
			`fast period ${fast} must be shorter than slow period ${slow}`
		);
	}
	requireCandles(window, slow, "macd");

	const closes = window.map((candle) => candle.close);
	const fastSeries = emaSeries(closes, fast);
	const slowSeries = emaSeries(closes, slow);

	const macdLine: number[] = [];
	for (let i = slow - 1; i < closes.length; i += 1) {
		const fastValue = fastSeries[i];
		const slowValue = slowSeries[i];
		if (fastValue === null || slowValue === null) {
			throw new Error(`EMA missing at index ${i} after warm-up`);
		}
		macdLine.push(fastValue - slowValue);
	}

	const signalSeries = emaSeries(macdLine, signal);

	return macdLine.map((value, offset): IndicatorValue<MacdPoint> => {
		const signalValue = signalSeries[offset];
		return {
			timestamp: window[slow - 1 + offset].closeTime,
			value: {
				macdLine: value,
				signalLine: signalValue,
				histogram: signalValue === null ? null : value - signalValue,
			},
		};
	});
}
