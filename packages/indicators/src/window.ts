import { InsufficientDataError, requirePositiveInteger } from "@bandwise/core";
import type { Candle, IndicatorSeries, IndicatorValue } from "@bandwise/core";

export type CandleWindow = readonly Candle[];

export const requireCandles = (
	window: CandleWindow,
	required: number,
	context: string
): void => {
	if (window.length < required) {
		throw new InsufficientDataError(context, required, window.length);
	}
};

export const requirePeriod = (period: number, field: string): number =>
	requirePositiveInteger(period, field);

export const lastValue = <T>(
	series: IndicatorSeries<T>
): IndicatorValue<T> | undefined => series[series.length - 1];
