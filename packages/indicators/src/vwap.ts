import { requirePositiveInteger, startOfUtcDay } from "@bandwise/core";
import type {
	Candle,
	IndicatorSeries,
	IndicatorValue,
	SessionReset,
} from "@bandwise/core";
import { lastValue, requireCandles } from "./window";
import type { CandleWindow } from "./window";

export interface VwapOptions {
	sessionReset?: SessionReset;
	/** Only the last N candles of the current session contribute */
	rollingPeriod?: number;
}

export const typicalPrice = (candle: Candle): number =>
	(candle.high + candle.low + candle.close) / 3;

const sessionKey = (candle: Candle, sessionReset: SessionReset): number =>
	sessionReset === "daily" ? startOfUtcDay(candle.openTime) : 0;

/**
 * Volume-weighted average of typical price, one value per candle, restarting
 * at every session boundary. Candles whose session has no volume yet emit no
 * value.
 */
export function vwap(
	window: CandleWindow,
	options: VwapOptions = {}
): IndicatorSeries {
	requireCandles(window, 1, "vwap");
	const sessionReset = options.sessionReset ?? "none";
	const rollingPeriod =
		options.rollingPeriod === undefined
			? null
			: requirePositiveInteger(options.rollingPeriod, "vwap.rollingPeriod");

	const series: IndicatorValue[] = [];
	let sessionStart = 0;
	let currentSession: number | null = null;
	let pvSum = 0;
	let volumeSum = 0;

	for (let i = 0; i < window.length; i += 1) {
		const candle = window[i];
		const key = sessionKey(candle, sessionReset);
		if (key !== currentSession) {
			currentSession = key;
			sessionStart = i;
			pvSum = 0;
			volumeSum = 0;
		}

		if (rollingPeriod === null) {
			pvSum += typicalPrice(candle) * candle.volume;
			volumeSum += candle.volume;
		} else {
			pvSum = 0;
			volumeSum = 0;
			for (let j = Math.max(sessionStart, i - rollingPeriod + 1); j <= i; j += 1) {
				pvSum += typicalPrice(window[j]) * window[j].volume;
				volumeSum += window[j].volume;
			}
		}

		if (volumeSum > 0) {
			series.push({ timestamp: candle.closeTime, value: pvSum / volumeSum });
		}
	}

	return series;
}

/**
 * VWAP at the newest candle, or null when its session has no volume
 */
export function latestVwap(
	window: CandleWindow,
	options: VwapOptions = {}
): number | null {
	const last = lastValue(vwap(window, options));
	const newest = window[window.length - 1];
	return last && last.timestamp === newest.closeTime ? last.value : null;
}
