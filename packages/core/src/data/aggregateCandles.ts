import type { Candle } from "../types";
import { bucketTimestamp, timeframeToMs } from "../time";

/**
 * Aggregate base timeframe candles into a higher timeframe candle
 *
 * Pure aggregation function that composes OHLCV data from base candles
 * whose openTime falls within a target timeframe bucket.
 *
 * @param baseCandles - Sorted array of base timeframe candles
 * @param targetTimeframe - Target timeframe to aggregate to (e.g., "5m", "15m")
 * @param bucketStart - openTime of the target candle
 * @returns Aggregated candle or null when the bucket holds no base candle
 */
export function aggregateCandle(
	baseCandles: readonly Candle[],
	targetTimeframe: string,
	bucketStart: number,
	symbol: string
): Candle | null {
	const bucketEnd = bucketStart + timeframeToMs(targetTimeframe);

	const candlesInBucket = baseCandles.filter(
		(c) => c.openTime >= bucketStart && c.openTime < bucketEnd
	);

	if (candlesInBucket.length === 0) {
		return null;
	}

	const first = candlesInBucket[0];
	const last = candlesInBucket[candlesInBucket.length - 1];

	return {
		symbol,
		timeframe: targetTimeframe,
		openTime: bucketStart,
		closeTime: last.closeTime,
		open: first.open,
		high: Math.max(...candlesInBucket.map((c) => c.high)),
		low: Math.min(...candlesInBucket.map((c) => c.low)),
		close: last.close,
		volume: candlesInBucket.reduce((sum, c) => sum + c.volume, 0),
	};
}

/**
 * True when `candle` is the last base candle of its target bucket, i.e. the
 * target candle is complete as soon as this base candle closes.
 */
export function closesBucket(
	candle: Candle,
	baseTimeframe: string,
	targetTimeframe: string
): boolean {
	const baseMs = timeframeToMs(baseTimeframe);
	const targetMs = timeframeToMs(targetTimeframe);
	const bucketStart = bucketTimestamp(candle.openTime, targetMs);
	return candle.openTime + baseMs >= bucketStart + targetMs;
}

/**
 * Start times of the target buckets that are complete once `candle` arrives
 *
 * The bucket of `previous` closes when `candle` opens in a later bucket,
 * unless `previous` already closed it as the last base candle of that bucket.
 * The bucket of `candle` closes when `candle` is its last base candle.
 * Oldest first; each bucket is reported by exactly one base candle.
 */
export function detectClosedBuckets(
	previous: Candle | null,
	candle: Candle,
	targetTimeframe: string
): number[] {
	const targetMs = timeframeToMs(targetTimeframe);
	const currentBucket = bucketTimestamp(candle.openTime, targetMs);
	const closed: number[] = [];

	if (previous) {
		const previousBucket = bucketTimestamp(previous.openTime, targetMs);
		if (
			currentBucket > previousBucket &&
			!closesBucket(previous, previous.timeframe, targetTimeframe)
		) {
			closed.push(previousBucket);
		}
	}
	if (closesBucket(candle, candle.timeframe, targetTimeframe)) {
		closed.push(currentBucket);
	}

	return closed;
}

/**
 * Build the target candles closed by `candle`, oldest first
 *
 * @param baseCandles - Stored base candles, `candle` included
 * @param previous - Base candle stored before `candle`, null for the first
 */
export function aggregateClosedBuckets(
	baseCandles: readonly Candle[],
	previous: Candle | null,
	candle: Candle,
	targetTimeframe: string
): Candle[] {
	const closed: Candle[] = [];
	for (const bucketStart of detectClosedBuckets(previous, candle, targetTimeframe)) {
		const aggregated = aggregateCandle(
			baseCandles,
			targetTimeframe,
			bucketStart,
			candle.symbol
		);
		if (aggregated) {
			closed.push(aggregated);
		}
	}
	return closed;
}
