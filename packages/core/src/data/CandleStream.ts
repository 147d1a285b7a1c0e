import type { Candle, GapPolicy } from "../types";
import { InvalidCandleError } from "../errors";
import { timeframeToMs } from "../time";
import { validateCandle } from "./validateCandle";

export interface CandleStreamOptions {
	symbol: string;
	timeframe: string;
	/** "tolerant" accepts any increasing openTime, "reject" requires contiguous bars */
	gapPolicy?: GapPolicy;
	/** Keep only the newest N candles; unbounded when omitted */
	maxCandles?: number;
}

/**
 * Append-only series of closed candles for one (symbol, timeframe) pair
 *
 * Responsibilities:
 * - Validate every candle before it becomes visible to indicators
 * - Enforce strictly increasing openTime and the configured gap policy
 * - Trim to the history window
 * - Hand out read-only windows
 *
 * NOT responsible for:
 * - Forming/partial bars (the feed only appends closed candles)
 * - Reordering or deduplicating late data (rejected instead)
 */
export class CandleStream {
	readonly symbol: string;
	readonly timeframe: string;
	readonly gapPolicy: GapPolicy;
	private readonly timeframeMs: number;
	private readonly maxCandles: number | null;
	private candles: Candle[] = [];

	constructor(options: CandleStreamOptions) {
		this.symbol = options.symbol;
		this.timeframe = options.timeframe;
		this.gapPolicy = options.gapPolicy ?? "tolerant";
		this.timeframeMs = timeframeToMs(options.timeframe);
		this.maxCandles =
			options.maxCandles === undefined ? null : Math.max(options.maxCandles, 1);
	}

	/**
	 * Append the newest closed candle
	 *
	 * @throws InvalidCandleError when the candle breaks an OHLC invariant,
	 * belongs to another series, does not advance the stream or leaves a gap
	 * under the "reject" policy. The stream is unchanged in that case.
	 */
	append(candle: Candle): Candle {
		validateCandle(candle);

		if (candle.symbol !== this.symbol || candle.timeframe !== this.timeframe) {
			throw new InvalidCandleError(
				"series_mismatch",
				candle,
				`stream holds ${this.symbol} ${this.timeframe}`
			);
		}

		const previous = this.latest();
		if (previous) {
			if (candle.openTime <= previous.openTime) {
				throw new InvalidCandleError(
					"non_monotonic",
					candle,
					`openTime ${candle.openTime} does not advance past ${previous.openTime}`
				);
			}
			if (
				this.gapPolicy === "reject" &&
				candle.openTime !== previous.openTime + this.timeframeMs
			) {
				throw new InvalidCandleError(
					"gap",
					candle,
					`expected openTime ${previous.openTime + this.timeframeMs}, got ${candle.openTime}`
				);
			}
		}

		const frozen = Object.freeze({ ...candle });
		this.candles.push(frozen);
		this.trimToLimit();
		return frozen;
	}

	get length(): number {
		return this.candles.length;
	}

	latest(): Candle | undefined {
		return this.candles[this.candles.length - 1];
	}

	at(index: number): Candle | undefined {
		return this.candles[index];
	}

	/**
	 * Newest `count` candles (all when omitted), oldest first
	 */
	window(count?: number): readonly Candle[] {
		if (count === undefined || count >= this.candles.length) {
			return this.candles.slice();
		}
		return this.candles.slice(this.candles.length - Math.max(count, 0));
	}

	/**
	 * Index of the newest candle with closeTime <= timestamp, or -1
	 */
	lastClosedIndex(timestamp: number): number {
		let lo = 0;
		let hi = this.candles.length - 1;
		let found = -1;
		while (lo <= hi) {
			const mid = (lo + hi) >> 1;
			if (this.candles[mid].closeTime <= timestamp) {
				found = mid;
				lo = mid + 1;
			} else {
				hi = mid - 1;
			}
		}
		return found;
	}

	/**
	 * Every candle whose closeTime is at or before `timestamp`, oldest first
	 */
	closedAsOf(timestamp: number): readonly Candle[] {
		return this.candles.slice(0, this.lastClosedIndex(timestamp) + 1);
	}

	private trimToLimit(): void {
		if (this.maxCandles !== null && this.candles.length > this.maxCandles) {
			this.candles.splice(0, this.candles.length - this.maxCandles);
		}
	}
}
