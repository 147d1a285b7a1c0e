import type { Candle } from "../types";
import { NoAlignedBarError } from "../errors";
import type { CandleStream } from "./CandleStream";

/**
 * Maps an evaluation timestamp on a fast timeframe to the newest slow candle
 * that had fully closed by then. The in-progress slow bar is never visible.
 */
export class TimeframeAligner {
	constructor(private readonly slow: CandleStream) {}

	get timeframe(): string {
		return this.slow.timeframe;
	}

	align(timestamp: number): Candle {
		const index = this.slow.lastClosedIndex(timestamp);
		const candle = this.slow.at(index);
		if (index < 0 || !candle) {
			throw new NoAlignedBarError(this.slow.timeframe, timestamp);
		}
		return candle;
	}

	/**
	 * Slow candles up to and including the aligned one
	 */
	closedWindow(timestamp: number): readonly Candle[] {
		const window = this.slow.closedAsOf(timestamp);
		if (!window.length) {
			throw new NoAlignedBarError(this.slow.timeframe, timestamp);
		}
		return window;
	}
}
