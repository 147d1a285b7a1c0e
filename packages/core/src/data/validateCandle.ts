import type { Candle } from "../types";
import { InvalidCandleError } from "../errors";

const NUMERIC_FIELDS = [
	"openTime",
	"closeTime",
	"open",
	"high",
	"low",
	"close",
	"volume",
] as const;

/**
 * Checks the OHLC ordering and timing invariants of a single candle.
 * Returns the candle unchanged; never clamps or repairs values.
 */
export const validateCandle = (candle: Candle): Candle => {
	for (const field of NUMERIC_FIELDS) {
		const value = candle[field];
		if (!Number.isFinite(value)) {
			throw new InvalidCandleError(
				"non_finite",
				candle,
				`${field} is not a finite number (${value})`
			);
		}
		if (value < 0) {
			throw new InvalidCandleError(
				"negative_value",
				candle,
				`${field} is negative (${value})`
			);
		}
	}

	const bodyHigh = Math.max(candle.open, candle.close);
	const bodyLow = Math.min(candle.open, candle.close);
	if (candle.high < bodyHigh || bodyLow < candle.low) {
		throw new InvalidCandleError(
			"ohlc_order",
			candle,
			`expected high >= max(open, close) >= min(open, close) >= low, got o=${candle.open} h=${candle.high} l=${candle.low} c=${candle.close}`
		);
	}

	if (candle.closeTime <= candle.openTime) {
		throw new InvalidCandleError(
			"time_order",
			candle,
			`closeTime ${candle.closeTime} must be after openTime ${candle.openTime}`
		);
	}

	return candle;
};
