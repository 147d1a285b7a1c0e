import type { ActivePositionSide, Candle, RiskBand } from "@bandwise/core";

export interface RiskBandConfig {
	/** Stop distance in ATR multiples */
	kStop: number;
	/** Target distance in ATR multiples */
	kTarget: number;
}

export type RiskBandExitReason = "stop_loss" | "take_profit" | "opposing_signal";

export interface RiskBandExit {
	reason: RiskBandExitReason;
	exitPrice: number;
	timestamp: number;
	band: RiskBand;
}

export const createRiskBand = (
	direction: ActivePositionSide,
	entryPrice: number,
	atr: number,
	config: RiskBandConfig,
	timestamp: number
): RiskBand => {
	const sign = direction === "LONG" ? 1 : -1;
	return {
		direction,
		entryPrice,
		stopLoss: entryPrice - sign * config.kStop * atr,
		takeProfit: entryPrice + sign * config.kTarget * atr,
		openedAt: timestamp,
		updatedAt: timestamp,
	};
};

/**
 * Checks the candle's range against the existing levels. OHLC bars carry no
 * intrabar order, so when stop and target are both inside the range the stop
 * is assumed to have filled first. A bar that opens beyond a level fills at
 * the open.
 */
export const detectRiskBandExit = (
	band: RiskBand,
	candle: Candle
): Omit<RiskBandExit, "band"> | null => {
	const timestamp = candle.closeTime;
	if (band.direction === "LONG") {
		if (candle.low <= band.stopLoss) {
			return {
				reason: "stop_loss",
				exitPrice: Math.min(candle.open, band.stopLoss),
				timestamp,
			};
		}
		if (candle.high >= band.takeProfit) {
			return {
				reason: "take_profit",
				exitPrice: Math.max(candle.open, band.takeProfit),
				timestamp,
			};
		}
		return null;
	}

	if (candle.high >= band.stopLoss) {
		return {
			reason: "stop_loss",
			exitPrice: Math.max(candle.open, band.stopLoss),
			timestamp,
		};
	}
	if (candle.low <= band.takeProfit) {
		return {
			reason: "take_profit",
			exitPrice: Math.min(candle.open, band.takeProfit),
			timestamp,
		};
	}
	return null;
};

/**
 * Moves stop and target toward `close` when the ATR-derived candidates are
 * tighter. Levels never move away from price: a LONG stop is non-decreasing,
 * a SHORT stop non-increasing, and a target only moves closer while staying
 * beyond the close.
 */
export const trailRiskBand = (
	band: RiskBand,
	close: number,
	atr: number,
	config: RiskBandConfig,
	timestamp: number
): RiskBand => {
	if (band.direction === "LONG") {
		const candidateStop = close - config.kStop * atr;
		const candidateTarget = close + config.kTarget * atr;
		const stopLoss = Math.max(band.stopLoss, candidateStop);
		const takeProfit =
			candidateTarget > close && candidateTarget < band.takeProfit
				? candidateTarget
				: band.takeProfit;
		return withLevels(band, stopLoss, takeProfit, timestamp);
	}

	const candidateStop = close + config.kStop * atr;
	const candidateTarget = close - config.kTarget * atr;
	const stopLoss = Math.min(band.stopLoss, candidateStop);
	const takeProfit =
		candidateTarget < close && candidateTarget > band.takeProfit
			? candidateTarget
			: band.takeProfit;
	return withLevels(band, stopLoss, takeProfit, timestamp);
};

const withLevels = (
	band: RiskBand,
	stopLoss: number,
	takeProfit: number,
	timestamp: number
): RiskBand => {
	if (stopLoss === band.stopLoss && takeProfit === band.takeProfit) {
		return band;
	}
	return { ...band, stopLoss, takeProfit, updatedAt: timestamp };
};
