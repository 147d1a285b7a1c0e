/**
 * A closed OHLCV bar. Timestamps are UTC epoch milliseconds; `closeTime` is
 * the last millisecond covered by the bar (exchange convention) or the
 * exclusive end, as long as a stream uses one convention throughout.
 */
export interface Candle {
	symbol: string;
	timeframe: string;
	openTime: number;
	closeTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export type ActivePositionSide = "LONG" | "SHORT";
export type PositionSide = ActivePositionSide | "FLAT";

export type SignalSide = PositionSide;

export interface Signal {
	side: SignalSide;
	timestamp: number;
	close: number;
}

export interface IndicatorValue<T = number> {
	/** `closeTime` of the candle the value belongs to */
	timestamp: number;
	value: T;
}

export type IndicatorSeries<T = number> = ReadonlyArray<IndicatorValue<T>>;

export interface RiskBand {
	direction: ActivePositionSide;
	entryPrice: number;
	stopLoss: number;
	takeProfit: number;
	openedAt: number;
	updatedAt: number;
}

export type StrategyName = "vwap" | "multi_momentum" | "atr_breakout";

export type GapPolicy = "tolerant" | "reject";

export type SessionReset = "none" | "daily";

export interface DecisionRecord {
	timestamp: number;
	symbol: string;
	strategyName: StrategyName;
	signal: SignalSide;
	/** Strategy state after the bar */
	state: PositionSide;
	close: number;
	reason: string;
	/** Fill price of a stop, target or opposing exit */
	exitPrice?: number;
	riskBand?: RiskBand;
}
