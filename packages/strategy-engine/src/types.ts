import type {
	Candle,
	PositionSide,
	RiskBand,
	Signal,
	SignalSide,
	StrategyName,
} from "@bandwise/core";

/**
 * Read-only view of the market at one evaluation timestamp. `candles` only
 * returns candles whose closeTime is at or before `timestamp`.
 */
export interface MarketView {
	symbol: string;
	timestamp: number;
	candles(timeframe: string): readonly Candle[];
}

/**
 * Output of a pure transition function: the next state, the signal to emit
 * (null when nothing is emitted) and a short machine-readable reason.
 */
export interface StrategyTransition {
	state: PositionSide;
	signal: SignalSide | null;
	reason: string;
}

export interface StrategyDecision {
	state: PositionSide;
	signal: Signal | null;
	reason: string;
	riskBand?: RiskBand;
	metadata?: Record<string, number | string | null>;
}

export interface SignalStrategy {
	readonly name: StrategyName;
	/** Timeframe whose closed candles trigger an evaluation */
	readonly executionTimeframe: string;
	/** Every timeframe the strategy reads, execution timeframe first */
	readonly timeframes: readonly string[];
	readonly state: PositionSide;
	evaluate(view: MarketView): StrategyDecision;
	reset(): void;
}
