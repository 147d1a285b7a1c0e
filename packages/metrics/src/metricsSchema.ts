import type { ActivePositionSide, StrategyName } from "@bandwise/core";

/**
 * One position from entry to exit. Prices are the decision prices before
 * slippage; `returnPct` is net of fees and slippage, as a fraction.
 */
export interface RoundTrip {
	index: number;
	symbol: string;
	strategyName: StrategyName;
	side: ActivePositionSide;
	entryTimestamp: number;
	exitTimestamp: number;
	durationMs: number;
	entryPrice: number;
	exitPrice: number;
	exitReason: string;
	returnPct: number;
	isWin: boolean;
}

export interface TradeSummary {
	symbol: string;
	strategyName: StrategyName;
	tradeCount: number;
	wins: number;
	losses: number;
	winRate: number;
	avgReturnPct: number;
	/** Compounded over every closed trade, as a fraction */
	totalReturn: number;
	/** Deepest fall of compounded equity from its running peak, as a fraction */
	maxDrawdown: number;
	/** Position still held after the last decision; not counted as a trade */
	openPosition: ActivePositionSide | null;
	trades: RoundTrip[];
}
