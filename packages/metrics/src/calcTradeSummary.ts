import { ConfigurationError } from "@bandwise/core";
import type {
	ActivePositionSide,
	DecisionRecord,
	PositionSide,
	StrategyName,
} from "@bandwise/core";
import type { ReplayResult } from "@bandwise/runtime";
import type { RoundTrip, TradeSummary } from "./metricsSchema";

export interface TradeCostOptions {
	/** Fraction of notional charged on every fill */
	feeRate?: number;
	/** Fraction every fill price moves against the position */
	slippageRate?: number;
}

interface TradeCosts {
	feeRate: number;
	slippageRate: number;
}

interface OpenTrade {
	side: ActivePositionSide;
	entryTimestamp: number;
	entryPrice: number;
}

interface TradeBook {
	symbol: string;
	strategyName: StrategyName;
	open: OpenTrade | null;
	trades: RoundTrip[];
}

const requireRate = (value: number | undefined, field: string): number => {
	const rate = value ?? 0;
	if (!Number.isFinite(rate) || rate < 0 || rate >= 1) {
		throw new ConfigurationError(field, `expected a rate in [0, 1), got ${rate}`);
	}
	return rate;
};

const isActive = (state: PositionSide): state is ActivePositionSide =>
	state !== "FLAT";

/**
 * Net return of one position. Slippage moves both fills against the
 * position; the fee is charged on entry and again on exit.
 */
export const tradeReturn = (
	side: ActivePositionSide,
	entryPrice: number,
	exitPrice: number,
	options: TradeCostOptions = {}
): number => {
	const costs = resolveCosts(options);
	const slip = costs.slippageRate;
	const entryFill = side === "LONG" ? entryPrice * (1 + slip) : entryPrice * (1 - slip);
	const exitFill = side === "LONG" ? exitPrice * (1 - slip) : exitPrice * (1 + slip);
	const gross =
		side === "LONG"
			? exitFill / entryFill - 1
			: (entryFill - exitFill) / entryFill;
	return Math.pow(1 - costs.feeRate, 2) * (1 + gross) - 1;
};

const resolveCosts = (options: TradeCostOptions): TradeCosts => ({
	feeRate: requireRate(options.feeRate, "feeRate"),
	slippageRate: requireRate(options.slippageRate, "slippageRate"),
});

/**
 * Pairs entries with exits per (symbol, strategy). A position closes when the
 * strategy state leaves its side: at the recorded exit price for stop, target
 * and opposing exits, at the bar close otherwise. A flip opens the new side
 * at the same close.
 */
const buildRoundTrips = (
	decisions: readonly DecisionRecord[],
	options: TradeCostOptions = {}
): Map<string, TradeBook> => {
	const costs = resolveCosts(options);
	const books = new Map<string, TradeBook>();

	for (const record of decisions) {
		const key = `${record.symbol}|${record.strategyName}`;
		let book = books.get(key);
		if (!book) {
			book = {
				symbol: record.symbol,
				strategyName: record.strategyName,
				open: null,
				trades: [],
			};
			books.set(key, book);
		}

		const open = book.open;
		if (open && open.side === record.state) {
			continue;
		}
		if (open) {
			const exitPrice = record.exitPrice ?? record.close;
			const returnPct = tradeReturn(open.side, open.entryPrice, exitPrice, costs);
			book.trades.push({
				index: book.trades.length,
				symbol: record.symbol,
				strategyName: record.strategyName,
				side: open.side,
				entryTimestamp: open.entryTimestamp,
				exitTimestamp: record.timestamp,
				durationMs: Math.max(record.timestamp - open.entryTimestamp, 0),
				entryPrice: open.entryPrice,
				exitPrice,
				exitReason: record.reason,
				returnPct,
				isWin: returnPct > 0,
			});
			book.open = null;
		}
		if (isActive(record.state)) {
			book.open = {
				side: record.state,
				entryTimestamp: record.timestamp,
				entryPrice: record.close,
			};
		}
	}

	return books;
};

const analyzeEquity = (
	trades: readonly RoundTrip[]
): { totalReturn: number; maxDrawdown: number } => {
	let equity = 1;
	let peak = 1;
	let maxDrawdown = 0;
	for (const trade of trades) {
		equity *= 1 + trade.returnPct;
		if (equity > peak) {
			peak = equity;
			continue;
		}
		const depth = peak > 0 ? (peak - equity) / peak : 0;
		maxDrawdown = Math.max(maxDrawdown, depth);
	}
	return { totalReturn: equity - 1, maxDrawdown };
};

/**
 * One summary per (symbol, strategy) in the order they first appear in the
 * decision log
 */
export const calcTradeSummary = (
	decisions: readonly DecisionRecord[],
	options: TradeCostOptions = {}
): TradeSummary[] =>
	[...buildRoundTrips(decisions, options).values()].map((book) => {
		const tradeCount = book.trades.length;
		const wins = book.trades.filter((trade) => trade.isWin).length;
		const losses = book.trades.filter((trade) => trade.returnPct < 0).length;
		const { totalReturn, maxDrawdown } = analyzeEquity(book.trades);
		return {
			symbol: book.symbol,
			strategyName: book.strategyName,
			tradeCount,
			wins,
			losses,
			winRate: tradeCount ? wins / tradeCount : 0,
			avgReturnPct: tradeCount
				? book.trades.reduce((sum, trade) => sum + trade.returnPct, 0) / tradeCount
				: 0,
			totalReturn,
			maxDrawdown,
			openPosition: book.open ? book.open.side : null,
			trades: book.trades,
		};
	});

export const summarizeReplay = (
	result: Pick<ReplayResult, "decisions">,
	options: TradeCostOptions = {}
): TradeSummary[] => calcTradeSummary(result.decisions, options);
