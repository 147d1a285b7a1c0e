import { createLogger, summarizeCandles, timeframeToMs } from "@bandwise/core";
import type { Candle, DecisionRecord, EngineConfig, StrategyName } from "@bandwise/core";
import { StrategyRunner } from "../StrategyRunner";
import { buildStrategies } from "../strategyBuilders";
import { fingerprintConfig, fingerprintDecisions } from "../fingerprints";

const logger = createLogger("replay");

export interface ReplayOptions {
	symbol: string;
	config: EngineConfig;
	strategies: readonly StrategyName[];
	/** Closed candles per fed timeframe, each series oldest first */
	candlesByTimeframe: Readonly<Record<string, readonly Candle[]>>;
}

export interface ReplayResult {
	decisions: DecisionRecord[];
	candleCount: number;
	rejectedCandles: number;
	fingerprint: string;
	configFingerprint: string;
}

export interface TimedCandle {
	timeframe: string;
	candle: Candle;
}

/**
 * Orders candles from several timeframes the way a live feed delivers them:
 * by closeTime, slower timeframes first when two bars close together, input
 * order otherwise.
 */
export const mergeByCloseTime = (
	candlesByTimeframe: Readonly<Record<string, readonly Candle[]>>
): TimedCandle[] => {
	const entries = Object.entries(candlesByTimeframe).flatMap(([timeframe, candles]) => {
		const tfMs = timeframeToMs(timeframe);
		return candles.map((candle, index) => ({ timeframe, candle, tfMs, index }));
	});
	entries.sort(
		(a, b) =>
			a.candle.closeTime - b.candle.closeTime || b.tfMs - a.tfMs || a.index - b.index
	);
	return entries.map(({ timeframe, candle }) => ({ timeframe, candle }));
};

/**
 * Streams historical candles through a fresh StrategyRunner one bar at a time.
 * Decisions match what the same candles produce when appended live.
 */
export const replayCandles = (options: ReplayOptions): ReplayResult => {
	const runner = new StrategyRunner({
		symbol: options.symbol,
		config: options.config,
		strategies: buildStrategies(options.strategies, options.config, {
			symbol: options.symbol,
		}),
	});

	const ordered = mergeByCloseTime(options.candlesByTimeframe);
	for (const { timeframe, candle } of ordered) {
		runner.append(timeframe, candle);
	}

	const decisions = [...runner.decisions()];
	const result: ReplayResult = {
		decisions,
		candleCount: ordered.length,
		rejectedCandles: runner.rejectedCandles,
		fingerprint: fingerprintDecisions(decisions),
		configFingerprint: fingerprintConfig(options.config),
	};

	logger.info("replay_complete", {
		symbol: options.symbol,
		strategies: options.strategies,
		candleCount: result.candleCount,
		candles: Object.fromEntries(
			Object.entries(options.candlesByTimeframe).map(([timeframe, candles]) => [
				timeframe,
				summarizeCandles(candles),
			])
		),
		decisionCount: decisions.length,
		rejectedCandles: result.rejectedCandles,
		fingerprint: result.fingerprint,
		configFingerprint: result.configFingerprint,
	});

	return result;
};
