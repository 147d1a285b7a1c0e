import {
	CandleStream,
	ConfigurationError,
	InsufficientDataError,
	InvalidCandleError,
	NoAlignedBarError,
	TimeframeAligner,
	aggregateClosedBuckets,
	createLogger,
	requirePositiveInteger,
	timeframeToMs,
} from "@bandwise/core";
import type { Candle, DecisionRecord, EngineConfig, Signal } from "@bandwise/core";
import type { MarketView, SignalStrategy, StrategyDecision } from "@bandwise/strategy-engine";

const logger = createLogger("runtime");

export type DecisionListener = (record: DecisionRecord) => void;

export interface StrategyRunnerOptions {
	symbol: string;
	config: EngineConfig;
	strategies: readonly SignalStrategy[];
}

/**
 * Single writer for one instrument: stores closed candles per timeframe and
 * evaluates every strategy whose execution timeframe just closed a bar.
 *
 * Derived timeframes (`runtime.derivedTimeframes`) are built from
 * `runtime.executionTimeframe` candles. A derived candle is stored, and the
 * strategies executing on its timeframe evaluated, before the base bar that
 * completes it is evaluated. A bucket missing its last base candle closes
 * when the next bucket opens.
 */
export class StrategyRunner {
	readonly symbol: string;
	private readonly baseTimeframe: string;
	private readonly derivedTimeframes: readonly string[];
	private readonly strategies: readonly SignalStrategy[];
	private readonly streams = new Map<string, CandleStream>();
	private readonly aligners = new Map<string, TimeframeAligner>();
	private readonly listeners = new Set<DecisionListener>();
	private readonly records: DecisionRecord[] = [];
	private rejected = 0;

	constructor(options: StrategyRunnerOptions) {
		const { runtime } = options.config;
		if (!options.strategies.length) {
			throw new ConfigurationError("strategies", "at least one strategy is required");
		}
		const maxCandles = requirePositiveInteger(
			runtime.historyWindowCandles,
			"runtime.historyWindowCandles"
		);
		this.symbol = options.symbol;
		this.baseTimeframe = runtime.executionTimeframe;
		this.derivedTimeframes = validateDerivedTimeframes(
			runtime.executionTimeframe,
			runtime.derivedTimeframes
		);
		this.strategies = options.strategies;

		const timeframes = new Set<string>([this.baseTimeframe, ...this.derivedTimeframes]);
		for (const strategy of this.strategies) {
			strategy.timeframes.forEach((tf) => timeframes.add(tf));
		}
		for (const timeframe of timeframes) {
			this.streams.set(
				timeframe,
				new CandleStream({
					symbol: this.symbol,
					timeframe,
					gapPolicy: runtime.gapPolicy,
					maxCandles,
				})
			);
		}
		for (const strategy of this.strategies) {
			for (const timeframe of strategy.timeframes) {
				if (timeframe !== strategy.executionTimeframe && !this.aligners.has(timeframe)) {
					this.aligners.set(timeframe, new TimeframeAligner(this.stream(timeframe)));
				}
			}
		}

		logger.info("runner_started", {
			symbol: this.symbol,
			strategies: this.strategies.map((s) => s.name),
			timeframes: [...timeframes],
			derivedTimeframes: this.derivedTimeframes,
			historyWindowCandles: maxCandles,
			gapPolicy: runtime.gapPolicy,
		});
	}

	get rejectedCandles(): number {
		return this.rejected;
	}

	/**
	 * Store a closed candle and evaluate the strategies that run on its
	 * timeframe. Returns the decisions that carried a signal.
	 */
	append(timeframe: string, candle: Candle): DecisionRecord[] {
		if (this.derivedTimeframes.includes(timeframe)) {
			throw new Error(
				`${timeframe} candles are derived from ${this.baseTimeframe} and cannot be appended directly`
			);
		}
		const previous = this.stream(timeframe).latest() ?? null;
		const stored = this.store(timeframe, candle);
		if (!stored) {
			return [];
		}

		const records: DecisionRecord[] = [];
		if (timeframe === this.baseTimeframe) {
			for (const derived of this.deriveFrom(previous, stored)) {
				records.push(...this.evaluateClosed(derived));
			}
		}
		records.push(...this.evaluateClosed(stored));
		return records;
	}

	onDecision(listener: DecisionListener): () => void {
		this.listeners.add(listener);
		return () => this.listeners.delete(listener);
	}

	decisions(): readonly DecisionRecord[] {
		return this.records.slice();
	}

	private stream(timeframe: string): CandleStream {
		const stream = this.streams.get(timeframe);
		if (!stream) {
			throw new Error(`No strategy reads ${timeframe} candles for ${this.symbol}`);
		}
		return stream;
	}

	private store(timeframe: string, candle: Candle): Candle | null {
		const stream = this.stream(timeframe);
		try {
			return stream.append(candle);
		} catch (error) {
			if (!(error instanceof InvalidCandleError)) {
				throw error;
			}
			this.rejected += 1;
			logger.warn("candle_rejected", {
				symbol: this.symbol,
				timeframe,
				reason: error.reason,
				openTime: candle.openTime,
				message: error.message,
			});
			return null;
		}
	}

	/**
	 * Store the derived candles `candle` completes, ordered by closeTime and
	 * then by their order in `runtime.derivedTimeframes`
	 */
	private deriveFrom(previous: Candle | null, candle: Candle): Candle[] {
		const base = this.stream(this.baseTimeframe).window();
		const stored: Candle[] = [];
		for (const timeframe of this.derivedTimeframes) {
			for (const derived of aggregateClosedBuckets(base, previous, candle, timeframe)) {
				const accepted = this.store(timeframe, derived);
				if (accepted) {
					stored.push(accepted);
				}
			}
		}
		return stored.sort((a, b) => a.closeTime - b.closeTime);
	}

	private evaluateClosed(candle: Candle): DecisionRecord[] {
		const records: DecisionRecord[] = [];
		for (const strategy of this.strategies) {
			if (strategy.executionTimeframe !== candle.timeframe) {
				continue;
			}
			const decision = this.evaluate(strategy, candle.closeTime);
			if (decision?.signal) {
				records.push(this.record(strategy, decision, decision.signal));
			}
		}
		return records;
	}

	private view(executionTimeframe: string, timestamp: number): MarketView {
		return {
			symbol: this.symbol,
			timestamp,
			candles: (timeframe) => {
				if (timeframe === executionTimeframe) {
					return this.stream(timeframe).closedAsOf(timestamp);
				}
				const aligner = this.aligners.get(timeframe);
				if (!aligner) {
					throw new Error(`No aligner for ${timeframe}; add it to the strategy's timeframes`);
				}
				return aligner.closedWindow(timestamp);
			},
		};
	}

	private evaluate(strategy: SignalStrategy, timestamp: number): StrategyDecision | null {
		try {
			return strategy.evaluate(this.view(strategy.executionTimeframe, timestamp));
		} catch (error) {
			if (error instanceof InsufficientDataError || error instanceof NoAlignedBarError) {
				logger.debug("strategy_warmup", {
					symbol: this.symbol,
					strategyName: strategy.name,
					timestamp,
					message: error.message,
				});
				return null;
			}
			throw error;
		}
	}

	private record(
		strategy: SignalStrategy,
		decision: StrategyDecision,
		signal: Signal
	): DecisionRecord {
		const exitPrice = decision.metadata?.exitPrice;
		const record: DecisionRecord = {
			timestamp: signal.timestamp,
			symbol: this.symbol,
			strategyName: strategy.name,
			signal: signal.side,
			state: decision.state,
			close: signal.close,
			reason: decision.reason,
			...(typeof exitPrice === "number" ? { exitPrice } : {}),
			...(decision.riskBand ? { riskBand: { ...decision.riskBand } } : {}),
		};
		this.records.push(record);
		logger.info("strategy_decision", { ...record });
		this.listeners.forEach((listener) => listener(record));
		return record;
	}
}

const validateDerivedTimeframes = (
	baseTimeframe: string,
	derived: readonly string[]
): string[] => {
	const baseMs = timeframeToMs(baseTimeframe);
	return derived.map((timeframe, index) => {
		const ms = timeframeToMs(timeframe);
		if (ms <= baseMs || ms % baseMs !== 0) {
			throw new ConfigurationError(
				`runtime.derivedTimeframes[${index}]`,
				`${timeframe} must be a longer multiple of ${baseTimeframe}`
			);
		}
		return timeframe;
	});
};
