import {
	ConfigurationError,
	InsufficientDataError,
	requirePositiveInteger,
	timeframeToMs,
} from "@bandwise/core";
import type { MomentumStrategyConfig, PositionSide, StrategyName } from "@bandwise/core";
import { lastValue, macd, rsi } from "@bandwise/indicators";
import { latestCandle, toDecision } from "./decision";
import type {
	MarketView,
	SignalStrategy,
	StrategyDecision,
	StrategyTransition,
} from "./types";

export interface MomentumInputs {
	rsi: number;
	/** MACD histogram of the newest closed slow candle */
	histogram: number;
	oversoldBound: number;
	overboughtBound: number;
}

/**
 * Oversold fast RSI with positive slow momentum goes LONG, overbought RSI with
 * negative momentum goes SHORT. Anything else emits FLAT and keeps the last
 * directional state.
 */
export const momentumTransition = (
	state: PositionSide,
	inputs: MomentumInputs
): StrategyTransition => {
	if (inputs.rsi < inputs.oversoldBound && inputs.histogram > 0) {
		return { state: "LONG", signal: "LONG", reason: "oversold_with_bullish_macd" };
	}
	if (inputs.rsi > inputs.overboughtBound && inputs.histogram < 0) {
		return { state: "SHORT", signal: "SHORT", reason: "overbought_with_bearish_macd" };
	}
	return { state, signal: "FLAT", reason: "no_confluence" };
};

const requireBound = (value: number, field: string): number => {
	if (!Number.isFinite(value) || value < 0 || value > 100) {
		throw new ConfigurationError(field, `expected a value in [0, 100], got ${value}`);
	}
	return value;
};

export class MultiMomentumStrategy implements SignalStrategy {
	readonly name: StrategyName = "multi_momentum";
	readonly executionTimeframe: string;
	readonly timeframes: readonly string[];
	private position: PositionSide = "FLAT";

	constructor(private readonly config: MomentumStrategyConfig) {
		requireBound(config.oversoldBound, "momentum.oversoldBound");
		requireBound(config.overboughtBound, "momentum.overboughtBound");
		if (config.oversoldBound >= config.overboughtBound) {
			throw new ConfigurationError(
				"momentum.oversoldBound",
				`oversold bound ${config.oversoldBound} must be below overbought bound ${config.overboughtBound}`
			);
		}
		requirePositiveInteger(config.rsiPeriod, "momentum.rsiPeriod");
		requirePositiveInteger(config.macdFast, "momentum.macdFast");
		requirePositiveInteger(config.macdSlow, "momentum.macdSlow");
		requirePositiveInteger(config.macdSignal, "momentum.macdSignal");
		if (config.macdFast >= config.macdSlow) {
			throw new ConfigurationError(
				"momentum.macdFast",
				`fast period ${config.macdFast} must be shorter than slow period ${config.macdSlow}`
			);
		}
		if (timeframeToMs(config.slowInterval) <= timeframeToMs(config.fastInterval)) {
			throw new ConfigurationError(
				"momentum.slowInterval",
				`${config.slowInterval} must be longer than fastInterval ${config.fastInterval}`
			);
		}
		this.executionTimeframe = config.fastInterval;
		this.timeframes = [config.fastInterval, config.slowInterval];
	}

	get state(): PositionSide {
		return this.position;
	}

	evaluate(view: MarketView): StrategyDecision {
		const fast = view.candles(this.config.fastInterval);
		// rsi() throws InsufficientDataError before the series can be empty
		const rsiSeries = rsi(fast, this.config.rsiPeriod);
		const rsiPoint = rsiSeries[rsiSeries.length - 1];
		const latest = latestCandle(fast);

		const slow = view.candles(this.config.slowInterval);
		const macdPoint = lastValue(
			macd(slow, this.config.macdFast, this.config.macdSlow, this.config.macdSignal)
		);
		const histogram = macdPoint?.value.histogram ?? null;
		if (histogram === null) {
			throw new InsufficientDataError(
				`macd histogram (${this.config.slowInterval})`,
				this.config.macdSlow + this.config.macdSignal - 1,
				slow.length
			);
		}

		const transition = momentumTransition(this.position, {
			rsi: rsiPoint.value,
			histogram,
			oversoldBound: this.config.oversoldBound,
			overboughtBound: this.config.overboughtBound,
		});
		this.position = transition.state;
		return toDecision(transition, latest, {
			metadata: {
				rsi: rsiPoint.value,
				histogram,
				slowCloseTime: latestCandle(slow).closeTime,
			},
		});
	}

	reset(): void {
		this.position = "FLAT";
	}
}
