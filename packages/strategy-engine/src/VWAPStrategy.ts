import {
	ConfigurationError,
	requirePositiveInteger,
	requirePositiveNumber,
} from "@bandwise/core";
import type { PositionSide, StrategyName, VwapStrategyConfig } from "@bandwise/core";
import { latestVwap, requireCandles } from "@bandwise/indicators";
import { latestCandle, toDecision } from "./decision";
import type {
	MarketView,
	SignalStrategy,
	StrategyDecision,
	StrategyTransition,
} from "./types";

export interface VwapInputs {
	close: number;
	vwap: number;
	threshold: number;
	exitThreshold: number;
}

/**
 * | state | condition                        | next  | signal |
 * | ----- | -------------------------------- | ----- | ------ |
 * | FLAT  | close > vwap * (1 + threshold)   | LONG  | LONG   |
 * | FLAT  | close < vwap * (1 - threshold)   | SHORT | SHORT  |
 * | LONG  | close <= vwap * (1 + exit)       | FLAT  | FLAT   |
 * | SHORT | close >= vwap * (1 - exit)       | FLAT  | FLAT   |
 *
 * Every other combination keeps the state and emits nothing.
 */
export const vwapTransition = (
	state: PositionSide,
	inputs: VwapInputs
): StrategyTransition => {
	const { close, vwap, threshold, exitThreshold } = inputs;
	switch (state) {
		case "FLAT":
			if (close > vwap * (1 + threshold)) {
				return { state: "LONG", signal: "LONG", reason: "vwap_break_up" };
			}
			if (close < vwap * (1 - threshold)) {
				return { state: "SHORT", signal: "SHORT", reason: "vwap_break_down" };
			}
			return { state, signal: null, reason: "inside_band" };
		case "LONG":
			if (close <= vwap * (1 + exitThreshold)) {
				return { state: "FLAT", signal: "FLAT", reason: "vwap_reversion" };
			}
			return { state, signal: null, reason: "holding_long" };
		case "SHORT":
			if (close >= vwap * (1 - exitThreshold)) {
				return { state: "FLAT", signal: "FLAT", reason: "vwap_reversion" };
			}
			return { state, signal: null, reason: "holding_short" };
	}
};

export class VWAPStrategy implements SignalStrategy {
	readonly name: StrategyName = "vwap";
	readonly timeframes: readonly string[];
	private position: PositionSide = "FLAT";
	private readonly exitThreshold: number;

	constructor(
		private readonly config: VwapStrategyConfig,
		readonly executionTimeframe: string
	) {
		requirePositiveNumber(config.threshold, "vwap.threshold");
		this.exitThreshold = requirePositiveNumber(
			config.exitThreshold ?? config.threshold,
			"vwap.exitThreshold"
		);
		if (this.exitThreshold > config.threshold) {
			throw new ConfigurationError(
				"vwap.exitThreshold",
				`must not exceed threshold ${config.threshold}, got ${this.exitThreshold}`
			);
		}
		if (config.rollingPeriod !== undefined) {
			requirePositiveInteger(config.rollingPeriod, "vwap.rollingPeriod");
		}
		this.timeframes = [executionTimeframe];
	}

	get state(): PositionSide {
		return this.position;
	}

	evaluate(view: MarketView): StrategyDecision {
		const window = view.candles(this.executionTimeframe);
		requireCandles(window, 1, "vwap strategy");
		const latest = latestCandle(window);

		const value = latestVwap(window, {
			sessionReset: this.config.sessionReset,
			rollingPeriod: this.config.rollingPeriod,
		});
		if (value === null) {
			return toDecision(
				{ state: this.position, signal: null, reason: "no_session_volume" },
				latest
			);
		}

		const transition = vwapTransition(this.position, {
			close: latest.close,
			vwap: value,
			threshold: this.config.threshold,
			exitThreshold: this.exitThreshold,
		});
		this.position = transition.state;
		return toDecision(transition, latest, { metadata: { vwap: value } });
	}

	reset(): void {
		this.position = "FLAT";
	}
}
