import { ConfigurationError, requirePositiveInteger } from "@bandwise/core";
import type {
	ActivePositionSide,
	AtrBreakoutConfig,
	PositionSide,
	StrategyName,
} from "@bandwise/core";
import { atr, lastValue, priceChannel, requireCandles } from "@bandwise/indicators";
import type { ChannelPoint } from "@bandwise/indicators";
import { RiskBandManager } from "@bandwise/risk-engine";
import type { RiskBandExitReason } from "@bandwise/risk-engine";
import { latestCandle, toDecision } from "./decision";
import type {
	MarketView,
	SignalStrategy,
	StrategyDecision,
	StrategyTransition,
} from "./types";

export const breakoutDirection = (
	close: number,
	channel: ChannelPoint,
	minBreakout: number
): ActivePositionSide | null => {
	if (close > channel.high * (1 + minBreakout)) {
		return "LONG";
	}
	if (close < channel.low * (1 - minBreakout)) {
		return "SHORT";
	}
	return null;
};

export interface BreakoutInputs {
	breakout: ActivePositionSide | null;
	/** Set when the open band's stop or target was touched by this bar */
	exit: RiskBandExitReason | null;
}

/**
 * Band exits win over everything. An opposing breakout closes the band
 * without reversing, and a bar that closes a band never opens a new one.
 */
export const atrBreakoutTransition = (
	state: PositionSide,
	inputs: BreakoutInputs
): StrategyTransition => {
	if (state !== "FLAT") {
		if (inputs.exit !== null) {
			return { state: "FLAT", signal: "FLAT", reason: inputs.exit };
		}
		if (inputs.breakout !== null && inputs.breakout !== state) {
			return { state: "FLAT", signal: "FLAT", reason: "opposing_breakout" };
		}
		return { state, signal: null, reason: state === "LONG" ? "holding_long" : "holding_short" };
	}
	if (inputs.breakout === "LONG") {
		return { state: "LONG", signal: "LONG", reason: "breakout_up" };
	}
	if (inputs.breakout === "SHORT") {
		return { state: "SHORT", signal: "SHORT", reason: "breakout_down" };
	}
	return { state, signal: null, reason: "inside_channel" };
};

export class ATRBreakoutStrategy implements SignalStrategy {
	readonly name: StrategyName = "atr_breakout";
	readonly timeframes: readonly string[];
	private readonly manager: RiskBandManager;
	private readonly requiredCandles: number;

	constructor(
		private readonly config: AtrBreakoutConfig,
		readonly executionTimeframe: string,
		symbol = ""
	) {
		requirePositiveInteger(config.period, "atr.period");
		requirePositiveInteger(config.channelPeriod, "atr.channelPeriod");
		if (!Number.isFinite(config.minBreakout) || config.minBreakout < 0) {
			throw new ConfigurationError(
				"atr.minBreakout",
				`expected a number >= 0, got ${config.minBreakout}`
			);
		}
		this.manager = new RiskBandManager(
			{ kStop: config.kStop, kTarget: config.kTarget },
			symbol
		);
		this.requiredCandles = Math.max(config.period, config.channelPeriod) + 1;
		this.timeframes = [executionTimeframe];
	}

	get state(): PositionSide {
		return this.manager.band?.direction ?? "FLAT";
	}

	evaluate(view: MarketView): StrategyDecision {
		const window = view.candles(this.executionTimeframe);
		requireCandles(window, this.requiredCandles, "atr breakout");
		const latest = latestCandle(window);
		const atrPoint = lastValue(atr(window, this.config.period));
		const channelPoint = lastValue(priceChannel(window, this.config.channelPeriod));
		if (!atrPoint || !channelPoint) {
			throw new Error("ATR breakout indicators empty after warm-up");
		}
		const atrValue = atrPoint.value;
		const channel = channelPoint.value;
		const metadata = {
			atr: atrValue,
			channelHigh: channel.high,
			channelLow: channel.low,
		};

		const exit = this.manager.isOpen ? this.manager.checkExit(latest) : null;
		const transition = atrBreakoutTransition(exit ? exit.band.direction : this.state, {
			breakout: breakoutDirection(latest.close, channel, this.config.minBreakout),
			exit: exit ? exit.reason : null,
		});

		if (exit) {
			return toDecision(transition, latest, {
				riskBand: exit.band,
				metadata: { ...metadata, exitPrice: exit.exitPrice },
			});
		}

		if (transition.reason === "opposing_breakout") {
			const closed = this.manager.close(latest.close, latest.closeTime);
			return toDecision(transition, latest, {
				riskBand: closed.band,
				metadata: { ...metadata, exitPrice: closed.exitPrice },
			});
		}

		if (transition.state === "FLAT") {
			return toDecision(transition, latest, { metadata });
		}

		if (transition.signal !== null) {
			const band = this.manager.open(
				transition.state,
				latest.close,
				atrValue,
				latest.closeTime
			);
			return toDecision(transition, latest, { riskBand: band, metadata });
		}

		const trail = this.manager.trail(latest.close, atrValue, latest.closeTime);
		if (!trail.changed) {
			return toDecision(transition, latest, { riskBand: trail.band, metadata });
		}
		return toDecision(
			{ state: transition.state, signal: transition.state, reason: "band_trailed" },
			latest,
			{ riskBand: trail.band, metadata }
		);
	}

	reset(): void {
		this.manager.reset();
	}
}
