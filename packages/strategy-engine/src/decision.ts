import type { Candle } from "@bandwise/core";
import type { StrategyDecision, StrategyTransition } from "./types";

export const toDecision = (
	transition: StrategyTransition,
	candle: Candle,
	extras: Pick<StrategyDecision, "riskBand" | "metadata"> = {}
): StrategyDecision => ({
	state: transition.state,
	signal:
		transition.signal === null
			? null
			: {
					side: transition.signal,
					timestamp: candle.closeTime,
					close: candle.close,
				},
	reason: transition.reason,
	...extras,
});

export const latestCandle = (window: readonly Candle[]): Candle => {
	const latest = window[window.length - 1];
	if (!latest) {
		throw new Error("Cannot evaluate an empty candle window");
	}
	return latest;
};
