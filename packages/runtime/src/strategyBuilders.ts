import { ConfigurationError } from "@bandwise/core";
import type { EngineConfig, StrategyName } from "@bandwise/core";
import {
	ATRBreakoutStrategy,
	MultiMomentumStrategy,
	VWAPStrategy,
} from "@bandwise/strategy-engine";
import type { SignalStrategy } from "@bandwise/strategy-engine";

export const STRATEGY_NAMES: readonly StrategyName[] = [
	"vwap",
	"multi_momentum",
	"atr_breakout",
];

const isStrategyName = (value: string): value is StrategyName =>
	STRATEGY_NAMES.some((name) => name === value);

/**
 * Normalizes a user-supplied strategy name (trimmed, lowercase, "-" read as "_")
 *
 * @throws ConfigurationError listing the available names when unknown
 */
export const parseStrategyName = (value: string): StrategyName => {
	const normalized = value.trim().toLowerCase().replace(/-/g, "_");
	if (!isStrategyName(normalized)) {
		throw new ConfigurationError(
			"strategies",
			`unknown strategy "${value}", expected one of ${STRATEGY_NAMES.join(", ")}`
		);
	}
	return normalized;
};

export interface BuildStrategyOptions {
	/** Instrument the strategy trades; only used to label risk band logs */
	symbol?: string;
}

/**
 * VWAP and ATR breakout evaluate on `runtime.executionTimeframe`; momentum
 * evaluates on its own `fastInterval`.
 */
export const buildStrategy = (
	name: StrategyName,
	config: EngineConfig,
	options: BuildStrategyOptions = {}
): SignalStrategy => {
	const executionTimeframe = config.runtime.executionTimeframe;
	switch (name) {
		case "vwap":
			return new VWAPStrategy(config.vwap, executionTimeframe);
		case "multi_momentum":
			return new MultiMomentumStrategy(config.momentum);
		case "atr_breakout":
			return new ATRBreakoutStrategy(config.atr, executionTimeframe, options.symbol);
	}
};

export const buildStrategies = (
	names: readonly StrategyName[],
	config: EngineConfig,
	options: BuildStrategyOptions = {}
): SignalStrategy[] => {
	if (!names.length) {
		throw new ConfigurationError("strategies", "at least one strategy is required");
	}
	const seen = new Set<StrategyName>();
	return names.map((name) => {
		if (seen.has(name)) {
			throw new ConfigurationError("strategies", `duplicate strategy "${name}"`);
		}
		seen.add(name);
		return buildStrategy(name, config, options);
	});
};
