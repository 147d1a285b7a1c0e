import { describe, expect, it } from "vitest";
import { ConfigurationError, InsufficientDataError } from "@bandwise/core";
import type { MomentumStrategyConfig } from "@bandwise/core";
import { MultiMomentumStrategy, momentumTransition } from "./MultiMomentumStrategy";
import { closes, viewAt } from "./__tests__/helpers";

// Small periods keep the warm-up short: RSI(2), MACD(2, 3, 2)
const config: MomentumStrategyConfig = {
	fastInterval: "1m",
	slowInterval: "5m",
	rsiPeriod: 2,
	oversoldBound: 30,
	overboughtBound: 70,
	macdFast: 2,
	macdSlow: 3,
	macdSignal: 2,
};

// Slow closes 1, 2, 4, 8 end with a positive histogram; 19, 18, 16, 12
// mirror them and end negative. The fifth slow candle is still forming when
// the fast bars are evaluated.
const SLOW_START = 0;
const FAST_START = 4 * 300_000;
const bullishSlow = closes("5m", [1, 2, 4, 8, 1], SLOW_START);
const bearishSlow = closes("5m", [19, 18, 16, 12, 30], SLOW_START);
const fallingFast = closes("1m", [10, 9, 8], FAST_START);
const risingFast = closes("1m", [10, 11, 12], FAST_START);
const evaluatedAt = fallingFast[2].closeTime;

describe("momentumTransition", () => {
	const bounds = { oversoldBound: 30, overboughtBound: 70 };

	it("requires both RSI and MACD to agree", () => {
		expect(momentumTransition("FLAT", { ...bounds, rsi: 20, histogram: 0.5 }).state).toBe(
			"LONG"
		);
		expect(momentumTransition("FLAT", { ...bounds, rsi: 80, histogram: -0.5 }).state).toBe(
			"SHORT"
		);
		expect(momentumTransition("FLAT", { ...bounds, rsi: 20, histogram: -0.5 })).toEqual({
			state: "FLAT",
			signal: "FLAT",
			reason: "no_confluence",
		});
		expect(momentumTransition("FLAT", { ...bounds, rsi: 30, histogram: 0.5 }).signal).toBe(
			"FLAT"
		);
	});

	it("keeps the last directional state on a neutral bar", () => {
		expect(momentumTransition("SHORT", { ...bounds, rsi: 50, histogram: 1 })).toEqual({
			state: "SHORT",
			signal: "FLAT",
			reason: "no_confluence",
		});
	});
});

describe("MultiMomentumStrategy", () => {
	it("goes LONG on oversold RSI with a rising slow histogram", () => {
		const strategy = new MultiMomentumStrategy(config);
		const decision = strategy.evaluate(
			viewAt(evaluatedAt, { "1m": fallingFast, "5m": bullishSlow })
		);

		expect(decision.signal).toEqual({ side: "LONG", timestamp: evaluatedAt, close: 8 });
		expect(decision.metadata?.rsi).toBe(0);
		expect(decision.metadata?.histogram).toBeCloseTo(7 / 36, 10);
		expect(decision.metadata?.slowCloseTime).toBe(bullishSlow[3].closeTime);
	});

	it("goes SHORT on overbought RSI with a falling slow histogram", () => {
		const strategy = new MultiMomentumStrategy(config);
		const decision = strategy.evaluate(
			viewAt(evaluatedAt, { "1m": risingFast, "5m": bearishSlow })
		);

		expect(decision.state).toBe("SHORT");
		expect(decision.metadata?.rsi).toBe(100);
		expect(decision.metadata?.histogram).toBeCloseTo(-7 / 36, 10);
	});

	it("emits FLAT every bar without confluence but keeps its state", () => {
		const strategy = new MultiMomentumStrategy(config);
		strategy.evaluate(viewAt(evaluatedAt, { "1m": fallingFast, "5m": bullishSlow }));
		const decision = strategy.evaluate(
			viewAt(evaluatedAt, { "1m": risingFast, "5m": bullishSlow })
		);

		expect(decision.signal?.side).toBe("FLAT");
		expect(decision.state).toBe("LONG");
		expect(strategy.state).toBe("LONG");
	});

	it("waits for the slow histogram to warm up", () => {
		const strategy = new MultiMomentumStrategy(config);
		const shortSlow = bullishSlow.slice(0, 3);

		expect(() =>
			strategy.evaluate(viewAt(evaluatedAt, { "1m": fallingFast, "5m": shortSlow }))
		).toThrow(InsufficientDataError);
		expect(() => strategy.evaluate(viewAt(evaluatedAt, { "1m": fallingFast }))).toThrow(
			InsufficientDataError
		);
		expect(() =>
			strategy.evaluate(viewAt(evaluatedAt, { "1m": fallingFast.slice(0, 2), "5m": bullishSlow }))
		).toThrow(InsufficientDataError);
	});

	it("reports the fast RSI warm-up before reading slow candles", () => {
		const strategy = new MultiMomentumStrategy(config);

		expect(() =>
			strategy.evaluate(viewAt(evaluatedAt, { "1m": fallingFast.slice(0, 2) }))
		).toThrow("rsi needs at least 3 candles, got 2");
	});

	it("reads from the fast interval", () => {
		const strategy = new MultiMomentumStrategy(config);
		expect(strategy.executionTimeframe).toBe("1m");
		expect(strategy.timeframes).toEqual(["1m", "5m"]);
	});

	it("rejects inverted bounds", () => {
		expect(
			() => new MultiMomentumStrategy({ ...config, oversoldBound: 70, overboughtBound: 30 })
		).toThrow(ConfigurationError);
		expect(
			() => new MultiMomentumStrategy({ ...config, oversoldBound: 50, overboughtBound: 50 })
		).toThrow(ConfigurationError);
		expect(() => new MultiMomentumStrategy({ ...config, overboughtBound: 101 })).toThrow(
			/expected a value in \[0, 100\]/
		);
	});

	it("rejects invalid periods and intervals", () => {
		expect(() => new MultiMomentumStrategy({ ...config, rsiPeriod: 0 })).toThrow(
			ConfigurationError
		);
		expect(() => new MultiMomentumStrategy({ ...config, macdFast: 3 })).toThrow(
			/must be shorter than slow period/
		);
		expect(() => new MultiMomentumStrategy({ ...config, slowInterval: "1m" })).toThrow(
			ConfigurationError
		);
	});
});
