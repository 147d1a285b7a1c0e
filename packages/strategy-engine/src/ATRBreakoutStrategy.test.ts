import { describe, expect, it } from "vitest";
import { ConfigurationError, InsufficientDataError } from "@bandwise/core";
import type { AtrBreakoutConfig, Candle } from "@bandwise/core";
import {
	ATRBreakoutStrategy,
	atrBreakoutTransition,
	breakoutDirection,
} from "./ATRBreakoutStrategy";
import { buildCandles, viewAt } from "./__tests__/helpers";
import type { Bar } from "./__tests__/helpers";

const config: AtrBreakoutConfig = {
	period: 5,
	channelPeriod: 5,
	kStop: 2,
	kTarget: 3,
	minBreakout: 0,
};

// Five quiet bars (true range 2, channel 103..105) then a close at 106
const base: Bar[] = [
	...Array.from({ length: 5 }, () => ({ open: 104, high: 105, low: 103, close: 104 })),
	{ open: 104, high: 106, low: 104, close: 106 },
];

const runFrom = (strategy: ATRBreakoutStrategy, candles: readonly Candle[], from: number) =>
	candles
		.slice(from)
		.map((candle) => strategy.evaluate(viewAt(candle.closeTime, { "1m": candles })));

describe("breakoutDirection", () => {
	const channel = { high: 105, low: 95 };

	it("requires a close strictly beyond the channel", () => {
		expect(breakoutDirection(106, channel, 0)).toBe("LONG");
		expect(breakoutDirection(105, channel, 0)).toBeNull();
		expect(breakoutDirection(94, channel, 0)).toBe("SHORT");
	});

	it("applies the minimum breakout distance", () => {
		expect(breakoutDirection(106, channel, 0.01)).toBeNull();
		expect(breakoutDirection(107, channel, 0.01)).toBe("LONG");
	});
});

describe("atrBreakoutTransition", () => {
	it("lets band exits win over a new breakout", () => {
		expect(atrBreakoutTransition("LONG", { breakout: "SHORT", exit: "stop_loss" })).toEqual({
			state: "FLAT",
			signal: "FLAT",
			reason: "stop_loss",
		});
	});

	it("closes on an opposing breakout without reversing", () => {
		expect(atrBreakoutTransition("SHORT", { breakout: "LONG", exit: null })).toEqual({
			state: "FLAT",
			signal: "FLAT",
			reason: "opposing_breakout",
		});
		expect(atrBreakoutTransition("SHORT", { breakout: "SHORT", exit: null }).signal).toBeNull();
	});

	it("enters only from FLAT", () => {
		expect(atrBreakoutTransition("FLAT", { breakout: "SHORT", exit: null }).state).toBe("SHORT");
		expect(atrBreakoutTransition("FLAT", { breakout: null, exit: null }).reason).toBe(
			"inside_channel"
		);
	});
});

describe("ATRBreakoutStrategy", () => {
	it("enters LONG above the channel with an ATR stop", () => {
		const candles = buildCandles("1m", base);
		const strategy = new ATRBreakoutStrategy(config, "1m");
		const [decision] = runFrom(strategy, candles, 5);

		expect(decision.signal).toEqual({
			side: "LONG",
			timestamp: candles[5].closeTime,
			close: 106,
		});
		expect(decision.riskBand).toEqual({
			direction: "LONG",
			entryPrice: 106,
			stopLoss: 102,
			takeProfit: 112,
			openedAt: candles[5].closeTime,
			updatedAt: candles[5].closeTime,
		});
		expect(decision.metadata).toEqual({ atr: 2, channelHigh: 105, channelLow: 103 });
		expect(strategy.state).toBe("LONG");
	});

	it("trails, stops out and waits a bar before re-entering", () => {
		const candles = buildCandles("1m", [
			...base,
			{ open: 106, high: 109, low: 105, close: 108 },
			{ open: 104, high: 104, low: 95, close: 96 },
			{ open: 95.5, high: 96, low: 94, close: 94.5 },
		]);
		const strategy = new ATRBreakoutStrategy(config, "1m");
		const [entry, trailed, stopped, reentry] = runFrom(strategy, candles, 5);

		expect(entry.signal?.side).toBe("LONG");

		expect(trailed.reason).toBe("band_trailed");
		expect(trailed.signal?.side).toBe("LONG");
		expect(trailed.riskBand?.stopLoss).toBeCloseTo(103.2, 10);
		expect(trailed.riskBand?.takeProfit).toBe(112);

		expect(stopped.reason).toBe("stop_loss");
		expect(stopped.state).toBe("FLAT");
		expect(stopped.signal?.side).toBe("FLAT");
		expect(stopped.metadata?.exitPrice).toBeCloseTo(103.2, 10);

		expect(reentry.signal?.side).toBe("SHORT");
		expect(reentry.riskBand?.stopLoss).toBeCloseTo(94.5 + 2 * 4.016, 10);
		expect(reentry.riskBand?.takeProfit).toBeCloseTo(94.5 - 3 * 4.016, 10);
	});

	it("never loosens the stop while holding", () => {
		const candles = buildCandles("1m", [
			...base,
			{ open: 106, high: 109, low: 105, close: 108 },
			{ open: 108, high: 108.5, low: 104, close: 105 },
		]);
		const strategy = new ATRBreakoutStrategy(config, "1m");
		const [, trailed, holding] = runFrom(strategy, candles, 5);

		expect(holding.reason).toBe("holding_long");
		expect(holding.signal).toBeNull();
		expect(holding.riskBand?.stopLoss).toBe(trailed.riskBand?.stopLoss);
	});

	it("exits at the target", () => {
		const candles = buildCandles("1m", [
			...base,
			{ open: 107, high: 113, low: 106, close: 112.5 },
		]);
		const strategy = new ATRBreakoutStrategy(config, "1m");
		const [, exit] = runFrom(strategy, candles, 5);

		expect(exit.reason).toBe("take_profit");
		expect(exit.metadata?.exitPrice).toBe(112);
		expect(strategy.state).toBe("FLAT");
	});

	it("closes on an opposing breakout and stays FLAT", () => {
		const candles = buildCandles("1m", [
			...base,
			{ open: 105, high: 106, low: 102.2, close: 102.5 },
		]);
		const strategy = new ATRBreakoutStrategy(config, "1m");
		const [, exit] = runFrom(strategy, candles, 5);

		expect(exit).toMatchObject({
			state: "FLAT",
			reason: "opposing_breakout",
			signal: { side: "FLAT", close: 102.5 },
		});
		expect(exit.riskBand?.stopLoss).toBe(102);
		expect(exit.metadata?.exitPrice).toBe(102.5);
		expect(strategy.state).toBe("FLAT");
	});

	it("ignores breakouts smaller than minBreakout", () => {
		const candles = buildCandles("1m", base);
		const strategy = new ATRBreakoutStrategy({ ...config, minBreakout: 0.01 }, "1m");
		const [decision] = runFrom(strategy, candles, 5);

		expect(decision.signal).toBeNull();
		expect(decision.reason).toBe("inside_channel");
	});

	it("needs channelPeriod closed bars before the evaluated one", () => {
		const candles = buildCandles("1m", base.slice(0, 5));
		const strategy = new ATRBreakoutStrategy(config, "1m");

		expect(() => runFrom(strategy, candles, 4)).toThrow(InsufficientDataError);
		expect(() => runFrom(strategy, candles, 4)).toThrow(
			"atr breakout needs at least 6 candles, got 5"
		);
	});

	it("drops the band on reset", () => {
		const strategy = new ATRBreakoutStrategy(config, "1m");
		runFrom(strategy, buildCandles("1m", base), 5);
		strategy.reset();
		expect(strategy.state).toBe("FLAT");
	});

	it("rejects invalid multipliers and periods", () => {
		expect(() => new ATRBreakoutStrategy({ ...config, kStop: 0 }, "1m")).toThrow(
			ConfigurationError
		);
		expect(() => new ATRBreakoutStrategy({ ...config, kTarget: -1 }, "1m")).toThrow(
			ConfigurationError
		);
		expect(() => new ATRBreakoutStrategy({ ...config, channelPeriod: 0 }, "1m")).toThrow(
			ConfigurationError
		);
		expect(() => new ATRBreakoutStrategy({ ...config, minBreakout: -0.1 }, "1m")).toThrow(
			ConfigurationError
		);
	});
});
