import { describe, it, expect } from "vitest";
import { CandleStream } from "./CandleStream";
import { TimeframeAligner } from "./TimeframeAligner";
import { NoAlignedBarError } from "../errors";

const fifteenMinutes = (openTime: number, close: number) => ({
	symbol: "BTC/USDT",
	timeframe: "15m",
	openTime,
	closeTime: openTime + 899_999,
	open: close,
	high: close,
	low: close,
	close,
	volume: 1,
});

const buildAligner = (): TimeframeAligner => {
	const slow = new CandleStream({ symbol: "BTC/USDT", timeframe: "15m" });
	slow.append(fifteenMinutes(0, 100));
	slow.append(fifteenMinutes(900_000, 110));
	return new TimeframeAligner(slow);
};

describe("TimeframeAligner", () => {
	it("should return the newest slow candle closed by the timestamp", () => {
		const aligner = buildAligner();

		expect(aligner.align(899_999).close).toBe(100);
		expect(aligner.align(1_000_000).close).toBe(100);
		expect(aligner.align(1_799_999).close).toBe(110);
	});

	it("should never expose the forming slow candle", () => {
		const aligner = buildAligner();

		expect(aligner.closedWindow(1_799_998).map((c) => c.close)).toEqual([100]);
	});

	it("should throw NoAlignedBarError before the first slow close", () => {
		const aligner = buildAligner();

		expect(() => aligner.align(500)).toThrow(NoAlignedBarError);
		expect(() => aligner.closedWindow(500)).toThrow(NoAlignedBarError);
	});
});
