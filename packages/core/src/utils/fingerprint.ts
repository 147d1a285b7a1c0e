import crypto from "node:crypto";
import type { Candle } from "../types";

const canonicalNumber = (value: number): number | string => {
	if (!Number.isFinite(value)) {
		return String(value);
	}
	return Object.is(value, -0) ? 0 : value;
};

const stableStringifyInternal = (value: unknown): string => {
	if (typeof value === "number") {
		return JSON.stringify(canonicalNumber(value));
	}
	if (value === null || typeof value !== "object") {
		return typeof value === "undefined" ? "null" : JSON.stringify(value);
	}
	if (Array.isArray(value)) {
		return `[${value.map(stableStringifyInternal).join(",")}]`;
	}
	const entries = Object.entries(value)
		.filter(([, val]) => typeof val !== "undefined")
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(
			([key, val]) => `${JSON.stringify(key)}:${stableStringifyInternal(val)}`
		);
	return `{${entries.join(",")}}`;
};

/**
 * JSON with sorted keys, so equal values always serialize identically
 */
export const stableStringify = (value: unknown): string => {
	return stableStringifyInternal(value);
};

export const hashJson = (value: unknown, length = 12): string => {
	const digest = crypto
		.createHash("sha1")
		.update(stableStringify(value))
		.digest("hex");
	return length > 0 ? digest.slice(0, length) : digest;
};

export interface CandleFingerprintSummary {
	count: number;
	firstOpenTime: number | null;
	lastCloseTime: number | null;
	hash: string | null;
}

export const summarizeCandles = (
	candles: readonly Candle[]
): CandleFingerprintSummary => ({
	count: candles.length,
	firstOpenTime: candles[0]?.openTime ?? null,
	lastCloseTime: candles[candles.length - 1]?.closeTime ?? null,
	hash: candles.length ? hashJson(candles) : null,
});
