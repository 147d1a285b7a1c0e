/**
 * Pure time utilities for deterministic timestamp handling
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */
import { DAY_MS, HOUR_MS, MINUTE_MS } from "./constants";

const TIMEFRAME_PATTERN = /^(\d+)([mhd])$/;

const UNIT_MS: Record<string, number> = {
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
};

/**
 * Parse timeframe string to milliseconds
 * @param timeframe - Format: "1m", "5m", "15m", "1h", "4h", "1d"
 * @throws Error if timeframe format is invalid
 */
export const timeframeToMs = (timeframe: string): number => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const match = timeframe.trim().toLowerCase().match(TIMEFRAME_PATTERN);
	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	return n * UNIT_MS[match[2]];
};

export const isValidTimeframe = (timeframe: string): boolean =>
	TIMEFRAME_PATTERN.test(timeframe.trim().toLowerCase()) &&
	parseInt(timeframe.trim(), 10) > 0;

/**
 * Bucket a timestamp to the start of its timeframe period
 * @example bucketTimestamp(1735690261234, 60000) => 1735690260000
 */
export const bucketTimestamp = (ts: number, tfMs: number): number => {
	if (!Number.isFinite(ts) || ts < 0) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isFinite(tfMs) || tfMs <= 0) {
		throw new Error(`Invalid timeframe ms: ${tfMs}`);
	}
	return Math.floor(ts / tfMs) * tfMs;
};

export const startOfUtcDay = (ts: number): number => bucketTimestamp(ts, DAY_MS);
