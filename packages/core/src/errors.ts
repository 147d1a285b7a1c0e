import type { Candle } from "./types";

/**
 * Base class for every error the engine raises on purpose. `recoverable`
 * errors concern a single bar or a warm-up period; the caller may retry once
 * more data has arrived. Non-recoverable errors stop the instrument.
 */
export abstract class EngineError extends Error {
	abstract readonly recoverable: boolean;

	protected constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class InsufficientDataError extends EngineError {
	readonly recoverable = true;

	constructor(
		readonly context: string,
		readonly required: number,
		readonly available: number
	) {
		super(
			`${context} needs at least ${required} candles, got ${available}`
		);
	}
}

export class NoAlignedBarError extends EngineError {
	readonly recoverable = true;

	constructor(
		readonly timeframe: string,
		readonly timestamp: number
	) {
		super(
			`No closed ${timeframe} candle at or before ${new Date(timestamp).toISOString()}`
		);
	}
}

export class ConfigurationError extends EngineError {
	readonly recoverable = false;

	constructor(
		readonly field: string,
		message: string
	) {
		super(`Invalid configuration for ${field}: ${message}`);
	}
}

export type InvalidCandleReason =
	| "non_finite"
	| "negative_value"
	| "ohlc_order"
	| "time_order"
	| "non_monotonic"
	| "gap"
	| "series_mismatch";

export class InvalidCandleError extends EngineError {
	readonly recoverable = true;

	constructor(
		readonly reason: InvalidCandleReason,
		readonly candle: Candle,
		detail: string
	) {
		super(`Rejected ${candle.symbol} ${candle.timeframe} candle: ${detail}`);
	}
}

export const isEngineError = (value: unknown): value is EngineError =>
	value instanceof EngineError;

export const isRecoverableEngineError = (value: unknown): value is EngineError =>
	isEngineError(value) && value.recoverable;

export const requirePositiveInteger = (value: number, field: string): number => {
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigurationError(field, `expected a positive integer, got ${value}`);
	}
	return value;
};

export const requirePositiveNumber = (value: number, field: string): number => {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigurationError(field, `expected a number > 0, got ${value}`);
	}
	return value;
};
