import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigurationError } from "./errors";
import { isValidTimeframe } from "./time";
import type { GapPolicy, SessionReset } from "./types";

export interface VwapStrategyConfig {
	/** Entry distance from VWAP as a fraction, e.g. 0.01 for 1% */
	threshold: number;
	/** Exit distance from VWAP; defaults to `threshold` */
	exitThreshold?: number;
	sessionReset: SessionReset;
	/** Restrict each VWAP value to the last N candles of its session */
	rollingPeriod?: number;
}

export interface MomentumStrategyConfig {
	fastInterval: string;
	slowInterval: string;
	rsiPeriod: number;
	oversoldBound: number;
	overboughtBound: number;
	macdFast: number;
	macdSlow: number;
	macdSignal: number;
}

export interface AtrBreakoutConfig {
	period: number;
	channelPeriod: number;
	kStop: number;
	kTarget: number;
	/** Extra distance beyond the channel, as a fraction, required to enter */
	minBreakout: number;
}

export interface RuntimeConfig {
	executionTimeframe: string;
	historyWindowCandles: number;
	gapPolicy: GapPolicy;
	/** Slower timeframes built from execution candles instead of a separate feed */
	derivedTimeframes: string[];
}

export interface EngineConfig {
	runtime: RuntimeConfig;
	vwap: VwapStrategyConfig;
	momentum: MomentumStrategyConfig;
	atr: AtrBreakoutConfig;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	runtime: {
		executionTimeframe: "1m",
		historyWindowCandles: 1_000,
		gapPolicy: "tolerant",
		derivedTimeframes: [],
	},
	vwap: {
		threshold: 0.02,
		sessionReset: "daily",
	},
	momentum: {
		fastInterval: "1m",
		slowInterval: "15m",
		rsiPeriod: 14,
		oversoldBound: 30,
		overboughtBound: 70,
		macdFast: 12,
		macdSlow: 26,
		macdSignal: 9,
	},
	atr: {
		period: 14,
		channelPeriod: 20,
		kStop: 2,
		kTarget: 4,
		minBreakout: 0,
	},
};

export type ConfigSourceType = "file" | "defaults";

export interface LoadedEngineConfig {
	config: EngineConfig;
	source: ConfigSourceType;
	path?: string;
}

export interface ConfigLoadOptions {
	configPath?: string;
	envPath?: string;
}

type RawSection = Record<string, unknown>;

const isRecord = (value: unknown): value is RawSection =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readSection = (raw: RawSection, key: string): RawSection => {
	const value = raw[key];
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new ConfigurationError(key, "expected an object");
	}
	return value;
};

const readNumber = (
	section: RawSection,
	key: string,
	fallback: number,
	field: string
): number => {
	const value = section[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new ConfigurationError(field, `expected a number, got ${String(value)}`);
	}
	return value;
};

const readOptionalNumber = (
	section: RawSection,
	key: string,
	field: string
): number | undefined => {
	if (section[key] === undefined) {
		return undefined;
	}
	return readNumber(section, key, Number.NaN, field);
};

const readTimeframe = (
	section: RawSection,
	key: string,
	fallback: string,
	field: string
): string => {
	const value = section[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "string" || !isValidTimeframe(value)) {
		throw new ConfigurationError(field, `expected a timeframe like "15m", got ${String(value)}`);
	}
	return value.trim().toLowerCase();
};

const readChoice = <T extends string>(
	section: RawSection,
	key: string,
	choices: readonly T[],
	fallback: T,
	field: string
): T => {
	const value = section[key];
	if (value === undefined) {
		return fallback;
	}
	const match = choices.find((choice) => choice === value);
	if (match === undefined) {
		throw new ConfigurationError(
			field,
			`expected one of ${choices.join(", ")}, got ${String(value)}`
		);
	}
	return match;
};

const readTimeframeList = (
	section: RawSection,
	key: string,
	fallback: string[],
	field: string
): string[] => {
	const value = section[key];
	if (value === undefined) {
		return [...fallback];
	}
	if (!Array.isArray(value)) {
		throw new ConfigurationError(field, "expected an array of timeframes");
	}
	return value.map((entry, index) =>
		readTimeframe({ entry }, "entry", "", `${field}[${index}]`)
	);
};

/**
 * Validates field types of an untrusted config object and fills in defaults.
 * Cross-field rules (bounds ordering, period ordering) are enforced by the
 * strategy constructors.
 */
export const parseEngineConfig = (raw: unknown): EngineConfig => {
	if (!isRecord(raw)) {
		throw new ConfigurationError("engine", "expected a JSON object");
	}
	const defaults = DEFAULT_ENGINE_CONFIG;
	const runtime = readSection(raw, "runtime");
	const vwap = readSection(raw, "vwap");
	const momentum = readSection(raw, "momentum");
	const atr = readSection(raw, "atr");

	const exitThreshold = readOptionalNumber(vwap, "exitThreshold", "vwap.exitThreshold");
	const rollingPeriod = readOptionalNumber(vwap, "rollingPeriod", "vwap.rollingPeriod");

	return {
		runtime: {
			executionTimeframe: readTimeframe(
				runtime,
				"executionTimeframe",
				defaults.runtime.executionTimeframe,
				"runtime.executionTimeframe"
			),
			historyWindowCandles: readNumber(
				runtime,
				"historyWindowCandles",
				defaults.runtime.historyWindowCandles,
				"runtime.historyWindowCandles"
			),
			gapPolicy: readChoice<GapPolicy>(
				runtime,
				"gapPolicy",
				["tolerant", "reject"],
				defaults.runtime.gapPolicy,
				"runtime.gapPolicy"
			),
			derivedTimeframes: readTimeframeList(
				runtime,
				"derivedTimeframes",
				defaults.runtime.derivedTimeframes,
				"runtime.derivedTimeframes"
			),
		},
		vwap: {
			threshold: readNumber(vwap, "threshold", defaults.vwap.threshold, "vwap.threshold"),
			sessionReset: readChoice<SessionReset>(
				vwap,
				"sessionReset",
				["none", "daily"],
				defaults.vwap.sessionReset,
				"vwap.sessionReset"
			),
			...(exitThreshold === undefined ? {} : { exitThreshold }),
			...(rollingPeriod === undefined ? {} : { rollingPeriod }),
		},
		momentum: {
			fastInterval: readTimeframe(
				momentum,
				"fastInterval",
				defaults.momentum.fastInterval,
				"momentum.fastInterval"
			),
			slowInterval: readTimeframe(
				momentum,
				"slowInterval",
				defaults.momentum.slowInterval,
				"momentum.slowInterval"
			),
			rsiPeriod: readNumber(momentum, "rsiPeriod", defaults.momentum.rsiPeriod, "momentum.rsiPeriod"),
			oversoldBound: readNumber(
				momentum,
				"oversoldBound",
				defaults.momentum.oversoldBound,
				"momentum.oversoldBound"
			),
			overboughtBound: readNumber(
				momentum,
				"overboughtBound",
				defaults.momentum.overboughtBound,
				"momentum.overboughtBound"
			),
			macdFast: readNumber(momentum, "macdFast", defaults.momentum.macdFast, "momentum.macdFast"),
			macdSlow: readNumber(momentum, "macdSlow", defaults.momentum.macdSlow, "momentum.macdSlow"),
			macdSignal: readNumber(
				momentum,
				"macdSignal",
				defaults.momentum.macdSignal,
				"momentum.macdSignal"
			),
		},
		atr: {
			period: readNumber(atr, "period", defaults.atr.period, "atr.period"),
			channelPeriod: readNumber(
				atr,
				"channelPeriod",
				defaults.atr.channelPeriod,
				"atr.channelPeriod"
			),
			kStop: readNumber(atr, "kStop", defaults.atr.kStop, "atr.kStop"),
			kTarget: readNumber(atr, "kTarget", defaults.atr.kTarget, "atr.kTarget"),
			minBreakout: readNumber(atr, "minBreakout", defaults.atr.minBreakout, "atr.minBreakout"),
		},
	};
};

let cachedWorkspaceRoot: string | undefined;

const isWorkspaceRoot = (dir: string): boolean => {
	if (fs.existsSync(path.join(dir, ".git"))) {
		return true;
	}
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
	return isRecord(parsed) && Array.isArray(parsed.workspaces);
};

export const getWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getDefaultConfigPath = (): string =>
	path.join(getWorkspaceRoot(), "config", "engine.json");

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigurationError(
			filePath,
			`not valid JSON (${error instanceof Error ? error.message : String(error)})`
		);
	}
};

/**
 * Load `.env`, then the engine config file. An explicit path (option or
 * BANDWISE_CONFIG) must exist; the default path falls back to built-in
 * defaults when absent.
 */
export const loadEngineConfig = (
	options: ConfigLoadOptions = {}
): LoadedEngineConfig => {
	dotenv.config({
		path: options.envPath ?? path.join(getWorkspaceRoot(), ".env"),
	});

	const explicitPath = options.configPath ?? process.env.BANDWISE_CONFIG;
	const configPath = explicitPath
		? path.resolve(explicitPath)
		: getDefaultConfigPath();

	if (!fs.existsSync(configPath)) {
		if (explicitPath) {
			throw new ConfigurationError(configPath, "config file not found");
		}
		return { config: parseEngineConfig({}), source: "defaults" };
	}

	return {
		config: parseEngineConfig(readJsonFile(configPath)),
		source: "file",
		path: configPath,
	};
};
