import { hashJson } from "@bandwise/core";
import type { DecisionRecord, EngineConfig } from "@bandwise/core";

export type DecisionFingerprint = string;
export type ConfigFingerprint = string;

/**
 * Hash of a decision log. Two runs over the same candles and config produce
 * the same fingerprint whether they were replayed or streamed.
 */
export const fingerprintDecisions = (
	decisions: readonly DecisionRecord[]
): DecisionFingerprint => hashJson(decisions);

export const fingerprintConfig = (config: EngineConfig): ConfigFingerprint =>
	hashJson(config);
