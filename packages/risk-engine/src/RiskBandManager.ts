import { createLogger, requirePositiveNumber } from "@bandwise/core";
import type { ActivePositionSide, Candle, RiskBand } from "@bandwise/core";
import {
	createRiskBand,
	detectRiskBandExit,
	trailRiskBand,
} from "./riskBand";
import type { RiskBandConfig, RiskBandExit } from "./riskBand";

const logger = createLogger("risk-engine");

export interface RiskBandTrail {
	band: RiskBand;
	changed: boolean;
}

/**
 * Owns the protective levels of at most one open position for one
 * instrument. Not shared between runners.
 */
export class RiskBandManager {
	private current: RiskBand | null = null;

	constructor(
		private readonly config: RiskBandConfig,
		private readonly symbol = ""
	) {
		requirePositiveNumber(config.kStop, "atr.kStop");
		requirePositiveNumber(config.kTarget, "atr.kTarget");
	}

	get band(): RiskBand | null {
		return this.current;
	}

	get isOpen(): boolean {
		return this.current !== null;
	}

	open(
		direction: ActivePositionSide,
		entryPrice: number,
		atr: number,
		timestamp: number
	): RiskBand {
		if (this.current) {
			throw new Error(
				`Risk band already open (${this.current.direction} @ ${this.current.entryPrice})`
			);
		}
		if (!Number.isFinite(atr) || atr < 0) {
			throw new Error(`ATR must be a finite non-negative number, got ${atr}`);
		}
		const band = createRiskBand(direction, entryPrice, atr, this.config, timestamp);
		this.current = band;
		logger.info("risk_band_opened", { symbol: this.symbol, ...band });
		return band;
	}

	/**
	 * Closes the band when the candle touched its stop or target
	 */
	checkExit(candle: Candle): RiskBandExit | null {
		const band = this.requireOpen();
		const exit = detectRiskBandExit(band, candle);
		if (!exit) {
			return null;
		}
		return this.finish({ ...exit, band });
	}

	trail(close: number, atr: number, timestamp: number): RiskBandTrail {
		const band = this.requireOpen();
		const next = trailRiskBand(band, close, atr, this.config, timestamp);
		const changed = next !== band;
		if (changed) {
			this.current = next;
			logger.debug("risk_band_trailed", { symbol: this.symbol, ...next });
		}
		return { band: next, changed };
	}

	/**
	 * Closes the band on an opposing signal at the given price
	 */
	close(exitPrice: number, timestamp: number): RiskBandExit {
		const band = this.requireOpen();
		return this.finish({ reason: "opposing_signal", exitPrice, timestamp, band });
	}

	reset(): void {
		this.current = null;
	}

	private finish(exit: RiskBandExit): RiskBandExit {
		this.current = null;
		logger.info("risk_band_closed", {
			symbol: this.symbol,
			...exit.band,
			exitReason: exit.reason,
			exitPrice: exit.exitPrice,
		});
		return exit;
	}

	private requireOpen(): RiskBand {
		if (!this.current) {
			throw new Error("No open risk band");
		}
		return this.current;
	}
}
