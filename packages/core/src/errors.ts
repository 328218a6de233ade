import type { TimeframeUnit } from "./types";

/**
 * Raised when a calendar period has no fixed length in milliseconds
 * (months and years). Callers must not substitute an approximation.
 */
export class UnsupportedPeriodError extends Error {
	readonly unit: TimeframeUnit;

	constructor(unit: TimeframeUnit) {
		super(`Period "${unit}" has no fixed duration in milliseconds`);
		this.name = "UnsupportedPeriodError";
		this.unit = unit;
	}
}
