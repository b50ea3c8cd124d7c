/**
 * Percentile tick schedule — where the next checkpoint falls.
 *
 * The 0-100 range is walked in halvings of the remaining distance to 100%
 * (0→50, 50→75, 75→87.5, ...). Each halving is cut into
 * `ticksPerHalfDistance` equal steps, so every scale gets the same number of
 * rows in a percentile distribution.
 */

import { ConfigError } from "../shared/errors.js";
import type { TickStrategy, TraversalState } from "./types.js";

/**
 * Largest double below 100. Formula-driven targets saturate here; a target at
 * this cap is only met by the bucket that completes the recorded count.
 */
export const LAST_TARGET_BELOW_100 = 100 - 2 ** -46;

/**
 * Number of equal ticks the whole 0-100 range is divided into at the scale of
 * `percentileLevel`. Evaluation order is fixed: ln(x)/ln(2), truncated, then
 * an integer power of two. Changing it shifts checkpoint boundaries.
 */
export function percentileReportingTicks(
	ticksPerHalfDistance: number,
	percentileLevel: number,
): number {
	const halvings = Math.trunc(Math.log(100.0 / (100.0 - percentileLevel)) / Math.log(2));
	return ticksPerHalfDistance * 2 ** (halvings + 1);
}

/** Throws ConfigError unless `ticksPerHalfDistance` is a positive safe integer. */
export function assertTicksPerHalfDistance(ticksPerHalfDistance: number): void {
	if (!Number.isSafeInteger(ticksPerHalfDistance) || ticksPerHalfDistance <= 0) {
		throw new ConfigError(
			`ticksPerHalfDistance must be a positive integer, got ${ticksPerHalfDistance}`,
			{ ticksPerHalfDistance },
		);
	}
}

export class PercentileTickScheduler implements TickStrategy {
	private ticks: number;
	private target = 0.0;
	private previousTarget = 0.0;
	private terminal = false;

	constructor(ticksPerHalfDistance: number) {
		assertTicksPerHalfDistance(ticksPerHalfDistance);
		this.ticks = ticksPerHalfDistance;
	}

	get ticksPerHalfDistance(): number {
		return this.ticks;
	}

	get targetPercentile(): number {
		return this.target;
	}

	get previousTargetPercentile(): number {
		return this.previousTarget;
	}

	get terminalStepEmitted(): boolean {
		return this.terminal;
	}

	/** Back to the initial schedule, optionally with a new tick density. */
	reset(ticksPerHalfDistance: number = this.ticks): void {
		assertTicksPerHalfDistance(ticksPerHalfDistance);
		this.ticks = ticksPerHalfDistance;
		this.target = 0.0;
		this.previousTarget = 0.0;
		this.terminal = false;
	}

	/** Pin the target to exactly 100% for the one extra closing step. */
	markTerminalStep(): void {
		this.target = 100.0;
		this.terminal = true;
	}

	shouldEmit(state: TraversalState): boolean {
		if (state.countAtCurrentBucket === 0) return false;
		if (this.target >= LAST_TARGET_BELOW_100) {
			return state.cumulativeCountThroughCurrentBucket === state.totalRecordedCount;
		}
		const currentPercentile =
			(100.0 * state.cumulativeCountThroughCurrentBucket) / state.totalRecordedCount;
		return currentPercentile >= this.target;
	}

	advanceTarget(): void {
		this.previousTarget = this.target;
		if (this.terminal) return;

		const next = this.target + 100.0 / percentileReportingTicks(this.ticks, this.target);
		// A step below the spacing of doubles near 100 no longer moves the target.
		this.target =
			next > this.target && next < LAST_TARGET_BELOW_100 ? next : LAST_TARGET_BELOW_100;
	}

	// ── TickStrategy ─────────────────────────────────────────────────

	reachedIterationLevel(state: TraversalState): boolean {
		return this.shouldEmit(state);
	}

	incrementIterationLevel(): void {
		this.advanceTarget();
	}

	percentileIteratedTo(): number {
		return this.target;
	}

	percentileIteratedFrom(): number {
		return this.previousTarget;
	}
}
