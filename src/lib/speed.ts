/**
 * Load-to-pace mapping for the runner animation.
 *
 * @module
 */
import { multiplier } from './catalog.ts'

import type { MaxRate } from '../types.ts'

/** Interval at zero load (2 fps). */
export const SLOWEST_INTERVAL_MS = 500

/** Lower bound on the tick interval. Built-in tiers bottom out at 25 ms. */
export const MIN_INTERVAL_MS = 16

const LOAD_PER_RATE_STEP = 5
const MIN_RATE = 1

/**
 * Map a load reading to the animation tick interval.
 *
 * The frame rate grows linearly with load, scaled by the tier multiplier, and
 * never drops below 1 frame per {@link SLOWEST_INTERVAL_MS}.
 *
 * @param load - CPU load in percent (0-100).
 * @param maxRate - Selected ceiling tier.
 * @returns Milliseconds between frames.
 */
export function intervalMs(load: number, maxRate: MaxRate): number {
	const rate = Math.max(MIN_RATE, (load / LOAD_PER_RATE_STEP) * multiplier(maxRate))
	return Math.max(MIN_INTERVAL_MS, Math.round(SLOWEST_INTERVAL_MS / rate))
}
