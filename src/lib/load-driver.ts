/**
 * Periodic load sampling that re-paces the animation.
 *
 * @module
 */
import { intervalMs } from './speed.ts'

import type { MaxRate, StatusSurface } from '../types.ts'
import type { AnimationDriver } from './animation.ts'
import type { LoadSampler } from './load.ts'

/** Period between load samples. */
export const LOAD_INTERVAL_MS = 5000

const LABEL_DECIMALS = 1

/**
 * Format a load reading for the status label.
 *
 * @param load - Load in percent.
 * @returns Label such as `CPU: 12.5%`.
 */
export function formatLoad(load: number): string {
	return `CPU: ${load.toFixed(LABEL_DECIMALS)}%`
}

type LoadDriverOptions = Readonly<{
	animation: AnimationDriver
	/** Read at every tick so tier changes apply on the next sample. */
	maxRate: () => MaxRate
	sampler: LoadSampler
	surface: StatusSurface
	interval?: number
}>

/** Samples load on a slow timer and retunes the animation from it. */
export class LoadDriver {
	private readonly options: LoadDriverOptions
	private timer: ReturnType<typeof globalThis.setInterval> | undefined = undefined
	private latest = 0

	constructor(options: LoadDriverOptions) {
		this.options = options
	}

	/** Most recent load reading, 0 before the first tick. */
	get lastLoad(): number {
		return this.latest
	}

	/** Whether the sampler timer is running. */
	get running(): boolean {
		return this.timer !== undefined
	}

	/** Begin sampling. No-op when already running. */
	start(): void {
		if (this.timer) {
			return
		}
		this.timer = globalThis.setInterval(() => this.tick(), this.options.interval ?? LOAD_INTERVAL_MS)
	}

	/** Halt sampling. */
	stop(): void {
		if (this.timer) {
			globalThis.clearInterval(this.timer)
			this.timer = undefined
		}
	}

	/** Sample once, update the label and retune the animation. */
	tick(): void {
		const { animation, maxRate, sampler, surface } = this.options
		this.latest = sampler.sample()
		surface.setLabel(formatLoad(this.latest))
		animation.retune(intervalMs(this.latest, maxRate()))
	}
}
