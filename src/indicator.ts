/**
 * Load-driven runner indicator.
 *
 * Wires the load sampler, both tickers, frame resolution and the appearance
 * subscription around the current option state.
 *
 * @module
 */
import { EventEmitter } from 'node:events'

import { AnimationDriver } from './lib/animation.ts'
import { resolveFrameSet } from './lib/frames.ts'
import { LoadSampler } from './lib/load.ts'
import { formatLoad, LoadDriver } from './lib/load-driver.ts'

import type {
	AppearanceSource,
	AssetStore,
	Frame,
	LoadSource,
	MaxRate,
	OptionState,
	ResolvedTheme,
	Runner,
	StatusSurface,
	Theme,
} from './types.ts'

const IDLE_LOAD = 0

/** Collaborators and starting state for an {@link Indicator}. */
export interface IndicatorOptions {
	appearance: AppearanceSource
	assets: AssetStore
	/** Raw counter; its warm-up reading is discarded on construction. */
	load: LoadSource
	options: OptionState
	surface: StatusSurface
	/** Starting animation interval, before the first load sample. */
	animationIntervalMs?: number
	/** Load sampling period. */
	loadIntervalMs?: number
}

/** Events emitted by an {@link Indicator}. */
export interface IndicatorEvents {
	close: []
	frames: [frames: readonly Frame[]]
}

/**
 * A status-line runner whose pace follows CPU load.
 *
 * @example
 * ```ts
 * const indicator = new Indicator({
 *   appearance: createOsAppearance(),
 *   assets: loadAssetStore(),
 *   load: createCpuLoadSource(),
 *   options: await settings.load(),
 *   surface: createTerminalSurface(),
 * })
 * indicator.start()
 * ```
 */
export class Indicator extends EventEmitter<IndicatorEvents> {
	private readonly appearance: AppearanceSource
	private readonly assets: AssetStore
	private readonly surface: StatusSurface
	private readonly sampler: LoadSampler
	private readonly animation: AnimationDriver
	private readonly loadDriver: LoadDriver
	private state: OptionState
	private unsubscribe: (() => void) | undefined = undefined
	private closed = false

	constructor(options: IndicatorOptions) {
		super()
		this.appearance = options.appearance
		this.assets = options.assets
		this.surface = options.surface
		this.state = { ...options.options }
		this.sampler = new LoadSampler(options.load)
		this.animation = new AnimationDriver(this.surface, options.animationIntervalMs)
		this.loadDriver = new LoadDriver({
			animation: this.animation,
			interval: options.loadIntervalMs,
			maxRate: () => this.state.maxRate,
			sampler: this.sampler,
			surface: this.surface,
		})
		this.refreshFrames()
	}

	/** Copy of the current option state. */
	get options(): OptionState {
		return { ...this.state }
	}

	/** Current animation interval in milliseconds. */
	get interval(): number {
		return this.animation.interval
	}

	/** Most recent load reading. */
	get load(): number {
		return this.loadDriver.lastLoad
	}

	/** Whether {@link Indicator.close} has run. */
	get isClosed(): boolean {
		return this.closed
	}

	/** Show the first frame and start both tickers and the appearance watch. */
	start(): void {
		if (this.closed) {
			throw new Error('Indicator is closed')
		}
		this.surface.setLabel(formatLoad(IDLE_LOAD))
		this.animation.tick()
		this.animation.start()
		this.loadDriver.start()
		this.unsubscribe ??= this.appearance.subscribe(theme => {
			if (this.state.theme === 'system') {
				this.refreshFrames(() => theme)
			}
		})
	}

	/** Switch runner and rebuild the frame set. */
	setRunner(runner: Runner): void {
		this.state.runner = runner
		this.refreshFrames()
	}

	/** Switch theme and rebuild the frame set. */
	setTheme(theme: Theme): void {
		this.state.theme = theme
		this.refreshFrames()
	}

	/** Switch max-rate tier; applies at the next load sample. */
	setMaxRate(maxRate: MaxRate): void {
		this.state.maxRate = maxRate
	}

	/** Stop everything and release the counter and the surface. Idempotent. */
	close(): void {
		if (this.closed) {
			return
		}
		this.closed = true
		this.animation.stop()
		this.loadDriver.stop()
		this.unsubscribe?.()
		this.unsubscribe = undefined
		this.sampler.close()
		this.surface.dispose()
		this.emit('close')
	}

	private refreshFrames(probe: () => ResolvedTheme = () => this.appearance.currentTheme()): void {
		const frames = resolveFrameSet(this.state.runner, this.state.theme, probe, this.assets)
		this.animation.setFrames(frames)
		this.emit('frames', frames)
	}
}
