/**
 * Frame ticker for the runner animation.
 *
 * Owns a single interval timer and a cyclic frame cursor. Retuning swaps the
 * pace without touching the cursor.
 *
 * @module
 */
import type { Frame, StatusSurface } from '../types.ts'

/** Pace used until the first load reading arrives. */
export const DEFAULT_ANIMATION_INTERVAL_MS = 200

const FIRST_FRAME = 0
const NEXT_FRAME_STEP = 1

/** Drives a frame set onto a status surface at a retunable pace. */
export class AnimationDriver {
	private readonly surface: StatusSurface
	private frames: readonly Frame[] = []
	private timer: ReturnType<typeof globalThis.setInterval> | undefined = undefined
	private currentInterval: number
	private frameCursor = FIRST_FRAME

	/**
	 * @param surface - Where frames are pushed.
	 * @param interval - Starting tick interval in milliseconds.
	 */
	constructor(surface: StatusSurface, interval: number = DEFAULT_ANIMATION_INTERVAL_MS) {
		this.surface = surface
		this.currentInterval = interval
	}

	/** Index of the next frame to show. */
	get cursor(): number {
		return this.frameCursor
	}

	/** Current tick interval in milliseconds. */
	get interval(): number {
		return this.currentInterval
	}

	/** Whether the ticker is running. */
	get running(): boolean {
		return this.timer !== undefined
	}

	/**
	 * Replace the active frame set.
	 *
	 * A cursor beyond the new length is reset on the next tick.
	 *
	 * @param frames - Resolved frames in display order.
	 */
	setFrames(frames: readonly Frame[]): void {
		this.frames = frames
	}

	/** Begin ticking at the current interval. No-op when already running. */
	start(): void {
		if (this.timer) {
			return
		}
		this.timer = globalThis.setInterval(() => this.tick(), this.currentInterval)
	}

	/** Halt ticking. */
	stop(): void {
		if (this.timer) {
			globalThis.clearInterval(this.timer)
			this.timer = undefined
		}
	}

	/**
	 * Change the pace: stop, set the interval, restart if it was running.
	 *
	 * @param interval - New tick interval in milliseconds.
	 */
	retune(interval: number): void {
		const wasRunning = this.running
		this.stop()
		this.currentInterval = interval
		if (wasRunning) {
			this.start()
		}
	}

	/** Push the frame under the cursor and advance it. */
	tick(): void {
		const count = this.frames.length
		if (count === 0) {
			return
		}
		if (this.frameCursor >= count) {
			this.frameCursor = FIRST_FRAME
		}
		const frame = this.frames[this.frameCursor]
		if (frame !== undefined) {
			this.surface.showFrame(frame)
		}
		this.frameCursor = (this.frameCursor + NEXT_FRAME_STEP) % count
	}
}
