import { afterEach, beforeEach, expect, test, vi } from 'vitest'

import { AnimationDriver, DEFAULT_ANIMATION_INTERVAL_MS } from './animation.ts'

import type { Frame, StatusSurface } from '../types.ts'

/**
 * Surface that records every frame pushed to it.
 *
 * @returns Surface and its frame log.
 */
function recordingSurface(): { frames: Frame[]; surface: StatusSurface } {
	const frames: Frame[] = []
	return {
		frames,
		surface: {
			dispose: vi.fn(),
			resume: vi.fn(),
			setLabel: vi.fn(),
			showFrame: (frame: Frame) => {
				frames.push(frame)
			},
			suspend: vi.fn(),
		},
	}
}

beforeEach(() => {
	vi.useFakeTimers()
})

afterEach(() => {
	vi.useRealTimers()
})

test('AnimationDriver cycles through frames at the default pace', () => {
	const { frames, surface } = recordingSurface()
	const driver = new AnimationDriver(surface)
	driver.setFrames(['a', 'b', 'c'])
	driver.start()

	vi.advanceTimersByTime(DEFAULT_ANIMATION_INTERVAL_MS * 4)

	expect(frames).toEqual(['a', 'b', 'c', 'a'])
	expect(driver.cursor).toBe(1)
})

test('AnimationDriver start is idempotent', () => {
	const { frames, surface } = recordingSurface()
	const driver = new AnimationDriver(surface, 100)
	driver.setFrames(['a', 'b'])
	driver.start()
	driver.start()

	vi.advanceTimersByTime(100)

	expect(frames).toEqual(['a'])
	expect(vi.getTimerCount()).toBe(1)
})

test('AnimationDriver retune changes pace without resetting the cursor', () => {
	const { frames, surface } = recordingSurface()
	const driver = new AnimationDriver(surface, 100)
	driver.setFrames(['a', 'b', 'c', 'd'])
	driver.start()
	vi.advanceTimersByTime(200)

	driver.retune(25)
	expect(driver.interval).toBe(25)
	expect(driver.cursor).toBe(2)
	expect(vi.getTimerCount()).toBe(1)

	vi.advanceTimersByTime(50)
	expect(frames).toEqual(['a', 'b', 'c', 'd'])
})

test('AnimationDriver retune on a stopped driver leaves it stopped', () => {
	const { surface } = recordingSurface()
	const driver = new AnimationDriver(surface)
	driver.retune(40)

	expect(driver.running).toBe(false)
	expect(driver.interval).toBe(40)
	expect(vi.getTimerCount()).toBe(0)
})

test('AnimationDriver stop halts ticking', () => {
	const { frames, surface } = recordingSurface()
	const driver = new AnimationDriver(surface, 100)
	driver.setFrames(['a'])
	driver.start()
	driver.stop()

	vi.advanceTimersByTime(500)

	expect(frames).toEqual([])
	expect(driver.running).toBe(false)
})

test('AnimationDriver empty frame set is a no-op', () => {
	const { frames, surface } = recordingSurface()
	const driver = new AnimationDriver(surface)
	driver.tick()

	expect(frames).toEqual([])
	expect(driver.cursor).toBe(0)
})

test('AnimationDriver stale cursor resets after a shorter rebuild', () => {
	const { frames, surface } = recordingSurface()
	const driver = new AnimationDriver(surface)
	driver.setFrames(['a', 'b', 'c', 'd', 'e'])
	for (let i = 0; i < 4; i++) {
		driver.tick()
	}
	expect(driver.cursor).toBe(4)

	driver.setFrames(['x', 'y'])
	driver.tick()

	expect(frames.at(-1)).toBe('x')
	expect(driver.cursor).toBe(1)
})

test('AnimationDriver cursor stays in range for any prior position', () => {
	const { surface } = recordingSurface()
	for (let length = 1; length <= 6; length++) {
		for (let prior = 0; prior < 8; prior++) {
			const driver = new AnimationDriver(surface)
			driver.setFrames(Array.from({ length: 8 }, (_, i) => `f${i}`))
			for (let i = 0; i < prior; i++) {
				driver.tick()
			}
			driver.setFrames(Array.from({ length }, (_, i) => `g${i}`))
			driver.tick()
			expect(driver.cursor).toBeGreaterThanOrEqual(0)
			expect(driver.cursor).toBeLessThan(length)
		}
	}
})
