/**
 * Frame artwork lookup and frame-set resolution.
 *
 * Artwork lives in `assets/frames.json`, keyed `{theme}_{runner}_{index}`.
 *
 * @module
 */
import { readFileSync } from 'node:fs'

import { frameCount } from './catalog.ts'

import type { AssetStore, Frame, ResolvedTheme, Runner, Theme } from '../types.ts'

const FRAMES_FILE = new URL('../../assets/frames.json', import.meta.url)

/**
 * Build an asset store over a plain key/frame record.
 *
 * @param entries - Frame artwork by key.
 * @returns Store answering case-insensitive lookups.
 */
export function createAssetStore(entries: Readonly<Record<string, unknown>>): AssetStore {
	const frames = new Map<string, Frame>()
	for (const [key, value] of Object.entries(entries)) {
		if (typeof value === 'string') {
			frames.set(key.toLowerCase(), value)
		}
	}
	return {
		get(key: string): Frame | undefined {
			return frames.get(key.toLowerCase())
		},
	}
}

/**
 * Load the bundled frame artwork.
 *
 * @param url - Override location of the JSON asset file.
 * @returns Asset store over the file's entries.
 */
export function loadAssetStore(url: URL = FRAMES_FILE): AssetStore {
	const parsed: unknown = JSON.parse(readFileSync(url, 'utf8'))
	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		throw new Error(`Invalid frame asset file: ${url.pathname}`)
	}
	return createAssetStore(Object.fromEntries(Object.entries(parsed)))
}

/**
 * Replace `system` with the probed OS appearance.
 *
 * @param theme - Selected theme.
 * @param probe - OS appearance probe, only called for `system`.
 * @returns A renderable theme.
 */
export function resolveTheme(theme: Theme, probe: () => ResolvedTheme): ResolvedTheme {
	return theme === 'system' ? probe() : theme
}

/** Asset key of one frame. */
export function frameKey(theme: ResolvedTheme, runner: Runner, index: number): string {
	return `${theme}_${runner}_${index}`.toLowerCase()
}

/**
 * Resolve the ordered frames for a runner in a theme.
 *
 * Missing artwork is skipped rather than substituted, so the result may be
 * shorter than the runner's frame count.
 *
 * @param runner - Selected runner.
 * @param theme - Selected theme (`system` is probed).
 * @param probe - OS appearance probe.
 * @param assets - Artwork lookup.
 * @returns Frames in index order.
 */
export function resolveFrameSet(
	runner: Runner,
	theme: Theme,
	probe: () => ResolvedTheme,
	assets: AssetStore,
): Frame[] {
	const resolved = resolveTheme(theme, probe)
	const frames: Frame[] = []
	for (let index = 0; index < frameCount(runner); index++) {
		const frame = assets.get(frameKey(resolved, runner, index))
		if (frame !== undefined) {
			frames.push(frame)
		}
	}
	return frames
}
