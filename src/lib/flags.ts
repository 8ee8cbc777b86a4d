/**
 * Command-line option overrides.
 *
 * @module
 */
import { keysOf, MAX_RATES, parseKey, RUNNERS, THEMES } from './catalog.ts'

import type { OptionState } from '../types.ts'

/** Option flags as parsed by mri; unset flags are absent. */
export type OptionFlags = Readonly<{
	fps?: unknown
	runner?: unknown
	theme?: unknown
}>

/**
 * Apply command-line overrides on top of the saved options.
 *
 * @param saved - Options loaded from disk.
 * @param flags - Parsed command-line flags.
 * @returns Merged options, or an error message for an invalid flag.
 */
export function applyFlags(saved: OptionState, flags: OptionFlags): OptionState | string {
	const next = { ...saved }
	if (flags.runner !== undefined) {
		const runner = parseKey(RUNNERS, flags.runner)
		if (!runner) {
			return `Unknown runner: ${String(flags.runner)} (expected ${keysOf(RUNNERS).join(', ')})`
		}
		next.runner = runner
	}
	if (flags.theme !== undefined) {
		const theme = parseKey(THEMES, flags.theme)
		if (!theme) {
			return `Unknown theme: ${String(flags.theme)} (expected ${keysOf(THEMES).join(', ')})`
		}
		next.theme = theme
	}
	if (flags.fps !== undefined) {
		const maxRate = parseKey(MAX_RATES, flags.fps)
		if (!maxRate) {
			return `Unknown fps limit: ${String(flags.fps)} (expected ${keysOf(MAX_RATES).join(', ')})`
		}
		next.maxRate = maxRate
	}
	return next
}
