/**
 * Enumeration tables for runners, themes and max-rate tiers.
 *
 * Each variant maps to a stable persisted key and, separately, to a display
 * label, so relabelling a menu entry never breaks a saved settings file.
 *
 * @module
 */
import type { MaxRate, OptionState, Runner, Theme } from '../types.ts'

type Entry<T extends string> = Readonly<{
	key: string
	label: string
	value: T
}>

type RunnerEntry = Entry<Runner> & Readonly<{ frameCount: number }>

type MaxRateEntry = Entry<MaxRate> & Readonly<{ multiplier: number }>

export const RUNNERS: readonly RunnerEntry[] = [
	{ frameCount: 5, key: 'Cat', label: 'Cat', value: 'cat' },
	{ frameCount: 10, key: 'Parrot', label: 'Parrot', value: 'parrot' },
	{ frameCount: 14, key: 'Horse', label: 'Horse', value: 'horse' },
]

export const THEMES: readonly Entry<Theme>[] = [
	{ key: 'System', label: 'System', value: 'system' },
	{ key: 'Light', label: 'Light', value: 'light' },
	{ key: 'Dark', label: 'Dark', value: 'dark' },
]

export const MAX_RATES: readonly MaxRateEntry[] = [
	{ key: 'FPS40', label: '40 fps', multiplier: 1, value: 'fps40' },
	{ key: 'FPS30', label: '30 fps', multiplier: 0.75, value: 'fps30' },
	{ key: 'FPS20', label: '20 fps', multiplier: 0.5, value: 'fps20' },
	{ key: 'FPS10', label: '10 fps', multiplier: 0.25, value: 'fps10' },
]

export const DEFAULT_OPTIONS: Readonly<OptionState> = {
	maxRate: 'fps40',
	runner: 'cat',
	theme: 'system',
}

const NEXT_STEP = 1

/**
 * Find the table entry for a variant.
 *
 * @param table - Enumeration table.
 * @param value - Variant to look up.
 * @returns Matching entry.
 */
function entryFor<T extends string, E extends Entry<T>>(table: readonly E[], value: T): E {
	const entry = table.find(item => item.value === value)
	if (!entry) {
		throw new Error(`Unknown variant: ${value}`)
	}
	return entry
}

/**
 * Parse a stable key (case-insensitive) into its variant.
 *
 * @param table - Enumeration table.
 * @param key - Candidate key, usually from disk or the command line.
 * @returns Variant, or `undefined` when the key is unknown or not a string.
 */
export function parseKey<T extends string>(table: readonly Entry<T>[], key: unknown): T | undefined {
	if (typeof key !== 'string') {
		return undefined
	}
	const normalized = key.trim().toLowerCase()
	return table.find(item => item.key.toLowerCase() === normalized)?.value
}

/**
 * Serialize a variant to its stable key.
 *
 * @param table - Enumeration table.
 * @param value - Variant to serialize.
 * @returns Stable persisted key.
 */
export function toKey<T extends string>(table: readonly Entry<T>[], value: T): string {
	return entryFor(table, value).key
}

/**
 * Display label for a variant.
 *
 * @param table - Enumeration table.
 * @param value - Variant to describe.
 * @returns Human-readable label.
 */
export function toLabel<T extends string>(table: readonly Entry<T>[], value: T): string {
	return entryFor(table, value).label
}

/**
 * Step to the variant after `value`, wrapping at the end of the table.
 *
 * @param table - Enumeration table.
 * @param value - Current variant.
 * @returns Following variant.
 */
export function nextValue<T extends string>(table: readonly Entry<T>[], value: T): T {
	const index = table.findIndex(item => item.value === value)
	const next = table[(index + NEXT_STEP) % table.length]
	return next ? next.value : value
}

/** Number of frames in a full cycle of `runner`. */
export function frameCount(runner: Runner): number {
	return entryFor(RUNNERS, runner).frameCount
}

/** Speed multiplier of a max-rate tier. */
export function multiplier(maxRate: MaxRate): number {
	return entryFor(MAX_RATES, maxRate).multiplier
}

/** All stable keys of a table, for usage text. */
export function keysOf<T extends string>(table: readonly Entry<T>[]): string[] {
	return table.map(item => item.key)
}
