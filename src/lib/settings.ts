/**
 * Persisted option state in `settings.json`.
 *
 * Values are stored under their stable keys (`Runner`, `Theme`,
 * `FPSMaxLimit`); each key falls back to its default on its own when missing
 * or unreadable.
 *
 * @module
 */
import { DEFAULT_OPTIONS, MAX_RATES, parseKey, RUNNERS, THEMES, toKey } from './catalog.ts'
import { readJsonFile, writeJsonFile } from './config.ts'

import type { OptionState, SettingsFile, SettingsStore } from '../types.ts'

const SETTINGS_FILE = 'settings.json'

/**
 * Decode a parsed settings file.
 *
 * @param value - Parsed JSON, or anything else found on disk.
 * @returns Option state with per-key defaults applied.
 */
export function decodeSettings(value: unknown): OptionState {
	const file: SettingsFile =
		typeof value === 'object' && value !== null ? Object.fromEntries(Object.entries(value)) : {}
	return {
		maxRate: parseKey(MAX_RATES, file.FPSMaxLimit) ?? DEFAULT_OPTIONS.maxRate,
		runner: parseKey(RUNNERS, file.Runner) ?? DEFAULT_OPTIONS.runner,
		theme: parseKey(THEMES, file.Theme) ?? DEFAULT_OPTIONS.theme,
	}
}

/**
 * Encode option state for disk.
 *
 * @param state - Options to persist.
 * @returns Flat key/value settings object.
 */
export function encodeSettings(state: OptionState): Record<'FPSMaxLimit' | 'Runner' | 'Theme', string> {
	return {
		FPSMaxLimit: toKey(MAX_RATES, state.maxRate),
		Runner: toKey(RUNNERS, state.runner),
		Theme: toKey(THEMES, state.theme),
	}
}

/**
 * Create the settings store backed by the config directory.
 *
 * @returns Settings store.
 */
export function createFileSettingsStore(): SettingsStore {
	return {
		async load(): Promise<OptionState> {
			try {
				return decodeSettings(await readJsonFile(SETTINGS_FILE))
			} catch (error) {
				if (error instanceof SyntaxError) {
					return { ...DEFAULT_OPTIONS }
				}
				throw error
			}
		},
		async save(state: OptionState): Promise<void> {
			await writeJsonFile(SETTINGS_FILE, encodeSettings(state))
		},
	}
}
