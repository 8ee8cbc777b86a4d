/**
 * Interactive options menu.
 *
 * Mirrors a tray context menu: runner, theme and max-rate submenus, a startup
 * toggle, the version line and exit.
 *
 * @module
 */
import { select, Separator } from '@inquirer/prompts'

import { MAX_RATES, RUNNERS, THEMES, toLabel } from './catalog.ts'

import type { MaxRate, MenuAction, OptionState, Runner, Theme } from '../types.ts'

const CHECKED = '●'
const UNCHECKED = '○'
const EXIT_PROMPT_ERROR = 'ExitPromptError'

/** Top-level menu entries. */
export type MainEntry = 'exit' | 'max-rate' | 'process-manager' | 'runner' | 'startup' | 'theme' | 'version'

/** One selectable line, or a separator. */
export type MenuEntry<V> = Readonly<{ disabled?: boolean; name: string; value: V }> | 'separator'

/**
 * Prefix a label with its checked state.
 *
 * @param label - Entry label.
 * @param checked - Whether the entry is the current selection.
 * @returns Marked label.
 */
function mark(label: string, checked: boolean): string {
	return `${checked ? CHECKED : UNCHECKED} ${label}`
}

/**
 * Build the top-level menu entries.
 *
 * @param state - Current options, shown next to each submenu.
 * @param startupEnabled - Autostart state, queried when the menu opens.
 * @param version - Display version line.
 * @returns Menu entries in display order.
 */
export function buildMainEntries(state: OptionState, startupEnabled: boolean, version: string): MenuEntry<MainEntry>[] {
	return [
		{ name: `Runner: ${toLabel(RUNNERS, state.runner)}`, value: 'runner' },
		{ name: `Theme: ${toLabel(THEMES, state.theme)}`, value: 'theme' },
		{ name: `FPS Max Limit: ${toLabel(MAX_RATES, state.maxRate)}`, value: 'max-rate' },
		{ name: mark('Startup', startupEnabled), value: 'startup' },
		{ name: 'Process manager', value: 'process-manager' },
		'separator',
		{ disabled: true, name: version, value: 'version' },
		{ name: 'Exit', value: 'exit' },
	]
}

/**
 * Build submenu entries for an enumeration.
 *
 * @param table - Enumeration table.
 * @param current - Currently selected variant.
 * @returns One entry per variant, the current one checked.
 */
export function buildOptionEntries<T extends string>(
	table: readonly Readonly<{ label: string; value: T }>[],
	current: T,
): MenuEntry<T>[] {
	return table.map(item => ({ name: mark(item.label, item.value === current), value: item.value }))
}

/**
 * Convert entries to inquirer choices.
 *
 * @param entries - Menu entries.
 * @returns Choices for `select`.
 */
function toChoices<V>(entries: MenuEntry<V>[]): (Separator | { disabled?: boolean; name: string; value: V })[] {
	return entries.map(entry => (entry === 'separator' ? new Separator() : { ...entry }))
}

/**
 * Prompt for one value on stderr, removing the prompt afterwards.
 *
 * @param message - Prompt title.
 * @param entries - Menu entries.
 * @param current - Initially highlighted value.
 * @returns Selected value.
 */
async function choose<V>(message: string, entries: MenuEntry<V>[], current?: V): Promise<V> {
	return await select<V>(
		{ choices: toChoices(entries), default: current, loop: false, message },
		{ clearPromptOnDone: true, output: process.stderr },
	)
}

/**
 * Map a top-level choice to an action, opening submenus as needed.
 *
 * @param entry - Selected top-level entry.
 * @param state - Current options.
 * @returns Action, or `undefined` for non-actionable entries.
 */
async function toAction(entry: MainEntry, state: OptionState): Promise<MenuAction | undefined> {
	switch (entry) {
		case 'runner': {
			const runner = await choose<Runner>('Runner', buildOptionEntries(RUNNERS, state.runner), state.runner)
			return { kind: 'runner', runner }
		}
		case 'theme': {
			const theme = await choose<Theme>('Theme', buildOptionEntries(THEMES, state.theme), state.theme)
			return { kind: 'theme', theme }
		}
		case 'max-rate': {
			const maxRate = await choose<MaxRate>(
				'FPS Max Limit',
				buildOptionEntries(MAX_RATES, state.maxRate),
				state.maxRate,
			)
			return { kind: 'max-rate', maxRate }
		}
		case 'startup':
		case 'process-manager':
		case 'exit': {
			return { kind: entry }
		}
		case 'version': {
			return undefined
		}
	}
}

/**
 * Open the menu and wait for a selection.
 *
 * @param state - Current options.
 * @param startupEnabled - Autostart state, queried by the caller just now.
 * @param version - Display version line.
 * @returns Selected action, or `undefined` when dismissed with Ctrl+C.
 */
export async function openMenu(
	state: OptionState,
	startupEnabled: boolean,
	version: string,
): Promise<MenuAction | undefined> {
	try {
		const entry = await choose<MainEntry>('cpurun', buildMainEntries(state, startupEnabled, version))
		return await toAction(entry, state)
	} catch (error) {
		if (error instanceof Error && error.name === EXIT_PROMPT_ERROR) {
			return undefined
		}
		throw error
	}
}
