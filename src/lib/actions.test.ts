import { expect, test, vi } from 'vitest'

import { Indicator } from '../indicator.ts'
import { handleMenuAction } from './actions.ts'
import { createAssetStore } from './frames.ts'

import type { AutostartStore, StatusSurface } from '../types.ts'
import type { ActionContext } from './actions.ts'

const COMMAND = '/usr/bin/node cli.ts'

/** In-memory autostart entry. */
class MemoryAutostart implements AutostartStore {
	command: string | undefined = undefined

	async disable(): Promise<void> {
		this.command = undefined
	}

	async enable(command: string): Promise<void> {
		this.command = command
	}

	async isEnabled(): Promise<boolean> {
		return this.command !== undefined
	}
}

/**
 * Build an action context over fakes.
 *
 * @returns Context plus the fakes it wraps.
 */
function setup(): { autostart: MemoryAutostart; context: ActionContext; indicator: Indicator } {
	const surface: StatusSurface = {
		dispose: vi.fn(),
		resume: vi.fn(),
		setLabel: vi.fn(),
		showFrame: vi.fn(),
		suspend: vi.fn(),
	}
	const indicator = new Indicator({
		appearance: { currentTheme: () => 'light', subscribe: () => () => undefined },
		assets: createAssetStore({ light_cat_0: 'c', light_horse_0: 'h' }),
		load: { close: vi.fn(), sample: () => 0 },
		options: { maxRate: 'fps40', runner: 'cat', theme: 'system' },
		surface,
	})
	const autostart = new MemoryAutostart()
	const context: ActionContext = {
		autostart,
		indicator,
		launchCommand: () => COMMAND,
		openProcessManager: vi.fn(),
		shutdown: vi.fn(),
	}
	return { autostart, context, indicator }
}

test('handleMenuAction option actions update the indicator', async () => {
	const { context, indicator } = setup()

	await handleMenuAction({ kind: 'runner', runner: 'horse' }, context)
	await handleMenuAction({ kind: 'theme', theme: 'dark' }, context)
	await handleMenuAction({ kind: 'max-rate', maxRate: 'fps10' }, context)

	expect(indicator.options).toEqual({ maxRate: 'fps10', runner: 'horse', theme: 'dark' })
})

test('handleMenuAction runner action rebuilds the frame set', async () => {
	const { context, indicator } = setup()
	const frames = vi.fn()
	indicator.on('frames', frames)

	await handleMenuAction({ kind: 'runner', runner: 'horse' }, context)

	expect(frames).toHaveBeenCalledWith(['h'])
})

test('handleMenuAction startup toggles against the stored entry', async () => {
	const { autostart, context } = setup()

	await handleMenuAction({ kind: 'startup' }, context)
	expect(autostart.command).toBe(COMMAND)

	await handleMenuAction({ kind: 'startup' }, context)
	expect(autostart.command).toBeUndefined()
})

test('handleMenuAction process manager and exit delegate', async () => {
	const { context } = setup()

	await handleMenuAction({ kind: 'process-manager' }, context)
	await handleMenuAction({ kind: 'exit' }, context)

	expect(context.openProcessManager).toHaveBeenCalledTimes(1)
	expect(context.shutdown).toHaveBeenCalledTimes(1)
})
