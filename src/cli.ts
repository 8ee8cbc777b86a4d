#!/usr/bin/env tsx

import { readFile } from 'node:fs/promises'

import mri from 'mri'

import { Indicator } from './indicator.ts'
import { handleMenuAction } from './lib/actions.ts'
import { createOsAppearance } from './lib/appearance.ts'
import { createAutostart, resolveLaunchCommand } from './lib/autostart.ts'
import { keysOf, MAX_RATES, nextValue, RUNNERS, THEMES } from './lib/catalog.ts'
import { applyFlags } from './lib/flags.ts'
import { loadAssetStore } from './lib/frames.ts'
import { acquireInstanceLock } from './lib/instance.ts'
import { createKeyBindings } from './lib/keys.ts'
import { createLifecycle } from './lib/lifecycle.ts'
import { createCpuLoadSource } from './lib/load.ts'
import { bold, dim, logError, write, writeBlock } from './lib/log.ts'
import { openMenu } from './lib/menu.ts'
import { openProcessManager } from './lib/process-manager.ts'
import { createFileSettingsStore } from './lib/settings.ts'
import { startupStep } from './lib/startup.ts'
import { createTerminalSurface } from './lib/surface.ts'

import type { OptionFlags } from './lib/flags.ts'
import type { KeyCommand } from './lib/keys.ts'
import type { MenuAction } from './types.ts'

const ARGV_OFFSET = 2
const EXIT_SUCCESS = 0
const EXIT_FAILURE = 1

const argv = mri<OptionFlags & { help?: boolean; version?: boolean }>(process.argv.slice(ARGV_OFFSET), {
	alias: { h: 'help', v: 'version' },
	boolean: ['help', 'version'],
	string: ['fps', 'runner', 'theme'],
})

/**
 * Read the package version.
 *
 * @returns Version string from package.json.
 */
async function readVersion(): Promise<string> {
	const raw = await readFile(new URL('../package.json', import.meta.url), 'utf8')
	const pkg: { version?: unknown } = JSON.parse(raw)
	return typeof pkg.version === 'string' ? pkg.version : '0.0.0'
}

if (argv.help) {
	writeBlock([
		`${bold('cpurun')} — a terminal runner that speeds up with CPU load`,
		'',
		`${bold('Usage:')}`,
		`  cpurun ${dim('[options]')}`,
		'',
		`${bold('Options:')}`,
		`  ${dim('--runner <name>')}  ${keysOf(RUNNERS).join(', ')}`,
		`  ${dim('--theme <name>')}   ${keysOf(THEMES).join(', ')}`,
		`  ${dim('--fps <limit>')}    ${keysOf(MAX_RATES).join(', ')}`,
		`  ${dim('-h, --help')}       Show this help`,
		`  ${dim('-v, --version')}    Show version`,
		'',
		`${bold('Keys:')}`,
		`  ${dim('m')} menu  ${dim('r')} runner  ${dim('t')} theme  ${dim('f')} fps limit  ${dim('s')} startup  ${dim('q')} quit`,
		`  ${dim('enter enter')} open the process manager`,
	])
	process.exit(EXIT_SUCCESS)
}

const version = await readVersion()

if (argv.version) {
	write(version)
	process.exit(EXIT_SUCCESS)
}

const settings = createFileSettingsStore()
const options = applyFlags(await startupStep(() => settings.load()), argv)

if (typeof options === 'string') {
	logError(options)
	write(dim('Run cpurun --help for usage.'))
	process.exit(EXIT_FAILURE)
}

const lock = await startupStep(() => acquireInstanceLock())
const surface = createTerminalSurface()

const indicator = await startupStep(
	() =>
		new Indicator({
			appearance: createOsAppearance(),
			assets: loadAssetStore(),
			load: createCpuLoadSource(),
			options,
			surface,
		}),
	{ cleanup: () => lock.release() },
)

const autostart = createAutostart()

const lifecycle = createLifecycle(async () => {
	keys.detach()
	indicator.close()
	try {
		await settings.save(indicator.options)
	} finally {
		await lock.release()
	}
})

/**
 * Apply an action, reporting failures without stopping the indicator.
 *
 * @param action - Selected action.
 * @returns Resolves once applied.
 */
async function dispatch(action: MenuAction): Promise<void> {
	try {
		await handleMenuAction(action, {
			autostart,
			indicator,
			launchCommand: resolveLaunchCommand,
			openProcessManager,
			shutdown: lifecycle.shutdown,
		})
	} catch (error) {
		logError(error instanceof Error ? error.message : String(error))
	}
}

/**
 * Suspend drawing, show the menu, then apply the selection.
 *
 * @returns Resolves once the menu is closed.
 */
async function showMenu(): Promise<void> {
	keys.detach()
	surface.suspend()
	const action = await openMenu(indicator.options, await autostart.isEnabled(), `cpurun v${version}`)
	if (lifecycle.done()) {
		return
	}
	surface.resume()
	keys.attach()
	if (action) {
		await dispatch(action)
	}
}

/**
 * Translate a key command into an action.
 *
 * @param command - Bound key command.
 * @returns Resolves once handled.
 */
async function onKey(command: KeyCommand): Promise<void> {
	const current = indicator.options
	switch (command) {
		case 'menu': {
			await showMenu()
			return
		}
		case 'cycle-runner': {
			await dispatch({ kind: 'runner', runner: nextValue(RUNNERS, current.runner) })
			return
		}
		case 'cycle-theme': {
			await dispatch({ kind: 'theme', theme: nextValue(THEMES, current.theme) })
			return
		}
		case 'cycle-max-rate': {
			await dispatch({ kind: 'max-rate', maxRate: nextValue(MAX_RATES, current.maxRate) })
			return
		}
		case 'startup': {
			await dispatch({ kind: 'startup' })
			return
		}
		case 'activate': {
			await dispatch({ kind: 'process-manager' })
			return
		}
		case 'exit': {
			await dispatch({ kind: 'exit' })
			return
		}
	}
}

const keys = createKeyBindings(command => {
	onKey(command).catch((error: unknown) => {
		logError(error instanceof Error ? error.message : String(error))
		lifecycle.shutdown()
	})
})

indicator.start()
keys.attach()
