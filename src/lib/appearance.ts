/**
 * OS light/dark appearance probing.
 *
 * Queries the platform's appearance setting through its own CLI tool and
 * polls for changes. Any probe failure reads as light.
 *
 * @module
 */
import { spawnSync } from 'node:child_process'

import type { AppearanceListener, AppearanceSource, ResolvedTheme } from '../types.ts'

/** How often the OS appearance is re-checked for changes. */
export const APPEARANCE_POLL_MS = 10_000

const APPEARANCE_ENV = 'CPURUN_APPEARANCE'
const EXIT_SUCCESS = 0
const PROBE_TIMEOUT_MS = 1000
const REGISTRY_DARK = /SystemUsesLightTheme\s+REG_DWORD\s+0x0+\b/i

type ProbeCommand = Readonly<{
	args: readonly string[]
	command: string
	parse: (stdout: string) => ResolvedTheme
}>

/** Runs a probe command, returning stdout or `undefined` on failure. */
export type CommandRunner = (command: string, args: readonly string[]) => string | undefined

/**
 * Parse `gsettings get org.gnome.desktop.interface color-scheme` output.
 *
 * @param stdout - Command output, e.g. `'prefer-dark'`.
 * @returns Appearance it describes.
 */
export function parseGnomeColorScheme(stdout: string): ResolvedTheme {
	return stdout.includes('prefer-dark') ? 'dark' : 'light'
}

/**
 * Parse `defaults read -g AppleInterfaceStyle` output.
 *
 * @param stdout - Command output; `Dark` when dark mode is on.
 * @returns Appearance it describes.
 */
export function parseAppleInterfaceStyle(stdout: string): ResolvedTheme {
	return stdout.trim().toLowerCase() === 'dark' ? 'dark' : 'light'
}

/**
 * Parse `reg query ... /v SystemUsesLightTheme` output.
 *
 * @param stdout - Command output containing the DWORD value.
 * @returns Appearance it describes.
 */
export function parseWindowsPersonalize(stdout: string): ResolvedTheme {
	return REGISTRY_DARK.test(stdout) ? 'dark' : 'light'
}

/**
 * Resolve the probe command for a platform.
 *
 * @param platform - Node platform identifier.
 * @returns Command and parser for that platform's appearance setting.
 */
export function getProbeCommand(platform: NodeJS.Platform): ProbeCommand {
	if (platform === 'darwin') {
		return {
			args: ['read', '-g', 'AppleInterfaceStyle'],
			command: 'defaults',
			parse: parseAppleInterfaceStyle,
		}
	}
	if (platform === 'win32') {
		return {
			args: [
				'query',
				'HKCU\\Software\\Microsoft\\Windows\\CurrentVersion\\Themes\\Personalize',
				'/v',
				'SystemUsesLightTheme',
			],
			command: 'reg',
			parse: parseWindowsPersonalize,
		}
	}
	return {
		args: ['get', 'org.gnome.desktop.interface', 'color-scheme'],
		command: 'gsettings',
		parse: parseGnomeColorScheme,
	}
}

/**
 * Run a command synchronously and capture stdout.
 *
 * @param command - Executable name.
 * @param args - Arguments.
 * @returns Stdout on a zero exit, otherwise `undefined`.
 */
export function runCommand(command: string, args: readonly string[]): string | undefined {
	const result = spawnSync(command, args, {
		encoding: 'utf8',
		stdio: ['ignore', 'pipe', 'ignore'],
		timeout: PROBE_TIMEOUT_MS,
	})
	if (result.error || result.status !== EXIT_SUCCESS) {
		return undefined
	}
	return result.stdout
}

/**
 * Read a forced appearance from the environment.
 *
 * @param env - Environment to read.
 * @returns Forced appearance, or `undefined` when unset or invalid.
 */
function appearanceOverride(env: NodeJS.ProcessEnv): ResolvedTheme | undefined {
	const value = env[APPEARANCE_ENV]?.trim().toLowerCase()
	return value === 'dark' || value === 'light' ? value : undefined
}

type AppearanceOptions = Readonly<{
	env?: NodeJS.ProcessEnv
	platform?: NodeJS.Platform
	pollMs?: number
	run?: CommandRunner
}>

/**
 * Create an appearance source for the current OS.
 *
 * Listeners are notified only when the probed appearance differs from the
 * last value seen. Polling runs only while at least one listener exists.
 *
 * @param options - Platform, environment and command overrides.
 * @returns Appearance source.
 */
export function createOsAppearance(options: AppearanceOptions = {}): AppearanceSource {
	const env = options.env ?? process.env
	const probe = getProbeCommand(options.platform ?? process.platform)
	const run = options.run ?? runCommand
	const listeners = new Set<AppearanceListener>()
	let timer: ReturnType<typeof globalThis.setInterval> | undefined = undefined
	let last: ResolvedTheme | undefined = undefined

	/**
	 * Probe the OS appearance once.
	 *
	 * @returns Current appearance, light when it cannot be read.
	 */
	function currentTheme(): ResolvedTheme {
		const forced = appearanceOverride(env)
		if (forced) {
			return forced
		}
		const stdout = run(probe.command, probe.args)
		return stdout === undefined ? 'light' : probe.parse(stdout)
	}

	/**
	 * Re-probe and notify listeners on change.
	 *
	 * @returns Nothing.
	 */
	function poll(): void {
		const theme = currentTheme()
		if (theme === last) {
			return
		}
		last = theme
		for (const listener of listeners) {
			listener(theme)
		}
	}

	return {
		currentTheme,
		subscribe(listener: AppearanceListener): () => void {
			listeners.add(listener)
			if (!timer) {
				last = currentTheme()
				timer = globalThis.setInterval(poll, options.pollMs ?? APPEARANCE_POLL_MS)
			}
			return () => {
				listeners.delete(listener)
				if (listeners.size === 0 && timer) {
					globalThis.clearInterval(timer)
					timer = undefined
				}
			}
		},
	}
}
