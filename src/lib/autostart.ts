/**
 * Per-user run-on-login registration.
 *
 * Linux uses an XDG autostart entry, macOS a LaunchAgent, Windows the
 * `HKCU\...\Run` registry key through the `reg` tool. Every read checks the
 * OS entry itself.
 *
 * @module
 */
import { spawnSync } from 'node:child_process'
import { access, mkdir, rm, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'

import type { AutostartStore } from '../types.ts'

export const APP_NAME = 'cpurun'

const LAUNCH_AGENT_LABEL = 'dev.cpurun'
const XDG_CONFIG_ENV = 'XDG_CONFIG_HOME'
const RUN_KEY = 'HKCU\\Software\\Microsoft\\Windows\\CurrentVersion\\Run'
const EXIT_SUCCESS = 0

/**
 * Quote one argument for a shell-style command line.
 *
 * @param arg - Raw argument.
 * @returns Double-quoted argument when it contains whitespace or quotes.
 */
function quote(arg: string): string {
	return /[\s"]/.test(arg) ? `"${arg.replaceAll('"', '\\"')}"` : arg
}

/**
 * Build the command line that relaunches this program.
 *
 * Includes the Node binary, its exec arguments (loader flags) and the script.
 *
 * @returns Command line for the autostart entry.
 */
export function resolveLaunchCommand(): string {
	const script = process.argv[1]
	const parts = [process.execPath, ...process.execArgv, ...(script ? [script] : [])]
	return parts.map(quote).join(' ')
}

/**
 * Escape text for inclusion in an XML plist.
 *
 * @param value - Raw text.
 * @returns XML-escaped text.
 */
function escapeXml(value: string): string {
	return value
		.replaceAll('&', '&amp;')
		.replaceAll('<', '&lt;')
		.replaceAll('>', '&gt;')
		.replaceAll('"', '&quot;')
}

/**
 * Render an XDG desktop entry.
 *
 * @param command - Command line to run at login.
 * @returns `.desktop` file contents.
 */
export function renderDesktopEntry(command: string): string {
	return [
		'[Desktop Entry]',
		'Type=Application',
		`Name=${APP_NAME}`,
		'Comment=CPU load indicator',
		`Exec=${command}`,
		'Terminal=true',
		'X-GNOME-Autostart-enabled=true',
		'',
	].join('\n')
}

/**
 * Render a LaunchAgent property list.
 *
 * @param command - Command line to run at login.
 * @returns `.plist` file contents.
 */
export function renderLaunchAgent(command: string): string {
	return [
		'<?xml version="1.0" encoding="UTF-8"?>',
		'<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">',
		'<plist version="1.0">',
		'<dict>',
		'\t<key>Label</key>',
		`\t<string>${LAUNCH_AGENT_LABEL}</string>`,
		'\t<key>ProgramArguments</key>',
		'\t<array>',
		'\t\t<string>/bin/sh</string>',
		'\t\t<string>-c</string>',
		`\t\t<string>${escapeXml(command)}</string>`,
		'\t</array>',
		'\t<key>RunAtLoad</key>',
		'\t<true/>',
		'</dict>',
		'</plist>',
		'',
	].join('\n')
}

/**
 * Autostart backed by a single file whose presence means "enabled".
 *
 * @param path - Entry file path.
 * @param render - Renders the entry for a command line.
 * @returns Autostart store.
 */
export function createFileAutostart(path: string, render: (command: string) => string): AutostartStore {
	return {
		async disable(): Promise<void> {
			await rm(path, { force: true })
		},
		async enable(command: string): Promise<void> {
			await mkdir(dirname(path), { recursive: true })
			await writeFile(path, render(command), 'utf8')
		},
		async isEnabled(): Promise<boolean> {
			try {
				await access(path)
				return true
			} catch {
				return false
			}
		},
	}
}

/**
 * Autostart backed by the Windows `Run` registry key.
 *
 * @returns Autostart store.
 */
function createRegistryAutostart(): AutostartStore {
	/**
	 * Run `reg` and report success.
	 *
	 * @param args - Arguments to `reg`.
	 * @returns True on a zero exit.
	 */
	function reg(args: readonly string[]): boolean {
		const result = spawnSync('reg', args, { stdio: 'ignore' })
		return !result.error && result.status === EXIT_SUCCESS
	}

	return {
		async disable(): Promise<void> {
			reg(['delete', RUN_KEY, '/v', APP_NAME, '/f'])
		},
		async enable(command: string): Promise<void> {
			if (!reg(['add', RUN_KEY, '/v', APP_NAME, '/t', 'REG_SZ', '/d', command, '/f'])) {
				throw new Error('Failed to register autostart entry')
			}
		},
		async isEnabled(): Promise<boolean> {
			return reg(['query', RUN_KEY, '/v', APP_NAME])
		},
	}
}

/**
 * Create the autostart store for a platform.
 *
 * @param platform - Node platform identifier.
 * @returns Autostart store.
 */
export function createAutostart(platform: NodeJS.Platform = process.platform): AutostartStore {
	if (platform === 'win32') {
		return createRegistryAutostart()
	}
	if (platform === 'darwin') {
		return createFileAutostart(
			join(homedir(), 'Library', 'LaunchAgents', `${LAUNCH_AGENT_LABEL}.plist`),
			renderLaunchAgent,
		)
	}
	const configHome = process.env[XDG_CONFIG_ENV] ?? join(homedir(), '.config')
	return createFileAutostart(join(configHome, 'autostart', `${APP_NAME}.desktop`), renderDesktopEntry)
}
