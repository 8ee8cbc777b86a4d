import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { withTempHome } from '@test/env.ts'
import { expect, test } from 'vitest'

import { createAutostart, renderDesktopEntry, renderLaunchAgent } from './autostart.ts'

const COMMAND = '/usr/bin/node /opt/cpurun/src/cli.ts'

test('autostart entries desktop entry runs the launch command', () => {
	const entry = renderDesktopEntry(COMMAND)
	expect(entry.split('\n')).toContain(`Exec=${COMMAND}`)
	expect(entry.startsWith('[Desktop Entry]\n')).toBe(true)
})

test('autostart entries launch agent escapes the command', () => {
	const plist = renderLaunchAgent('run "a" & <b>')
	expect(plist).toContain('\t\t<string>run &quot;a&quot; &amp; &lt;b&gt;</string>')
	expect(plist).toContain('\t<key>RunAtLoad</key>\n\t<true/>')
})

test('XDG autostart store enable and disable are reflected by presence checks', async () => {
	await withTempHome(async ({ homeDir }) => {
		const autostart = createAutostart('linux')
		expect(await autostart.isEnabled()).toBe(false)

		await autostart.enable(COMMAND)
		expect(await createAutostart('linux').isEnabled()).toBe(true)
		const entry = await readFile(join(homeDir, '.config', 'autostart', 'cpurun.desktop'), 'utf8')
		expect(entry).toBe(renderDesktopEntry(COMMAND))

		await autostart.disable()
		expect(await autostart.isEnabled()).toBe(false)
	})
})

test('XDG autostart store disabling a missing entry is not an error', async () => {
	await withTempHome(async () => {
		await expect(createAutostart('linux').disable()).resolves.toBeUndefined()
	})
})
