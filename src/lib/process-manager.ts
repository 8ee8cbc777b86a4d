/**
 * Cross-platform process-manager launcher.
 *
 * @module
 */
import { spawn } from 'node:child_process'

interface LaunchCommand {
	args: string[]
	command: string
}

/**
 * Resolve the process-manager command for a platform.
 *
 * @param platform - Node platform identifier.
 * @returns Command tuple to execute.
 */
export function getProcessManagerCommand(platform: NodeJS.Platform = process.platform): LaunchCommand {
	if (platform === 'darwin') {
		return { args: ['-a', 'Activity Monitor'], command: 'open' }
	}

	if (platform === 'win32') {
		return { args: ['/c', 'start', '', 'taskmgr'], command: 'cmd' }
	}

	return { args: [], command: 'gnome-system-monitor' }
}

/**
 * Open the OS process manager, detached from this process.
 *
 * Fire-and-forget: a missing helper produces no output and no error.
 *
 * @returns Nothing.
 */
export function openProcessManager(): void {
	const { args, command } = getProcessManagerCommand()
	const child = spawn(command, args, { detached: true, stdio: 'ignore', windowsHide: true })
	child.once('error', () => undefined)
	child.unref()
}
