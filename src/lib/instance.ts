/**
 * Single-instance guard backed by a PID lock file in the config directory.
 *
 * @module
 */
import { open, readFile, rm } from 'node:fs/promises'

import { ensureConfigDir, resolveConfigPath } from './config.ts'
import { StartupError } from '../types.ts'

const LOCK_FILE = 'cpurun.lock'
const PROBE_SIGNAL = 0
const DECIMAL_RADIX = 10

/** Handle to a held instance lock. */
export interface InstanceLock {
	/** Path of the lock file. */
	readonly path: string
	/** Remove the lock file. Safe to call more than once. */
	release(): Promise<void>
}

/**
 * Check whether a process with the given PID exists.
 *
 * @param pid - Process id to probe.
 * @returns True unless the OS reports no such process.
 */
export function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, PROBE_SIGNAL)
		return true
	} catch (error) {
		return (error as NodeJS.ErrnoException).code === 'EPERM'
	}
}

/**
 * Read the PID recorded in an existing lock file.
 *
 * @param path - Lock file path.
 * @returns Recorded PID, or `undefined` when unreadable.
 */
async function readLockPid(path: string): Promise<number | undefined> {
	try {
		const pid = Number.parseInt(await readFile(path, 'utf8'), DECIMAL_RADIX)
		return Number.isNaN(pid) ? undefined : pid
	} catch (error) {
		if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
			return undefined
		}
		throw error
	}
}

/**
 * Create the lock file exclusively and record this process's PID.
 *
 * @param path - Lock file path.
 * @returns True when created, false when it already exists.
 */
async function tryCreate(path: string): Promise<boolean> {
	try {
		const handle = await open(path, 'wx')
		try {
			await handle.writeFile(`${process.pid}\n`, 'utf8')
		} finally {
			await handle.close()
		}
		return true
	} catch (error) {
		if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
			return false
		}
		throw error
	}
}

/**
 * Acquire the process-wide instance lock.
 *
 * A lock left behind by a process that no longer exists is replaced.
 *
 * @param alive - PID liveness check.
 * @returns Held lock.
 * @throws {StartupError} `ALREADY_RUNNING` when another live instance holds it.
 */
export async function acquireInstanceLock(alive: (pid: number) => boolean = isProcessAlive): Promise<InstanceLock> {
	await ensureConfigDir()
	const path = resolveConfigPath(LOCK_FILE)

	if (!(await tryCreate(path))) {
		const holder = await readLockPid(path)
		if (holder !== undefined && holder !== process.pid && alive(holder)) {
			throw new StartupError('ALREADY_RUNNING', `cpurun is already running (pid ${holder})`)
		}
		await rm(path, { force: true })
		if (!(await tryCreate(path))) {
			throw new StartupError('ALREADY_RUNNING', 'cpurun is already running')
		}
	}

	let released = false
	return {
		path,
		async release(): Promise<void> {
			if (released) {
				return
			}
			released = true
			await rm(path, { force: true })
		},
	}
}
