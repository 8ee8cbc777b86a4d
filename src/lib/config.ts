/**
 * Config-directory utilities for cpurun local state.
 *
 * Provides path resolution and JSON read/write helpers under `~/.config/cpurun`
 * (or an override directory via environment variable).
 *
 * @module
 */
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'

const CONFIG_ROOT_DIR = '.config'
const APP_CONFIG_DIR = 'cpurun'
const CONFIG_DIR_ENV = 'CPURUN_CONFIG_DIR'

const DIR_MODE = 0o700

/**
 * Resolve the absolute path to the cpurun config directory.
 *
 * @returns Config directory path, honoring `CPURUN_CONFIG_DIR` when set.
 */
export function getConfigDir(): string {
	return process.env[CONFIG_DIR_ENV] ?? join(homedir(), CONFIG_ROOT_DIR, APP_CONFIG_DIR)
}

/**
 * Resolve a filename under the cpurun config directory.
 *
 * @param filename - Relative config filename.
 * @returns Absolute path to the config file.
 */
export function resolveConfigPath(filename: string): string {
	return join(getConfigDir(), filename)
}

/**
 * Ensure the cpurun config directory exists with private directory permissions.
 *
 * @returns Promise that resolves once the directory exists.
 */
export async function ensureConfigDir(): Promise<void> {
	await mkdir(getConfigDir(), { mode: DIR_MODE, recursive: true })
}

/**
 * Read and parse a JSON file from the cpurun config directory.
 *
 * @param filename - Relative config filename.
 * @returns Parsed JSON value, or `undefined` when the file does not exist.
 */
export async function readJsonFile(filename: string): Promise<unknown> {
	const path = resolveConfigPath(filename)
	try {
		const raw = await readFile(path, 'utf8')
		return JSON.parse(raw)
	} catch (error) {
		const err = error as NodeJS.ErrnoException
		if (err.code === 'ENOENT') {
			return undefined
		}
		throw error
	}
}

/**
 * Write a JSON file into the cpurun config directory.
 *
 * @param filename - Relative config filename.
 * @param data - Serializable payload.
 * @returns Promise that resolves when file write is complete.
 */
export async function writeJsonFile(filename: string, data: unknown): Promise<void> {
	await ensureConfigDir()
	await writeFile(resolveConfigPath(filename), `${JSON.stringify(data, null, '\t')}\n`, 'utf8')
}
