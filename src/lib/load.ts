/**
 * CPU load sampling.
 *
 * Wraps a raw utilization counter, discarding its warm-up reading and
 * clamping jitter above 100%.
 *
 * @module
 */
import { cpus } from 'node:os'

import { StartupError } from '../types.ts'

import type { LoadSource } from '../types.ts'

const MAX_LOAD = 100
const NO_CPUS = 0
const EMPTY_DELTA = 0

type CpuTotals = Readonly<{
	busy: number
	total: number
}>

/**
 * Sum busy and total CPU time across all cores.
 *
 * @param info - Per-core times from `os.cpus()`.
 * @returns Aggregate busy and total milliseconds.
 */
function totalsOf(info: ReturnType<typeof cpus>): CpuTotals {
	let busy = 0
	let total = 0
	for (const { times } of info) {
		const all = times.user + times.nice + times.sys + times.idle + times.irq
		total += all
		busy += all - times.idle
	}
	return { busy, total }
}

/**
 * Create the OS utilization counter.
 *
 * Each read reports utilization since the previous read. The first read has
 * no baseline and reports 0.
 *
 * @param read - CPU time source, `os.cpus` by default.
 * @returns Counter over aggregate CPU times.
 * @throws {StartupError} `LOAD_COUNTER` when the platform reports no CPUs.
 */
export function createCpuLoadSource(read: typeof cpus = cpus): LoadSource {
	if (read().length === NO_CPUS) {
		throw new StartupError('LOAD_COUNTER', 'CPU utilization counter is unavailable on this platform')
	}

	let previous: CpuTotals | undefined = undefined

	return {
		close(): void {
			previous = undefined
		},
		sample(): number {
			const current = totalsOf(read())
			const baseline = previous
			previous = current
			if (!baseline) {
				return 0
			}
			const total = current.total - baseline.total
			if (total <= EMPTY_DELTA) {
				return 0
			}
			return ((current.busy - baseline.busy) / total) * MAX_LOAD
		},
	}
}

/** Load readings in [0, 100] backed by a warmed-up counter. */
export class LoadSampler {
	private readonly source: LoadSource

	/**
	 * Take ownership of a counter and discard its warm-up reading.
	 *
	 * @param source - Raw utilization counter.
	 */
	constructor(source: LoadSource) {
		this.source = source
		this.source.sample()
	}

	/**
	 * Read the current load.
	 *
	 * @returns Load in percent, capped at 100.
	 */
	sample(): number {
		return Math.min(MAX_LOAD, this.source.sample())
	}

	/** Release the counter. */
	close(): void {
		this.source.close()
	}
}
