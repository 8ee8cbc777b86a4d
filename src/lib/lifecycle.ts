/**
 * Process lifecycle controller for graceful shutdown behavior.
 *
 * Encapsulates signal handling, timed teardown, and the final exit code.
 *
 * @module
 */
import { clearLine, logError } from './log.ts'

const EXIT_SUCCESS = 0
const EXIT_FAILURE = 1
const SHUTDOWN_TIMEOUT_MS = 2000

/** Controller for graceful shutdown of the indicator process. */
export interface Lifecycle {
	/** Returns true if shutdown is in progress (use as an early-return guard). */
	done(): boolean
	/** Run teardown once, then exit. */
	shutdown(): void
}

type LifecycleOptions = Readonly<{
	/** Process exit, overridable for tests. */
	exit?: (code: number) => void
	/** Signals that trigger shutdown. */
	signals?: readonly NodeJS.Signals[]
	timeoutMs?: number
}>

/**
 * Create a lifecycle controller that manages signal handling and graceful shutdown.
 *
 * Registers one-shot signal handlers on creation. Teardown runs exactly once;
 * if it hangs past the timeout the process exits with a failure code.
 *
 * @param teardown - Stops the indicator, saves settings and releases the lock.
 * @param options - Exit, signal and timeout overrides.
 * @returns Lifecycle controller with `done` and `shutdown`.
 */
export function createLifecycle(teardown: () => Promise<void>, options: LifecycleOptions = {}): Lifecycle {
	const exit = options.exit ?? ((code: number) => process.exit(code))
	const signals = options.signals ?? ['SIGINT', 'SIGTERM']
	let isShuttingDown = false

	/**
	 * Start graceful teardown and register a forced-exit timeout.
	 *
	 * @returns Nothing.
	 */
	function shutdown(): void {
		if (isShuttingDown) {
			return
		}
		isShuttingDown = true
		for (const signal of signals) {
			process.removeListener(signal, onSignal)
		}

		const timeout = globalThis.setTimeout(() => {
			exit(EXIT_FAILURE)
		}, options.timeoutMs ?? SHUTDOWN_TIMEOUT_MS)

		teardown().then(
			() => {
				globalThis.clearTimeout(timeout)
				exit(EXIT_SUCCESS)
			},
			(error: unknown) => {
				globalThis.clearTimeout(timeout)
				logError(error instanceof Error ? error.message : String(error))
				exit(EXIT_FAILURE)
			},
		)
	}

	/**
	 * Handle a termination signal.
	 *
	 * @returns Nothing.
	 */
	function onSignal(): void {
		clearLine()
		shutdown()
	}

	for (const signal of signals) {
		process.once(signal, onSignal)
	}

	return {
		done(): boolean {
			return isShuttingDown
		},
		shutdown,
	}
}
