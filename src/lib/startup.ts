/**
 * Startup step runner: any failure is reported on stderr and ends the process.
 *
 * @module
 */
import { logError, logWarn } from './log.ts'
import { StartupError } from '../types.ts'

const EXIT_FAILURE = 1

type StartupStepOptions = Readonly<{
	/** Releases what earlier steps acquired before exiting. */
	cleanup?: () => Promise<void>
	/** Process exit, overridable for tests. */
	exit?: (code: number) => never
}>

/**
 * Run one startup step, exiting with a failure code if it throws.
 *
 * A second instance is reported as a notice; anything else as an error.
 *
 * @param step - Work to run.
 * @param options - Cleanup and exit overrides.
 * @returns Result of the step.
 */
export async function startupStep<T>(step: () => Promise<T> | T, options: StartupStepOptions = {}): Promise<T> {
	const exit = options.exit ?? ((code: number) => process.exit(code))
	try {
		return await step()
	} catch (error) {
		if (error instanceof StartupError && error.code === 'ALREADY_RUNNING') {
			logWarn(error.message)
		} else {
			logError(error instanceof Error ? error.message : String(error))
		}
		await options.cleanup?.()
		return exit(EXIT_FAILURE)
	}
}
