/**
 * Raw-mode key bindings for the running indicator.
 *
 * @module
 */
import { emitKeypressEvents } from 'node:readline'

/** Command bound to a key. */
export type KeyCommand =
	| 'activate'
	| 'cycle-max-rate'
	| 'cycle-runner'
	| 'cycle-theme'
	| 'exit'
	| 'menu'
	| 'startup'

/** Shape of the `key` argument of a readline `keypress` event. */
export interface KeyPress {
	ctrl?: boolean
	name?: string
}

/** Window for two activations to count as a double activation. */
export const DOUBLE_ACTIVATION_MS = 400

const BINDINGS: Readonly<Record<string, KeyCommand>> = {
	f: 'cycle-max-rate',
	m: 'menu',
	q: 'exit',
	r: 'cycle-runner',
	return: 'activate',
	s: 'startup',
	t: 'cycle-theme',
}

/**
 * Map a key press to its command.
 *
 * @param key - Key press from readline.
 * @returns Bound command, or `undefined` for unbound keys.
 */
export function keyToCommand(key: KeyPress): KeyCommand | undefined {
	if (key.ctrl) {
		return key.name === 'c' ? 'exit' : undefined
	}
	return key.name === undefined ? undefined : BINDINGS[key.name]
}

/**
 * Track activations and report when two land within the window.
 *
 * @param windowMs - Maximum gap between the two activations.
 * @param now - Clock in milliseconds.
 * @returns Function to call on each activation; true on a double activation.
 */
export function createDoubleActivation(
	windowMs: number = DOUBLE_ACTIVATION_MS,
	now: () => number = Date.now,
): () => boolean {
	let previous: number | undefined = undefined
	return () => {
		const at = now()
		if (previous !== undefined && at - previous <= windowMs) {
			previous = undefined
			return true
		}
		previous = at
		return false
	}
}

/** Controller for key bindings on a TTY input. */
export interface KeyBindings {
	attach(): void
	detach(): void
}

/**
 * Listen for bound keys on a TTY stdin.
 *
 * Enter fires `activate` only on a double press. On a non-TTY input nothing is
 * attached.
 *
 * @param onCommand - Receives each bound command.
 * @param stdin - Input stream.
 * @returns Key bindings controller.
 */
export function createKeyBindings(
	onCommand: (command: KeyCommand) => void,
	stdin: NodeJS.ReadStream = process.stdin,
): KeyBindings {
	const doubleActivation = createDoubleActivation()
	let attached = false

	/**
	 * Dispatch a readline keypress.
	 *
	 * @param _input - Typed character (unused).
	 * @param key - Parsed key.
	 * @returns Nothing.
	 */
	function onKeypress(_input: string | undefined, key: KeyPress | undefined): void {
		const command = key ? keyToCommand(key) : undefined
		if (command === 'activate' && !doubleActivation()) {
			return
		}
		if (command) {
			onCommand(command)
		}
	}

	return {
		attach(): void {
			if (attached || !stdin.isTTY) {
				return
			}
			attached = true
			emitKeypressEvents(stdin)
			stdin.setRawMode(true)
			stdin.on('keypress', onKeypress)
			stdin.resume()
		},
		detach(): void {
			if (!attached) {
				return
			}
			attached = false
			stdin.removeListener('keypress', onKeypress)
			stdin.setRawMode(false)
			stdin.pause()
		},
	}
}
