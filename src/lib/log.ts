/**
 * Terminal output primitives.
 *
 * Centralizes formatted stderr logging so the status line and messages share
 * one indent and one stream.
 *
 * @module
 */
import { red, yellow } from 'colorette'

export { bold, dim } from 'colorette'

export const INDENT = '  '
export const CLEAR_LINE = '\r\u001B[2K'

/**
 * Write a line to stderr at the standard indent level.
 *
 * @param message - Text to print.
 * @param indent - Prefix to prepend before the message.
 * @returns Nothing.
 */
export function write(message: string, indent: string = INDENT): void {
	process.stderr.write(`${indent}${message}\n`)
}

/**
 * Write a pre-formatted block (multiple lines) to stderr.
 *
 * @param lines - Lines to print.
 * @returns Nothing.
 */
export function writeBlock(lines: string[]): void {
	for (const line of lines) {
		process.stderr.write(`${INDENT}${line}\n`)
	}
}

/**
 * Write an error message to stderr at the standard indent level.
 *
 * @param message - Error text.
 * @returns Nothing.
 */
export function logError(message: string): void {
	process.stderr.write(`${INDENT}${red('ERROR')} ${message}\n`)
}

/**
 * Write a warning/notice message to stderr with a yellow prefix.
 *
 * @param message - Warning text.
 * @returns Nothing.
 */
export function logWarn(message: string): void {
	process.stderr.write(`${INDENT}${yellow('!')} ${message}\n`)
}

/**
 * Clear the current terminal line, falling back to newline on non-TTY.
 *
 * @returns Nothing.
 */
export function clearLine(): void {
	if (process.stderr.isTTY) {
		process.stderr.write(CLEAR_LINE)
	} else {
		process.stderr.write('\n')
	}
}
