import { expect, test } from 'vitest'

import { CLEAR_LINE, dim, INDENT } from './log.ts'
import { createTerminalSurface } from './surface.ts'

const CURSOR_HIDE = '\u001B[?25l'
const CURSOR_SHOW = '\u001B[?25h'

/**
 * Capture writes to a fake terminal stream.
 *
 * @param isTTY - Whether the stream reports as interactive.
 * @returns Stream and the list of written chunks.
 */
function capture(isTTY: boolean): { chunks: string[]; stream: { isTTY: boolean; write(chunk: string): boolean } } {
	const chunks: string[] = []
	return {
		chunks,
		stream: {
			isTTY,
			write(chunk: string): boolean {
				chunks.push(chunk)
				return true
			},
		},
	}
}

test('createTerminalSurface redraws the status line in place on a TTY', () => {
	const { chunks, stream } = capture(true)
	const surface = createTerminalSurface(stream)

	surface.setLabel('CPU: 4.0%')
	surface.showFrame('◇··')

	expect(chunks).toEqual([
		CURSOR_HIDE,
		`${CLEAR_LINE}${INDENT}  ${dim('CPU: 4.0%')}`,
		`${CLEAR_LINE}${INDENT}◇··  ${dim('CPU: 4.0%')}`,
	])
})

test('createTerminalSurface stays quiet while suspended and redraws on resume', () => {
	const { chunks, stream } = capture(true)
	const surface = createTerminalSurface(stream)
	surface.showFrame('a')
	chunks.length = 0

	surface.suspend()
	surface.showFrame('b')
	surface.resume()

	expect(chunks).toEqual([`${CLEAR_LINE}${CURSOR_SHOW}`, CURSOR_HIDE, `${CLEAR_LINE}${INDENT}b  ${dim('')}`])
})

test('createTerminalSurface dispose restores the cursor once and stops drawing', () => {
	const { chunks, stream } = capture(true)
	const surface = createTerminalSurface(stream)
	surface.showFrame('a')
	chunks.length = 0

	surface.dispose()
	surface.dispose()
	surface.showFrame('b')

	expect(chunks).toEqual([`${CLEAR_LINE}${CURSOR_SHOW}`])
})

test('createTerminalSurface prints only label changes on a non-TTY stream', () => {
	const { chunks, stream } = capture(false)
	const surface = createTerminalSurface(stream)

	surface.showFrame('a')
	surface.setLabel('CPU: 1.0%')
	surface.setLabel('CPU: 1.0%')
	surface.showFrame('b')
	surface.setLabel('CPU: 2.5%')

	expect(chunks).toEqual([`${INDENT}CPU: 1.0%\n`, `${INDENT}CPU: 2.5%\n`])
})
