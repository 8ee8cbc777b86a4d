/**
 * In-place terminal status line.
 *
 * Draws `<frame>  <label>` on a single stderr line, redrawn on every frame.
 * On non-TTY streams only label changes are printed, one per line.
 *
 * @module
 */
import { CLEAR_LINE, dim, INDENT } from './log.ts'

import type { Frame, StatusSurface } from '../types.ts'

const CURSOR_HIDE = '\u001B[?25l'
const CURSOR_SHOW = '\u001B[?25h'
const GAP = '  '

/** Minimal writable surface of a terminal stream. */
export interface SurfaceStream {
	readonly isTTY?: boolean
	write(chunk: string): unknown
}

/**
 * Create a status surface that draws onto a terminal stream.
 *
 * @param stream - Output stream, stderr by default.
 * @returns Surface controller.
 */
export function createTerminalSurface(stream: SurfaceStream = process.stderr): StatusSurface {
	const interactive = stream.isTTY === true
	let frame: Frame = ''
	let label = ''
	let suspended = false
	let disposed = false
	let cursorHidden = false

	/**
	 * Redraw the status line with the current frame and label.
	 *
	 * @returns Nothing.
	 */
	function render(): void {
		if (!interactive || suspended || disposed) {
			return
		}
		if (!cursorHidden) {
			stream.write(CURSOR_HIDE)
			cursorHidden = true
		}
		stream.write(`${CLEAR_LINE}${INDENT}${frame}${GAP}${dim(label)}`)
	}

	/**
	 * Clear the status line and give the cursor back.
	 *
	 * @returns Nothing.
	 */
	function release(): void {
		if (!interactive || !cursorHidden) {
			return
		}
		stream.write(`${CLEAR_LINE}${CURSOR_SHOW}`)
		cursorHidden = false
	}

	return {
		dispose(): void {
			if (disposed) {
				return
			}
			release()
			disposed = true
		},
		resume(): void {
			suspended = false
			render()
		},
		setLabel(next: string): void {
			if (next === label) {
				return
			}
			label = next
			if (!interactive && !disposed) {
				stream.write(`${INDENT}${label}\n`)
				return
			}
			render()
		},
		showFrame(next: Frame): void {
			frame = next
			render()
		},
		suspend(): void {
			release()
			suspended = true
		},
	}
}
