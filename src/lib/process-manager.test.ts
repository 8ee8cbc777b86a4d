import { expect, test } from 'vitest'

import { getProcessManagerCommand } from './process-manager.ts'

test('process manager command per platform', () => {
	expect(getProcessManagerCommand('win32')).toEqual({ args: ['/c', 'start', '', 'taskmgr'], command: 'cmd' })
	expect(getProcessManagerCommand('darwin')).toEqual({ args: ['-a', 'Activity Monitor'], command: 'open' })
	expect(getProcessManagerCommand('linux')).toEqual({ args: [], command: 'gnome-system-monitor' })
})
