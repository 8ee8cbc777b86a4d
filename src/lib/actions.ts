/**
 * Menu and key-binding action dispatch.
 *
 * @module
 */
import type { Indicator } from '../indicator.ts'
import type { AutostartStore, MenuAction } from '../types.ts'

/** Collaborators an action may touch. */
export interface ActionContext {
	autostart: AutostartStore
	indicator: Indicator
	/** Command line registered for autostart. */
	launchCommand: () => string
	openProcessManager: () => void
	shutdown: () => void
}

/**
 * Apply a menu or key-binding action.
 *
 * Option changes only touch in-memory state; persistence happens at shutdown.
 *
 * @param action - Selected action.
 * @param context - Collaborators.
 * @returns Resolves once the action has taken effect.
 */
export async function handleMenuAction(action: MenuAction, context: ActionContext): Promise<void> {
	switch (action.kind) {
		case 'runner': {
			context.indicator.setRunner(action.runner)
			return
		}
		case 'theme': {
			context.indicator.setTheme(action.theme)
			return
		}
		case 'max-rate': {
			context.indicator.setMaxRate(action.maxRate)
			return
		}
		case 'startup': {
			if (await context.autostart.isEnabled()) {
				await context.autostart.disable()
			} else {
				await context.autostart.enable(context.launchCommand())
			}
			return
		}
		case 'process-manager': {
			context.openProcessManager()
			return
		}
		case 'exit': {
			context.shutdown()
			return
		}
	}
}
