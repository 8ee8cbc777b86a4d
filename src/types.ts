/** Selectable animated subject. */
export type Runner = 'cat' | 'parrot' | 'horse'

/** Rendering theme, or `system` to defer to the OS appearance. */
export type Theme = 'light' | 'dark' | 'system'

/** A theme that can actually be rendered. */
export type ResolvedTheme = Exclude<Theme, 'system'>

/** Ceiling tier controlling how sharply animation speed follows load. */
export type MaxRate = 'fps40' | 'fps30' | 'fps20' | 'fps10'

/** A single frame of terminal artwork. */
export type Frame = string

/** User selections persisted across restarts. */
export interface OptionState {
	maxRate: MaxRate
	runner: Runner
	theme: Theme
}

/**
 * Raw OS utilization counter.
 *
 * The first reading after construction carries no meaningful value and is
 * discarded by {@link LoadSampler}.
 */
export interface LoadSource {
	/** Release the underlying counter handle. */
	close(): void
	/** Utilization since the previous read, in percent. */
	sample(): number
}

/** Lookup of frame artwork by `{theme}_{runner}_{index}` key. */
export interface AssetStore {
	get(key: string): Frame | undefined
}

/** Listener invoked when the OS appearance changes. */
export type AppearanceListener = (theme: ResolvedTheme) => void

/** OS light/dark appearance probe with change notifications. */
export interface AppearanceSource {
	/** Probe the current OS appearance. */
	currentTheme(): ResolvedTheme
	/**
	 * Register for appearance changes.
	 *
	 * @returns Function that removes the listener.
	 */
	subscribe(listener: AppearanceListener): () => void
}

/** Persisted flat key/value settings. */
export interface SettingsStore {
	load(): Promise<OptionState>
	save(state: OptionState): Promise<void>
}

/** Per-user run-on-login registration. */
export interface AutostartStore {
	disable(): Promise<void>
	enable(command: string): Promise<void>
	/** Checks the OS entry itself, never a cached flag. */
	isEnabled(): Promise<boolean>
}

/** Where the indicator draws its frame and label. */
export interface StatusSurface {
	dispose(): void
	/** Redraw after {@link StatusSurface.suspend}. */
	resume(): void
	setLabel(label: string): void
	showFrame(frame: Frame): void
	/** Stop drawing until resumed (e.g. while a prompt owns the terminal). */
	suspend(): void
}

/** Serialized settings file shape. Values are stable enum keys. */
export type SettingsFile = Partial<Record<'FPSMaxLimit' | 'Runner' | 'Theme', unknown>>

/** Selection raised by the menu or a key binding. */
export type MenuAction =
	| { kind: 'exit' }
	| { kind: 'max-rate'; maxRate: MaxRate }
	| { kind: 'process-manager' }
	| { kind: 'runner'; runner: Runner }
	| { kind: 'startup' }
	| { kind: 'theme'; theme: Theme }

/** Codes carried by fatal {@link StartupError}s. */
export type StartupErrorCode = 'ALREADY_RUNNING' | 'LOAD_COUNTER'

/** Fatal error raised before the indicator is shown. */
export class StartupError extends Error {
	readonly code: StartupErrorCode

	constructor(code: StartupErrorCode, message: string) {
		super(message)
		this.name = 'StartupError'
		this.code = code
	}
}
