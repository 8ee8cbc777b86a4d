/**
 * Cpurun: a status-line runner whose pace follows CPU load.
 *
 * @example
 * ```ts
 * import { Indicator, createCpuLoadSource, createOsAppearance, createTerminalSurface, loadAssetStore } from "./src/index.ts";
 *
 * const indicator = new Indicator({
 *   appearance: createOsAppearance(),
 *   assets: loadAssetStore(),
 *   load: createCpuLoadSource(),
 *   options: { maxRate: "fps40", runner: "cat", theme: "system" },
 *   surface: createTerminalSurface(),
 * });
 * indicator.start();
 * ```
 *
 * @module
 */

export { Indicator } from './indicator.ts'
export type { IndicatorEvents, IndicatorOptions } from './indicator.ts'

export { AnimationDriver, DEFAULT_ANIMATION_INTERVAL_MS } from './lib/animation.ts'
export { createOsAppearance } from './lib/appearance.ts'
export { createAutostart } from './lib/autostart.ts'
export { DEFAULT_OPTIONS, MAX_RATES, RUNNERS, THEMES } from './lib/catalog.ts'
export { createAssetStore, loadAssetStore, resolveFrameSet, resolveTheme } from './lib/frames.ts'
export { createCpuLoadSource, LoadSampler } from './lib/load.ts'
export { formatLoad, LOAD_INTERVAL_MS, LoadDriver } from './lib/load-driver.ts'
export { createFileSettingsStore } from './lib/settings.ts'
export { intervalMs, MIN_INTERVAL_MS, SLOWEST_INTERVAL_MS } from './lib/speed.ts'
export { createTerminalSurface } from './lib/surface.ts'

export { StartupError } from './types.ts'
export type {
	AppearanceSource,
	AssetStore,
	AutostartStore,
	Frame,
	LoadSource,
	MaxRate,
	MenuAction,
	OptionState,
	ResolvedTheme,
	Runner,
	SettingsStore,
	StatusSurface,
	StartupErrorCode,
	Theme,
} from './types.ts'
