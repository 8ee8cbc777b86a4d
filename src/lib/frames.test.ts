import { expect, test, vi } from 'vitest'

import { RUNNERS } from './catalog.ts'
import { createAssetStore, frameKey, loadAssetStore, resolveFrameSet, resolveTheme } from './frames.ts'

import type { ResolvedTheme } from '../types.ts'

const lightProbe = (): ResolvedTheme => 'light'
const darkProbe = (): ResolvedTheme => 'dark'

test('resolveTheme explicit themes are used verbatim without probing', () => {
	const probe = vi.fn(darkProbe)
	expect(resolveTheme('light', probe)).toBe('light')
	expect(probe).not.toHaveBeenCalled()
})

test('resolveTheme system defers to the probe', () => {
	expect(resolveTheme('system', darkProbe)).toBe('dark')
	expect(resolveTheme('system', lightProbe)).toBe('light')
})

const assets = createAssetStore({
	DARK_CAT_0: 'd0',
	dark_cat_1: 'd1',
	dark_cat_2: 'd2',
	dark_cat_3: 'd3',
	dark_cat_4: 'd4',
	light_cat_0: 'l0',
	light_cat_1: 'l1',
	light_cat_2: 'l2',
	light_cat_3: 'l3',
	light_cat_4: 'l4',
})

test('frameKey builds lower-case keys', () => {
	expect(frameKey('dark', 'parrot', 7)).toBe('dark_parrot_7')
})

test('resolveFrameSet system theme uses the probed prefix', () => {
	expect(resolveFrameSet('cat', 'system', darkProbe, assets)).toEqual(['d0', 'd1', 'd2', 'd3', 'd4'])
	expect(resolveFrameSet('cat', 'system', lightProbe, assets)).toEqual(['l0', 'l1', 'l2', 'l3', 'l4'])
})

test('resolveFrameSet is idempotent for identical inputs', () => {
	const first = resolveFrameSet('cat', 'dark', lightProbe, assets)
	const second = resolveFrameSet('cat', 'dark', lightProbe, assets)
	expect(second).toEqual(first)
})

test('resolveFrameSet skips missing indices without placeholders', () => {
	const sparse = createAssetStore({
		light_parrot_0: 'a',
		light_parrot_1: 'b',
		light_parrot_3: 'd',
	})
	expect(resolveFrameSet('parrot', 'light', darkProbe, sparse)).toEqual(['a', 'b', 'd'])
})

test('resolveFrameSet yields an empty set when no artwork exists', () => {
	expect(resolveFrameSet('horse', 'dark', darkProbe, createAssetStore({}))).toEqual([])
})

test('bundled artwork covers every runner frame in both themes', () => {
	const assets = loadAssetStore()
	for (const { frameCount, value } of RUNNERS) {
		expect(resolveFrameSet(value, 'light', lightProbe, assets)).toHaveLength(frameCount)
		expect(resolveFrameSet(value, 'dark', darkProbe, assets)).toHaveLength(frameCount)
	}
})
