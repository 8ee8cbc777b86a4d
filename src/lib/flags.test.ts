import { expect, test } from 'vitest'

import { DEFAULT_OPTIONS } from './catalog.ts'
import { applyFlags } from './flags.ts'

import type { OptionState } from '../types.ts'

const SAVED: OptionState = { maxRate: 'fps20', runner: 'parrot', theme: 'dark' }

test('applyFlags keeps saved options when no flag is set', () => {
	expect(applyFlags(SAVED, {})).toEqual(SAVED)
})

test('applyFlags overrides each option independently', () => {
	expect(applyFlags(SAVED, { runner: 'Horse' })).toEqual({ ...SAVED, runner: 'horse' })
	expect(applyFlags(SAVED, { theme: 'Light' })).toEqual({ ...SAVED, theme: 'light' })
	expect(applyFlags(SAVED, { fps: 'FPS10' })).toEqual({ ...SAVED, maxRate: 'fps10' })
})

test('applyFlags matches values case-insensitively', () => {
	expect(applyFlags(DEFAULT_OPTIONS, { fps: 'fps30', runner: 'CAT', theme: 'system' })).toEqual({
		maxRate: 'fps30',
		runner: 'cat',
		theme: 'system',
	})
})

test('applyFlags reports an unknown value with the accepted keys', () => {
	expect(applyFlags(SAVED, { runner: 'dog' })).toBe('Unknown runner: dog (expected Cat, Parrot, Horse)')
	expect(applyFlags(SAVED, { theme: 'sepia' })).toBe('Unknown theme: sepia (expected System, Light, Dark)')
	expect(applyFlags(SAVED, { fps: '60' })).toBe('Unknown fps limit: 60 (expected FPS40, FPS30, FPS20, FPS10)')
})

test('applyFlags leaves the saved options untouched', () => {
	const saved = { ...SAVED }
	applyFlags(saved, { runner: 'Cat' })
	expect(saved).toEqual(SAVED)
})
