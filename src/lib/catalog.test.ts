import { expect, test } from 'vitest'

import { frameCount, keysOf, MAX_RATES, multiplier, nextValue, parseKey, RUNNERS, THEMES, toKey, toLabel } from './catalog.ts'

test('parseKey accepts stable keys regardless of case and padding', () => {
	expect(parseKey(RUNNERS, 'Parrot')).toBe('parrot')
	expect(parseKey(RUNNERS, ' horse ')).toBe('horse')
	expect(parseKey(MAX_RATES, 'fps20')).toBe('fps20')
})

test('parseKey rejects unknown keys and non-strings', () => {
	expect(parseKey(THEMES, 'Sepia')).toBeUndefined()
	expect(parseKey(THEMES, 3)).toBeUndefined()
	expect(parseKey(MAX_RATES, '20 fps')).toBeUndefined()
})

test('keys and labels are separate', () => {
	expect(toKey(MAX_RATES, 'fps30')).toBe('FPS30')
	expect(toLabel(MAX_RATES, 'fps30')).toBe('30 fps')
	expect(keysOf(THEMES)).toEqual(['System', 'Light', 'Dark'])
})

test('nextValue wraps around', () => {
	expect(nextValue(RUNNERS, 'cat')).toBe('parrot')
	expect(nextValue(RUNNERS, 'horse')).toBe('cat')
	expect(nextValue(MAX_RATES, 'fps10')).toBe('fps40')
})

test('frame counts and multipliers', () => {
	expect(RUNNERS.map(item => frameCount(item.value))).toEqual([5, 10, 14])
	expect(MAX_RATES.map(item => multiplier(item.value))).toEqual([1, 0.75, 0.5, 0.25])
})
