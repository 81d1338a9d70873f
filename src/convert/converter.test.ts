import { describe, it, expect } from 'vitest'
import { clean, createConverter, escapeMarkup, parseConverterOptions } from './converter.js'

describe('convert', () => {
	it('converts palette colors at high depth and appends a reset', () => {
		const converter = createConverter({ depth: 'high', autoReset: true })

		expect(converter.convert('&aHello &cWorld')).toBe(
			'\x1b[38;2;85;255;85mHello \x1b[38;2;255;85;85mWorld\x1b[0m',
		)
	})

	it.each([
		['tty', '\x1b[33m\x1b[4munderlined\x1b[0m \x1b[43myellow'],
		['low', '\x1b[93m\x1b[4munderlined\x1b[0m \x1b[103myellow'],
		['medium', '\x1b[38;5;227m\x1b[4munderlined\x1b[0m \x1b[48;5;227myellow'],
		['high', '\x1b[38;2;255;255;85m\x1b[4munderlined\x1b[0m \x1b[48;2;255;255;85myellow'],
		[null, 'underlined yellow'],
	] as const)('renders foreground, attribute, reset and background at depth %s', (depth, expected) => {
		const converter = createConverter({ depth, autoReset: false })

		expect(converter.convert('&e&nunderlined&R &~eyellow')).toBe(expected)
	})

	it('offsets tty/low backgrounds by 10 and switches family at medium', () => {
		const low = createConverter({ depth: 'low', autoReset: false })
		const medium = low.withOptions({ depth: 'medium' })

		expect(low.convert('&3')).toBe('\x1b[36m')
		expect(low.convert('&~3')).toBe('\x1b[46m')
		expect(medium.convert('&3')).toBe('\x1b[38;5;37m')
		expect(medium.convert('&~3')).toBe('\x1b[48;5;37m')
	})

	it('uses the RGB template for background palette colors at high depth', () => {
		const converter = createConverter({ depth: 'high', autoReset: false })

		expect(converter.convert('&~a')).toBe('\x1b[48;2;85;255;85m')
	})

	it.each([
		['&#f0f;', '\x1b[38;2;255;0;255m'],
		['&#ff00ff;', '\x1b[38;2;255;0;255m'],
		['&#f00ffa;', '\x1b[38;2;240;15;250m'],
		['&~#0a0;', '\x1b[48;2;0;170;0m'],
	])('renders hex literal %s at 24-bit regardless of depth', (input, expected) => {
		const converter = createConverter({ depth: 'low', autoReset: false })

		expect(converter.convert(input)).toBe(expected)
	})

	it('emits two sequences for the color reset', () => {
		const converter = createConverter({ depth: 'tty', autoReset: false })

		expect(converter.convert('&rc')).toBe('\x1b[39m\x1b[49m')
		expect(converter.convert('&rl')).toBe('\x1b[22m')
	})

	it.each(['&~l', '&#ff00f;', '&#ggg;', '&A', '&r', '&rx'])('leaves %s untouched', (input) => {
		const converter = createConverter({ depth: 'low', autoReset: false })

		expect(converter.convert(input)).toBe(input)
	})

	it.each([
		[true, 'a', 'a\x1b[0m'],
		[true, 'a&R', 'a\x1b[0m'],
		[false, 'a', 'a'],
		[false, 'a&R', 'a\x1b[0m'],
	] as const)('with autoReset=%s converts %s', (autoReset, input, expected) => {
		const converter = createConverter({ depth: 'low', autoReset })

		expect(converter.convert(input)).toBe(expected)
	})

	it('returns text without codes unchanged', () => {
		const converter = createConverter({ depth: 'high', autoReset: false })
		const text = 'no codes here & none there'

		expect(converter.convert(text)).toBe(text)
	})

	it('turns the escape token into a literal marker', () => {
		const converter = createConverter({ depth: 'low', autoReset: false })

		expect(converter.convert('&_4foo')).toBe('&4foo')
	})

	it.each([
		['&', '\x1b[93me§ee§§_4x'],
		['e', '&\x1b[93m§\x1b[93m§§_4x'],
		['§', '&ee\x1b[93me§§4x'],
		['_', '&ee§ee§§\x1b[31mx'],
		['4', '&ee§ee§§_4x'],
		['x', '&ee§ee§§_4x'],
	])('handles marker %s', (marker, expected) => {
		const converter = createConverter({ depth: 'low', autoReset: false, marker })

		expect(converter.convert('&ee§ee§§_4x')).toBe(expected)
	})

	it.each(['$', '^', '?', '(', ')', '\\', '/', '[', ']', '*', '+', '.', '-', '|', '{'])(
		'handles regex metacharacter %s as marker',
		(marker) => {
			const converter = createConverter({ depth: 'low', autoReset: false, marker })

			expect(converter.convert(`${marker}4foo${marker}_2bar`)).toBe(`\x1b[31mfoo${marker}2bar`)
		},
	)

	it('accepts a marker outside the basic multilingual plane', () => {
		const converter = createConverter({ depth: 'low', autoReset: false, marker: '😀' })

		expect(converter.convert('😀c!')).toBe('\x1b[91m!')
	})

	it('behaves like clean when depth is null, even with autoReset', () => {
		const converter = createConverter({ depth: null, autoReset: true })
		const input = '&aHi &~#fff;there&R &_e'

		expect(converter.convert(input)).toBe('Hi there &e')
		expect(converter.convert(input)).toBe(converter.clean(input))
	})
})

describe('clean', () => {
	it('strips codes with the default marker', () => {
		expect(clean('&2>be me')).toBe('>be me')
	})

	it.each([
		['&e&nunderlined&rn yellow', '&', 'underlined yellow'],
		['&e&nunderlined&rn yellow', '!', '&e&nunderlined&rn yellow'],
		['!e!nunderlined!rn yellow', '!', 'underlined yellow'],
		['§_4 gives §4red', '§', '§4 gives red'],
		['&#aaa;underlined&R', '&', 'underlined'],
	])('cleans %s with marker %s', (input, marker, expected) => {
		expect(clean(input, marker)).toBe(expected)
	})

	it('never emits ANSI or the auto reset, even at high depth', () => {
		const converter = createConverter({ depth: 'high', autoReset: true })

		expect(converter.clean('&l&~3bold&R')).toBe('bold')
	})

	it.each(['$', '(', '\\', '[', '*', '.'])('handles regex metacharacter %s as marker', (marker) => {
		expect(clean(`${marker}4foo${marker}_2bar`, marker)).toBe(`foo${marker}2bar`)
	})
})

describe('withOptions', () => {
	it('makes codes under the old marker inert and the new marker live', () => {
		const ampersand = createConverter({ depth: 'low', autoReset: false })
		const bang = ampersand.withOptions({ marker: '!' })

		expect(bang.convert('&4a!4b')).toBe('&4a\x1b[31mb')
		expect(ampersand.convert('&4a!4b')).toBe('\x1b[31ma!4b')
	})

	it('leaves the original converter unchanged', () => {
		const original = createConverter({ depth: 'tty', autoReset: false })
		const changed = original.withOptions({ depth: 'high' })

		expect(original.options.depth).toBe('tty')
		expect(changed.options).toEqual({ depth: 'high', autoReset: false, marker: '&' })
	})

	it('rejects an invalid marker', () => {
		const converter = createConverter()

		expect(() => converter.withOptions({ marker: '' })).toThrow('Marker must be exactly one character')
	})
})

describe('createConverter', () => {
	it('defaults to high depth, auto reset and the & marker', () => {
		expect(createConverter().options).toEqual({ depth: 'high', autoReset: true, marker: '&' })
	})

	it('throws on a marker longer than one character', () => {
		expect(() => createConverter({ marker: '&&' })).toThrow(
			'Invalid converter options: marker: Marker must be exactly one character',
		)
	})
})

describe('parseConverterOptions', () => {
	it('returns a config error for an empty marker', () => {
		expect(parseConverterOptions({ marker: '' })).toEqual({
			ok: false,
			error: { type: 'config', message: 'marker: Marker must be exactly one character' },
		})
	})

	it('fills defaults', () => {
		expect(parseConverterOptions({ depth: null })).toEqual({
			ok: true,
			value: { depth: null, autoReset: true, marker: '&' },
		})
	})
})

describe('escapeMarkup', () => {
	it('escapes every marker', () => {
		expect(escapeMarkup('a&b&_')).toBe('a&_b&__')
	})

	it('round-trips through convert as literal text', () => {
		const converter = createConverter({ depth: 'high', autoReset: false })
		const text = '&ebold & plain &_ done'

		expect(converter.convert(escapeMarkup(text))).toBe(text)
	})

	it('round-trips with _ as the marker', () => {
		const converter = createConverter({ depth: 'low', autoReset: false, marker: '_' })

		expect(escapeMarkup('_4 and _c', '_')).toBe('__4 and __c')
		expect(converter.convert(escapeMarkup('_4 and _c', '_'))).toBe('_4 and _c')
		expect(converter.clean(escapeMarkup('_4 and _c', '_'))).toBe('_4 and _c')
	})

	it('keeps a code right after an escaped _ marker live', () => {
		const converter = createConverter({ depth: 'low', autoReset: false, marker: '_' })

		expect(converter.convert('___4x')).toBe('_\x1b[31mx')
	})

	it('does not unescape a token formed next to a substituted code', () => {
		const converter = createConverter({ depth: 'low', autoReset: false, marker: 'm' })

		expect(converter.convert('m4_x')).toBe('\x1b[31m_x')
	})
})
