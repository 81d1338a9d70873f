import type { Depth } from './depth.js'

/**
 * Lookup tables for every code the markup grammar accepts.
 *
 * The tables and the grammar in compilePattern.ts are designed together:
 * each symbol the grammar can match has exactly one entry here.
 */

export const COLOR_CODES = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9', 'a', 'b', 'c', 'd', 'e', 'f'] as const

export type ColorCode = (typeof COLOR_CODES)[number]

export const FORMATTER_CODES = ['h', 'i', 'j', 'k', 'l', 'm', 'n', 'o'] as const

export type FormatterCode = (typeof FORMATTER_CODES)[number]

export const RESET_CODES = ['R', 'rf', 'rb', 'rc', 'rh', 'ri', 'rj', 'rk', 'rl', 'rm', 'rn', 'ro'] as const

export type ResetCode = (typeof RESET_CODES)[number]

export type Rgb = readonly [r: number, g: number, b: number]

type PaletteDepth = Exclude<Depth, 'high'>

const PALETTES: Record<PaletteDepth, Record<ColorCode, number>> = {
	tty: {
		'0': 30,
		'1': 34,
		'2': 32,
		'3': 36,
		'4': 31,
		'5': 35,
		'6': 33,
		'7': 37,
		'8': 30,
		'9': 34,
		a: 32,
		b: 34,
		c: 31,
		d: 35,
		e: 33,
		f: 37,
	},
	low: {
		'0': 30,
		'1': 34,
		'2': 32,
		'3': 36,
		'4': 31,
		'5': 35,
		'6': 33,
		'7': 37,
		'8': 90,
		'9': 94,
		a: 92,
		b: 96,
		c: 91,
		d: 95,
		e: 93,
		f: 97,
	},
	medium: {
		'0': 0,
		'1': 19,
		'2': 34,
		'3': 37,
		'4': 124,
		'5': 127,
		'6': 214,
		'7': 248,
		'8': 240,
		'9': 147,
		a: 83,
		b: 87,
		c: 203,
		d: 207,
		e: 227,
		f: 15,
	},
}

const TRUE_COLORS: Record<ColorCode, Rgb> = {
	'0': [0, 0, 0],
	'1': [0, 0, 170],
	'2': [0, 170, 0],
	'3': [0, 170, 170],
	'4': [170, 0, 0],
	'5': [170, 0, 170],
	'6': [255, 170, 0],
	'7': [170, 170, 170],
	'8': [85, 85, 85],
	'9': [85, 85, 255],
	a: [85, 255, 85],
	b: [85, 255, 255],
	c: [255, 85, 85],
	d: [255, 85, 255],
	e: [255, 255, 85],
	f: [255, 255, 255],
}

const FORMATTERS: Record<FormatterCode, number> = {
	h: 8, // hidden
	i: 7, // inverse
	j: 2, // dim
	k: 5, // blink
	l: 1, // bold
	m: 9, // strikethrough
	n: 4, // underline
	o: 3, // italic
}

const RESETS: Record<ResetCode, readonly number[]> = {
	R: [0],
	rf: [39],
	rb: [49],
	rc: [39, 49],
	rh: [28],
	ri: [27],
	rj: [22],
	rk: [25],
	rl: [22],
	rm: [29],
	rn: [24],
	ro: [23],
}

export type ColorValue = { kind: 'sgr'; value: number } | { kind: 'rgb'; value: Rgb }

const COLOR_SET = new Set<string>(COLOR_CODES)
const FORMATTER_SET = new Set<string>(FORMATTER_CODES)
const RESET_SET = new Set<string>(RESET_CODES)

export function isColorCode(code: string): code is ColorCode {
	return COLOR_SET.has(code)
}

export function isFormatterCode(code: string): code is FormatterCode {
	return FORMATTER_SET.has(code)
}

export function isResetCode(code: string): code is ResetCode {
	return RESET_SET.has(code)
}

export function colorLookup(depth: Depth, code: ColorCode): ColorValue {
	if (depth === 'high') {
		return { kind: 'rgb', value: TRUE_COLORS[code] }
	}
	return { kind: 'sgr', value: PALETTES[depth][code] }
}

export function attributeLookup(code: FormatterCode): number {
	return FORMATTERS[code]
}

export function resetLookup(code: ResetCode): readonly number[] {
	return RESETS[code]
}
