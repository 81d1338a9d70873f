import {
	type ColorCode,
	type FormatterCode,
	type ResetCode,
	type Rgb,
	isColorCode,
	isFormatterCode,
	isResetCode,
} from '../codes/palette.js'
import { invariantBreach } from '../invariants.js'

/**
 * One recognized code, classified by what it does.
 */
export type CodeMatch =
	| { kind: 'formatter'; code: FormatterCode }
	| { kind: 'reset'; code: ResetCode }
	| { kind: 'color'; background: boolean; code: ColorCode }
	| { kind: 'hex'; background: boolean; rgb: Rgb }

/** Named groups captured by the matcher from compilePattern.ts */
export interface CodeGroups {
	bg?: string
	color?: string
	hex?: string
	fmt?: string
}

/**
 * Expands `f0f` to `ff00ff` and splits the 6 digits into channel bytes.
 */
export function parseHex(digits: string): Rgb {
	const full = digits.length === 3 ? [...digits].map((nibble) => nibble + nibble).join('') : digits
	if (!/^[0-9a-fA-F]{6}$/.test(full)) {
		return invariantBreach(`hex literal "${digits}" is not 3 or 6 hex digits`)
	}
	return [parseInt(full.slice(0, 2), 16), parseInt(full.slice(2, 4), 16), parseInt(full.slice(4, 6), 16)]
}

export function classifyMatch(groups: CodeGroups): CodeMatch {
	const background = groups.bg === '~'

	if (groups.color !== undefined) {
		if (!isColorCode(groups.color)) {
			return invariantBreach(`no palette entry for color code "${groups.color}"`)
		}
		return { kind: 'color', background, code: groups.color }
	}

	if (groups.hex !== undefined) {
		return { kind: 'hex', background, rgb: parseHex(groups.hex) }
	}

	if (groups.fmt !== undefined) {
		if (isFormatterCode(groups.fmt)) {
			return { kind: 'formatter', code: groups.fmt }
		}
		if (isResetCode(groups.fmt)) {
			return { kind: 'reset', code: groups.fmt }
		}
		return invariantBreach(`no table entry for code "${groups.fmt}"`)
	}

	return invariantBreach('match captured no code group')
}
