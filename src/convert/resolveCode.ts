import type { Depth } from '../codes/depth.js'
import { type Rgb, attributeLookup, colorLookup, resetLookup } from '../codes/palette.js'
import type { CodeMatch } from './classifyMatch.js'

const sgr = (params: string | number): string => `\x1b[${params}m`

const trueColor = ([r, g, b]: Rgb, background: boolean): string =>
	sgr(`${background ? 48 : 38};2;${r};${g};${b}`)

/**
 * Turns a classified code into the ANSI sequence for `depth`.
 *
 * Attributes and resets ignore depth. Hex literals always use the 24-bit form.
 * Palette colors are looked up per depth; backgrounds at tty/low shift the
 * foreground parameter by 10, while medium and high switch to the 48;… family.
 */
export function resolveCode(match: CodeMatch, depth: Depth): string {
	switch (match.kind) {
		case 'formatter':
			return sgr(attributeLookup(match.code))
		case 'reset':
			return resetLookup(match.code).map(sgr).join('')
		case 'hex':
			return trueColor(match.rgb, match.background)
		case 'color': {
			const color = colorLookup(depth, match.code)
			if (color.kind === 'rgb') {
				return trueColor(color.value, match.background)
			}
			if (depth === 'medium') {
				return sgr(`${match.background ? 48 : 38};5;${color.value}`)
			}
			return sgr(match.background ? color.value + 10 : color.value)
		}
	}
}
