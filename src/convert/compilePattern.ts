/**
 * Builds the matcher for one marker character.
 *
 *   code       := M ( '~'? ( [0-9a-f] | '#' hex ';' ) | [h-oR] | 'r' [bcfh-o] )
 *   hex        := 3 or 6 lowercase hex digits
 *   escape     := M '_'
 *
 * The escape is the first alternative and captures as `esc`, so the scan
 * consumes it whole and never starts a code on the `_` (which matters when
 * the marker is `_` itself). Formatter and reset letters sit outside the
 * color alphabet, so a match is never ambiguous. Every alternative has a
 * bounded width.
 */

const BODY = '(?:(?<bg>~)?(?:(?<color>[0-9a-f])|#(?<hex>[0-9a-f]{3}|[0-9a-f]{6});)|(?<fmt>[h-oR]|r[bcfh-o]))'

export interface CompiledPattern {
	readonly marker: string
	/** Global matcher over every code form and the escape for `marker` */
	readonly regex: RegExp
	/** Marker followed by `_`; stands for one literal marker */
	readonly escapeToken: string
}

export function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&')
}

export function compilePattern(marker: string): CompiledPattern {
	return Object.freeze({
		marker,
		regex: new RegExp(`${escapeRegExp(marker)}(?:(?<esc>_)|${BODY})`, 'g'),
		escapeToken: `${marker}_`,
	})
}
