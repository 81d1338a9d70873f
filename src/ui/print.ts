import { type Converter, escapeMarkup } from '../convert/converter.js'
import { COLOR_CODES, FORMATTER_CODES } from '../codes/palette.js'
import type { OutputStream } from '../types.js'

export function print(converter: Converter, text: string, stream: OutputStream = process.stdout): void {
	stream.write(converter.convert(text))
}

export function println(converter: Converter, text: string, stream: OutputStream = process.stdout): void {
	stream.write(`${converter.convert(text)}\n`)
}

/** Writes the full reset sequence (nothing when color is off). */
export function printReset(converter: Converter, stream: OutputStream = process.stdout): void {
	stream.write(converter.convert(`${converter.options.marker}R`))
}

/**
 * Every color code followed by every attribute, each shown on its own
 * letter: `&00&11…&ff&R&hh&R&ii…&R&oo`.
 */
export function showcase(converter: Converter): string {
	const m = converter.options.marker
	const colors = COLOR_CODES.map((code) => `${m}${code}${escapeMarkup(code, m)}`).join('')
	const attributes = FORMATTER_CODES.map((code) => `${m}R${m}${code}${escapeMarkup(code, m)}`).join('')
	return converter.convert(colors + attributes)
}
