import { z } from 'zod'
import { DepthSchema } from '../codes/depth.js'
import { type Result, type ConfigError, ok, err, configError } from '../result.js'
import { type CompiledPattern, compilePattern } from './compilePattern.js'
import { type CodeMatch, classifyMatch } from './classifyMatch.js'
import { resolveCode } from './resolveCode.js'

export const DEFAULT_MARKER = '&'

export const FULL_RESET = resolveCode({ kind: 'reset', code: 'R' }, 'tty')

export const MarkerSchema = z.string().refine((value) => [...value].length === 1, {
	message: 'Marker must be exactly one character',
})

export const ConverterOptionsSchema = z.object({
	/** `null` disables color: convert() then behaves like clean() */
	depth: DepthSchema.nullable().default('high'),
	/** Append a full reset to converted text that does not already end with one */
	autoReset: z.boolean().default(true),
	marker: MarkerSchema.default(DEFAULT_MARKER),
})

export type ConverterOptions = z.output<typeof ConverterOptionsSchema>

export interface Converter {
	readonly options: Readonly<ConverterOptions>
	/** Replaces every code with its ANSI sequence for the configured depth */
	convert(text: string): string
	/** Removes every code without emitting ANSI */
	clean(text: string): string
	/**
	 * Returns a converter with the given options changed. The compiled matcher
	 * is shared when the marker stays the same.
	 */
	withOptions(overrides: Partial<ConverterOptions>): Converter
}

export function parseConverterOptions(input: unknown): Result<ConverterOptions, ConfigError> {
	const result = ConverterOptionsSchema.safeParse(input)
	if (!result.success) {
		const issue = result.error.errors[0]
		const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
		return err(configError(`${where}${issue.message}`))
	}
	return ok(result.data)
}

/**
 * Runs `replace` over every code in `text` and turns each escape token into
 * one literal marker in the same pass. Text without codes comes back as the
 * very same string.
 */
function substitute(text: string, pattern: CompiledPattern, replace: (match: CodeMatch) => string): string {
	let output = ''
	let last = 0
	let matched = false

	for (const found of text.matchAll(pattern.regex)) {
		const index = found.index ?? 0
		const groups = found.groups ?? {}
		output += text.slice(last, index) + (groups.esc !== undefined ? pattern.marker : replace(classifyMatch(groups)))
		last = index + found[0].length
		matched = true
	}

	return matched ? output + text.slice(last) : text
}

function buildConverter(options: ConverterOptions, pattern: CompiledPattern): Converter {
	const clean = (text: string): string => substitute(text, pattern, () => '')

	const convert = (text: string): string => {
		const { depth, autoReset } = options
		if (depth === null) {
			return clean(text)
		}

		const converted = substitute(text, pattern, (match) => resolveCode(match, depth))
		return autoReset && !converted.endsWith(FULL_RESET) ? converted + FULL_RESET : converted
	}

	const withOptions = (overrides: Partial<ConverterOptions>): Converter => {
		const next = validOptions({ ...options, ...overrides })
		return buildConverter(next, next.marker === pattern.marker ? pattern : compilePattern(next.marker))
	}

	return Object.freeze({ options: Object.freeze({ ...options }), convert, clean, withOptions })
}

function validOptions(input: unknown): ConverterOptions {
	const parsed = parseConverterOptions(input)
	if (!parsed.ok) {
		throw new Error(`Invalid converter options: ${parsed.error.message}`)
	}
	return parsed.value
}

/**
 * Creates a converter. Invalid options (such as a marker longer than one
 * character) throw here, before any text is converted. Use
 * parseConverterOptions first for options that come from users.
 */
export function createConverter(options: Partial<ConverterOptions> = {}): Converter {
	const parsed = validOptions(options)
	return buildConverter(parsed, compilePattern(parsed.marker))
}

/**
 * Removes markup codes for `marker` and unescapes literal markers.
 */
export function clean(text: string, marker: string = DEFAULT_MARKER): string {
	return createConverter({ depth: null, marker }).clean(text)
}

/**
 * Escapes every literal marker so that converting the result with the same
 * marker prints `text` unchanged, apart from the auto reset.
 */
export function escapeMarkup(text: string, marker: string = DEFAULT_MARKER): string {
	return text.split(marker).join(compilePattern(marker).escapeToken)
}
