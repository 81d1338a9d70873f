/**
 * Terminal color support detection and styling helpers for the CLI's own
 * messages.
 *
 * Color is disabled when:
 * - NO_COLOR env var is set to a non-empty value (https://no-color.org/)
 * - TERM=dumb
 * - the stream is not a TTY (piped output)
 *
 * TINCTURE_DEPTH forces a depth, except over NO_COLOR.
 */

import { type Depth, parseDepth } from './codes/depth.js'
import { createConverter, escapeMarkup } from './convert/converter.js'
import type { Env } from './types.js'

export interface InferDepthDeps {
	env: Env
	isTTY: boolean
}

function getDefaultDeps(): InferDepthDeps {
	return {
		env: process.env,
		isTTY: process.stdout.isTTY === true,
	}
}

/**
 * Guesses the best depth the terminal supports, or `null` for no color.
 */
export function inferDepth(deps: Partial<InferDepthDeps> = {}): Depth | null {
	const { env, isTTY } = { ...getDefaultDeps(), ...deps }

	if (env.NO_COLOR) return null

	if (env.TINCTURE_DEPTH !== undefined) {
		const forced = parseDepth(env.TINCTURE_DEPTH)
		if (forced.ok) return forced.value
	}

	if (!isTTY) return null

	const colorterm = env.COLORTERM?.toLowerCase()
	if (colorterm === '24bit' || colorterm === 'truecolor') return 'high'

	const term = env.TERM ?? ''
	if (term === 'dumb') return null
	if (term.includes('24bit') || term === 'terminator' || term === 'mosh') return 'high'
	if (term.includes('256')) return 'medium'
	return 'low'
}

/**
 * Styling functions for diagnostics. Each returns the input unchanged when
 * depth is `null`; the input is never read as markup.
 */
export function createStyles(depth: Depth | null) {
	const converter = createConverter({ depth, autoReset: true })
	const wrap = (codes: string, text: string): string => converter.convert(`${codes}${escapeMarkup(text)}`)

	return {
		/** Red text - for errors */
		red: (text: string): string => wrap('&c', text),

		/** Green text - for success */
		green: (text: string): string => wrap('&a', text),

		/** Yellow text - for warnings */
		yellow: (text: string): string => wrap('&e', text),

		/** Bold text - for emphasis */
		bold: (text: string): string => wrap('&l', text),

		/** Dim text - for de-emphasized information */
		dim: (text: string): string => wrap('&j', text),

		/** Combine bold and red - for fatal errors */
		boldRed: (text: string): string => wrap('&l&c', text),
	} as const
}
