import { z } from 'zod'
import { type Result, type ConfigError, ok, err, configError } from '../result.js'

/**
 * Color precision tiers, lowest first.
 *
 * - tty: 8 colors, the bright half of the palette folds onto the normal one
 * - low: 16 colors
 * - medium: 256 colors
 * - high: 24-bit RGB
 */
export const DEPTHS = ['tty', 'low', 'medium', 'high'] as const

export type Depth = (typeof DEPTHS)[number]

const DEPTH_BITS: Record<Depth, number> = {
	tty: 3,
	low: 4,
	medium: 8,
	high: 24,
}

export const DepthSchema = z.enum(DEPTHS)

export function depthBits(depth: Depth): number {
	return DEPTH_BITS[depth]
}

/**
 * Negative when `a` is the lower tier, positive when it is the higher one.
 */
export function compareDepth(a: Depth, b: Depth): number {
	return DEPTH_BITS[a] - DEPTH_BITS[b]
}

/**
 * Parses a depth given by name (`tty`, `low`, `medium`, `high`) or by bit
 * count (`3`, `4`, `8`, `24`). `none` selects no color and yields `null`.
 */
export function parseDepth(value: string | number): Result<Depth | null, ConfigError> {
	const normalized = String(value).trim().toLowerCase()

	if (normalized === 'none') {
		return ok(null)
	}

	const named = DepthSchema.safeParse(normalized)
	if (named.success) {
		return ok(named.data)
	}

	const byBits = DEPTHS.find((depth) => String(DEPTH_BITS[depth]) === normalized)
	if (byBits) {
		return ok(byBits)
	}

	return err(configError(`Invalid depth "${value}". Expected one of: tty, low, medium, high, none, 3, 4, 8, 24`))
}
