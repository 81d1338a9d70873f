/**
 * Result type for explicit error handling.
 * Expected failures are modeled in types, not exceptions.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error }
}

/**
 * A user-supplied option (flag, env var, config file entry) failed validation.
 */
export type ConfigError = {
	type: 'config'
	message: string
}

/**
 * The command line itself is malformed: unknown flag, missing flag value.
 */
export type UsageError = {
	type: 'usage'
	message: string
}

/**
 * Reading from or writing to a stream failed.
 */
export type IoError = {
	type: 'io'
	message: string
}

export function configError(message: string): ConfigError {
	return { type: 'config', message }
}

export function usageError(message: string): UsageError {
	return { type: 'usage', message }
}

export function ioError(message: string): IoError {
	return { type: 'io', message }
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
