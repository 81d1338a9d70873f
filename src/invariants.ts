/**
 * Invariant checks
 *
 * A breach means the program itself is wrong (for example the code grammar
 * accepted something the lookup tables do not know). These are never user
 * errors: crash loudly instead of returning a Result.
 */

export function invariantBreach(message: string): never {
	throw new Error(`Invariant breach: ${message}`)
}
