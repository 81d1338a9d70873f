import { readFile } from 'fs/promises'
import { homedir } from 'os'
import { join } from 'path'
import { parse } from 'ini'
import { z } from 'zod'
import { type Depth, parseDepth } from '../codes/depth.js'
import { MarkerSchema } from '../convert/converter.js'
import { type Result, type ConfigError, ok, err, configError } from '../result.js'
import type { Env, FsModule } from '../types.js'

export const CONFIG_FILE_NAME = '.tincturerc'

/**
 * Settings gathered from one source. A missing key means "not set here";
 * `depth: null` means "no color" was chosen explicitly.
 */
export interface PartialSettings {
	depth?: Depth | null
	marker?: string
	autoReset?: boolean
}

// Case-insensitive for both env and INI values
const BooleanLikeSchema = z.union([
	z.boolean(),
	z
		.string()
		.transform((value) => value.toLowerCase())
		.pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
		.transform((value) => value === 'true' || value === '1' || value === 'yes'),
])

const RawSettingsSchema = z.object({
	depth: z.union([z.string(), z.number()]).optional(),
	marker: MarkerSchema.optional(),
	auto_reset: BooleanLikeSchema.optional(),
})

type RawSettings = z.infer<typeof RawSettingsSchema>

function toSettings(raw: RawSettings, source: string): Result<PartialSettings, ConfigError> {
	const settings: PartialSettings = {}

	if (raw.depth !== undefined) {
		const depth = parseDepth(raw.depth)
		if (!depth.ok) {
			return err(configError(`${source}: ${depth.error.message}`))
		}
		settings.depth = depth.value
	}
	if (raw.marker !== undefined) settings.marker = raw.marker
	if (raw.auto_reset !== undefined) settings.autoReset = raw.auto_reset

	return ok(settings)
}

function validate(input: unknown, source: string): Result<PartialSettings, ConfigError> {
	const result = RawSettingsSchema.safeParse(input)
	if (!result.success) {
		const issue = result.error.errors[0]
		return err(configError(`${source}: ${issue.path.join('.')}: ${issue.message}`))
	}
	return toSettings(result.data, source)
}

/**
 * Reads TINCTURE_DEPTH, TINCTURE_MARKER and TINCTURE_AUTO_RESET. Empty values
 * count as unset.
 */
export function settingsFromEnv(env: Env): Result<PartialSettings, ConfigError> {
	return validate(
		{
			depth: env.TINCTURE_DEPTH || undefined,
			marker: env.TINCTURE_MARKER || undefined,
			auto_reset: env.TINCTURE_AUTO_RESET || undefined,
		},
		'environment',
	)
}

export interface LoadConfigDeps {
	fs: FsModule
	/** Candidate files, first existing one wins */
	paths: string[]
}

function getDefaultDeps(): LoadConfigDeps {
	return {
		fs: {
			readFile: (path, encoding) => readFile(path, encoding),
		},
		paths: [join(process.cwd(), CONFIG_FILE_NAME), join(homedir(), CONFIG_FILE_NAME)],
	}
}

/**
 * Reads a config file's content.
 * Returns null if the file doesn't exist (expected outcome, not an error).
 */
async function readConfigContent(fs: FsModule, path: string): Promise<string | null> {
	try {
		return await fs.readFile(path, 'utf-8')
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			return null
		}
		// Unexpected filesystem error - not ours to handle
		throw error
	}
}

/**
 * Loads settings from the first INI config file found. No file at all is
 * not an error: the result is empty settings.
 *
 * ```ini
 * depth = medium
 * marker = "%"
 * auto_reset = false
 * ```
 *
 * `#` and `;` start INI comments, so quote them when used as the marker.
 */
export async function loadConfig(deps: Partial<LoadConfigDeps> = {}): Promise<Result<PartialSettings, ConfigError>> {
	const { fs, paths } = { ...getDefaultDeps(), ...deps }

	for (const path of paths) {
		const content = await readConfigContent(fs, path)
		if (content === null) continue

		return validate(parse(content), path)
	}

	return ok({})
}
