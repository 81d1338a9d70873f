import { createRequire } from 'node:module'
import { type Depth, parseDepth } from './codes/depth.js'
import { type PartialSettings, loadConfig, settingsFromEnv } from './config/loadConfig.js'
import { cleanAnsi } from './convert/cleanAnsi.js'
import {
	type Converter,
	DEFAULT_MARKER,
	createConverter,
	escapeMarkup,
	parseConverterOptions,
} from './convert/converter.js'
import { type Result, type ConfigError, type UsageError, ok, err, usageError, errorMessage } from './result.js'
import { createStyles, inferDepth } from './terminal.js'
import type { Env, ExitFn, OutputStream } from './types.js'
import { showcase } from './ui/print.js'

// Resolves from both src/ and dist/
const require = createRequire(import.meta.url)
const pkg: { name: string; version: string } = require('../package.json')

export const NAME = pkg.name
export const VERSION = pkg.version

export type Mode = 'convert' | 'clean' | 'clean-ansi' | 'escape' | 'showcase' | 'help' | 'version'

export interface CliArgs {
	mode: Mode
	settings: PartialSettings
	configPath?: string
	/** Positional text, empty when input should come from stdin */
	text: string[]
}

export const USAGE = `Usage: ${NAME} [options] [text...]

Converts &-style markup into ANSI escape sequences. Reads stdin when no text is given.

Options:
  -d, --depth <depth>   tty, low, medium, high, none (or 3, 4, 8, 24)
  -m, --marker <char>   marker character (default "${DEFAULT_MARKER}")
      --no-reset        do not append a full reset to the output
      --clean           strip markup codes instead of converting them
      --clean-ansi      strip ANSI escape sequences from the input
      --escape          escape literal markers in the input
      --showcase        print every code at the selected depth
  -c, --config <path>   INI config file (ignored if missing)
  -v, --version         print the version
  -h, --help            print this help
`

const MODE_FLAGS: Record<string, Mode> = {
	'--clean': 'clean',
	'--clean-ansi': 'clean-ansi',
	'--escape': 'escape',
	'--showcase': 'showcase',
	'-h': 'help',
	'--help': 'help',
	'-v': 'version',
	'--version': 'version',
}

const VALUE_FLAGS: Record<string, 'depth' | 'marker' | 'config'> = {
	'-d': 'depth',
	'--depth': 'depth',
	'-m': 'marker',
	'--marker': 'marker',
	'-c': 'config',
	'--config': 'config',
}

/**
 * Parse command line arguments. Supports `--flag value`, `--flag=value` and
 * `--` to end option parsing.
 */
export function parseArgs(args: string[]): Result<CliArgs, UsageError | ConfigError> {
	const parsed: CliArgs = { mode: 'convert', settings: {}, text: [] }

	for (let i = 0; i < args.length; i++) {
		const arg = args[i]

		if (arg === '--') {
			parsed.text.push(...args.slice(i + 1))
			break
		}

		if (!arg.startsWith('-') || arg === '-') {
			parsed.text.push(arg)
			continue
		}

		if (arg === '--no-reset') {
			parsed.settings.autoReset = false
			continue
		}

		const mode = MODE_FLAGS[arg]
		if (mode) {
			// help and version win over any other mode
			if (parsed.mode !== 'help' && parsed.mode !== 'version') parsed.mode = mode
			continue
		}

		const eq = arg.indexOf('=')
		const name = eq === -1 ? arg : arg.slice(0, eq)
		const key = VALUE_FLAGS[name]
		if (!key) {
			return err(usageError(`Unknown option: ${arg}`))
		}

		let value: string
		if (eq !== -1) {
			value = arg.slice(eq + 1)
		} else if (i + 1 < args.length) {
			value = args[++i]
		} else {
			return err(usageError(`Option ${name} requires a value`))
		}

		if (key === 'depth') {
			const depth = parseDepth(value)
			if (!depth.ok) return depth
			parsed.settings.depth = depth.value
		} else if (key === 'marker') {
			parsed.settings.marker = value
		} else {
			parsed.configPath = value
		}
	}

	return ok(parsed)
}

function firstDefined<T>(...values: Array<T | undefined>): T | undefined {
	return values.find((value) => value !== undefined)
}

export interface RunDeps {
	stdout: OutputStream
	stderr: OutputStream
	readStdin: () => Promise<string>
	env: Env
	stdoutIsTTY: boolean
	stderrIsTTY: boolean
	loadConfig: typeof loadConfig
	exit: ExitFn
}

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
	let data = ''
	stream.setEncoding('utf8')
	for await (const chunk of stream) {
		data += String(chunk)
	}
	return data
}

const defaultExit: ExitFn = (code) => process.exit(code)

function getDefaultDeps(): RunDeps {
	return {
		stdout: process.stdout,
		stderr: process.stderr,
		readStdin: () => readAll(process.stdin),
		env: process.env,
		stdoutIsTTY: process.stdout.isTTY === true,
		stderrIsTTY: process.stderr.isTTY === true,
		loadConfig,
		exit: defaultExit,
	}
}

function render(mode: Mode, converter: Converter, text: string): string {
	switch (mode) {
		case 'clean':
			return converter.clean(text)
		case 'clean-ansi':
			return cleanAnsi(text)
		case 'escape':
			return escapeMarkup(text, converter.options.marker)
		default:
			return converter.convert(text)
	}
}

/**
 * Main entry point for the CLI
 * @param args - Command line arguments (defaults to process.argv.slice(2))
 */
export async function run(args: string[] = process.argv.slice(2), deps: Partial<RunDeps> = {}): Promise<void> {
	const { stdout, stderr, readStdin, env, stdoutIsTTY, stderrIsTTY, loadConfig: load, exit } = {
		...getDefaultDeps(),
		...deps,
	}
	const c = createStyles(inferDepth({ env, isTTY: stderrIsTTY }))

	const fail = (code: number, message: string, hint?: string): never => {
		stderr.write(`${c.boldRed('Error:')} ${message}\n`)
		if (hint) stderr.write(`${c.dim(hint)}\n`)
		return exit(code)
	}

	const parsedArgs = parseArgs(args)
	if (!parsedArgs.ok) {
		return fail(2, parsedArgs.error.message, `Run ${NAME} --help for usage.`)
	}
	const { mode, settings: flags, configPath, text } = parsedArgs.value

	if (mode === 'help') {
		stdout.write(USAGE)
		return
	}
	if (mode === 'version') {
		stdout.write(`${NAME} v${VERSION}\n`)
		return
	}

	const fromEnv = settingsFromEnv(env)
	if (!fromEnv.ok) {
		return fail(2, fromEnv.error.message)
	}

	const fromFile = await load(configPath ? { paths: [configPath] } : {})
	if (!fromFile.ok) {
		return fail(2, fromFile.error.message)
	}

	// Precedence: flags, then NO_COLOR, then env, then config file, then detection
	const depth: Depth | null | undefined = firstDefined(
		flags.depth,
		env.NO_COLOR ? null : undefined,
		fromEnv.value.depth,
		fromFile.value.depth,
	)

	const options = parseConverterOptions({
		depth: depth === undefined ? inferDepth({ env, isTTY: stdoutIsTTY }) : depth,
		marker: firstDefined(flags.marker, fromEnv.value.marker, fromFile.value.marker),
		autoReset: firstDefined(flags.autoReset, fromEnv.value.autoReset, fromFile.value.autoReset),
	})
	if (!options.ok) {
		return fail(2, options.error.message)
	}

	const converter = createConverter(options.value)

	if (mode === 'showcase') {
		stdout.write(`${showcase(converter)}\n`)
		return
	}

	if (text.length > 0) {
		stdout.write(`${render(mode, converter, text.join(' '))}\n`)
		return
	}

	let input: string
	try {
		input = await readStdin()
	} catch (error) {
		return fail(1, `Could not read stdin: ${errorMessage(error)}`)
	}
	// The trailing newline stays last, after any auto reset
	const newline = /\r?\n$/.exec(input)?.[0] ?? ''
	stdout.write(render(mode, converter, input.slice(0, input.length - newline.length)) + newline)
}
