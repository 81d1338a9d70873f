import * as readline from 'readline/promises'
import type { Converter } from '../convert/converter.js'
import { type Result, type IoError, ok, err, ioError, errorMessage } from '../result.js'

export interface PromptInputDeps {
	createInterface: typeof readline.createInterface
	stdin: NodeJS.ReadableStream
	stdout: NodeJS.WritableStream
}

/**
 * Writes the converted prompt, then reads one line of input (without the
 * trailing newline). Stream failures come back as an IoError.
 */
export async function promptInput(
	converter: Converter,
	prompt: string,
	{
		createInterface = readline.createInterface,
		stdin = process.stdin,
		stdout = process.stdout,
	}: Partial<PromptInputDeps> = {},
): Promise<Result<string, IoError>> {
	const rl = createInterface({ input: stdin, output: stdout })
	try {
		const answer = await rl.question(converter.convert(prompt))
		return ok(answer)
	} catch (error) {
		return err(ioError(`Could not read input: ${errorMessage(error)}`))
	} finally {
		rl.close()
	}
}
