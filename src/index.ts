export { type Depth, DEPTHS, compareDepth, depthBits, parseDepth } from './codes/depth.js'
export {
	type ColorCode,
	type FormatterCode,
	type ResetCode,
	type Rgb,
	COLOR_CODES,
	FORMATTER_CODES,
	RESET_CODES,
} from './codes/palette.js'
export {
	type Converter,
	type ConverterOptions,
	DEFAULT_MARKER,
	FULL_RESET,
	clean,
	createConverter,
	escapeMarkup,
	parseConverterOptions,
} from './convert/converter.js'
export { cleanAnsi } from './convert/cleanAnsi.js'
export { inferDepth } from './terminal.js'
export { print, println, printReset, showcase } from './ui/print.js'
export { promptInput } from './ui/promptInput.js'
export { type Result, type ConfigError, type IoError, ok, err } from './result.js'
