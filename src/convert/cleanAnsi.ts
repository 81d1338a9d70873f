/**
 * Matches ANSI control sequences:
 * - CSI: ESC [ (or the 8-bit CSI byte) params final-byte, e.g. colors and cursor movement
 * - OSC: ESC ] … BEL, e.g. window titles and hyperlinks
 */
const ANSI_PATTERN =
	/[\u001B\u009B][[\]()#;?]*(?:(?:(?:(?:;[-a-zA-Z\d/#&.:=?%@~_]+)*|[a-zA-Z\d]+(?:;[-a-zA-Z\d/#&.:=?%@~_]*)*)?\u0007)|(?:(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-nq-uy=><~]))/g

/**
 * Strips ANSI escape sequences from text. A lone ESC that does not start a
 * valid sequence is left in place.
 */
export function cleanAnsi(text: string): string {
	return text.replace(ANSI_PATTERN, '')
}
