/**
 * Line ending used when a document is rendered back to text.
 */
export type LineEnding = '\n' | '\r\n'

/**
 * An ordered, immutable sequence of lines read from a STORM file.
 */
export interface Document {
	readonly lines: readonly string[]
	readonly lineEnding: LineEnding
}

/**
 * UTF-8 Byte Order Mark (BOM) character.
 * Unnecessary for UTF-8 but sometimes added by editors. We strip it.
 */
const UTF8_BOM = '\uFEFF'

/**
 * Picks CRLF when the source uses it anywhere, LF otherwise.
 */
export function detectLineEnding(source: string): LineEnding {
	return source.includes('\r\n') ? '\r\n' : '\n'
}

/**
 * Splits source text into lines.
 * A trailing line terminator does not start an extra empty line.
 */
export function splitLines(source: string): string[] {
	if (source.length === 0) return []

	const lines = source.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line))
	if (source.endsWith('\n')) {
		lines.pop()
	}
	return lines
}

/**
 * Builds a frozen document from already-split lines.
 */
export function fromLines(lines: readonly string[], lineEnding: LineEnding = '\n'): Document {
	return Object.freeze({ lineEnding, lines: Object.freeze([...lines]) })
}

/**
 * Reads a whole source text into a document.
 */
export function createDocument(text: string): Document {
	const source = text.startsWith(UTF8_BOM) ? text.slice(UTF8_BOM.length) : text
	return fromLines(splitLines(source), detectLineEnding(source))
}

/**
 * Renders a document back to text, terminating every line.
 * An empty document renders as the empty string.
 */
export function renderDocument(document: Document): string {
	if (document.lines.length === 0) return ''
	return `${document.lines.join(document.lineEnding)}${document.lineEnding}`
}
