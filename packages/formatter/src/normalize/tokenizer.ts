import type { Document } from '../core/document.ts'
import type { NormalizedLine } from './types.ts'
import { isWhitespace } from './whitespace.ts'

/**
 * Separator placed between tokens of a normalized line.
 */
export const TOKEN_SEPARATOR = ' '

/**
 * Splits a line into runs of non-whitespace characters.
 * Quotes, brackets and comments are not interpreted.
 */
export function tokenizeLine(line: string): string[] {
	const tokens: string[] = []
	let tokenStart = -1

	for (let i = 0; i < line.length; i++) {
		if (isWhitespace(line.charAt(i))) {
			if (tokenStart !== -1) {
				tokens.push(line.slice(tokenStart, i))
				tokenStart = -1
			}
		} else if (tokenStart === -1) {
			tokenStart = i
		}
	}

	if (tokenStart !== -1) {
		tokens.push(line.slice(tokenStart))
	}
	return tokens
}

export function joinTokens(tokens: readonly string[]): string {
	return tokens.join(TOKEN_SEPARATOR)
}

export function normalizeLine(line: string, lineNumber: number): NormalizedLine {
	const tokens = tokenizeLine(line)
	return { lineNumber, text: joinTokens(tokens), tokens }
}

/**
 * Normalizes every line of a document, blank lines included.
 */
export function normalizeLines(document: Document): NormalizedLine[] {
	return document.lines.map((line, index) => normalizeLine(line, index + 1))
}
