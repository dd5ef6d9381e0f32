const WHITESPACE = /\s/

/**
 * Classifies a character as a token separator.
 * Covers spaces, tabs, stray carriage returns and Unicode spaces.
 */
export function isWhitespace(char: string): boolean {
	return char.length > 0 && WHITESPACE.test(char)
}
