import type { BlockMarker } from './types.ts'

const IDENTIFIER = /^[\p{L}_][\p{L}\p{N}_]*$/u

export function isIdentifier(token: string): boolean {
	return IDENTIFIER.test(token)
}

/**
 * Parses a `begin NAME` / `end NAME` marker from a line's tokens.
 * Keywords are case-sensitive; anything after NAME is ignored.
 * Returns null for every other line.
 */
export function parseBlockMarker(tokens: readonly string[]): BlockMarker | null {
	const [keyword, name] = tokens
	if (name === undefined || !isIdentifier(name)) return null
	if (keyword === 'begin' || keyword === 'end') {
		return { kind: keyword, name }
	}
	return null
}
