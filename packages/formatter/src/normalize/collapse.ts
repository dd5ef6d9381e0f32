import type { NormalizedLine } from './types.ts'

export function isBlankLine(line: NormalizedLine): boolean {
	return line.tokens.length === 0
}

/**
 * Removes blank lines entirely; a run of them leaves nothing behind.
 */
export function collapseBlankLines(lines: readonly NormalizedLine[]): NormalizedLine[] {
	return lines.filter((line) => !isBlankLine(line))
}
