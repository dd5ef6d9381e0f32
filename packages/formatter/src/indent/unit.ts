import { type FormatConfig, validateTabSize } from '../core/config.ts'

/**
 * Returns the prefix for one indentation level.
 */
export function createIndentUnit(config: FormatConfig): string {
	if (!config.useSpaces) return '\t'
	return ' '.repeat(validateTabSize(config.tabSize))
}

export function renderIndent(depth: number, unit: string): string {
	return unit.repeat(Math.max(0, depth))
}
