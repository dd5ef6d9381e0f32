import { throwInvalidTabSize } from './errors.ts'

/**
 * Resolved formatting configuration.
 */
export interface FormatConfig {
	/** Indent with `tabSize` spaces instead of one tab per level */
	readonly useSpaces: boolean
	/** Spaces per indentation level; only read when `useSpaces` is set */
	readonly tabSize: number
	/** Nest lines between `begin NAME` and `end NAME` */
	readonly sectionBlocks: boolean
}

/**
 * Options accepted from callers; missing fields take the defaults.
 */
export type FormatOptions = Partial<FormatConfig>

export const DEFAULT_TAB_SIZE = 4

export const DEFAULT_CONFIG: FormatConfig = Object.freeze({
	sectionBlocks: false,
	tabSize: DEFAULT_TAB_SIZE,
	useSpaces: false,
})

const DIGITS = /^\d+$/

/**
 * Checks that a tab size is a non-negative integer.
 */
export function validateTabSize(value: number): number {
	if (!Number.isSafeInteger(value) || value < 0) {
		throwInvalidTabSize(String(value))
	}
	return value
}

/**
 * Parses a tab size given as text, e.g. from a command-line flag.
 */
export function parseTabSize(raw: string): number {
	const trimmed = raw.trim()
	if (!DIGITS.test(trimmed)) {
		throwInvalidTabSize(raw)
	}
	return validateTabSize(Number.parseInt(trimmed, 10))
}

/**
 * Fills in defaults and validates options.
 * @throws ConfigError if an option value is invalid
 */
export function resolveConfig(options: FormatOptions = {}): FormatConfig {
	return Object.freeze({
		sectionBlocks: options.sectionBlocks ?? DEFAULT_CONFIG.sectionBlocks,
		tabSize: validateTabSize(options.tabSize ?? DEFAULT_CONFIG.tabSize),
		useSpaces: options.useSpaces ?? DEFAULT_CONFIG.useSpaces,
	})
}
