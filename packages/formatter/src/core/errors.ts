import { type FormatterDiagnosticCode, formatDiagnosticMessage, SFCFG001 } from './diagnostics.ts'

/**
 * Error thrown when a formatting option has an invalid value.
 * Raised before any line is formatted.
 */
export class ConfigError extends Error {
	readonly code: FormatterDiagnosticCode
	readonly option: string
	readonly value: string

	constructor(message: string, code: FormatterDiagnosticCode, option: string, value: string) {
		super(message)
		this.name = 'ConfigError'
		this.code = code
		this.option = option
		this.value = value
	}
}

/**
 * Throws a tab size error for the raw value the user supplied.
 */
export function throwInvalidTabSize(value: string): never {
	throw new ConfigError(formatDiagnosticMessage(SFCFG001, { value }), 'SFCFG001', 'tabSize', value)
}
