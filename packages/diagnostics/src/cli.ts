/**
 * CLI diagnostic definitions.
 *
 * Error code format: SFCLI<NUMBER>
 * - SFCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (SFCLI001-099)
// =============================================================================

export const SFCLI001: DiagnosticDef = {
	code: 'SFCLI001',
	description: "stormfmt couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const SFCLI002: DiagnosticDef = {
	code: 'SFCLI002',
	description: "The file exists but stormfmt can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const SFCLI003: DiagnosticDef = {
	code: 'SFCLI003',
	description: "The file isn't UTF-8 text, so stormfmt can't split it into lines.",
	message: 'not a UTF-8 text file: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Re-save the file as UTF-8 before formatting it.',
}

export const SFCLI004: DiagnosticDef = {
	code: 'SFCLI004',
	description: "stormfmt couldn't write the formatted text back to the file.",
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for this file.',
}

export const SFCLI005: DiagnosticDef = {
	code: 'SFCLI005',
	description: 'Something unexpected went wrong while formatting.',
	message: 'formatting failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your input file, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	SFCLI001,
	SFCLI002,
	SFCLI003,
	SFCLI004,
	SFCLI005,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
