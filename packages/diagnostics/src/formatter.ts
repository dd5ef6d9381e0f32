/**
 * Formatter diagnostic definitions.
 *
 * Error code format: SF<AREA><NUMBER>
 * - SFCFG: Configuration errors (001-099)
 * - SFFMT: Formatting warnings (050-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CONFIGURATION ERRORS (SFCFG001-099)
// =============================================================================

export const SFCFG001: DiagnosticDef = {
	code: 'SFCFG001',
	description: 'The tab size is the number of spaces used per indentation level.',
	message: 'invalid tab size "{value}": expected a non-negative integer',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass a whole number such as `--tabsize 2` or `--tabsize 4`.',
}

// =============================================================================
// FORMATTING WARNINGS (SFFMT050-099)
// =============================================================================

export const SFFMT050: DiagnosticDef = {
	code: 'SFFMT050',
	description: 'This `end` line closes a block, but no block is open at this point.',
	message: 'unmatched `end {name}`: no open block',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Remove this line, or add the `begin {name}` it belongs to.',
}

export const SFFMT051: DiagnosticDef = {
	code: 'SFFMT051',
	description: 'Blocks close in the reverse order they were opened.',
	message: 'mismatched `end {found}`: innermost open block is `{expected}`',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Close `{expected}` with `end {expected}` first.',
}

export const SFFMT052: DiagnosticDef = {
	code: 'SFFMT052',
	description: 'The file ends while this block is still open.',
	message: 'unclosed block `{name}`',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Add `end {name}` where the block should finish.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all formatter diagnostics.
 */
export const FORMATTER_DIAGNOSTICS = {
	// Configuration errors
	SFCFG001,
	// Formatting warnings
	SFFMT050,
	SFFMT051,
	SFFMT052,
} as const

/**
 * All valid formatter diagnostic codes.
 */
export type FormatterDiagnosticCode = keyof typeof FORMATTER_DIAGNOSTICS
