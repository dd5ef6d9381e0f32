/**
 * Re-export diagnostic types and formatter definitions from shared package.
 */

import { FORMATTER_DIAGNOSTICS } from '@stormfmt/diagnostics'

export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	FORMATTER_DIAGNOSTICS,
	type FormatterDiagnosticCode,
	formatDiagnosticMessage,
	interpolateMessage,
	SFCFG001,
	SFFMT050,
	SFFMT051,
	SFFMT052,
} from '@stormfmt/diagnostics'

/**
 * All valid diagnostic codes for the formatter.
 */
export type DiagnosticCode = keyof typeof FORMATTER_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof FORMATTER_DIAGNOSTICS)[typeof code] {
	return FORMATTER_DIAGNOSTICS[code]
}
