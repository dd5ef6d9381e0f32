/**
 * @stormfmt/diagnostics
 *
 * Shared diagnostic types and definitions for stormfmt packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	SFCLI001,
	SFCLI002,
	SFCLI003,
	SFCLI004,
	SFCLI005,
} from './cli.ts'
export {
	FORMATTER_DIAGNOSTICS,
	type FormatterDiagnosticCode,
	SFCFG001,
	SFFMT050,
	SFFMT051,
	SFFMT052,
} from './formatter.ts'
export { formatDiagnosticMessage, interpolateMessage } from './interpolate.ts'
export { type DiagnosticArgs, type DiagnosticDef, DiagnosticSeverity } from './types.ts'
