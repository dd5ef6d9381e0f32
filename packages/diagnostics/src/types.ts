/**
 * Diagnostic severity levels.
 * Errors abort a run; warnings are reported alongside the formatted output.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Diagnostic definition in the catalog.
 * `message` and `suggestion` may contain `{placeholder}` arguments.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>
