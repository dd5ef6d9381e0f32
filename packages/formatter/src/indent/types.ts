import type { DiagnosticCode } from '../core/diagnostics.ts'

/**
 * Block delimiter keywords recognised in section-block mode.
 */
export type BlockMarkerKind = 'begin' | 'end'

/**
 * A `begin NAME` or `end NAME` line.
 */
export interface BlockMarker {
	readonly kind: BlockMarkerKind
	readonly name: string
}

/**
 * A block opened by `begin NAME` that has not been closed yet.
 */
export interface OpenBlock {
	readonly name: string
	readonly line: number
}

/**
 * A formatted line. Depth is the number of indentation units in its prefix.
 */
export interface IndentedLine {
	readonly lineNumber: number
	readonly depth: number
	readonly text: string
}

/**
 * A formatting anomaly. Reported, never fatal.
 */
export interface FormatWarning {
	readonly code: DiagnosticCode
	readonly line: number
	readonly message: string
	readonly suggestion?: string
}

export interface IndentResult {
	lines: IndentedLine[]
	warnings: FormatWarning[]
}
