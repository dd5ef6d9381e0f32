/**
 * stormfmt Formatter Public API
 *
 * Pure pipeline over an immutable document:
 * - Normalize: split each line on whitespace, rejoin with single spaces
 * - Collapse: drop lines with no tokens
 * - Indent: prefix each line with depth × unit, optionally tracking
 *   `begin NAME` / `end NAME` blocks
 */

import { type FormatConfig, type FormatOptions, resolveConfig } from './core/config.ts'
import { createDocument, type Document, fromLines, renderDocument } from './core/document.ts'
import { indentLines } from './indent/engine.ts'
import type { FormatWarning, IndentedLine } from './indent/types.ts'
import { collapseBlankLines } from './normalize/collapse.ts'
import { normalizeLines } from './normalize/tokenizer.ts'

export {
	DEFAULT_CONFIG,
	DEFAULT_TAB_SIZE,
	type FormatConfig,
	type FormatOptions,
	parseTabSize,
	resolveConfig,
	validateTabSize,
} from './core/config.ts'
export {
	type DiagnosticCode,
	DiagnosticSeverity,
	getDiagnostic,
} from './core/diagnostics.ts'
export {
	createDocument,
	type Document,
	detectLineEnding,
	fromLines,
	type LineEnding,
	renderDocument,
	splitLines,
} from './core/document.ts'
export { ConfigError } from './core/errors.ts'
export {
	type BlockMarker,
	type BlockMarkerKind,
	createIndentState,
	createIndentUnit,
	type FormatWarning,
	type IndentedLine,
	type IndentResult,
	type IndentState,
	indentLines,
	parseBlockMarker,
	renderIndent,
} from './indent/index.ts'
export {
	collapseBlankLines,
	isBlankLine,
	joinTokens,
	type NormalizedLine,
	normalizeLine,
	normalizeLines,
	tokenizeLine,
} from './normalize/index.ts'

/**
 * Result of formatting a document.
 */
export interface FormatResult {
	/** The formatted document, keeping the input's line ending */
	document: Document
	/** Formatted lines with their depth and source line number */
	lines: IndentedLine[]
	/** Block anomalies found in section-block mode */
	warnings: FormatWarning[]
}

export interface FormatTextResult {
	text: string
	warnings: FormatWarning[]
}

/**
 * Format a STORM document.
 *
 * Runs the three stages in order:
 * 1. Normalization (lines → token-joined lines)
 * 2. Collapsing (drop blank lines)
 * 3. Indentation (depth per line, prefix applied)
 *
 * @param document - Source document
 * @param config - Resolved configuration
 */
export function format(document: Document, config: FormatConfig): FormatResult {
	const content = collapseBlankLines(normalizeLines(document))
	const { lines, warnings } = indentLines(content, config)

	return {
		document: fromLines(
			lines.map((line) => line.text),
			document.lineEnding
		),
		lines,
		warnings,
	}
}

/**
 * Format STORM source text.
 *
 * @throws {ConfigError} If an option value is invalid
 */
export function formatText(source: string, options: FormatOptions = {}): FormatTextResult {
	const config = resolveConfig(options)
	const result = format(createDocument(source), config)
	return { text: renderDocument(result.document), warnings: result.warnings }
}
