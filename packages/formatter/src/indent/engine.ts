import type { FormatConfig } from '../core/config.ts'
import type { NormalizedLine } from '../normalize/types.ts'
import { parseBlockMarker } from './markers.ts'
import { addWarning, createIndentState, type IndentState } from './state.ts'
import type { BlockMarker, IndentedLine, IndentResult } from './types.ts'
import { createIndentUnit, renderIndent } from './unit.ts'

/**
 * Opens a block. The `begin` line stays at the enclosing depth.
 * Returns the depth to emit the line at.
 */
export function enterBlock(marker: BlockMarker, lineNumber: number, state: IndentState): number {
	const emitDepth = state.depth
	state.depth++
	state.stack.push({ line: lineNumber, name: marker.name })
	return emitDepth
}

/**
 * Closes a block. The `end` line moves out to the depth after the pop.
 * Depth is clamped at 0; a name that doesn't match the innermost
 * open block still dedents and is only reported.
 */
export function exitBlock(marker: BlockMarker, lineNumber: number, state: IndentState): number {
	state.depth = Math.max(0, state.depth - 1)

	const innermost = state.stack.at(-1)
	if (innermost === undefined) {
		addWarning(state, 'SFFMT050', lineNumber, { name: marker.name })
	} else if (innermost.name === marker.name) {
		state.stack.pop()
	} else {
		addWarning(state, 'SFFMT051', lineNumber, { expected: innermost.name, found: marker.name })
	}
	return state.depth
}

/**
 * Computes the depth of one line and applies its block transition.
 */
export function resolveLineDepth(line: NormalizedLine, state: IndentState): number {
	const marker = parseBlockMarker(line.tokens)
	if (marker === null) return state.depth
	return marker.kind === 'begin'
		? enterBlock(marker, line.lineNumber, state)
		: exitBlock(marker, line.lineNumber, state)
}

/**
 * Reports every block still open at end of input, outermost first.
 */
export function reportUnclosedBlocks(state: IndentState): void {
	for (const block of state.stack) {
		addWarning(state, 'SFFMT052', block.line, { name: block.name })
	}
}

function toIndentedLine(line: NormalizedLine, depth: number, indent: string): IndentedLine {
	return { depth, lineNumber: line.lineNumber, text: `${indent}${line.text}` }
}

/**
 * Depth-to-prefix renderer. The unit is built on the first nested line.
 */
function createIndentRenderer(config: FormatConfig): (depth: number) => string {
	let unit: string | undefined
	return (depth) => {
		if (depth <= 0) return ''
		unit ??= createIndentUnit(config)
		return renderIndent(depth, unit)
	}
}

/**
 * Applies indentation to non-blank normalized lines.
 *
 * Flat mode (sectionBlocks off) puts every line at depth 0, so only the
 * leading whitespace is removed. Section-block mode nests lines between
 * `begin NAME` and `end NAME`:
 *
 *   begin foo        depth 0
 *   \thello          depth 1
 *   end foo          depth 0
 *
 * Mismatched or unmatched `end` lines and unclosed blocks never fail the
 * pass; they come back as warnings.
 */
export function indentLines(lines: readonly NormalizedLine[], config: FormatConfig): IndentResult {
	if (!config.sectionBlocks) {
		return { lines: lines.map((line) => toIndentedLine(line, 0, '')), warnings: [] }
	}

	const indent = createIndentRenderer(config)
	const state = createIndentState()
	const indented = lines.map((line) => {
		const depth = resolveLineDepth(line, state)
		return toIndentedLine(line, depth, indent(depth))
	})
	reportUnclosedBlocks(state)

	return { lines: indented, warnings: state.warnings }
}
