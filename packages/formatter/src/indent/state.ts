import { type DiagnosticArgs, type DiagnosticCode, getDiagnostic, interpolateMessage } from '../core/diagnostics.ts'
import type { FormatWarning, OpenBlock } from './types.ts'

/**
 * State threaded through the indentation pass.
 * The stack only feeds diagnostics; depth alone drives output.
 */
export interface IndentState {
	depth: number
	stack: OpenBlock[]
	warnings: FormatWarning[]
}

export function createIndentState(): IndentState {
	return {
		depth: 0,
		stack: [],
		warnings: [],
	}
}

/**
 * Records a warning from the catalog against a source line.
 */
export function addWarning(
	state: IndentState,
	code: DiagnosticCode,
	line: number,
	args: DiagnosticArgs
): void {
	const def = getDiagnostic(code)
	const message = interpolateMessage(def.message, args)
	if (def.suggestion === undefined) {
		state.warnings.push({ code, line, message })
		return
	}
	state.warnings.push({ code, line, message, suggestion: interpolateMessage(def.suggestion, args) })
}
