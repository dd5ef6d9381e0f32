export { enterBlock, exitBlock, indentLines, reportUnclosedBlocks, resolveLineDepth } from './engine.ts'
export { isIdentifier, parseBlockMarker } from './markers.ts'
export { addWarning, createIndentState, type IndentState } from './state.ts'
export type {
	BlockMarker,
	BlockMarkerKind,
	FormatWarning,
	IndentedLine,
	IndentResult,
	OpenBlock,
} from './types.ts'
export { createIndentUnit, renderIndent } from './unit.ts'
