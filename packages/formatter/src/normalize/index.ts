export { collapseBlankLines, isBlankLine } from './collapse.ts'
export { joinTokens, normalizeLine, normalizeLines, TOKEN_SEPARATOR, tokenizeLine } from './tokenizer.ts'
export type { NormalizedLine } from './types.ts'
export { isWhitespace } from './whitespace.ts'
