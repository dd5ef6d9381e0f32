/**
 * A source line after whitespace normalization.
 * Line is 1-indexed and refers to the input document.
 */
export interface NormalizedLine {
	readonly lineNumber: number
	readonly tokens: readonly string[]
	readonly text: string
}
