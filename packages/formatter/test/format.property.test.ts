import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { createDocument, type FormatOptions, formatText, normalizeLine } from '../src/index.ts'

const tokenArb = fc
	.array(fc.constantFrom('a', 'b', 'Z', '_', '1', '=', '{', '}', '"', ';'), {
		maxLength: 6,
		minLength: 1,
	})
	.map((chars) => chars.join(''))

const separatorArb = fc
	.array(fc.constantFrom(' ', '\t'), { maxLength: 4, minLength: 1 })
	.map((chars) => chars.join(''))

const paddingArb = fc.array(fc.constantFrom(' ', '\t'), { maxLength: 4 }).map((chars) => chars.join(''))

const lineArb = fc.oneof(
	fc.string(),
	fc.constantFrom('', '   ', '\t'),
	fc.constantFrom('begin a', 'begin b', 'end a', 'end b', '  begin   a  ', '\tend b')
)

const sourceArb = fc
	.tuple(fc.array(lineArb, { maxLength: 30 }), fc.constantFrom('\n', '\r\n'), fc.boolean())
	.map(([lines, eol, trailing]) => `${lines.join(eol)}${trailing && lines.length > 0 ? eol : ''}`)

const optionsArb: fc.Arbitrary<FormatOptions> = fc.record({
	sectionBlocks: fc.boolean(),
	tabSize: fc.integer({ max: 8, min: 0 }),
	useSpaces: fc.boolean(),
})

function countLines(text: string): number {
	return createDocument(text).lines.length
}

describe('format properties', () => {
	it('is idempotent', () => {
		fc.assert(
			fc.property(sourceArb, optionsArb, (source, options) => {
				const once = formatText(source, options).text
				return formatText(once, options).text === once
			}),
			{ numRuns: 500 }
		)
	})

	it('never produces more lines than it reads', () => {
		fc.assert(
			fc.property(sourceArb, optionsArb, (source, options) => {
				return countLines(formatText(source, options).text) <= countLines(source)
			}),
			{ numRuns: 500 }
		)
	})

	it('never emits a blank line', () => {
		fc.assert(
			fc.property(sourceArb, optionsArb, (source, options) => {
				return createDocument(formatText(source, options).text).lines.every(
					(line) => line.trim().length > 0
				)
			}),
			{ numRuns: 500 }
		)
	})

	it('leaves no leading whitespace in flat mode', () => {
		fc.assert(
			fc.property(sourceArb, (source) => {
				return createDocument(formatText(source).text).lines.every(
					(line) => line === line.trimStart()
				)
			}),
			{ numRuns: 500 }
		)
	})

	it('joins tokens with single spaces regardless of separators', () => {
		fc.assert(
			fc.property(
				fc.array(tokenArb, { maxLength: 8, minLength: 1 }),
				fc.array(separatorArb, { maxLength: 8, minLength: 8 }),
				paddingArb,
				paddingArb,
				(tokens, separators, leading, trailing) => {
					const line = tokens.map((token, i) => (i === 0 ? token : `${separators[i] ?? ' '}${token}`))
					const normalized = normalizeLine(`${leading}${line.join('')}${trailing}`, 1)
					assert.deepStrictEqual(normalized.tokens, tokens)
					assert.strictEqual(normalized.text, tokens.join(' '))
				}
			),
			{ numRuns: 500 }
		)
	})
})
