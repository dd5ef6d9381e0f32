import assert from 'node:assert'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import { Kernel } from '@adonisjs/ace'
import FormatCommand from '../../src/commands/format.ts'

class CapturedFormatCommand extends FormatCommand {
	output = ''

	protected override writeOutput(text: string): void {
		this.output += text
	}
}

async function runFormat(argv: string[]): Promise<CapturedFormatCommand> {
	const kernel = Kernel.create()
	const command = await kernel.create(CapturedFormatCommand, argv)
	command.ui.switchMode('raw')
	await command.exec()
	return command
}

function logMessages(command: CapturedFormatCommand): string[] {
	return command.ui.logger.getLogs().map((log) => log.message)
}

function hasLog(command: CapturedFormatCommand, text: string): boolean {
	return logMessages(command).some((message) => message.includes(text))
}

describe('format command', () => {
	let dir = ''

	before(async () => {
		dir = await mkdtemp(join(tmpdir(), 'stormfmt-'))
	})

	after(async () => {
		await rm(dir, { force: true, recursive: true })
	})

	async function fixture(name: string, content: string | Uint8Array): Promise<string> {
		const path = join(dir, name)
		await writeFile(path, content)
		return path
	}

	it('should print the formatted document', async () => {
		const path = await fixture('flat.dat', '  value   x\n\n\n\ty  = 1\n')
		const command = await runFormat([path])
		assert.strictEqual(command.output, 'value x\ny = 1\n')
		assert.strictEqual(command.exitCode ?? 0, 0)
	})

	it('should indent section blocks with spaces', async () => {
		const path = await fixture('blocks.storm', 'begin foo\nhello\nend foo\n')
		const command = await runFormat([path, '--section-blocks', '--spaces', '-t', '2'])
		assert.strictEqual(command.output, 'begin foo\n  hello\nend foo\n')
		assert.strictEqual(command.exitCode ?? 0, 0)
	})

	it('should indent section blocks with tabs by default', async () => {
		const path = await fixture('tabs.storm', 'begin foo\n    hello\nend foo\n')
		const command = await runFormat([path, '--section-blocks'])
		assert.strictEqual(command.output, 'begin foo\n\thello\nend foo\n')
	})

	it('should not print warnings to stdout', async () => {
		const path = await fixture('unmatched.dat', 'end foo\nbar\n')
		const command = await runFormat([path, '--section-blocks'])
		assert.strictEqual(command.output, 'end foo\nbar\n')
		assert.strictEqual(hasLog(command, 'SFFMT050'), false)
	})

	it('should fail when the file does not exist', async () => {
		const path = join(dir, 'missing.dat')
		const command = await runFormat([path])
		assert.strictEqual(command.exitCode, 1)
		assert.strictEqual(command.output, '')
		assert.ok(hasLog(command, `[SFCLI001] file not found: ${path}`))
	})

	it('should fail on a file that is not UTF-8 text', async () => {
		const path = await fixture('binary.dat', new Uint8Array([0x62, 0xff, 0xfe, 0x0a]))
		const command = await runFormat([path])
		assert.strictEqual(command.exitCode, 1)
		assert.strictEqual(command.output, '')
		assert.ok(hasLog(command, `[SFCLI003] not a UTF-8 text file: ${path}`))
	})

	it('should fail on an invalid tab size before reading the file', async () => {
		const path = join(dir, 'never-read.dat')
		const command = await runFormat([path, '--spaces', '--tabsize', 'wide'])
		assert.strictEqual(command.exitCode, 1)
		assert.strictEqual(command.output, '')
		assert.ok(hasLog(command, '[SFCFG001] invalid tab size "wide"'))
		assert.strictEqual(hasLog(command, 'SFCLI001'), false)
	})

	describe('--in-place', () => {
		it('should rewrite the file and print nothing to stdout', async () => {
			const path = await fixture('inplace.storm', 'begin a\nx\n\nend a')
			const command = await runFormat([path, '--section-blocks', '--in-place'])
			assert.strictEqual(await readFile(path, 'utf-8'), 'begin a\n\tx\nend a\n')
			assert.strictEqual(command.output, '')
			assert.ok(hasLog(command, `Formatted ${path}`))
			assert.strictEqual(command.exitCode ?? 0, 0)
		})

		it('should report formatting warnings', async () => {
			const path = await fixture('warn.storm', 'begin a\nx\n')
			const command = await runFormat([path, '--section-blocks', '-i'])
			assert.strictEqual(await readFile(path, 'utf-8'), 'begin a\n\tx\n')
			assert.ok(hasLog(command, `${path}:1 [SFFMT052] unclosed block \`a\``))
		})

		it('should leave the file untouched on a config error', async () => {
			const path = await fixture('keep.dat', '  x\n')
			const command = await runFormat([path, '-i', '-t', '2x'])
			assert.strictEqual(command.exitCode, 1)
			assert.strictEqual(await readFile(path, 'utf-8'), '  x\n')
		})
	})
})
