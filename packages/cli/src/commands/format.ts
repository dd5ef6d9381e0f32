import { writeFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type FormatOptions, type FormatTextResult, formatText } from '@stormfmt/formatter'
import {
	buildFormatOptions,
	formatReadError,
	formatRunError,
	formatWarning,
	formatWriteError,
	readSourceFile,
} from '../utils.ts'

export default class FormatCommand extends BaseCommand {
	static override commandName = 'format'
	static override description = 'Format a STORM data file (.dat / .storm) and print the result'

	@args.string({ description: 'Input .dat or .storm file to format' })
	declare file: string

	@flags.string({
		alias: 't',
		description: 'Spaces per indentation level, used with --spaces (default: 4)',
	})
	declare tabsize?: string

	@flags.boolean({ description: 'Indent with spaces instead of tabs' })
	declare spaces?: boolean

	@flags.boolean({
		description: 'Treat "begin NAME" / "end NAME" lines as nested block delimiters',
		flagName: 'section-blocks',
	})
	declare sectionBlocks?: boolean

	@flags.boolean({
		alias: 'i',
		description: 'Write the result back to the file instead of printing it',
		flagName: 'in-place',
	})
	declare inPlace?: boolean

	private async readSource(): Promise<string | null> {
		try {
			return await readSourceFile(this.file)
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.file, error))
			this.exitCode = 1
			return null
		}
	}

	private resolveOptions(): FormatOptions | null {
		try {
			return buildFormatOptions({
				sectionBlocks: this.sectionBlocks,
				spaces: this.spaces,
				tabsize: this.tabsize,
			})
		} catch (error: unknown) {
			this.logger.error(formatRunError(error))
			this.exitCode = 1
			return null
		}
	}

	private formatSource(source: string, options: FormatOptions): FormatTextResult | null {
		try {
			return formatText(source, options)
		} catch (error: unknown) {
			this.logger.error(formatRunError(error))
			this.exitCode = 1
			return null
		}
	}

	private async writeInPlace(result: FormatTextResult): Promise<void> {
		try {
			await writeFile(this.file, result.text, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
			return
		}

		for (const warning of result.warnings) {
			this.logger.warning(formatWarning(this.file, warning))
		}
		this.logger.success(`Formatted ${this.file}`)
	}

	/**
	 * Writes the formatted document to stdout. Warnings are not printed
	 * here so the output stays a clean document.
	 */
	protected writeOutput(text: string): void {
		process.stdout.write(text)
	}

	override async run(): Promise<void> {
		const options = this.resolveOptions()
		if (options === null) return

		const source = await this.readSource()
		if (source === null) return

		const result = this.formatSource(source, options)
		if (result === null) return

		if (this.inPlace === true) {
			await this.writeInPlace(result)
			return
		}
		this.writeOutput(result.text)
	}
}
