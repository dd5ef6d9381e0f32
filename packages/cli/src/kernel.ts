import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import FormatCommand from './commands/format.ts'

export const version = '0.1.0'

/**
 * Builds the stormfmt kernel with its commands and global flags.
 * Each kernel handles a single invocation.
 */
export function createKernel() {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'stormfmt')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([FormatCommand, HelpCommand]))

	kernel.on('help', async (command, $kernel, parsed) => {
		parsed.args.unshift(command.commandName)
		const help = new HelpCommand($kernel, parsed, kernel.ui, kernel.prompt)
		await help.exec()
		return $kernel.shortcircuit()
	})

	kernel.on('version', async (_, $kernel) => {
		kernel.ui.logger.log(`stormfmt v${version}`)
		return $kernel.shortcircuit()
	})

	return kernel
}
