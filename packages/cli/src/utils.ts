import { readFile } from 'node:fs/promises'
import {
	type CliDiagnosticCode,
	formatDiagnosticMessage,
	SFCLI001,
	SFCLI002,
	SFCLI003,
	SFCLI004,
	SFCLI005,
} from '@stormfmt/diagnostics'
import {
	ConfigError,
	DEFAULT_TAB_SIZE,
	type FormatOptions,
	type FormatWarning,
	parseTabSize,
} from '@stormfmt/formatter'

/**
 * Error thrown when an input file exists but can't be used as text.
 */
export class InputError extends Error {
	readonly code: CliDiagnosticCode
	readonly path: string

	constructor(message: string, code: CliDiagnosticCode, path: string) {
		super(message)
		this.name = 'InputError'
		this.code = code
		this.path = path
	}
}

/**
 * Flag values as the format command receives them.
 */
export interface FormatFlags {
	tabsize?: string
	spaces?: boolean
	sectionBlocks?: boolean
}

const COMMANDS = new Set(['format', 'help'])
const VERSION_FLAGS = new Set(['-v', '--version'])

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Routes bare `stormfmt <file> [options]` invocations to the format command.
 * A leading version flag goes to the kernel's default command, which takes
 * no arguments, and a bare `help` shows the format command's help.
 */
export function resolveArgv(argv: readonly string[]): string[] {
	const [first] = argv
	if (first === undefined) return ['format']
	if (VERSION_FLAGS.has(first)) return [...argv]
	if (first === 'help' && argv.length === 1) return ['format', '--help']
	if (COMMANDS.has(first)) return [...argv]
	return ['format', ...argv]
}

/**
 * Decodes file bytes as UTF-8, rejecting malformed sequences.
 */
export function decodeSource(bytes: Uint8Array, filePath: string): string {
	try {
		return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
	} catch {
		throw new InputError(formatDiagnosticMessage(SFCLI003, { path: filePath }), 'SFCLI003', filePath)
	}
}

export async function readSourceFile(filePath: string): Promise<string> {
	return decodeSource(await readFile(filePath), filePath)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (error instanceof InputError) {
		return error.message
	}
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatDiagnosticMessage(SFCLI001, { path: filePath })
	}
	return formatDiagnosticMessage(SFCLI002, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatDiagnosticMessage(SFCLI004, { reason: getErrorMessage(error) })
}

export function formatRunError(error: unknown): string {
	if (error instanceof ConfigError) {
		return error.message
	}
	return formatDiagnosticMessage(SFCLI005, { reason: getErrorMessage(error) })
}

/**
 * Renders a formatting warning as `file:line [CODE] message`.
 */
export function formatWarning(filePath: string, warning: FormatWarning): string {
	return `${filePath}:${warning.line} [${warning.code}] ${warning.message}`
}

/**
 * Maps command flags to formatter options.
 * @throws ConfigError if --tabsize is not a non-negative integer
 */
export function buildFormatOptions(flags: FormatFlags): FormatOptions {
	return {
		sectionBlocks: flags.sectionBlocks === true,
		tabSize: flags.tabsize === undefined ? DEFAULT_TAB_SIZE : parseTabSize(flags.tabsize),
		useSpaces: flags.spaces === true,
	}
}
