#!/usr/bin/env node

import { createKernel } from './kernel.ts'
import { resolveArgv } from './utils.ts'

async function main(): Promise<void> {
	const kernel = createKernel()
	await kernel.handle(resolveArgv(process.argv.slice(2)))
	process.exitCode = kernel.exitCode
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
