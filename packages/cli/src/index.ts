#!/usr/bin/env node
import { main } from './program.ts'
import { readFirstLine } from './stdin.ts'

main(process.argv.slice(2), {
	out: (text) => process.stdout.write(text),
	err: (text) => process.stderr.write(text),
	readLine: () => readFirstLine(process.stdin),
}).then(
	(code) => {
		process.exitCode = code
	},
	(error: unknown) => {
		console.error(error)
		process.exitCode = 1
	},
)
