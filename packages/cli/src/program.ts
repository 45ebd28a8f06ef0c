import {
	compile,
	disassemble,
	formatInstruction,
	formatTokens,
	isCalcError,
	isNotation,
	NOTATIONS,
	type Notation,
	parseTokens,
	run,
	tokenize,
} from '@calcvm/core'
import { Command, CommanderError, Option } from 'commander'

export const VERSION = '0.1.0'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

const EMIT_STAGES = ['result', 'tokens', 'ast', 'bytecode'] as const

type EmitStage = (typeof EMIT_STAGES)[number]

function isEmitStage(value: string): value is EmitStage {
	return EMIT_STAGES.some((stage) => stage === value)
}

/**
 * Where the program reads its expression from and writes its output to.
 * Writers receive complete text, trailing newline included.
 */
export interface ProgramIO {
	readonly out: (text: string) => void
	readonly err: (text: string) => void
	/** First line of standard input, or `undefined` when it is empty. */
	readonly readLine: () => Promise<string | undefined>
}

interface CliOptions {
	readonly notation: string
	readonly emit: string
	readonly debug?: boolean
}

interface Settings {
	readonly notation: Notation
	readonly emit: EmitStage
	readonly debug: boolean
}

function toSettings(command: Command, options: CliOptions): Settings {
	const { notation, emit } = options
	// commander enforces the choices; this narrows them
	if (!isNotation(notation)) {
		return command.error(`error: unknown notation '${notation}'`, { exitCode: EXIT_USAGE })
	}
	if (!isEmitStage(emit)) {
		return command.error(`error: unknown stage '${emit}'`, { exitCode: EXIT_USAGE })
	}
	return { notation, emit, debug: options.debug === true }
}

async function readExpression(command: Command, words: readonly string[], io: ProgramIO) {
	// an argument, even an empty one, is the expression; only stdin can be missing
	if (words.length > 0) {
		return words.join(' ')
	}
	const source = await io.readLine()
	if (source === undefined || source.trim() === '') {
		return command.error(
			'error: missing expression, pass it as arguments or on standard input',
			{ exitCode: EXIT_USAGE, code: 'calcvm.missingExpression' },
		)
	}
	return source
}

function execute(source: string, settings: Settings, io: ProgramIO): string {
	const debug = (message: string) => {
		if (settings.debug) {
			io.err(`${message}\n`)
		}
	}

	const tokens = tokenize(source)
	debug(`tokens: ${formatTokens(tokens)}`)
	if (settings.emit === 'tokens') {
		return formatTokens(tokens)
	}

	const expr = parseTokens(tokens, settings.notation)
	debug(`ast: ${JSON.stringify(expr)}`)
	if (settings.emit === 'ast') {
		return JSON.stringify(expr, null, 2)
	}

	const program = compile(expr)
	debug(`program: ${program.map(formatInstruction).join('; ')}`)
	if (settings.emit === 'bytecode') {
		return disassemble(program)
	}

	const result = run(program, {
		trace: settings.debug
			? ({ index, instruction, stack }) =>
					debug(`vm: #${index} ${formatInstruction(instruction)} [${stack.join(', ')}]`)
			: undefined,
	})
	return String(result)
}

export function createProgram(io: ProgramIO): Command {
	const program = new Command()

	program
		.name('calcvm')
		.description('Compile an arithmetic expression to stack-machine code and run it.')
		.version(VERSION)
		.argument('[expression...]', 'expression to evaluate, read from standard input when omitted')
		.addOption(
			new Option('-n, --notation <notation>', 'notation of the expression')
				.choices(NOTATIONS)
				.default('infix')
				.env('CALCVM_NOTATION'),
		)
		.addOption(
			new Option('-e, --emit <stage>', 'print the output of this stage')
				.choices(EMIT_STAGES)
				.default('result'),
		)
		.addOption(
			new Option('-d, --debug', 'trace every stage and machine step on stderr').env(
				'CALCVM_DEBUG',
			),
		)
		.configureOutput({
			writeOut: (text) => io.out(text),
			writeErr: (text) => io.err(text),
		})
		.exitOverride()
		.action(async (words: string[], options: CliOptions, command: Command) => {
			const settings = toSettings(command, options)
			const source = await readExpression(command, words, io)
			io.out(`${execute(source, settings, io)}\n`)
		})

	return program
}

/**
 * Run the CLI against `argv` (arguments only, without the node binary and script path)
 * and resolve to the process exit code. Pipeline failures are reported as
 * `<stage> error: <message>`; anything else propagates.
 */
export async function main(argv: readonly string[], io: ProgramIO): Promise<number> {
	try {
		await createProgram(io).parseAsync(argv, { from: 'user' })
		return EXIT_OK
	} catch (error) {
		if (error instanceof CommanderError) {
			return error.exitCode === EXIT_OK ? EXIT_OK : EXIT_USAGE
		}
		if (isCalcError(error)) {
			io.err(`${error.stage} error: ${error.message}\n`)
			return EXIT_FAILURE
		}
		throw error
	}
}
