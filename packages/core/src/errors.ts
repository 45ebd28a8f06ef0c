import type { Token } from './types.ts'

export type Stage = 'lex' | 'parse' | 'runtime'

export type ParseErrorKind = 'UnexpectedToken' | 'UnmatchedParenthesis' | 'UnexpectedEndOfInput'

export type RuntimeErrorKind = 'StackUnderflow' | 'MalformedProgram'

/**
 * Base class for every failure raised by the pipeline.
 * `stage` names the component that gave up.
 */
export abstract class CalcError extends Error {
	abstract readonly stage: Stage
}

export class LexError extends CalcError {
	override readonly name = 'LexError'
	readonly stage = 'lex'
	readonly text: string
	readonly offset: number

	constructor(text: string, offset: number) {
		super(`Unrecognized token '${text}' at offset ${offset}`)
		this.text = text
		this.offset = offset
	}
}

export class ParseError extends CalcError {
	override readonly name = 'ParseError'
	readonly stage = 'parse'
	readonly kind: ParseErrorKind
	/** Token the parser stopped at; absent when input ran out. */
	readonly token: Token | undefined

	constructor(kind: ParseErrorKind, message: string, token?: Token) {
		super(message)
		this.kind = kind
		this.token = token
	}
}

export class RuntimeError extends CalcError {
	override readonly name = 'RuntimeError'
	readonly stage = 'runtime'
	readonly kind: RuntimeErrorKind

	constructor(kind: RuntimeErrorKind, message: string) {
		super(message)
		this.kind = kind
	}
}

export function isCalcError(error: unknown): error is CalcError {
	return error instanceof CalcError
}
