import { compile } from './compiler.ts'
import { tokenize } from './lexer.ts'
import { run } from './machine.ts'
import { parse } from './parser.ts'
import { parseRpn } from './rpn.ts'
import type { EvaluateOptions, Expression, Notation, Program, Token } from './types.ts'

const FRONT_ENDS: Record<Notation, (tokens: readonly Token[]) => Expression> = {
	infix: parse,
	rpn: parseRpn,
}

export const NOTATIONS: readonly Notation[] = ['infix', 'rpn']

export function isNotation(value: string): value is Notation {
	return NOTATIONS.some((notation) => notation === value)
}

export function parseTokens(tokens: readonly Token[], notation: Notation = 'infix'): Expression {
	if (!isNotation(notation)) {
		throw new TypeError(`Unknown notation '${String(notation)}'`)
	}
	return FRONT_ENDS[notation](tokens)
}

/**
 * Read source text with the chosen front end.
 */
export function parseSource(source: string, notation: Notation = 'infix'): Expression {
	return parseTokens(tokenize(source), notation)
}

export function compileSource(source: string, options: EvaluateOptions = {}): Program {
	return compile(parseSource(source, options.notation))
}

/**
 * Run the whole pipeline: tokenize, parse, compile, execute.
 *
 * @example
 * ```ts
 * evaluate('( 1 + 2 ) * 3') // 9
 * evaluate('10 - 5 - 2') // 7, chains associate to the right
 * evaluate('1 2 + 3 *', { notation: 'rpn' }) // 9
 * ```
 */
export function evaluate(source: string, options: EvaluateOptions = {}): number {
	return run(compileSource(source, options), options)
}
