import { LexError } from './errors.ts'
import type { Operator, Token } from './types.ts'

const OPERATORS: ReadonlySet<string> = new Set<Operator>(['+', '-', '*', '/', '(', ')'])

const NUMBER_RE = /^(?:\d+(?:\.\d*)?|\.\d+)$/
const WHITESPACE_RE = /\s/

function isOperator(char: string): char is Operator {
	return OPERATORS.has(char)
}

function isBoundary(char: string): boolean {
	return WHITESPACE_RE.test(char) || isOperator(char)
}

/**
 * Split an infix or postfix source string into tokens.
 * Operators and parentheses are tokens of their own even without surrounding whitespace;
 * every other run of characters must be a decimal literal.
 */
export function tokenize(input: string): Token[] {
	const tokens: Token[] = []
	let i = 0

	while (i < input.length) {
		const char = input.charAt(i)

		if (WHITESPACE_RE.test(char)) {
			i++
			continue
		}

		if (isOperator(char)) {
			tokens.push({ kind: 'operator', operator: char, offset: i })
			i++
			continue
		}

		const start = i
		while (i < input.length && !isBoundary(input.charAt(i))) {
			i++
		}
		const text = input.slice(start, i)
		const value = NUMBER_RE.test(text) ? Number.parseFloat(text) : Number.NaN
		// overlong digit runs overflow to Infinity
		if (!Number.isFinite(value)) {
			throw new LexError(text, start)
		}
		tokens.push({ kind: 'number', value, offset: start })
	}

	return tokens
}
