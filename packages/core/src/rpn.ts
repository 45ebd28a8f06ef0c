import { binary, literal } from './constructors.ts'
import { ParseError } from './errors.ts'
import { describeToken } from './format.ts'
import type { Expression, Token } from './types.ts'

/**
 * Postfix front end: `1 2 + 3 *` builds the same tree as the infix `( 1 + 2 ) * 3`.
 * Parentheses have no meaning in postfix and are rejected.
 */
export function parseRpn(tokens: readonly Token[]): Expression {
	const operands: Expression[] = []

	for (const token of tokens) {
		if (token.kind === 'number') {
			operands.push(literal(token.value))
			continue
		}

		const { operator } = token
		if (operator === '(' || operator === ')') {
			throw new ParseError(
				'UnexpectedToken',
				`Unexpected ${describeToken(token)}, parentheses are not used in postfix notation`,
				token,
			)
		}

		const right = operands.pop()
		const left = operands.pop()
		if (left === undefined || right === undefined) {
			throw new ParseError(
				'UnexpectedToken',
				`Unexpected ${describeToken(token)}, operator needs two operands`,
				token,
			)
		}
		operands.push(binary(operator, left, right))
	}

	const [result, ...rest] = operands
	if (result === undefined) {
		throw new ParseError('UnexpectedEndOfInput', 'Unexpected end of input, expected a number')
	}
	if (rest.length > 0) {
		throw new ParseError(
			'UnexpectedEndOfInput',
			`Unexpected end of input, ${operands.length} operands are waiting for an operator`,
		)
	}
	return result
}
