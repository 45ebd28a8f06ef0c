import { binary, literal } from './constructors.ts'
import { ParseError } from './errors.ts'
import { describeToken } from './format.ts'
import type { BinaryOperator, Expression, Token } from './types.ts'

type AdditiveOperator = '+' | '-'
type MultiplicativeOperator = '*' | '/'

/** An operand waiting for the rest of its chain. */
interface Link<Op extends BinaryOperator> {
	readonly left: Expression
	readonly operator: Op
}

/** Partial `Expression` inside one pair of parentheses, or at top level. */
interface Group {
	terms: Link<AdditiveOperator>[]
	factors: Link<MultiplicativeOperator>[]
}

/** A group suspended by `(`, resumed at the matching `)`. */
interface Enclosing {
	readonly group: Group
	readonly open: Token
}

// a op1 b op2 c -> a op1 (b op2 c)
function foldRight<Op extends BinaryOperator>(links: readonly Link<Op>[], last: Expression) {
	return links.reduceRight<Expression>(
		(right, { left, operator }) => binary(operator, left, right),
		last,
	)
}

const emptyGroup = (): Group => ({ terms: [], factors: [] })

/**
 * Parser for infix arithmetic:
 *
 * ```
 * Expression ::= Product (('+'|'-') Expression)?
 * Product    ::= Value   (('*'|'/') Product)?
 * Value      ::= Number | '(' Expression ')'
 * ```
 *
 * Both binary levels recurse on their right operand, so chains associate to the right:
 * `10 - 5 - 2` parses as `10 - (5 - 2)`. Chains are collected in loops and nested
 * parentheses on an explicit stack, so neither long chains nor deep nesting grow the
 * call stack.
 */
export function parse(tokens: readonly Token[]): Expression {
	let position = 0

	const peek = (): Token | undefined => tokens[position]

	function accept<Op extends BinaryOperator>(...operators: Op[]): Op | undefined {
		const token = peek()
		if (token?.kind !== 'operator') {
			return undefined
		}
		const match = operators.find((op) => op === token.operator)
		if (match !== undefined) {
			position++
		}
		return match
	}

	const enclosing: Enclosing[] = []
	let group = emptyGroup()

	for (;;) {
		// Value
		const token = peek()
		if (token === undefined) {
			throw new ParseError(
				'UnexpectedEndOfInput',
				"Unexpected end of input, expected a number or '('",
			)
		}
		if (token.kind === 'operator') {
			if (token.operator !== '(') {
				throw new ParseError(
					'UnexpectedToken',
					`Unexpected ${describeToken(token)}, expected a number or '('`,
					token,
				)
			}
			position++
			enclosing.push({ group, open: token })
			group = emptyGroup()
			continue
		}
		position++
		let value: Expression = literal(token.value)

		// Continue the current chains, or close every group this value completes
		for (;;) {
			const multiplicative = accept('*', '/')
			if (multiplicative) {
				group.factors.push({ left: value, operator: multiplicative })
				break
			}
			const product: Expression = foldRight(group.factors, value)
			group.factors = []

			const additive = accept('+', '-')
			if (additive) {
				group.terms.push({ left: product, operator: additive })
				break
			}
			const expr: Expression = foldRight(group.terms, product)

			const outer = enclosing.pop()
			if (outer === undefined) {
				const trailing = peek()
				if (trailing !== undefined) {
					throw new ParseError(
						'UnexpectedToken',
						`Unexpected trailing ${describeToken(trailing)}`,
						trailing,
					)
				}
				return expr
			}

			const close = peek()
			if (close?.kind !== 'operator' || close.operator !== ')') {
				throw new ParseError(
					'UnmatchedParenthesis',
					`Missing ')' for '(' at offset ${outer.open.offset}`,
					close,
				)
			}
			position++
			group = outer.group
			value = expr
		}
	}
}
