import type { BinaryExpression, BinaryOperator, Expression, LiteralExpression } from './types.ts'
import { foldExpression } from './walk.ts'

export function literal(value: number): LiteralExpression {
	if (!Number.isFinite(value)) {
		throw new TypeError('Literal value must be a finite number')
	}
	return { kind: 'literal', value }
}

export function binary(
	operator: BinaryOperator,
	left: Expression,
	right: Expression,
): BinaryExpression {
	return { kind: 'binary', operator, left, right }
}

export const add = (left: Expression, right: Expression) => binary('+', left, right)
export const subtract = (left: Expression, right: Expression) => binary('-', left, right)
export const multiply = (left: Expression, right: Expression) => binary('*', left, right)
export const divide = (left: Expression, right: Expression) => binary('/', left, right)

export function countLiterals(expr: Expression): number {
	return foldExpression<number>(expr, {
		literal: () => 1,
		binary: (_node, left, right) => left + right,
	})
}

/**
 * Height of the tree; a lone literal has depth 1.
 */
export function depth(expr: Expression): number {
	return foldExpression<number>(expr, {
		literal: () => 1,
		binary: (_node, left, right) => 1 + Math.max(left, right),
	})
}
