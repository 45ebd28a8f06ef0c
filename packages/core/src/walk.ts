import type { BinaryExpression, Expression, LiteralExpression } from './types.ts'

/**
 * Per-node callbacks for `foldExpression`. `binary` receives the results already
 * computed for both operands.
 */
export interface ExpressionFold<T> {
	readonly literal: (node: LiteralExpression) => T
	readonly binary: (node: BinaryExpression, left: T, right: T) => T
}

interface Frame {
	readonly expr: Expression
	readonly expanded: boolean
}

/**
 * Post-order fold over a tree with an explicit stack, so right-leaning chains of any
 * length never grow the call stack.
 */
export function foldExpression<T extends number | string>(
	root: Expression,
	fold: ExpressionFold<T>,
): T {
	const results: T[] = []
	const pending: Frame[] = [{ expr: root, expanded: false }]

	for (let frame = pending.pop(); frame !== undefined; frame = pending.pop()) {
		const { expr } = frame
		if (expr.kind === 'literal') {
			results.push(fold.literal(expr))
		} else if (!frame.expanded) {
			pending.push(
				{ expr, expanded: true },
				{ expr: expr.right, expanded: false },
				{ expr: expr.left, expanded: false },
			)
		} else {
			const right = results.pop()
			const left = results.pop()
			if (left === undefined || right === undefined) {
				throw new Error('Expression fold lost an operand')
			}
			results.push(fold.binary(expr, left, right))
		}
	}

	const [result] = results
	if (result === undefined || results.length !== 1) {
		throw new Error('Expression fold lost an operand')
	}
	return result
}
