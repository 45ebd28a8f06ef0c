import type { BinaryOperator, Expression } from './types.ts'
import { foldExpression } from './walk.ts'

function apply(operator: BinaryOperator, a: number, b: number): number {
	switch (operator) {
		case '+':
			return a + b
		case '-':
			return a - b
		case '*':
			return a * b
		case '/':
			return a / b
	}
}

/**
 * Evaluate a tree directly, without compiling it. Agrees with `run(compile(expr))`.
 */
export function interpret(expr: Expression): number {
	return foldExpression<number>(expr, {
		literal: (node) => node.value,
		binary: (node, a, b) => apply(node.operator, a, b),
	})
}
