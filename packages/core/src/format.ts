import type { BinaryOperator, Expression, Instruction, Program, Token } from './types.ts'
import { foldExpression } from './walk.ts'

function formatNumber(n: number): string {
	return String(n)
}

export function formatToken(token: Token): string {
	return token.kind === 'number' ? formatNumber(token.value) : token.operator
}

export function describeToken(token: Token): string {
	return token.kind === 'number'
		? `number ${formatNumber(token.value)} at offset ${token.offset}`
		: `'${token.operator}' at offset ${token.offset}`
}

export function formatTokens(tokens: readonly Token[]): string {
	return tokens.map(formatToken).join(' ')
}

function isAdditive(expr: Expression): boolean {
	return expr.kind === 'binary' && (expr.operator === '+' || expr.operator === '-')
}

// Parentheses needed to reproduce the tree under the right-recursive grammar:
// an additive node's left operand is a Product, a multiplicative node's left operand is a Value.
function needsParens(child: Expression, parent: BinaryOperator, side: 'left' | 'right'): boolean {
	if (child.kind !== 'binary') {
		return false
	}
	if (parent === '+' || parent === '-') {
		return side === 'left' && isAdditive(child)
	}
	return side === 'left' || isAdditive(child)
}

function wrapOperand(
	text: string,
	child: Expression,
	parent: BinaryOperator,
	side: 'left' | 'right',
): string {
	return needsParens(child, parent, side) ? `( ${text} )` : text
}

/**
 * Print an expression as space-separated infix text with the fewest parentheses that
 * `parse` needs to rebuild the same tree.
 *
 * @example
 * ```ts
 * formatExpression(multiply(add(literal(1), literal(2)), literal(3))) // '( 1 + 2 ) * 3'
 * ```
 */
export function formatExpression(expr: Expression): string {
	return foldExpression<string>(expr, {
		literal: (node) => formatNumber(node.value),
		binary: (node, left, right) => {
			const leftText = wrapOperand(left, node.left, node.operator, 'left')
			const rightText = wrapOperand(right, node.right, node.operator, 'right')
			return `${leftText} ${node.operator} ${rightText}`
		},
	})
}

export function formatRpn(expr: Expression): string {
	return foldExpression<string>(expr, {
		literal: (node) => formatNumber(node.value),
		binary: (node, left, right) => `${left} ${right} ${node.operator}`,
	})
}

export function formatInstruction(instruction: Instruction): string {
	return instruction.kind === 'push'
		? `push ${formatNumber(instruction.value)}`
		: instruction.kind
}

export function disassemble(program: Program): string {
	return program.map(formatInstruction).join('\n')
}
