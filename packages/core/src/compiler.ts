import type { BinaryOperator, Expression, Instruction, Program } from './types.ts'

const OPCODES = {
	'+': { kind: 'add' },
	'-': { kind: 'sub' },
	'*': { kind: 'mul' },
	'/': { kind: 'div' },
} as const satisfies Record<BinaryOperator, Instruction>

/**
 * Lower an expression tree to stack-machine code in post-order: left operand, right operand,
 * then the operator. A tree with `n` literals yields `2n - 1` instructions.
 */
export function compile(expr: Expression): Program {
	const out: Instruction[] = []
	// subtrees still to lower, and opcodes waiting for their operands; top is last
	const pending: (Expression | Instruction)[] = [expr]

	for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
		switch (item.kind) {
			case 'literal':
				out.push({ kind: 'push', value: item.value })
				break
			case 'binary':
				pending.push(OPCODES[item.operator], item.right, item.left)
				break
			default:
				out.push(item)
		}
	}
	return out
}
