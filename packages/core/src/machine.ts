import { RuntimeError } from './errors.ts'
import { formatInstruction } from './format.ts'
import type { Instruction, Program, RunOptions } from './types.ts'

type ArithmeticInstruction = Exclude<Instruction, { kind: 'push' }>

// Division by zero is left to IEEE 754: 1 / 0 is Infinity, 0 / 0 is NaN.
const ARITHMETIC: Record<ArithmeticInstruction['kind'], (a: number, b: number) => number> = {
	add: (a, b) => a + b,
	sub: (a, b) => a - b,
	mul: (a, b) => a * b,
	div: (a, b) => a / b,
}

function underflow(instruction: Instruction, index: number, depth: number): RuntimeError {
	return new RuntimeError(
		'StackUnderflow',
		`Stack underflow at instruction #${index} (${formatInstruction(instruction)}): needs 2 operands, found ${depth}`,
	)
}

function malformed(depth: number): RuntimeError {
	return new RuntimeError(
		'MalformedProgram',
		`Malformed program: expected exactly 1 value on the stack after the last instruction, found ${depth}`,
	)
}

/**
 * Execute a program on a fresh operand stack and return the single value left on it.
 * Binary instructions pop the right operand first, so the earlier push is the left operand.
 */
export function run(program: Program, options: RunOptions = {}): number {
	const { trace } = options
	const stack: number[] = []

	for (const [index, instruction] of program.entries()) {
		if (instruction.kind === 'push') {
			stack.push(instruction.value)
		} else {
			const b = stack.pop()
			const a = stack.pop()
			if (a === undefined || b === undefined) {
				throw underflow(instruction, index, b === undefined ? 0 : 1)
			}
			stack.push(ARITHMETIC[instruction.kind](a, b))
		}
		trace?.({ index, instruction, stack: [...stack] })
	}

	const [result, ...rest] = stack
	if (result === undefined || rest.length > 0) {
		throw malformed(stack.length)
	}
	return result
}

/**
 * Highest operand-stack depth `run` reaches on this program, computed without evaluating it.
 * Rejects the same malformed programs `run` does.
 */
export function maxStackDepth(program: Program): number {
	let height = 0
	let max = 0

	for (const [index, instruction] of program.entries()) {
		if (instruction.kind === 'push') {
			height++
			max = Math.max(max, height)
			continue
		}
		if (height < 2) {
			throw underflow(instruction, index, height)
		}
		height--
	}

	if (height !== 1) {
		throw malformed(height)
	}
	return max
}
