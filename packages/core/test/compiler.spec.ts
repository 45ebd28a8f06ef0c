import * as fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import {
	add,
	compile,
	compileSource,
	countLiterals,
	divide,
	literal,
	multiply,
	subtract,
} from '../src/index.ts'
import { expressionArb } from './arbitraries.ts'

describe('compile', () => {
	it('compiles a literal to a single push', () => {
		expect(compile(literal(5))).toEqual([{ kind: 'push', value: 5 }])
	})

	it('emits operands before their operator', () => {
		expect(compile(multiply(add(literal(1), literal(2)), literal(3)))).toEqual([
			{ kind: 'push', value: 1 },
			{ kind: 'push', value: 2 },
			{ kind: 'add' },
			{ kind: 'push', value: 3 },
			{ kind: 'mul' },
		])
	})

	it('keeps right-leaning chains right-leaning', () => {
		expect(compile(subtract(literal(10), subtract(literal(5), literal(2))))).toEqual([
			{ kind: 'push', value: 10 },
			{ kind: 'push', value: 5 },
			{ kind: 'push', value: 2 },
			{ kind: 'sub' },
			{ kind: 'sub' },
		])
	})

	it('maps each operator to its opcode', () => {
		const opcodes = [add, subtract, multiply, divide].map((build) => {
			const program = compile(build(literal(1), literal(2)))
			return program[2]?.kind
		})
		expect(opcodes).toEqual(['add', 'sub', 'mul', 'div'])
	})

	it('compiles source text in either notation to the same program', () => {
		expect(compileSource('( 1 + 2 ) * 3')).toEqual(
			compileSource('1 2 + 3 *', { notation: 'rpn' }),
		)
	})

	it('emits 2n - 1 instructions for n literals', () => {
		fc.assert(
			fc.property(expressionArb(6), (expr) => {
				expect(compile(expr)).toHaveLength(2 * countLiterals(expr) - 1)
			}),
		)
	})

	it('emits exactly one push per literal', () => {
		fc.assert(
			fc.property(expressionArb(6), (expr) => {
				const pushes = compile(expr).filter((instruction) => instruction.kind === 'push')
				expect(pushes).toHaveLength(countLiterals(expr))
			}),
		)
	})
})
