import * as fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import {
	add,
	compileSource,
	describeToken,
	disassemble,
	divide,
	formatExpression,
	formatRpn,
	literal,
	multiply,
	parse,
	parseRpn,
	subtract,
	tokenize,
} from '../src/index.ts'
import { expressionArb } from './arbitraries.ts'

const one = literal(1)
const two = literal(2)
const three = literal(3)

describe('formatExpression', () => {
	it('prints a literal', () => {
		expect(formatExpression(literal(2.5))).toBe('2.5')
	})

	it('parenthesizes a sum inside a product', () => {
		expect(formatExpression(multiply(add(one, two), three))).toBe('( 1 + 2 ) * 3')
		expect(formatExpression(multiply(three, add(one, two)))).toBe('3 * ( 1 + 2 )')
	})

	it('omits parentheses for right-leaning chains', () => {
		expect(formatExpression(add(one, add(two, three)))).toBe('1 + 2 + 3')
		expect(formatExpression(subtract(literal(10), subtract(literal(5), two)))).toBe('10 - 5 - 2')
		expect(formatExpression(multiply(two, divide(three, literal(4))))).toBe('2 * 3 / 4')
	})

	it('parenthesizes left-leaning chains', () => {
		expect(formatExpression(add(add(one, two), three))).toBe('( 1 + 2 ) + 3')
		expect(formatExpression(multiply(multiply(two, three), literal(4)))).toBe('( 2 * 3 ) * 4')
	})

	it('omits parentheses for a product inside a sum', () => {
		expect(formatExpression(add(multiply(two, three), literal(4)))).toBe('2 * 3 + 4')
		expect(formatExpression(subtract(literal(4), multiply(two, three)))).toBe('4 - 2 * 3')
	})

	it('prints text that parses back to the same tree', () => {
		fc.assert(
			fc.property(expressionArb(6), (expr) => {
				expect(parse(tokenize(formatExpression(expr)))).toEqual(expr)
			}),
		)
	})
})

describe('formatRpn', () => {
	it('prints operators after their operands', () => {
		expect(formatRpn(multiply(add(one, two), three))).toBe('1 2 + 3 *')
		expect(formatRpn(subtract(literal(10), subtract(literal(5), two)))).toBe('10 5 2 - -')
	})

	it('prints text that the postfix parser reads back', () => {
		fc.assert(
			fc.property(expressionArb(6), (expr) => {
				expect(parseRpn(tokenize(formatRpn(expr)))).toEqual(expr)
			}),
		)
	})
})

describe('describeToken', () => {
	it('names numbers and operators with their offset', () => {
		const [number, operator] = tokenize('12 /')
		expect.assert(number !== undefined && operator !== undefined)
		expect(describeToken(number)).toBe('number 12 at offset 0')
		expect(describeToken(operator)).toBe("'/' at offset 3")
	})
})

describe('disassemble', () => {
	it('prints one instruction per line', () => {
		expect(disassemble(compileSource('( 1 + 2 ) * 3'))).toBe(
			['push 1', 'push 2', 'add', 'push 3', 'mul'].join('\n'),
		)
	})

	it('prints nothing for an empty program', () => {
		expect(disassemble([])).toBe('')
	})
})
