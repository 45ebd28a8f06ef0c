/**
 * @calcvm/core - arithmetic expression compiler and stack virtual machine
 */

export { compile } from './compiler.ts'
export {
	add,
	binary,
	countLiterals,
	depth,
	divide,
	literal,
	multiply,
	subtract,
} from './constructors.ts'
export type { ParseErrorKind, RuntimeErrorKind, Stage } from './errors.ts'
export { CalcError, isCalcError, LexError, ParseError, RuntimeError } from './errors.ts'
export {
	describeToken,
	disassemble,
	formatExpression,
	formatInstruction,
	formatRpn,
	formatToken,
	formatTokens,
} from './format.ts'
export { interpret } from './interpreter.ts'
export { tokenize } from './lexer.ts'
export { maxStackDepth, run } from './machine.ts'
export { parse } from './parser.ts'
export {
	compileSource,
	evaluate,
	isNotation,
	NOTATIONS,
	parseSource,
	parseTokens,
} from './pipeline.ts'
export { parseRpn } from './rpn.ts'
export type {
	BinaryExpression,
	BinaryOperator,
	EvaluateOptions,
	Expression,
	Instruction,
	LiteralExpression,
	Notation,
	Operator,
	Program,
	RunOptions,
	Token,
	TraceStep,
} from './types.ts'
export type { ExpressionFold } from './walk.ts'
export { foldExpression } from './walk.ts'
