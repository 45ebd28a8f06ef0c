/**
 * Shared type definitions for the calcvm pipeline.
 */

export type BinaryOperator = '+' | '-' | '*' | '/'

export type Operator = BinaryOperator | '(' | ')'

export type Token =
	| { readonly kind: 'number'; readonly value: number; readonly offset: number }
	| { readonly kind: 'operator'; readonly operator: Operator; readonly offset: number }

export interface LiteralExpression {
	readonly kind: 'literal'
	readonly value: number
}

export interface BinaryExpression {
	readonly kind: 'binary'
	readonly operator: BinaryOperator
	readonly left: Expression
	readonly right: Expression
}

export type Expression = LiteralExpression | BinaryExpression

export type Instruction =
	| { readonly kind: 'push'; readonly value: number }
	| { readonly kind: 'add' }
	| { readonly kind: 'sub' }
	| { readonly kind: 'mul' }
	| { readonly kind: 'div' }

export type Program = readonly Instruction[]

export type Notation = 'infix' | 'rpn'

/**
 * One executed instruction, reported to `RunOptions.trace`.
 */
export interface TraceStep {
	readonly index: number
	readonly instruction: Instruction
	/** Snapshot of the operand stack after the instruction, bottom first. */
	readonly stack: readonly number[]
}

export interface RunOptions {
	readonly trace?: (step: TraceStep) => void
}

export interface EvaluateOptions extends RunOptions {
	/**
	 * Front end used to read the source.
	 * @default 'infix'
	 */
	readonly notation?: Notation
}
