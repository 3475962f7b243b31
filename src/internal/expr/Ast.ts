export type BinaryOp = "+" | "-" | "*" | "/" | "^"
export type FunctionName = "sin" | "cos" | "log" | "sqrt"

export const BINARY_OPS: ReadonlyArray<BinaryOp> = ["+", "-", "*", "/", "^"]
export const FUNCTION_NAMES: ReadonlyArray<FunctionName> = ["sin", "cos", "log", "sqrt"]

export interface NumberNode {
  readonly _tag: "Number"
  readonly value: number
}

export interface VariableNode {
  readonly _tag: "Variable"
  readonly name: string
}

export interface BinaryNode {
  readonly _tag: "Binary"
  readonly op: BinaryOp
  readonly left: Expr
  readonly right: Expr
}

export interface FunctionNode {
  readonly _tag: "Function"
  readonly name: FunctionName
  readonly arg: Expr
}

export type Expr = NumberNode | VariableNode | BinaryNode | FunctionNode

/**
 * Top-level equality. Kept out of `Expr` so an equation can never appear as
 * an operand.
 */
export interface EquationNode {
  readonly _tag: "Equation"
  readonly lhs: Expr
  readonly rhs: Expr
}

export type Node = Expr | EquationNode

export interface Span {
  readonly start: number
  readonly end: number
  readonly line: number
  readonly column: number
}

export interface AssignmentStatement {
  readonly _tag: "Assignment"
  readonly name: string
  readonly expr: Expr
  readonly span: Span
}

export interface ExpressionStatement {
  readonly _tag: "ExpressionStatement"
  readonly expr: Expr
  readonly span: Span
}

export interface EquationStatement {
  readonly _tag: "EquationStatement"
  readonly equation: EquationNode
  readonly span: Span
}

export type Statement = AssignmentStatement | ExpressionStatement | EquationStatement

export const num = (value: number): NumberNode => ({ _tag: "Number", value })

export const variable = (name: string): VariableNode => ({ _tag: "Variable", name })

export const binary = (op: BinaryOp, left: Expr, right: Expr): BinaryNode => ({
  _tag: "Binary",
  op,
  left,
  right,
})

export const call = (name: FunctionName, arg: Expr): FunctionNode => ({ _tag: "Function", name, arg })

export const equation = (lhs: Expr, rhs: Expr): EquationNode => ({ _tag: "Equation", lhs, rhs })

export const isFunctionName = (name: string): name is FunctionName =>
  FUNCTION_NAMES.some((candidate) => candidate === name)
