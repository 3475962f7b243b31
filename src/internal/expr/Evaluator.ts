import {
  DivisionByZeroError,
  DomainError,
  UndefinedVariableError,
  UnknownFunctionError,
  UnknownOperatorError,
} from "../../Errors.js"
import type { BinaryNode, EquationNode, Expr, FunctionNode, Node } from "./Ast.js"
import { printExpr } from "./Pretty.js"

export type Environment = Readonly<Record<string, number>>

export const lookupBinding = (env: Environment, name: string): number | undefined =>
  Object.hasOwn(env, name) ? env[name] : undefined

const lookupVariable = (name: string, env: Environment): number => {
  const value = lookupBinding(env, name)
  if (value === undefined) {
    throw new UndefinedVariableError({ name })
  }
  return value
}

const evaluateBinary = (node: BinaryNode, env: Environment): number => {
  const left = evaluateExpr(node.left, env)
  const right = evaluateExpr(node.right, env)

  switch (node.op) {
    case "+":
      return left + right
    case "-":
      return left - right
    case "*":
      return left * right
    case "/":
      if (right === 0) {
        throw new DivisionByZeroError({ expression: printExpr(node) })
      }
      return left / right
    case "^":
      return Math.pow(left, right)
    default: {
      const unknown: never = node.op
      throw new UnknownOperatorError({ operator: String(unknown) })
    }
  }
}

const evaluateFunction = (node: FunctionNode, env: Environment): number => {
  const x = evaluateExpr(node.arg, env)

  switch (node.name) {
    case "sin":
      return Math.sin(x)
    case "cos":
      return Math.cos(x)
    case "log":
      if (x <= 0) {
        throw new DomainError({ function: "log", argument: x })
      }
      return Math.log(x)
    case "sqrt":
      if (x < 0) {
        throw new DomainError({ function: "sqrt", argument: x })
      }
      return Math.sqrt(x)
    default: {
      const unknown: never = node.name
      throw new UnknownFunctionError({ name: String(unknown) })
    }
  }
}

/**
 * Walks `expr` against `env`. Throws the tagged evaluation errors; callers at
 * the module boundary turn them into `Either`/`Effect` failures.
 */
export const evaluateExpr = (expr: Expr, env: Environment): number => {
  switch (expr._tag) {
    case "Number":
      return expr.value
    case "Variable":
      return lookupVariable(expr.name, env)
    case "Binary":
      return evaluateBinary(expr, env)
    case "Function":
      return evaluateFunction(expr, env)
    default: {
      const exhaustive: never = expr
      throw exhaustive
    }
  }
}

const collectInto = (node: Node, out: Array<string>): void => {
  switch (node._tag) {
    case "Number":
      return
    case "Variable":
      out.push(node.name)
      return
    case "Binary":
      collectInto(node.left, out)
      collectInto(node.right, out)
      return
    case "Function":
      collectInto(node.arg, out)
      return
    case "Equation":
      collectInto(node.lhs, out)
      collectInto(node.rhs, out)
      return
  }
}

/**
 * Every `Variable` leaf in left-to-right order, duplicates included.
 */
export const collectVariables = (node: Node): ReadonlyArray<string> => {
  const out: Array<string> = []
  collectInto(node, out)
  return out
}

export const uniqueVariables = (node: Node): ReadonlyArray<string> => [...new Set(collectVariables(node))]

export function cloneNode(node: Expr): Expr
export function cloneNode(node: EquationNode): EquationNode
export function cloneNode(node: Node): Node
export function cloneNode(node: Node): Node {
  switch (node._tag) {
    case "Number":
      return { _tag: "Number", value: node.value }
    case "Variable":
      return { _tag: "Variable", name: node.name }
    case "Binary":
      return { _tag: "Binary", op: node.op, left: cloneNode(node.left), right: cloneNode(node.right) }
    case "Function":
      return { _tag: "Function", name: node.name, arg: cloneNode(node.arg) }
    case "Equation":
      return { _tag: "Equation", lhs: cloneNode(node.lhs), rhs: cloneNode(node.rhs) }
  }
}

/**
 * Copy of `expr` with every variable bound in `env` replaced by its value.
 * Unbound variables are kept.
 */
export const substitute = (expr: Expr, env: Environment): Expr => {
  switch (expr._tag) {
    case "Number":
      return { _tag: "Number", value: expr.value }
    case "Variable": {
      const value = lookupBinding(env, expr.name)
      return value === undefined ? { _tag: "Variable", name: expr.name } : { _tag: "Number", value }
    }
    case "Binary":
      return { _tag: "Binary", op: expr.op, left: substitute(expr.left, env), right: substitute(expr.right, env) }
    case "Function":
      return { _tag: "Function", name: expr.name, arg: substitute(expr.arg, env) }
  }
}
