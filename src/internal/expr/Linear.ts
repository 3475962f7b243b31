import { DivisionByZeroError, InfiniteSolutionsError, NoSolutionError, NonLinearError } from "../../Errors.js"
import type { BinaryNode, Expr } from "./Ast.js"
import { printExpr } from "./Pretty.js"

/**
 * `Σ coefficients[v]·v + constant`.
 */
export interface LinearForm {
  readonly coefficients: Readonly<Record<string, number>>
  readonly constant: number
}

const emptyCoefficients = (): Record<string, number> => Object.create(null)

const isConstant = (form: LinearForm): boolean => Object.keys(form.coefficients).length === 0

const combine = (left: LinearForm, right: LinearForm, sign: 1 | -1): LinearForm => {
  const coefficients = emptyCoefficients()
  for (const [name, value] of Object.entries(left.coefficients)) {
    coefficients[name] = value
  }
  for (const [name, value] of Object.entries(right.coefficients)) {
    coefficients[name] = (coefficients[name] ?? 0) + sign * value
  }
  return { coefficients, constant: left.constant + sign * right.constant }
}

const scale = (form: LinearForm, factor: number): LinearForm => {
  const coefficients = emptyCoefficients()
  for (const [name, value] of Object.entries(form.coefficients)) {
    coefficients[name] = value * factor
  }
  return { coefficients, constant: form.constant * factor }
}

const divide = (form: LinearForm, divisor: number): LinearForm => {
  const coefficients = emptyCoefficients()
  for (const [name, value] of Object.entries(form.coefficients)) {
    coefficients[name] = value / divisor
  }
  return { coefficients, constant: form.constant / divisor }
}

const extractBinary = (node: BinaryNode): LinearForm => {
  if (node.op === "^") {
    throw new NonLinearError({ expression: printExpr(node), reason: "powers are not linear" })
  }

  const left = extractLinearForm(node.left)
  const right = extractLinearForm(node.right)

  switch (node.op) {
    case "+":
      return combine(left, right, 1)
    case "-":
      return combine(left, right, -1)
    case "*":
      if (isConstant(left)) {
        return scale(right, left.constant)
      }
      if (isConstant(right)) {
        return scale(left, right.constant)
      }
      throw new NonLinearError({ expression: printExpr(node), reason: "product of two non-constant terms" })
    case "/":
      if (!isConstant(right)) {
        throw new NonLinearError({ expression: printExpr(node), reason: "divisor depends on a variable" })
      }
      if (right.constant === 0) {
        throw new DivisionByZeroError({ expression: printExpr(node) })
      }
      return divide(left, right.constant)
  }
}

/**
 * Rewrites `expr` as a linear form. Throws `NonLinearError` on powers,
 * functions and products or quotients of variables, and `DivisionByZeroError`
 * when a constant divisor folds to zero.
 */
export const extractLinearForm = (expr: Expr): LinearForm => {
  switch (expr._tag) {
    case "Number":
      return { coefficients: emptyCoefficients(), constant: expr.value }
    case "Variable": {
      const coefficients = emptyCoefficients()
      coefficients[expr.name] = 1
      return { coefficients, constant: 0 }
    }
    case "Binary":
      return extractBinary(expr)
    case "Function":
      throw new NonLinearError({ expression: printExpr(expr), reason: `${expr.name} is not linear` })
  }
}

/**
 * Solves `form = 0` for `v`. A zero coefficient is reported as
 * `NoSolutionError` or `InfiniteSolutionsError` depending on the residual.
 */
export const solveLinearForm = (form: LinearForm, v: string): number => {
  const coefficient = Object.hasOwn(form.coefficients, v) ? form.coefficients[v] ?? 0 : 0
  if (coefficient === 0) {
    if (form.constant === 0) {
      throw new InfiniteSolutionsError({ variable: v })
    }
    throw new NoSolutionError({ variable: v, residual: form.constant })
  }
  const root = -form.constant / coefficient
  // avoid reporting -0
  return root === 0 ? 0 : root
}
