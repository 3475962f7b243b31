import { UnsupportedDerivativeError } from "../../Errors.js"
import { binary, call, num, type BinaryNode, type EquationNode, type Expr, type FunctionNode, type Node } from "./Ast.js"
import { cloneNode } from "./Evaluator.js"
import { printExpr } from "./Pretty.js"

const differentiateBinary = (node: BinaryNode, v: string): Expr => {
  const { left, right } = node

  switch (node.op) {
    case "+":
    case "-":
      return binary(node.op, differentiateExpr(left, v), differentiateExpr(right, v))
    case "*":
      // f'g + fg'
      return binary(
        "+",
        binary("*", differentiateExpr(left, v), cloneNode(right)),
        binary("*", cloneNode(left), differentiateExpr(right, v)),
      )
    case "/":
      // (f'g - fg') / g^2
      return binary(
        "/",
        binary(
          "-",
          binary("*", differentiateExpr(left, v), cloneNode(right)),
          binary("*", cloneNode(left), differentiateExpr(right, v)),
        ),
        binary("^", cloneNode(right), num(2)),
      )
    case "^": {
      if (right._tag !== "Number") {
        throw new UnsupportedDerivativeError({
          expression: printExpr(node),
          reason: "power rule requires a literal numeric exponent",
        })
      }
      const exponent = right.value
      // c * f^(c-1) * f'
      return binary(
        "*",
        binary("*", num(exponent), binary("^", cloneNode(left), num(exponent - 1))),
        differentiateExpr(left, v),
      )
    }
  }
}

const differentiateFunction = (node: FunctionNode, v: string): Expr => {
  const inner = differentiateExpr(node.arg, v)

  switch (node.name) {
    case "sin":
      return binary("*", call("cos", cloneNode(node.arg)), inner)
    case "cos":
      return binary("*", binary("*", num(-1), call("sin", cloneNode(node.arg))), inner)
    case "log":
      return binary("/", inner, cloneNode(node.arg))
    case "sqrt":
      return binary("/", inner, binary("*", num(2), call("sqrt", cloneNode(node.arg))))
  }
}

export const differentiateExpr = (expr: Expr, v: string): Expr => {
  switch (expr._tag) {
    case "Number":
      return num(0)
    case "Variable":
      return num(expr.name === v ? 1 : 0)
    case "Binary":
      return differentiateBinary(expr, v)
    case "Function":
      return differentiateFunction(expr, v)
  }
}

export function differentiate(node: Expr, v: string): Expr
export function differentiate(node: EquationNode, v: string): EquationNode
export function differentiate(node: Node, v: string): Node
export function differentiate(node: Node, v: string): Node {
  if (node._tag === "Equation") {
    return { _tag: "Equation", lhs: differentiateExpr(node.lhs, v), rhs: differentiateExpr(node.rhs, v) }
  }
  return differentiateExpr(node, v)
}
