import type { BinaryNode, Expr, Node, Statement } from "./Ast.js"

/**
 * Fully parenthesised printer. Output is unambiguous rather than minimal so
 * derivative trees can be inspected without reasoning about precedence.
 */

export const printNode = (node: Node): string =>
  node._tag === "Equation" ? `${printExpr(node.lhs)} = ${printExpr(node.rhs)}` : printExpr(node)

export const printExpr = (expr: Expr): string => {
  switch (expr._tag) {
    case "Number":
      return printNumber(expr.value)
    case "Variable":
      return expr.name
    case "Binary":
      return printBinary(expr)
    case "Function":
      return `${expr.name}(${printExpr(expr.arg)})`
  }
}

export const printStatement = (statement: Statement): string => {
  switch (statement._tag) {
    case "Assignment":
      return `let ${statement.name} = ${printExpr(statement.expr)}`
    case "ExpressionStatement":
      return printExpr(statement.expr)
    case "EquationStatement":
      return printNode(statement.equation)
  }
}

const printNumber = (value: number): string => (Object.is(value, -0) ? "0" : value.toString())

const printBinary = (node: BinaryNode): string =>
  `(${printExpr(node.left)} ${node.op} ${printExpr(node.right)})`
