import { describe, expect, it } from "@effect/vitest"
import { Effect, Either } from "effect"
import { parseExpression, parseProgram, printExpr, printStatement } from "../src/Expressions.js"
import {
  parseExpressionAst,
  parseExpressionEither,
  parseProgramAst,
  parseProgramEither,
} from "../src/internal/expr/Parser.js"

const parseFailure = (source: string) => {
  const result = parseProgramEither(source)
  if (Either.isRight(result)) {
    throw new Error(`expected ${source} to fail`)
  }
  return result.left
}

describe("statement parser", () => {
  it("parses assignments, equations and expressions", () => {
    const statements = parseProgramAst("let a = 2\na * x + 3 = 7; x")
    expect(statements.map((statement) => statement._tag)).toEqual([
      "Assignment",
      "EquationStatement",
      "ExpressionStatement",
    ])
    expect(statements.map(printStatement)).toEqual(["let a = 2", "((a * x) + 3) = 7", "x"])
  })

  it("builds nested binary nodes with precedence", () => {
    expect(parseExpressionAst("1 + 2 * 3")).toMatchObject({
      _tag: "Binary",
      op: "+",
      left: { _tag: "Number", value: 1 },
      right: {
        _tag: "Binary",
        op: "*",
        left: { _tag: "Number", value: 2 },
        right: { _tag: "Number", value: 3 },
      },
    })
  })

  it("groups powers to the right", () => {
    expect(printExpr(parseExpressionAst("2 ^ 3 ^ 2"))).toBe("(2 ^ (3 ^ 2))")
  })

  it("folds negative literals and scales other negations", () => {
    expect(parseExpressionAst("-3")).toEqual({ _tag: "Number", value: -3 })
    expect(parseExpressionAst("+3")).toEqual({ _tag: "Number", value: 3 })
    expect(parseExpressionAst("-x")).toEqual({
      _tag: "Binary",
      op: "*",
      left: { _tag: "Number", value: -1 },
      right: { _tag: "Variable", name: "x" },
    })
  })

  it("reads decimal and exponent literals", () => {
    expect(parseExpressionAst("1.5e3")).toEqual({ _tag: "Number", value: 1500 })
    expect(parseExpressionAst(".5")).toEqual({ _tag: "Number", value: 0.5 })
  })

  it("parses function calls", () => {
    expect(parseExpressionAst("sqrt(x + 1)")).toMatchObject({
      _tag: "Function",
      name: "sqrt",
      arg: { _tag: "Binary", op: "+" },
    })
  })

  it("skips comments and blank lines", () => {
    const statements = parseProgramAst("# header\n\n1 + 1 # trailing\n;\n")
    expect(statements).toHaveLength(1)
  })

  it("lexes identifiers that start with let", () => {
    const [statement] = parseProgramAst("letter = 1")
    expect(statement?._tag).toBe("EquationStatement")
  })

  it("records statement spans", () => {
    const [, second] = parseProgramAst("let a = 2\nb = 3")
    expect(second?.span).toEqual({ start: 10, end: 15, line: 2, column: 1 })
  })

  it("reports unknown functions with position", () => {
    const error = parseFailure("foo(1)")
    expect(error.problem).toBe("Unknown function foo")
    expect(error.line).toBe(1)
    expect(error.column).toBe(1)
  })

  it("refuses to assign to built-in functions", () => {
    const error = parseFailure("let sin = 1")
    expect(error.problem).toBe("Cannot assign to built-in function sin")
    expect(error.column).toBe(5)
  })

  it("points at the end of truncated input", () => {
    const error = parseFailure("1 +")
    expect(error.problem).toBe("Unexpected end of input")
    expect(error.column).toBe(4)
    expect(error.snippet).toBe("1 +\n   ^")
    expect(error.message).toBe("Parse error at line 1, column 4: Unexpected end of input")
  })

  it("reports unclosed groups", () => {
    const error = parseFailure("(1 + 2")
    expect(error.problem).toBe("Expected ')' to close group")
  })

  it("reports trailing tokens on the right line", () => {
    const error = parseFailure("x = 1\n1 2")
    expect(error.problem).toBe("Unexpected token 2 after statement")
    expect(error.line).toBe(2)
    expect(error.column).toBe(3)
  })

  it("reports lexer errors", () => {
    const error = parseFailure("1 $ 2")
    expect(error._tag).toBe("ExpressionParseError")
    expect(error.line).toBe(1)
  })

  it("rejects equations where a single expression is expected", () => {
    const result = parseExpressionEither("x = 1")
    expect(Either.isLeft(result) && result.left.problem).toBe("Unexpected token = after expression")
  })

  it.effect("exposes parsing as effects", () =>
    Effect.gen(function* () {
      const statements = yield* parseProgram("let r = 2; 3 * r")
      expect(statements).toHaveLength(2)

      const error = yield* Effect.flip(parseExpression(")"))
      expect(error.problem).toBe("Unexpected token )")
    }),
  )
})
