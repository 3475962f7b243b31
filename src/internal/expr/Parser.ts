import { Either } from "effect"
import type { IToken, TokenType } from "chevrotain"
import { ExpressionParseError } from "../../Errors.js"
import {
  Caret,
  Equals,
  Identifier,
  Let,
  LParen,
  Minus,
  Newline,
  NumberLiteral,
  Plus,
  RParen,
  Semicolon,
  Slash,
  Star,
  StatementLexer,
} from "./tokens.js"
import {
  binary,
  call,
  isFunctionName,
  num,
  variable,
  type BinaryOp,
  type Expr,
  type Span,
  type Statement,
} from "./Ast.js"

interface BinaryInfo {
  readonly precedence: number
  readonly rightAssociative?: boolean
  readonly op: BinaryOp
}

const POWER_PRECEDENCE = 3

const BinaryOperators = new Map<TokenType, BinaryInfo>([
  [Plus, { precedence: 1, op: "+" }],
  [Minus, { precedence: 1, op: "-" }],
  [Star, { precedence: 2, op: "*" }],
  [Slash, { precedence: 2, op: "/" }],
  [Caret, { precedence: POWER_PRECEDENCE, op: "^", rightAssociative: true }],
])

const snippet = (source: string, line: number, column: number): string => {
  const lines = source.split(/\r?\n/)
  const target = lines[Math.max(0, line - 1)] ?? ""
  return `${target}\n${" ".repeat(Math.max(0, column - 1))}^`
}

const endPosition = (source: string): { readonly line: number; readonly column: number } => {
  const lines = source.split(/\r?\n/)
  const last = lines[lines.length - 1] ?? ""
  return { line: lines.length, column: last.length + 1 }
}

const parseError = (source: string, token: IToken | undefined, problem: string): ExpressionParseError => {
  const position = token
    ? { line: token.startLine ?? 1, column: token.startColumn ?? 1 }
    : endPosition(source)
  return new ExpressionParseError({
    source,
    line: position.line,
    column: position.column,
    snippet: snippet(source, position.line, position.column),
    problem,
  })
}

const spanFromToken = (token: IToken): Span => ({
  start: token.startOffset,
  end: (token.endOffset ?? token.startOffset) + 1,
  line: token.startLine ?? 1,
  column: token.startColumn ?? 1,
})

const combineSpans = (start: Span, end: Span): Span => ({
  start: start.start,
  end: end.end,
  line: start.line,
  column: start.column,
})

const isSeparator = (token: IToken): boolean => token.tokenType === Newline || token.tokenType === Semicolon

class TokenStream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #source: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#tokens = tokens
    this.#source = source
  }

  peek(offset = 0): IToken | undefined {
    return this.#tokens[this.#index + offset]
  }

  previous(offset = 1): IToken | undefined {
    return this.#tokens[this.#index - offset]
  }

  consume(): IToken {
    const token = this.peek()
    if (!token) {
      throw parseError(this.#source, undefined, "Unexpected end of input")
    }
    this.#index += 1
    return token
  }

  match(tokenType: TokenType): boolean {
    const token = this.peek()
    if (token && token.tokenType === tokenType) {
      this.#index += 1
      return true
    }
    return false
  }

  expect(tokenType: TokenType, problem: string): IToken {
    const token = this.peek()
    if (!token || token.tokenType !== tokenType) {
      throw parseError(this.#source, token, problem)
    }
    this.#index += 1
    return token
  }

  get done(): boolean {
    return this.#index >= this.#tokens.length
  }
}

class StatementParser {
  readonly #stream: TokenStream
  readonly #source: string

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#stream = new TokenStream(tokens, source)
    this.#source = source
  }

  parseProgram(): ReadonlyArray<Statement> {
    const statements: Array<Statement> = []
    while (true) {
      this.skipSeparators()
      if (this.#stream.done) {
        return statements
      }
      statements.push(this.parseStatement())
      const next = this.#stream.peek()
      if (next && !isSeparator(next)) {
        throw parseError(this.#source, next, `Unexpected token ${next.image} after statement`)
      }
    }
  }

  parseSingleExpression(): Expr {
    this.skipSeparators()
    const expr = this.parseExpression(0)
    this.skipSeparators()
    if (!this.#stream.done) {
      const token = this.#stream.peek()
      throw parseError(this.#source, token, `Unexpected token ${token?.image ?? "<eof>"} after expression`)
    }
    return expr
  }

  parseStatement(): Statement {
    const first = this.#stream.peek()
    if (!first) {
      throw parseError(this.#source, undefined, "Unexpected end of input")
    }

    if (this.#stream.match(Let)) {
      const name = this.#stream.expect(Identifier, "Expected variable name after let")
      if (isFunctionName(name.image)) {
        throw parseError(this.#source, name, `Cannot assign to built-in function ${name.image}`)
      }
      this.#stream.expect(Equals, "Expected '=' in assignment")
      const expr = this.parseExpression(0)
      return { _tag: "Assignment", name: name.image, expr, span: this.spanFrom(first) }
    }

    const lhs = this.parseExpression(0)
    if (this.#stream.match(Equals)) {
      const rhs = this.parseExpression(0)
      return {
        _tag: "EquationStatement",
        equation: { _tag: "Equation", lhs, rhs },
        span: this.spanFrom(first),
      }
    }
    return { _tag: "ExpressionStatement", expr: lhs, span: this.spanFrom(first) }
  }

  parseExpression(minPrecedence: number): Expr {
    let left = this.parseUnary()
    // Pratt loop
    while (true) {
      const token = this.#stream.peek()
      if (!token) {
        break
      }
      const info = BinaryOperators.get(token.tokenType)
      if (!info || info.precedence < minPrecedence) {
        break
      }
      this.#stream.consume()
      const nextPrecedence = info.rightAssociative ? info.precedence : info.precedence + 1
      const right = this.parseExpression(nextPrecedence)
      left = binary(info.op, left, right)
    }
    return left
  }

  parseUnary(): Expr {
    const token = this.#stream.peek()
    if (!token) {
      throw parseError(this.#source, token, "Unexpected end of input")
    }

    if (token.tokenType === Plus || token.tokenType === Minus) {
      this.#stream.consume()
      // -x^2 is -(x^2)
      const operand = this.parseExpression(POWER_PRECEDENCE)
      if (token.tokenType === Plus) {
        return operand
      }
      return operand._tag === "Number" ? num(-operand.value) : binary("*", num(-1), operand)
    }

    return this.parsePrimary()
  }

  parsePrimary(): Expr {
    const token = this.#stream.consume()

    switch (token.tokenType) {
      case NumberLiteral:
        return num(this.parseNumber(token))
      case Identifier:
        return this.parseIdentifierOrCall(token)
      case LParen: {
        const expr = this.parseExpression(0)
        this.#stream.expect(RParen, "Expected ')' to close group")
        return expr
      }
      default:
        throw parseError(this.#source, token, `Unexpected token ${token.image}`)
    }
  }

  parseIdentifierOrCall(token: IToken): Expr {
    if (!this.#stream.match(LParen)) {
      return variable(token.image)
    }
    const name = token.image
    if (!isFunctionName(name)) {
      throw parseError(this.#source, token, `Unknown function ${name}`)
    }
    const arg = this.parseExpression(0)
    this.#stream.expect(RParen, `Expected ')' closing ${name} argument`)
    return call(name, arg)
  }

  parseNumber(token: IToken): number {
    const value = Number(token.image)
    if (!Number.isFinite(value)) {
      throw parseError(this.#source, token, `Invalid number literal: ${token.image}`)
    }
    return value
  }

  skipSeparators(): void {
    while (this.#stream.match(Newline) || this.#stream.match(Semicolon)) {
      // skip
    }
  }

  spanFrom(first: IToken): Span {
    const last = this.#stream.previous() ?? first
    return combineSpans(spanFromToken(first), spanFromToken(last))
  }
}

const lex = (source: string): ReadonlyArray<IToken> => {
  const result = StatementLexer.tokenize(source)
  const error = result.errors[0]
  if (error) {
    const line = error.line ?? 1
    const column = error.column ?? 1
    throw new ExpressionParseError({
      source,
      line,
      column,
      snippet: snippet(source, line, column),
      problem: error.message,
    })
  }
  return result.tokens
}

/**
 * Parses a program: statements separated by newlines or `;`. Throws
 * `ExpressionParseError`.
 */
export const parseProgramAst = (source: string): ReadonlyArray<Statement> =>
  new StatementParser(lex(source), source).parseProgram()

/**
 * Parses a single expression with no `=` or `let`.
 */
export const parseExpressionAst = (source: string): Expr =>
  new StatementParser(lex(source), source).parseSingleExpression()

const toParseError = (error: unknown): ExpressionParseError => {
  if (error instanceof ExpressionParseError) {
    return error
  }
  throw error
}

export const parseProgramEither = (source: string): Either.Either<ReadonlyArray<Statement>, ExpressionParseError> =>
  Either.try({
    try: () => parseProgramAst(source),
    catch: toParseError,
  })

export const parseExpressionEither = (source: string): Either.Either<Expr, ExpressionParseError> =>
  Either.try({
    try: () => parseExpressionAst(source),
    catch: toParseError,
  })
