import { createToken, Lexer } from "chevrotain"

/**
 * Token definitions for the statement language. `let` is declared with the
 * identifier as its longer alternative so names such as `letter` still lex as
 * identifiers.
 */

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /[ \t]+/, group: Lexer.SKIPPED })
export const LineComment = createToken({ name: "LineComment", pattern: /#[^\n]*/, group: Lexer.SKIPPED })
export const Newline = createToken({ name: "Newline", pattern: /\r?\n/, line_breaks: true })
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ })

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/,
})

export const Identifier = createToken({ name: "Identifier", pattern: /[A-Za-z_][A-Za-z0-9_]*/ })
export const Let = createToken({ name: "Let", pattern: /let/, longer_alt: Identifier })

export const Plus = createToken({ name: "Plus", pattern: /\+/ })
export const Minus = createToken({ name: "Minus", pattern: /-/ })
export const Star = createToken({ name: "Star", pattern: /\*/ })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const Caret = createToken({ name: "Caret", pattern: /\^/ })
export const Equals = createToken({ name: "Equals", pattern: /=/ })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })

export const StatementTokens = [
  WhiteSpace,
  LineComment,
  Newline,
  Semicolon,
  NumberLiteral,
  Let,
  Identifier,
  Plus,
  Minus,
  Star,
  Slash,
  Caret,
  Equals,
  LParen,
  RParen,
]

export const StatementLexer = new Lexer(StatementTokens)
