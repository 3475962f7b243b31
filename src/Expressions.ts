/**
 * Public expression API: evaluation, differentiation, linear extraction and
 * parsing, lifted from the pure internal modules into `Either` / `Effect`
 * values with typed error channels.
 *
 * @since 0.1.0
 */

import { Context, Effect, Either, Layer } from "effect"
import {
  DivisionByZeroError,
  ExpressionParseError,
  InfiniteSolutionsError,
  NoSolutionError,
  NonLinearError,
  UnsupportedDerivativeError,
  isEvaluationError,
  type EvaluationError,
} from "./Errors.js"
import type { EquationNode, Expr, Node, Statement } from "./internal/expr/Ast.js"
import { differentiate } from "./internal/expr/Derivative.js"
import { evaluateExpr, type Environment } from "./internal/expr/Evaluator.js"
import { extractLinearForm, solveLinearForm, type LinearForm } from "./internal/expr/Linear.js"
import { parseExpressionEither, parseProgramEither } from "./internal/expr/Parser.js"

export * from "./internal/expr/Ast.js"
export { cloneNode, collectVariables, substitute, uniqueVariables, type Environment } from "./internal/expr/Evaluator.js"
export type { LinearForm } from "./internal/expr/Linear.js"
export { printExpr, printNode, printStatement } from "./internal/expr/Pretty.js"

const toEvaluationError = (error: unknown): EvaluationError => {
  if (isEvaluationError(error)) {
    return error
  }
  throw error
}

/**
 * Evaluates `expr` against `env` without leaving pure code.
 *
 * @category Evaluation
 * @since 0.1.0
 */
export const evaluateEither = (expr: Expr, env: Environment): Either.Either<number, EvaluationError> =>
  Either.try({
    try: () => evaluateExpr(expr, env),
    catch: toEvaluationError,
  })

/**
 * @category Evaluation
 * @since 0.1.0
 * @example
 * ```ts
 * const value = yield* evaluate(binary("+", num(1), variable("x")), { x: 2 })
 * // 3
 * ```
 */
export const evaluate = (expr: Expr, env: Environment): Effect.Effect<number, EvaluationError> =>
  Effect.suspend(() => evaluateEither(expr, env))

/**
 * Symbolic derivative of `node` with respect to `v`. Equations are
 * differentiated side by side.
 *
 * @category Calculus
 * @since 0.1.0
 */
export function derivative(node: Expr, v: string): Effect.Effect<Expr, UnsupportedDerivativeError>
export function derivative(node: EquationNode, v: string): Effect.Effect<EquationNode, UnsupportedDerivativeError>
export function derivative(node: Node, v: string): Effect.Effect<Node, UnsupportedDerivativeError>
export function derivative(node: Node, v: string): Effect.Effect<Node, UnsupportedDerivativeError> {
  return Effect.try({
    try: () => differentiate(node, v),
    catch: (error) => {
      if (error instanceof UnsupportedDerivativeError) {
        return error
      }
      throw error
    },
  })
}

export const derivativeEither = (expr: Expr, v: string): Either.Either<Expr, UnsupportedDerivativeError> =>
  Either.try({
    try: () => differentiate(expr, v),
    catch: (error) => {
      if (error instanceof UnsupportedDerivativeError) {
        return error
      }
      throw error
    },
  })

/**
 * @category Linear
 * @since 0.1.0
 */
export const extractLinearEither = (
  expr: Expr,
): Either.Either<LinearForm, NonLinearError | DivisionByZeroError> =>
  Either.try({
    try: () => extractLinearForm(expr),
    catch: (error) => {
      if (error instanceof NonLinearError || error instanceof DivisionByZeroError) {
        return error
      }
      throw error
    },
  })

/**
 * @category Linear
 * @since 0.1.0
 */
export const extractLinear = (expr: Expr): Effect.Effect<LinearForm, NonLinearError | DivisionByZeroError> =>
  Effect.suspend(() => extractLinearEither(expr))

/**
 * Solves `form = 0` for `v`.
 *
 * @category Linear
 * @since 0.1.0
 */
export const solveLinearEither = (
  form: LinearForm,
  v: string,
): Either.Either<number, NoSolutionError | InfiniteSolutionsError> =>
  Either.try({
    try: () => solveLinearForm(form, v),
    catch: (error) => {
      if (error instanceof NoSolutionError || error instanceof InfiniteSolutionsError) {
        return error
      }
      throw error
    },
  })

/**
 * @category Linear
 * @since 0.1.0
 */
export const solveLinear = (
  form: LinearForm,
  v: string,
): Effect.Effect<number, NoSolutionError | InfiniteSolutionsError> => Effect.suspend(() => solveLinearEither(form, v))

/**
 * @category Parsing
 * @since 0.1.0
 */
export const parseProgram = (source: string): Effect.Effect<ReadonlyArray<Statement>, ExpressionParseError> =>
  Effect.suspend(() => parseProgramEither(source))

/**
 * @category Parsing
 * @since 0.1.0
 */
export const parseExpression = (source: string): Effect.Effect<Expr, ExpressionParseError> =>
  Effect.suspend(() => parseExpressionEither(source))

export interface ExpressionEngineService {
  readonly evaluate: (
    source: string,
    env?: Environment,
  ) => Effect.Effect<number, ExpressionParseError | EvaluationError>
  readonly derivative: (source: string, v: string) => Effect.Effect<Expr, ExpressionParseError | UnsupportedDerivativeError>
}

/**
 * Source-level entry point: parses an expression and evaluates or
 * differentiates it.
 *
 * @category Services
 * @since 0.1.0
 */
export class ExpressionEngine extends Context.Tag("effect-equation-solver/ExpressionEngine")<
  ExpressionEngine,
  ExpressionEngineService
>() {
  static readonly layer = Layer.succeed(this, {
    evaluate: (source: string, env: Environment = {}) =>
      parseExpression(source).pipe(Effect.flatMap((expr) => evaluate(expr, env))),
    derivative: (source: string, v: string) =>
      parseExpression(source).pipe(Effect.flatMap((expr) => derivative(expr, v))),
  })
}
