/**
 * Error hierarchy for the expression engine and equation solver.
 *
 * Every failure mode is a tagged error so callers can pattern match with
 * `Effect.catchTag` or inspect `_tag` on an `Either.left`. Messages stay
 * human-readable for the CLI while the fields carry the structured data.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when a `Variable` leaf has no binding in the environment.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new UndefinedVariableError({ name: "x" })
 * yield* Effect.fail(error)
 * ```
 */
export class UndefinedVariableError extends Data.TaggedError("UndefinedVariableError")<{
  readonly name: string
}> {
  override get message(): string {
    return `Undefined variable: ${this.name}`
  }
}

/**
 * Raised when a denominator evaluates (or folds) to exactly zero.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DivisionByZeroError extends Data.TaggedError("DivisionByZeroError")<{
  readonly expression: string
}> {
  override get message(): string {
    return `Division by zero in ${this.expression}`
  }
}

/**
 * Raised when `log` receives a value ≤ 0 or `sqrt` a value < 0.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DomainError extends Data.TaggedError("DomainError")<{
  readonly function: string
  readonly argument: number
}> {
  override get message(): string {
    return `${this.function} is undefined for ${this.argument}`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class UnknownOperatorError extends Data.TaggedError("UnknownOperatorError")<{
  readonly operator: string
}> {
  override get message(): string {
    return `Unknown operator ${this.operator}`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class UnknownFunctionError extends Data.TaggedError("UnknownFunctionError")<{
  readonly name: string
}> {
  override get message(): string {
    return `Unknown function: ${this.name}`
  }
}

/**
 * Raised by the differentiator for constructs it has no rule for, such as a
 * power whose exponent is not a literal number.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnsupportedDerivativeError extends Data.TaggedError("UnsupportedDerivativeError")<{
  readonly expression: string
  readonly reason: string
}> {
  override get message(): string {
    return `Cannot differentiate ${this.expression}: ${this.reason}`
  }
}

/**
 * Raised by the linear extractor when a subtree is not linear in its
 * variables.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NonLinearError extends Data.TaggedError("NonLinearError")<{
  readonly expression: string
  readonly reason: string
}> {
  override get message(): string {
    return `Non-linear term ${this.expression}: ${this.reason}`
  }
}

/**
 * Raised when an equation has more than one unknown.
 *
 * @category Errors
 * @since 0.1.0
 */
export class TooManyVariablesError extends Data.TaggedError("TooManyVariablesError")<{
  readonly variables: ReadonlyArray<string>
}> {
  override get message(): string {
    return `Can only solve single-variable equations, found: ${this.variables.join(", ")}`
  }
}

/**
 * Raised by bisection when the function does not change sign across the
 * interval.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new InvalidBracketError({ a: 0, b: 0.5, fa: -2, fb: -1.75 })
 * ```
 */
export class InvalidBracketError extends Data.TaggedError("InvalidBracketError")<{
  readonly a: number
  readonly b: number
  readonly fa: number
  readonly fb: number
}> {
  override get message(): string {
    return `Function values at [${this.a}, ${this.b}] must have opposite signs (got ${this.fa} and ${this.fb})`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class DerivativeNearZeroError extends Data.TaggedError("DerivativeNearZeroError")<{
  readonly x: number
  readonly derivative: number
}> {
  override get message(): string {
    return `Derivative too close to zero at x=${this.x}: ${this.derivative}`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class DidNotConvergeError extends Data.TaggedError("DidNotConvergeError")<{
  readonly iterations: number
  readonly estimate: number
}> {
  override get message(): string {
    return `Newton-Raphson did not converge after ${this.iterations} iterations (last estimate ${this.estimate})`
  }
}

/**
 * Raised when every solving strategy is exhausted without a root.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NoRootsFoundError extends Data.TaggedError("NoRootsFoundError")<{
  readonly variable: string
  readonly start: number
  readonly end: number
}> {
  override get message(): string {
    return `No roots found for ${this.variable} in [${this.start}, ${this.end}]`
  }
}

/**
 * Degenerate linear case `0·v + c = 0` with `c ≠ 0`.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NoSolutionError extends Data.TaggedError("NoSolutionError")<{
  readonly variable: string | undefined
  readonly residual: number
}> {
  override get message(): string {
    const subject = this.variable === undefined ? "equation" : this.variable
    return `No solution for ${subject}: residual ${this.residual} can never be zero`
  }
}

/**
 * Degenerate linear case `0·v + 0 = 0`.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InfiniteSolutionsError extends Data.TaggedError("InfiniteSolutionsError")<{
  readonly variable: string | undefined
}> {
  override get message(): string {
    const subject = this.variable === undefined ? "equation" : this.variable
    return `Infinitely many solutions for ${subject}`
  }
}

/**
 * Raised by the statement parser. `snippet` holds the offending line with a
 * caret under the reported column.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ExpressionParseError extends Data.TaggedError("ExpressionParseError")<{
  readonly source: string
  readonly line: number
  readonly column: number
  readonly snippet: string
  readonly problem: string
}> {
  override get message(): string {
    return `Parse error at line ${this.line}, column ${this.column}: ${this.problem}`
  }
}

/**
 * Failures of `evaluate`.
 *
 * @category Errors
 * @since 0.1.0
 */
export type EvaluationError =
  | UndefinedVariableError
  | DivisionByZeroError
  | DomainError
  | UnknownOperatorError
  | UnknownFunctionError

/**
 * Failures of `extractLinear` and `solveLinear`.
 *
 * @category Errors
 * @since 0.1.0
 */
export type LinearError = NonLinearError | DivisionByZeroError | NoSolutionError | InfiniteSolutionsError

/**
 * Failures of a single numerical attempt.
 *
 * @category Errors
 * @since 0.1.0
 */
export type RootFindingError = InvalidBracketError | DerivativeNearZeroError | DidNotConvergeError

/**
 * Failures surfaced by `solveEquation` once every strategy is exhausted.
 *
 * @category Errors
 * @since 0.1.0
 */
export type SolveError =
  | TooManyVariablesError
  | NoRootsFoundError
  | NoSolutionError
  | InfiniteSolutionsError
  | EvaluationError

export const isEvaluationError = (error: unknown): error is EvaluationError =>
  error instanceof UndefinedVariableError ||
  error instanceof DivisionByZeroError ||
  error instanceof DomainError ||
  error instanceof UnknownOperatorError ||
  error instanceof UnknownFunctionError
