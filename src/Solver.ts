/**
 * Equation solving orchestrator.
 *
 * Strategies run in a fixed order: closed-form power equations, exact linear
 * solving on `lhs - rhs`, then numerical root finding (multi-start
 * Newton-Raphson followed by a bisection scan). Failures of the first two
 * stages fall through silently and are only logged at debug level.
 *
 * @since 0.1.0
 */

import { Context, Effect, Either, Layer } from "effect"
import { SolverConfig, defaultSolverOptions, type SolverOptions } from "./Config.js"
import {
  ExpressionParseError,
  InfiniteSolutionsError,
  NoRootsFoundError,
  NoSolutionError,
  TooManyVariablesError,
  type EvaluationError,
  type SolveError,
} from "./Errors.js"
import { derivativeEither, evaluateEither, extractLinearEither, parseProgram, solveLinearEither } from "./Expressions.js"
import { binary, type EquationNode, type Expr } from "./internal/expr/Ast.js"
import { lookupBinding, substitute, uniqueVariables, type Environment } from "./internal/expr/Evaluator.js"
import { printExpr } from "./internal/expr/Pretty.js"
import { findAllRoots, newtonRaphson, type RealFunction } from "./internal/numeric/RootFinding.js"

/**
 * Solved values keyed by name: `v`, `v_neg` for the negative root of an even
 * power, or `v`, `v_1`, `v_2`, … for further numeric roots in discovery order.
 *
 * @category Models
 * @since 0.1.0
 */
export type SolutionSet = Readonly<Record<string, number>>

type Unknown =
  | { readonly _tag: "Unknown"; readonly variable: string; readonly lhs: Expr; readonly rhs: Expr }
  | { readonly _tag: "Closed"; readonly residual: Expr; readonly env: Environment }

const withoutBinding = (env: Environment, name: string): Environment =>
  Object.fromEntries(Object.entries(env).filter(([key]) => key !== name))

const selectUnknown = (
  equation: EquationNode,
  env: Environment,
): Either.Either<Unknown, TooManyVariablesError> => {
  const variables = uniqueVariables(equation)
  const free = variables.filter((name) => lookupBinding(env, name) === undefined)

  if (free.length > 1) {
    return Either.left(new TooManyVariablesError({ variables: free }))
  }

  // with nothing free, a lone bound variable is solved for again
  const [single] = free.length === 1 ? free : variables.length === 1 ? variables : []
  if (single === undefined) {
    const closed: Unknown = { _tag: "Closed", residual: binary("-", equation.lhs, equation.rhs), env }
    return Either.right(closed)
  }

  const bound = withoutBinding(env, single)
  const unknown: Unknown = {
    _tag: "Unknown",
    variable: single,
    lhs: substitute(equation.lhs, bound),
    rhs: substitute(equation.rhs, bound),
  }
  return Either.right(unknown)
}

const matchPower = (
  power: Expr,
  other: Expr,
  v: string,
): { readonly exponent: number; readonly value: number } | undefined => {
  if (
    power._tag === "Binary" &&
    power.op === "^" &&
    power.left._tag === "Variable" &&
    power.left.name === v &&
    power.right._tag === "Number" &&
    other._tag === "Number"
  ) {
    return { exponent: power.right.value, value: other.value }
  }
  return undefined
}

/**
 * `v ^ N = c` (either orientation) with literal `N` and `c`. Returns
 * `undefined` when the equation does not have that shape.
 */
export const solvePower = (lhs: Expr, rhs: Expr, v: string): SolutionSet | undefined => {
  const shape = matchPower(lhs, rhs, v) ?? matchPower(rhs, lhs, v)
  if (shape === undefined || shape.exponent === 0) {
    return undefined
  }
  const root = Math.pow(shape.value, 1 / shape.exponent)
  if (Number.isInteger(shape.exponent) && shape.exponent % 2 === 0) {
    return { [v]: root, [`${v}_neg`]: root === 0 ? 0 : -root }
  }
  return { [v]: root }
}

export const nameRoots = (v: string, roots: ReadonlyArray<number>): SolutionSet =>
  Object.fromEntries(roots.map((root, index) => [index === 0 ? v : `${v}_${index}`, root]))

const sampleAt = (residual: Expr, v: string): RealFunction => (x) =>
  Either.getOrElse(evaluateEither(residual, { [v]: x }), () => Number.NaN)

interface Sampler {
  readonly f: RealFunction
  /** First evaluation error, once no sample has produced a finite value. */
  readonly failure: () => EvaluationError | undefined
}

const recordingSampler = (residual: Expr, v: string): Sampler => {
  let firstError: EvaluationError | undefined
  let finiteSeen = false
  const f: RealFunction = (x) => {
    const sample = evaluateEither(residual, { [v]: x })
    if (Either.isLeft(sample)) {
      firstError ??= sample.left
      return Number.NaN
    }
    if (Number.isFinite(sample.right)) {
      finiteSeen = true
    }
    return sample.right
  }
  return { f, failure: () => (finiteSeen ? undefined : firstError) }
}

/**
 * Adds a converged Newton iterate to `roots`. Near a multiple root Newton
 * stops up to `sqrt(tolerance)` away, so a candidate also matches a known root
 * when the residual at their midpoint is below `tolerance`; the one with the
 * smaller residual is kept.
 */
const absorbRoot = (roots: Array<number>, candidate: number, f: RealFunction, options: SolverOptions): void => {
  const index = roots.findIndex(
    (root) =>
      Math.abs(root - candidate) < options.dedupTolerance || Math.abs(f((root + candidate) / 2)) < options.tolerance,
  )
  if (index === -1) {
    roots.push(candidate)
    return
  }
  const known = roots[index]
  if (known !== undefined && Math.abs(f(candidate)) < Math.abs(f(known))) {
    roots[index] = candidate
  }
}

const solveNumerically = (residual: Expr, v: string, options: SolverOptions) =>
  Effect.gen(function* () {
    const { f, failure } = recordingSampler(residual, v)
    const roots: Array<number> = []

    const slope = derivativeEither(residual, v)
    if (Either.isLeft(slope)) {
      yield* Effect.logDebug(`Skipping Newton-Raphson: ${slope.left.message}`)
    } else {
      const df = sampleAt(slope.right, v)
      for (const seed of options.seeds) {
        const attempt = newtonRaphson(f, df, seed, options.tolerance, options.maxIterations)
        if (Either.isLeft(attempt)) {
          yield* Effect.logDebug(`Seed ${seed} failed: ${attempt.left.message}`)
          continue
        }
        absorbRoot(roots, attempt.right, f, options)
        if (options.rootSelection === "first") {
          break
        }
      }
    }

    if (roots.length === 0) {
      yield* Effect.logDebug(`Scanning [${options.scanStart}, ${options.scanEnd}] step ${options.scanStep}`)
      roots.push(
        ...findAllRoots(f, options.scanStart, options.scanEnd, options.scanStep, {
          tolerance: options.tolerance,
          dedupTolerance: options.dedupTolerance,
        }),
      )
    }

    if (roots.length === 0) {
      const error = failure()
      if (error !== undefined) {
        return yield* Effect.fail(error)
      }
      return yield* Effect.fail(
        new NoRootsFoundError({ variable: v, start: options.scanStart, end: options.scanEnd }),
      )
    }
    return nameRoots(v, options.rootSelection === "first" ? roots.slice(0, 1) : roots)
  })

const solveClosed = (residual: Expr, env: Environment) =>
  Effect.gen(function* () {
    const value = yield* evaluateEither(residual, env)
    if (value === 0) {
      return yield* Effect.fail(new InfiniteSolutionsError({ variable: undefined }))
    }
    return yield* Effect.fail(new NoSolutionError({ variable: undefined, residual: value }))
  })

const solveFor = (variable: string, lhs: Expr, rhs: Expr, options: SolverOptions) =>
  Effect.gen(function* () {
    const power = solvePower(lhs, rhs, variable)
    if (power !== undefined) {
      return power
    }
    yield* Effect.logDebug("Power shortcut not applicable")

    const residual = binary("-", lhs, rhs)
    const linear = Either.flatMap(extractLinearEither(residual), (form) => solveLinearEither(form, variable))
    if (Either.isRight(linear)) {
      return { [variable]: linear.right }
    }
    yield* Effect.logDebug(`Linear solve failed: ${linear.left.message}`)

    return yield* solveNumerically(residual, variable, options)
  }).pipe(Effect.annotateLogs({ variable, equation: `${printExpr(lhs)} = ${printExpr(rhs)}` }))

/**
 * Solves a single-variable equation. Variables bound in `env` act as
 * constants; the returned solutions are not applied to `env`.
 *
 * @category Solving
 * @since 0.1.0
 * @example
 * ```ts
 * const solutions = yield* solveEquation(equation(binary("^", variable("x"), num(2)), num(9)), {})
 * // { x: 3, x_neg: -3 }
 * ```
 */
export const solveEquation = (
  equation: EquationNode,
  env: Environment = {},
  options: SolverOptions = defaultSolverOptions,
): Effect.Effect<SolutionSet, SolveError> =>
  Effect.gen(function* () {
    const unknown = yield* selectUnknown(equation, env)
    switch (unknown._tag) {
      case "Closed":
        return yield* solveClosed(unknown.residual, unknown.env)
      case "Unknown":
        return yield* solveFor(unknown.variable, unknown.lhs, unknown.rhs, options)
    }
  })

export interface EquationSolverService {
  readonly options: SolverOptions
  readonly solve: (equation: EquationNode, env?: Environment) => Effect.Effect<SolutionSet, SolveError>
  readonly solveSource: (
    source: string,
    env?: Environment,
  ) => Effect.Effect<SolutionSet, ExpressionParseError | SolveError>
}

const expectSingleEquation = (source: string) =>
  parseProgram(source).pipe(
    Effect.flatMap((statements) => {
      const [first] = statements
      if (statements.length === 1 && first !== undefined && first._tag === "EquationStatement") {
        return Effect.succeed(first.equation)
      }
      return Effect.fail(
        new ExpressionParseError({
          source,
          line: 1,
          column: 1,
          snippet: `${source.split(/\r?\n/)[0] ?? ""}\n^`,
          problem: "Expected a single equation",
        }),
      )
    }),
  )

/**
 * Solver service bound to the `SolverConfig` in context.
 *
 * @category Services
 * @since 0.1.0
 */
export class EquationSolver extends Context.Tag("effect-equation-solver/EquationSolver")<
  EquationSolver,
  EquationSolverService
>() {
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const options = yield* SolverConfig
      return {
        options,
        solve: (equation: EquationNode, env: Environment = {}) => solveEquation(equation, env, options),
        solveSource: (source: string, env: Environment = {}) =>
          expectSingleEquation(source).pipe(Effect.flatMap((equation) => solveEquation(equation, env, options))),
      }
    }),
  )

  /**
   * `layer` with the default options already provided.
   */
  static readonly Default = Layer.provide(this.layer, SolverConfig.layer)
}
