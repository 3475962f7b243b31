/**
 * Statement-by-statement execution against a mutable environment.
 *
 * The environment lives in a `Ref`; a statement only writes to it once it has
 * fully succeeded, so a failed statement leaves every binding untouched.
 *
 * @since 0.1.0
 */

import { Context, Effect, Either, Layer, Ref } from "effect"
import type { ExpressionParseError, SolveError } from "./Errors.js"
import { evaluate, parseProgram, printStatement, type Environment, type Statement } from "./Expressions.js"
import { EquationSolver, type EquationSolverService, type SolutionSet } from "./Solver.js"

/**
 * @category Models
 * @since 0.1.0
 */
export type StatementOutcome =
  | { readonly _tag: "Assigned"; readonly name: string; readonly value: number }
  | { readonly _tag: "Evaluated"; readonly value: number }
  | { readonly _tag: "Solved"; readonly solutions: SolutionSet }

/**
 * @category Models
 * @since 0.1.0
 */
export interface StatementReport {
  readonly statement: Statement
  readonly outcome: Either.Either<StatementOutcome, SolveError>
}

export interface SessionService {
  readonly environment: Effect.Effect<Environment>
  readonly runStatement: (statement: Statement) => Effect.Effect<StatementOutcome, SolveError>
  /**
   * Parses `source` and runs every statement in order. A parse failure fails
   * the whole program; a failing statement is reported and the rest still run.
   */
  readonly runProgram: (source: string) => Effect.Effect<ReadonlyArray<StatementReport>, ExpressionParseError>
  readonly reset: Effect.Effect<void>
}

export const formatOutcome = (outcome: StatementOutcome): string => {
  switch (outcome._tag) {
    case "Assigned":
      return `${outcome.name} = ${outcome.value}`
    case "Evaluated":
      return `${outcome.value}`
    case "Solved":
      return Object.entries(outcome.solutions)
        .map(([name, value]) => `${name} = ${value}`)
        .join(", ")
  }
}

const applySolutions = (env: Environment, solutions: SolutionSet): Environment => ({ ...env, ...solutions })

/**
 * Builds a session over an existing environment ref.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeSession = (solver: EquationSolverService, ref: Ref.Ref<Environment>): SessionService => {
  const execute = (statement: Statement): Effect.Effect<StatementOutcome, SolveError> =>
    Effect.gen(function* () {
      const env = yield* Ref.get(ref)
      switch (statement._tag) {
        case "Assignment": {
          const value = yield* evaluate(statement.expr, env)
          yield* Ref.set(ref, { ...env, [statement.name]: value })
          return { _tag: "Assigned", name: statement.name, value } satisfies StatementOutcome
        }
        case "ExpressionStatement": {
          const value = yield* evaluate(statement.expr, env)
          return { _tag: "Evaluated", value } satisfies StatementOutcome
        }
        case "EquationStatement": {
          const solutions = yield* solver.solve(statement.equation, env)
          yield* Ref.set(ref, applySolutions(env, solutions))
          return { _tag: "Solved", solutions } satisfies StatementOutcome
        }
      }
    })

  const runStatement = (statement: Statement): Effect.Effect<StatementOutcome, SolveError> =>
    execute(statement).pipe(
      Effect.tap((outcome) => Effect.logInfo(formatOutcome(outcome))),
      Effect.tapError((error) => Effect.logWarning(error.message)),
      Effect.annotateLogs("statement", printStatement(statement)),
    )

  return {
    environment: Ref.get(ref),
    runStatement,
    runProgram: (source: string) =>
      parseProgram(source).pipe(
        Effect.flatMap((statements) =>
          Effect.forEach(statements, (statement) =>
            Effect.either(runStatement(statement)).pipe(Effect.map((outcome) => ({ statement, outcome }))),
          ),
        ),
      ),
    reset: Ref.set(ref, {}),
  }
}

/**
 * Session service. Its environment starts out with `initial` bindings.
 *
 * @category Services
 * @since 0.1.0
 */
export class Session extends Context.Tag("effect-equation-solver/Session")<Session, SessionService>() {
  static readonly layer = Session.withEnvironment({})

  static withEnvironment(initial: Environment) {
    return Layer.effect(
      this,
      Effect.gen(function* () {
        const solver = yield* EquationSolver
        const ref = yield* Ref.make<Environment>(initial)
        return makeSession(solver, ref)
      }),
    )
  }
}
