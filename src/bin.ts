#!/usr/bin/env node

import { readFile } from "node:fs/promises"
import { Config, Console, Data, Effect, Either, Layer, Logger, LogLevel } from "effect"
import { SolverConfig } from "./Config.js"
import { printStatement } from "./Expressions.js"
import { formatOutcome, Session, type StatementReport } from "./Session.js"
import { EquationSolver } from "./Solver.js"

const usage = `
effect-equation-solver - evaluate expressions and solve single-variable equations

Usage:
  effect-equation-solver <script>
  effect-equation-solver --eval "<statements>"

Statements (one per line, or separated by ';'):
  let name = expr      bind a variable
  expr = expr          solve for the single unknown and bind the solutions
  expr                 evaluate and print

Environment:
  LOG_LEVEL               minimum log level (default: Warning)
  SOLVER_TOLERANCE        convergence tolerance (default: 1e-10)
  SOLVER_MAX_ITERATIONS   Newton-Raphson iteration cap (default: 100)
  SOLVER_SEEDS            comma separated Newton seeds
  SOLVER_SCAN_START       scan interval start (default: -10)
  SOLVER_SCAN_END         scan interval end (default: 10)
  SOLVER_SCAN_STEP        scan step (default: 0.1)
  SOLVER_ROOT_SELECTION   all | first (default: all)

Example:
  effect-equation-solver --eval "let a = 2; a * x + 3 = 7; x ^ 2"
`.trim()

class UsageError extends Data.TaggedError("UsageError")<{
  readonly problem: string
}> {
  override get message(): string {
    return this.problem
  }
}

const readSource = (args: ReadonlyArray<string>): Effect.Effect<string, UsageError> => {
  const [first, second] = args
  if (first === "--eval") {
    return second === undefined
      ? Effect.fail(new UsageError({ problem: "Missing value for --eval" }))
      : Effect.succeed(second)
  }
  if (first === undefined) {
    return Effect.fail(new UsageError({ problem: "Missing script path" }))
  }
  return Effect.tryPromise({
    try: () => readFile(first, "utf-8"),
    catch: (error) =>
      new UsageError({ problem: `Cannot read ${first}: ${error instanceof Error ? error.message : String(error)}` }),
  })
}

const printReport = (report: StatementReport) =>
  Either.match(report.outcome, {
    onLeft: (error) => Console.error(`${printStatement(report.statement)}: ${error.message}`),
    onRight: (outcome) => Console.log(formatOutcome(outcome)),
  })

const program = (args: ReadonlyArray<string>) =>
  Effect.gen(function* () {
    const source = yield* readSource(args)
    const session = yield* Session
    const reports = yield* session.runProgram(source)
    yield* Effect.forEach(reports, printReport, { discard: true })
    return reports.some((report) => Either.isLeft(report.outcome))
  })

const AppLayer = Session.layer.pipe(Layer.provide(EquationSolver.layer), Layer.provide(SolverConfig.fromEnv))

const main = Effect.gen(function* () {
  const args = process.argv.slice(2)
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    yield* Console.log(usage)
    return
  }

  const level = yield* Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Warning))
  const failed = yield* program(args).pipe(
    Effect.provide(AppLayer),
    Logger.withMinimumLogLevel(level),
    Effect.catchTags({
      UsageError: (error) => Console.error(`${error.message}\n\n${usage}`).pipe(Effect.as(true)),
      ExpressionParseError: (error) => Console.error(`${error.message}\n${error.snippet}`).pipe(Effect.as(true)),
    }),
  )
  if (failed) {
    process.exitCode = 1
  }
})

Effect.runPromise(main).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error)
  process.exitCode = 1
})
