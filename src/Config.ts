/**
 * Solver configuration.
 *
 * `SolverOptions` is a validated schema class; `SolverConfig` is the context
 * tag the `EquationSolver` layer reads it from. Use `SolverConfig.layer` for
 * the defaults, `SolverConfig.withOptions` for explicit overrides, or
 * `SolverConfig.fromEnv` to read `SOLVER_*` environment variables.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer, Schema } from "effect"

/**
 * Whether the numerical stage reports every distinct root or only the first
 * one discovered.
 *
 * @category Config
 * @since 0.1.0
 */
export const RootSelection = Schema.Literal("all", "first")
export type RootSelection = typeof RootSelection.Type

/**
 * @category Config
 * @since 0.1.0
 */
export class SolverOptions extends Schema.Class<SolverOptions>("SolverOptions")({
  tolerance: Schema.Number.pipe(Schema.positive()),
  maxIterations: Schema.Int.pipe(Schema.positive()),
  seeds: Schema.Array(Schema.Number.pipe(Schema.finite())),
  scanStart: Schema.Number.pipe(Schema.finite()),
  scanEnd: Schema.Number.pipe(Schema.finite()),
  scanStep: Schema.Number.pipe(Schema.positive()),
  dedupTolerance: Schema.Number.pipe(Schema.positive()),
  rootSelection: RootSelection,
}) {}

export interface SolverOptionsInput {
  readonly tolerance?: number
  readonly maxIterations?: number
  readonly seeds?: ReadonlyArray<number>
  readonly scanStart?: number
  readonly scanEnd?: number
  readonly scanStep?: number
  readonly dedupTolerance?: number
  readonly rootSelection?: RootSelection
}

const DEFAULTS = {
  tolerance: 1e-10,
  maxIterations: 100,
  seeds: [-10, -5, -1, 0, 1, 5, 10],
  scanStart: -10,
  scanEnd: 10,
  scanStep: 0.1,
  dedupTolerance: 1e-10,
  rootSelection: "all",
} as const satisfies Required<SolverOptionsInput>

/**
 * @category Config
 * @since 0.1.0
 */
export const defaultSolverOptions: SolverOptions = new SolverOptions(DEFAULTS)

/**
 * Merges `overrides` over the defaults. Throws a `ParseError` when a value
 * fails validation (e.g. a non-positive tolerance).
 *
 * @category Config
 * @since 0.1.0
 */
export const resolveSolverOptions = (overrides?: SolverOptionsInput): SolverOptions => {
  if (!overrides) {
    return defaultSolverOptions
  }
  return new SolverOptions({
    tolerance: overrides.tolerance ?? DEFAULTS.tolerance,
    maxIterations: overrides.maxIterations ?? DEFAULTS.maxIterations,
    seeds: overrides.seeds ?? DEFAULTS.seeds,
    scanStart: overrides.scanStart ?? DEFAULTS.scanStart,
    scanEnd: overrides.scanEnd ?? DEFAULTS.scanEnd,
    scanStep: overrides.scanStep ?? DEFAULTS.scanStep,
    dedupTolerance: overrides.dedupTolerance ?? DEFAULTS.dedupTolerance,
    rootSelection: overrides.rootSelection ?? DEFAULTS.rootSelection,
  })
}

const envOptions = Config.all({
  tolerance: Config.number("SOLVER_TOLERANCE").pipe(Config.withDefault(DEFAULTS.tolerance)),
  maxIterations: Config.integer("SOLVER_MAX_ITERATIONS").pipe(Config.withDefault(DEFAULTS.maxIterations)),
  seeds: Config.array(Config.number(), "SOLVER_SEEDS").pipe(Config.withDefault(DEFAULTS.seeds)),
  scanStart: Config.number("SOLVER_SCAN_START").pipe(Config.withDefault(DEFAULTS.scanStart)),
  scanEnd: Config.number("SOLVER_SCAN_END").pipe(Config.withDefault(DEFAULTS.scanEnd)),
  scanStep: Config.number("SOLVER_SCAN_STEP").pipe(Config.withDefault(DEFAULTS.scanStep)),
  dedupTolerance: Config.number("SOLVER_DEDUP_TOLERANCE").pipe(Config.withDefault(DEFAULTS.dedupTolerance)),
  rootSelection: Config.literal("all", "first")("SOLVER_ROOT_SELECTION").pipe(
    Config.withDefault(DEFAULTS.rootSelection),
  ),
})

/**
 * @category Config
 * @since 0.1.0
 */
export class SolverConfig extends Context.Tag("effect-equation-solver/SolverConfig")<
  SolverConfig,
  SolverOptions
>() {
  static readonly layer = Layer.succeed(this, defaultSolverOptions)

  static readonly withOptions = (overrides: SolverOptionsInput) =>
    Layer.sync(this, () => resolveSolverOptions(overrides))

  static readonly fromEnv = Layer.effect(
    this,
    Effect.gen(function* () {
      const raw = yield* envOptions
      return yield* Schema.decodeUnknown(SolverOptions)(raw)
    }),
  )
}
