import { describe, expect, it } from "@effect/vitest"
import { ConfigProvider, Effect, Layer } from "effect"
import { SolverConfig, SolverOptions, defaultSolverOptions, resolveSolverOptions } from "../src/Config.js"

const fromEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  SolverConfig.fromEnv.pipe(Layer.provide(Layer.setConfigProvider(ConfigProvider.fromMap(new Map(entries)))))

describe("SolverOptions", () => {
  it("uses the documented defaults", () => {
    expect(defaultSolverOptions.tolerance).toBe(1e-10)
    expect(defaultSolverOptions.maxIterations).toBe(100)
    expect(defaultSolverOptions.seeds).toEqual([-10, -5, -1, 0, 1, 5, 10])
    expect(defaultSolverOptions.scanStart).toBe(-10)
    expect(defaultSolverOptions.scanEnd).toBe(10)
    expect(defaultSolverOptions.scanStep).toBe(0.1)
    expect(defaultSolverOptions.rootSelection).toBe("all")
  })

  it("merges overrides over the defaults", () => {
    const options = resolveSolverOptions({ tolerance: 1e-6, seeds: [2] })
    expect(options).toBeInstanceOf(SolverOptions)
    expect(options.tolerance).toBe(1e-6)
    expect(options.seeds).toEqual([2])
    expect(options.maxIterations).toBe(100)
  })

  it("returns the shared defaults without overrides", () => {
    expect(resolveSolverOptions()).toBe(defaultSolverOptions)
  })

  it("rejects invalid values", () => {
    expect(() => resolveSolverOptions({ tolerance: -1 })).toThrow()
    expect(() => resolveSolverOptions({ maxIterations: 2.5 })).toThrow()
  })
})

describe("SolverConfig", () => {
  it.effect("provides the defaults through the base layer", () =>
    Effect.gen(function* () {
      const options = yield* SolverConfig
      expect(options).toBe(defaultSolverOptions)
    }).pipe(Effect.provide(SolverConfig.layer)),
  )

  it.effect("reads SOLVER_* variables", () =>
    Effect.gen(function* () {
      const options = yield* SolverConfig
      expect(options.tolerance).toBe(1e-6)
      expect(options.seeds).toEqual([1, 2])
      expect(options.rootSelection).toBe("first")
      expect(options.scanStep).toBe(0.1)
    }).pipe(
      Effect.provide(
        fromEnv([
          ["SOLVER_TOLERANCE", "1e-6"],
          ["SOLVER_SEEDS", "1,2"],
          ["SOLVER_ROOT_SELECTION", "first"],
        ]),
      ),
    ),
  )

  it.effect("fails on values outside the schema", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        Effect.provide(SolverConfig, fromEnv([["SOLVER_SCAN_STEP", "-1"]])),
      )
      expect(error._tag).toBe("ParseError")
    }),
  )
})
