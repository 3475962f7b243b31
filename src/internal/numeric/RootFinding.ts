/**
 * Numerical root finding (pure layer).
 *
 * Plain functions over `(x: number) => number` with no Effect wrapping; the
 * solver calls them in tight loops. Each attempt returns an `Either` so the
 * multi-start and scanning loops decide explicitly what to skip.
 *
 * @since 0.1.0
 * @internal
 */

import { Either } from "effect"
import { DerivativeNearZeroError, DidNotConvergeError, InvalidBracketError } from "../../Errors.js"

export type RealFunction = (x: number) => number

export const DEFAULT_TOLERANCE = 1e-10
export const DEFAULT_MAX_ITERATIONS = 100
export const DEDUP_TOLERANCE = 1e-10

/**
 * Newton-Raphson iteration `x ← x - f(x)/f'(x)`.
 *
 * Succeeds when `|f(x)| < tol` or the step is smaller than `tol`. Fails with
 * `DerivativeNearZeroError` when `|f'(x)| < tol`, and with
 * `DidNotConvergeError` after `maxIter` iterations or once the iterate leaves
 * the finite reals.
 *
 * @example
 * ```ts
 * const root = newtonRaphson((x) => x * x - 2, (x) => 2 * x, 1)
 * // Either.right(1.41421356...)
 * ```
 */
export const newtonRaphson = (
  f: RealFunction,
  df: RealFunction,
  guess: number,
  tol: number = DEFAULT_TOLERANCE,
  maxIter: number = DEFAULT_MAX_ITERATIONS,
): Either.Either<number, DerivativeNearZeroError | DidNotConvergeError> => {
  let x = guess
  for (let iteration = 0; iteration < maxIter; iteration += 1) {
    const fx = f(x)
    if (!Number.isFinite(fx)) {
      return Either.left(new DidNotConvergeError({ iterations: iteration, estimate: x }))
    }
    if (Math.abs(fx) < tol) {
      return Either.right(x)
    }
    const dfx = df(x)
    if (!Number.isFinite(dfx)) {
      return Either.left(new DidNotConvergeError({ iterations: iteration, estimate: x }))
    }
    if (Math.abs(dfx) < tol) {
      return Either.left(new DerivativeNearZeroError({ x, derivative: dfx }))
    }
    const step = fx / dfx
    x -= step
    if (Math.abs(step) < tol) {
      return Either.right(x)
    }
  }
  return Either.left(new DidNotConvergeError({ iterations: maxIter, estimate: x }))
}

/**
 * Bisection on `[a, b]`. Requires a sign change (`f(a)·f(b) ≤ 0`, neither
 * value NaN); an endpoint that is already an exact zero is returned unchanged.
 */
export const bisection = (
  f: RealFunction,
  a: number,
  b: number,
  tol: number = DEFAULT_TOLERANCE,
): Either.Either<number, InvalidBracketError> => {
  let lo = Math.min(a, b)
  let hi = Math.max(a, b)
  let flo = f(lo)
  const fhi = f(hi)

  // NaN endpoints fail the comparison as well
  if (!(flo * fhi <= 0)) {
    return Either.left(new InvalidBracketError({ a, b, fa: f(a), fb: f(b) }))
  }
  if (flo === 0) {
    return Either.right(lo)
  }
  if (fhi === 0) {
    return Either.right(hi)
  }

  while (hi - lo > tol) {
    const mid = (lo + hi) / 2
    // bracket can no longer shrink in double precision
    if (mid === lo || mid === hi) {
      break
    }
    const fmid = f(mid)
    if (Math.abs(fmid) < tol) {
      return Either.right(mid)
    }
    if (flo * fmid < 0) {
      hi = mid
    } else {
      lo = mid
      flo = fmid
    }
  }

  return Either.right((lo + hi) / 2)
}

/**
 * Appends `candidate` unless it lies within `tolerance` of a root already in
 * `roots`. Returns whether it was kept.
 */
export const pushDistinct = (roots: Array<number>, candidate: number, tolerance: number = DEDUP_TOLERANCE): boolean => {
  if (roots.some((root) => Math.abs(root - candidate) < tolerance)) {
    return false
  }
  roots.push(candidate)
  return true
}

export const dedupRoots = (candidates: ReadonlyArray<number>, tolerance: number = DEDUP_TOLERANCE): ReadonlyArray<number> => {
  const roots: Array<number> = []
  for (const candidate of candidates) {
    pushDistinct(roots, candidate, tolerance)
  }
  return roots
}

export interface ScanOptions {
  readonly tolerance?: number
  readonly dedupTolerance?: number
}

/**
 * Scans `[start, end]` in fixed steps and bisects every cell where `f`
 * changes sign (`f(prev)·f(x) ≤ 0`). Cells whose bisection fails are skipped.
 * Roots come back in discovery order without near-duplicates.
 */
export const findAllRoots = (
  f: RealFunction,
  start: number,
  end: number,
  step: number,
  options: ScanOptions = {},
): ReadonlyArray<number> => {
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE
  const dedupTolerance = options.dedupTolerance ?? DEDUP_TOLERANCE
  const roots: Array<number> = []
  if (!(step > 0) || !(end > start)) {
    return roots
  }

  const cells = Math.ceil((end - start) / step - 1e-9)
  let previousX = start
  let previousF = f(start)

  for (let index = 1; index <= cells; index += 1) {
    const x = index === cells ? end : start + index * step
    const fx = f(x)

    if (previousF * fx <= 0) {
      const outcome = bisection(f, previousX, x, tolerance)
      if (Either.isRight(outcome)) {
        pushDistinct(roots, outcome.right, dedupTolerance)
      }
    }

    previousX = x
    previousF = fx
  }

  return roots
}
