import { describe, expect, it } from "vitest"
import { Either } from "effect"
import {
  bisection,
  dedupRoots,
  findAllRoots,
  newtonRaphson,
  pushDistinct,
} from "../../src/internal/numeric/RootFinding.js"

const square = (x: number) => x * x - 2
const dSquare = (x: number) => 2 * x

describe("Numerical root finding", () => {
  describe("newtonRaphson", () => {
    it("converges to sqrt(2) from 1", () => {
      const result = newtonRaphson(square, dSquare, 1)
      expect(Either.isRight(result)).toBe(true)
      if (Either.isRight(result)) {
        expect(result.right).toBeCloseTo(Math.SQRT2, 10)
      }
    })

    it("converges to the negative root from a negative guess", () => {
      const result = newtonRaphson(square, dSquare, -10)
      expect(Either.getOrElse(result, () => Number.NaN)).toBeCloseTo(-Math.SQRT2, 10)
    })

    it("fails when the derivative vanishes", () => {
      const result = newtonRaphson(square, dSquare, 0)
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("DerivativeNearZeroError")
        if (result.left._tag === "DerivativeNearZeroError") {
          expect(result.left.x).toBe(0)
          expect(result.left.derivative).toBe(0)
        }
      }
    })

    it("gives up after maxIter iterations", () => {
      // x^2 + 1 has no real root
      const result = newtonRaphson((x) => x * x + 1, (x) => 2 * x, 0.5, 1e-10, 5)
      if (Either.isLeft(result) && result.left._tag === "DidNotConvergeError") {
        expect(result.left.iterations).toBe(5)
      } else {
        expect.fail("expected DidNotConvergeError")
      }
    })

    it("stops on non-finite samples", () => {
      const result = newtonRaphson(() => Number.NaN, () => 1, 3)
      if (Either.isLeft(result) && result.left._tag === "DidNotConvergeError") {
        expect(result.left.iterations).toBe(0)
        expect(result.left.estimate).toBe(3)
      } else {
        expect.fail("expected DidNotConvergeError")
      }
    })
  })

  describe("bisection", () => {
    it("narrows a bracket to the root", () => {
      const result = bisection(square, 0, 2)
      expect(Either.getOrElse(result, () => Number.NaN)).toBeCloseTo(Math.SQRT2, 9)
    })

    it("accepts reversed endpoints", () => {
      const result = bisection(square, 2, 0)
      expect(Either.getOrElse(result, () => Number.NaN)).toBeCloseTo(Math.SQRT2, 9)
    })

    it("rejects an interval without a sign change", () => {
      const result = bisection(square, 0, 0.5)
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("InvalidBracketError")
        expect(result.left.a).toBe(0)
        expect(result.left.b).toBe(0.5)
        expect(result.left.fa).toBe(-2)
        expect(result.left.fb).toBe(-1.75)
      }
    })

    it("rejects a bracket with a NaN endpoint", () => {
      const result = bisection((x) => (x < 0 ? Number.NaN : x - 5), -1, 1)
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("InvalidBracketError")
        expect(Number.isNaN(result.left.fa)).toBe(true)
        expect(result.left.fb).toBe(-4)
      }
    })

    it("returns an endpoint that is already a root", () => {
      expect(bisection((x) => x - 1, 1, 3)).toEqual(Either.right(1))
      expect(bisection((x) => x - 3, 1, 3)).toEqual(Either.right(3))
    })
  })

  describe("findAllRoots", () => {
    it("finds the five roots of sin on [-7, 7] in order", () => {
      const roots = findAllRoots(Math.sin, -7, 7, 0.1)
      const expected = [-2 * Math.PI, -Math.PI, 0, Math.PI, 2 * Math.PI]

      expect(roots).toHaveLength(5)
      roots.forEach((root, index) => {
        expect(root).toBeCloseTo(expected[index] ?? Number.NaN, 9)
      })
    })

    it("reports a root on a grid point once", () => {
      expect(findAllRoots((x) => x - 1, 0, 2, 0.5)).toEqual([1])
    })

    it("skips cells whose samples are not numbers", () => {
      const roots = findAllRoots((x) => (x < 0 ? Number.NaN : x - 0.25), -1, 1, 0.1)
      expect(roots).toHaveLength(1)
      expect(roots[0]).toBeCloseTo(0.25, 9)
    })

    it("returns nothing for an empty or inverted range", () => {
      expect(findAllRoots(Math.sin, 1, 1, 0.1)).toEqual([])
      expect(findAllRoots(Math.sin, 1, -1, 0.1)).toEqual([])
      expect(findAllRoots(Math.sin, -1, 1, 0)).toEqual([])
    })
  })

  describe("deduplication", () => {
    it("drops candidates within tolerance of an earlier root", () => {
      expect(dedupRoots([1, 1 + 1e-12, 2, 2 - 1e-11])).toEqual([1, 2])
    })

    it("honours a custom tolerance", () => {
      expect(dedupRoots([1, 1.05, 2], 0.1)).toEqual([1, 2])
    })

    it("reports whether a candidate was kept", () => {
      const roots: Array<number> = [0.5]
      expect(pushDistinct(roots, 0.5)).toBe(false)
      expect(pushDistinct(roots, 0.75)).toBe(true)
      expect(roots).toEqual([0.5, 0.75])
    })
  })
})
