/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Expressions.js"
export * from "./Config.js"
export * from "./Solver.js"
export * from "./Session.js"
export {
  bisection,
  dedupRoots,
  findAllRoots,
  newtonRaphson,
  type RealFunction,
  type ScanOptions,
} from "./internal/numeric/RootFinding.js"
