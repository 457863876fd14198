/**
 * Ant colony optimization over lazily discovered graphs.
 *
 * Usage:
 * ```typescript
 * import { Colony, MatrixTraversal, WeightedScoring, mulberry32, runGenerations } from "pheromone-trail";
 *
 * const colony = new Colony();
 * const traversal = new MatrixTraversal(distances, mulberry32(7));
 * const report = runGenerations(colony, traversal, new WeightedScoring(), { generations: 100 });
 * console.log(report.best);
 * ```
 */

export * from "./colony";
export * from "./policies";
export * from "./runner";
export * from "./utils";
