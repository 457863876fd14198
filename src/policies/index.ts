/**
 * @fileoverview Reference traversal and scoring policies.
 *
 * @module policies
 */

export { MatrixTraversal } from "./MatrixTraversal";
export { WeightedScoring } from "./WeightedScoring";
export { mulberry32 } from "./random";
