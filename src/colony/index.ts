export { Colony, createColony } from "./Colony";

export { PheromoneTable, PheromoneTableView, createEdgeKey } from "./PheromoneTable";
export type {
  PheromoneEdge,
  ReadonlyPheromoneEdge,
  ReadonlyPheromoneTable,
} from "./PheromoneTable";

export type {
  BestPath,
  ColonySnapshot,
  PheromoneSlot,
  Scoring,
  TargetCandidate,
  Traversal,
} from "./interfaces";

export {
  DEFAULT_RUN_OPTIONS,
  DEFAULT_SCORING_WEIGHTS,
  SUMMARY_TRAIL_COUNT,
} from "./ColonyConstants";
export type { RunOptions, ScoringWeights } from "./ColonyConstants";
