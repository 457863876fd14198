export {
  runGenerations,
  resolveRunOptions,
  strongestTrails,
  printRunSummary,
} from "./ColonyRunner";
export type { RunReport, TrailSummary } from "./ColonyRunner";
