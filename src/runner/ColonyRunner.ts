/**
 * ColonyRunner - Multi-generation driver
 *
 * Runs a colony for a fixed number of generations and records how the
 * best path improved. Progress logging is opt-in.
 */

import { round } from "lodash";
import { Colony } from "../colony/Colony";
import { BestPath, ColonySnapshot, Scoring, Traversal } from "../colony/interfaces";
import { DEFAULT_RUN_OPTIONS, RunOptions, SUMMARY_TRAIL_COUNT } from "../colony/ColonyConstants";
import { ErrorMapper } from "../utils/ErrorMapper";
import { ColonyError } from "../utils/errors";

/**
 * Result of runGenerations.
 */
export interface RunReport {
  /** Options the run used, after defaults */
  options: RunOptions;

  /** Best quality after each generation (0 while nothing is found) */
  history: number[];

  /** Best path at the end of the run */
  best: BestPath | undefined;

  /** Colony statistics at the end of the run */
  snapshot: ColonySnapshot;

  /** Strongest trails at the end of the run */
  trails: TrailSummary[];
}

export interface TrailSummary {
  a: number;
  b: number;
  pheromone: number;
}

/**
 * Merge options over defaults and check them.
 */
export function resolveRunOptions(options: Partial<RunOptions> = {}): RunOptions {
  const resolved = { ...DEFAULT_RUN_OPTIONS, ...options };

  if (!Number.isInteger(resolved.generations) || resolved.generations < 0) {
    throw new ColonyError(`generations must be a non-negative integer, got ${resolved.generations}`);
  }
  if (!Number.isInteger(resolved.antsPerGeneration) || resolved.antsPerGeneration < 0) {
    throw new ColonyError(
      `antsPerGeneration must be a non-negative integer, got ${resolved.antsPerGeneration}`
    );
  }
  if (!Number.isInteger(resolved.logEvery) || resolved.logEvery < 1) {
    throw new ColonyError(`logEvery must be a positive integer, got ${resolved.logEvery}`);
  }

  return resolved;
}

/**
 * Run `options.generations` generations on `colony`.
 *
 * Errors thrown by the colony or its policies are logged with the
 * generation they happened in and rethrown.
 */
export function runGenerations(
  colony: Colony,
  traversal: Traversal,
  scoring: Scoring,
  options: Partial<RunOptions> = {}
): RunReport {
  const resolved = resolveRunOptions(options);
  const history: number[] = [];

  const step = ErrorMapper.wrapGeneration((generation: number) => {
    colony.runGeneration(resolved.antsPerGeneration, traversal, scoring);
    const quality = colony.bestPath()?.quality ?? 0;
    history.push(quality);

    const isLast = generation === resolved.generations - 1;
    if (resolved.verbose && (colony.generation % resolved.logEvery === 0 || isLast)) {
      console.log(
        `[ColonyRunner] generation ${colony.generation}: best=${round(quality, 4)} ` +
        `edges=${colony.pheromones.size}`
      );
    }
  });

  for (let generation = 0; generation < resolved.generations; generation++) {
    step(generation);
  }

  return {
    options: resolved,
    history,
    best: colony.bestPath(),
    snapshot: colony.snapshot(),
    trails: strongestTrails(colony, SUMMARY_TRAIL_COUNT),
  };
}

/**
 * Edges with the most pheromone after the last completed generation.
 */
export function strongestTrails(colony: Colony, limit: number): TrailSummary[] {
  const written = colony.activeSlot === 0 ? 1 : 0;
  return colony.pheromones.strongest(written, limit).map(edge => ({
    a: edge.a,
    b: edge.b,
    pheromone: edge.levels[written],
  }));
}

/**
 * Debug: Print run summary.
 */
export function printRunSummary(report: RunReport): void {
  const { snapshot, best } = report;
  console.log("\n=== Colony Run ===");
  console.log(`Generations:  ${snapshot.generation}`);
  console.log(`Ants:         ${snapshot.antsSimulated}`);
  console.log(`Edges:        ${snapshot.edgeCount}`);

  if (best) {
    console.log(`Best quality: ${best.quality.toFixed(4)}`);
    console.log(`Best path:    ${best.path.join(" -> ")}`);
  } else {
    console.log("Best path:    none");
  }

  if (report.trails.length > 0) {
    console.log("\nStrongest trails:");
    for (const trail of report.trails) {
      console.log(`  ${trail.a}-${trail.b}: ${trail.pheromone.toFixed(2)}`);
    }
  }
}
