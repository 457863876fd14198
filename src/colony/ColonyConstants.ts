/**
 * @fileoverview Default tuning values for colony runs and scoring.
 *
 * @module colony/ColonyConstants
 */

/**
 * Options for a multi-generation run.
 */
export interface RunOptions {
  /** Generations to simulate */
  generations: number;
  /** Ants per generation */
  antsPerGeneration: number;
  /** Log progress to the console */
  verbose: boolean;
  /**
   * When verbose, log after generations whose colony-wide count is a
   * multiple of this (the last one of a run is always logged)
   */
  logEvery: number;
}

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  generations: 50,
  antsPerGeneration: 20,
  verbose: false,
  logEvery: 10,
};

/**
 * Weights for the linear reference scoring.
 */
export interface ScoringWeights {
  /** Multiplier applied to pheromone when computing a visit score */
  pheromoneWeight: number;
  /** Multiplier turning a path's total quality into a deposit */
  depositScale: number;
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  pheromoneWeight: 1,
  depositScale: 1,
};

/** Trails listed by printRunSummary */
export const SUMMARY_TRAIL_COUNT = 5;
