import { Scoring } from "../colony/interfaces";
import { DEFAULT_SCORING_WEIGHTS, ScoringWeights } from "../colony/ColonyConstants";
import { ColonyError } from "../utils/errors";

/**
 * Linear scoring: a candidate's visit score is its raw quality plus its
 * weighted pheromone, and a path deposits a fixed multiple of its total
 * quality.
 */
export class WeightedScoring implements Scoring {
  readonly weights: ScoringWeights;

  constructor(weights: Partial<ScoringWeights> = {}) {
    this.weights = { ...DEFAULT_SCORING_WEIGHTS, ...weights };

    const { pheromoneWeight, depositScale } = this.weights;
    if (!Number.isFinite(pheromoneWeight)) {
      throw new ColonyError(`pheromoneWeight must be finite, got ${pheromoneWeight}`);
    }
    if (!Number.isFinite(depositScale) || depositScale < 0) {
      throw new ColonyError(`depositScale must be finite and non-negative, got ${depositScale}`);
    }
  }

  edgeQuality(rawQuality: number, pheromone: number): number {
    return rawQuality + this.weights.pheromoneWeight * pheromone;
  }

  pheromonesDeposited(totalQuality: number): number {
    return this.weights.depositScale * totalQuality;
  }
}
