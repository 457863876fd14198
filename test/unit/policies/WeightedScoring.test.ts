import { expect } from "chai";
import { WeightedScoring } from "../../../src/policies/WeightedScoring";
import { DEFAULT_SCORING_WEIGHTS } from "../../../src/colony/ColonyConstants";
import { ColonyError } from "../../../src/utils/errors";

describe("WeightedScoring", () => {
  it("should default to quality plus pheromone", () => {
    const scoring = new WeightedScoring();

    expect(scoring.weights).to.deep.equal(DEFAULT_SCORING_WEIGHTS);
    expect(scoring.edgeQuality(10, 5)).to.equal(15);
    expect(scoring.pheromonesDeposited(10)).to.equal(10);
  });

  it("should apply custom weights", () => {
    const scoring = new WeightedScoring({ pheromoneWeight: 2, depositScale: 0.5 });

    expect(scoring.edgeQuality(1, 3)).to.equal(7);
    expect(scoring.pheromonesDeposited(8)).to.equal(4);
  });

  it("should keep defaults for weights left out", () => {
    const scoring = new WeightedScoring({ depositScale: 3 });

    expect(scoring.weights.pheromoneWeight).to.equal(1);
  });

  it("should reject invalid weights", () => {
    expect(() => new WeightedScoring({ depositScale: -1 })).to.throw(ColonyError);
    expect(() => new WeightedScoring({ pheromoneWeight: NaN })).to.throw(ColonyError);
  });
});
