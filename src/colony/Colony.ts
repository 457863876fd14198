import { PheromoneTable, PheromoneTableView, ReadonlyPheromoneTable } from "./PheromoneTable";
import {
  BestPath,
  ColonySnapshot,
  PheromoneSlot,
  Scoring,
  Traversal,
} from "./interfaces";
import { ColonyError, PolicyContractError } from "../utils/errors";

/**
 * Colony runs generations of ants over a graph it discovers lazily.
 *
 * Per generation:
 * 1. Every known edge's active slot is seeded from the other slot
 * 2. Ants walk one at a time, always taking the candidate with the best
 *    visit score, and deposit pheromone on the edges they walked
 * 3. The slots swap roles
 *
 * Deposits land in the active slot immediately, so later ants of a
 * generation are steered by earlier ones. There is no evaporation: trails
 * only accumulate.
 *
 * Comparisons use strict `>`, so the first-enumerated candidate wins a tie
 * and an ant that only ties the best path does not replace it.
 */
export class Colony {
  /** Edge pheromone levels */
  private readonly table = new PheromoneTable();

  /** Copy-on-read view of `table` for callers */
  private readonly view = new PheromoneTableView(this.table);

  /** Whether slot 1 is the active slot for the next generation */
  private secondBuffer = false;

  /** Best quality ever found; 0 means no path yet */
  private bestQuality = 0;

  /** Nodes of the best path; swapped with pathBuf, never copied */
  private bestBuf: number[] = [];

  /** Scratch path of the ant being simulated */
  private pathBuf: number[] = [];

  private generations = 0;
  private ants = 0;

  /**
   * Run one generation of `antCount` ants.
   *
   * @param antCount - Non-negative integer; 0 only carries trails forward
   * @param traversal - Position and topology provider, reset once per ant
   * @param scoring - Visit score and deposit functions
   * @throws ColonyError if antCount is not a non-negative integer
   * @throws PolicyContractError if scoring returns a NaN visit score or an
   *   invalid deposit. Ants that finished before the failing one keep their
   *   deposits, best path and ant count; the generation count and active
   *   slot do not advance, so the next generation's carry-forward overwrites
   *   those partial deposits with the previous trail.
   */
  runGeneration(antCount: number, traversal: Traversal, scoring: Scoring): void {
    if (!Number.isInteger(antCount) || antCount < 0) {
      throw new ColonyError(`antCount must be a non-negative integer, got ${antCount}`);
    }

    const slot = this.activeSlot;
    this.table.carryForward(slot);

    for (let ant = 0; ant < antCount; ant++) {
      this.runAnt(ant, slot, traversal, scoring);
    }

    this.secondBuffer = !this.secondBuffer;
    this.generations++;
  }

  /**
   * Best path ever found, or undefined if no ant has produced a path with
   * positive quality. The returned path is a copy.
   */
  bestPath(): BestPath | undefined {
    if (this.bestQuality > 0) {
      return { quality: this.bestQuality, path: this.bestBuf.slice() };
    }
    return undefined;
  }

  /** Slot the next generation will write */
  get activeSlot(): PheromoneSlot {
    return this.secondBuffer ? 1 : 0;
  }

  get useSecondBuffer(): boolean {
    return this.secondBuffer;
  }

  /** Generations run so far */
  get generation(): number {
    return this.generations;
  }

  /** Read-only view of the edge table; edges are frozen copies */
  get pheromones(): ReadonlyPheromoneTable {
    return this.view;
  }

  /**
   * Pheromone on the edge between `a` and `b` as of the last completed
   * generation. Does not create the edge.
   */
  pheromone(a: number, b: number): number {
    const written: PheromoneSlot = this.secondBuffer ? 0 : 1;
    return this.table.level(a, b, written);
  }

  snapshot(): ColonySnapshot {
    const found = this.bestQuality > 0;
    return {
      generation: this.generations,
      antsSimulated: this.ants,
      edgeCount: this.table.size,
      activeSlot: this.activeSlot,
      bestQuality: this.bestQuality,
      bestPathLength: found ? this.bestBuf.length : 0,
    };
  }

  private runAnt(ant: number, slot: PheromoneSlot, traversal: Traversal, scoring: Scoring): void {
    const path = this.pathBuf;
    path.length = 0;

    const start = traversal.reset();
    let current = start;
    let totalQuality = 0;

    // Walk until no candidates remain
    for (;;) {
      let bestScore = -Infinity;
      let chosen: number | undefined;
      let chosenQuality = 0;

      for (const { quality, target } of traversal.targets(current)) {
        const pheromone = this.table.touch(current, target).levels[slot];
        const score = scoring.edgeQuality(quality, pheromone);
        if (Number.isNaN(score)) {
          throw new PolicyContractError(
            `Visit score is NaN for edge ${current}-${target} ` +
            `(generation ${this.generations}, ant ${ant})`,
            score
          );
        }
        if (chosen === undefined || score > bestScore) {
          bestScore = score;
          chosen = target;
          chosenQuality = quality;
        }
      }

      if (chosen === undefined) break;

      totalQuality += chosenQuality;
      current = chosen;
      traversal.walkTo(current);
      path.push(current);
    }

    // An ant that never moved still reports where it stands
    if (path.length === 0) {
      path.push(current);
    }

    const deposit = scoring.pheromonesDeposited(totalQuality);
    if (!Number.isFinite(deposit) || deposit < 0) {
      throw new PolicyContractError(
        `Deposit must be a finite non-negative number, got ${deposit} ` +
        `(generation ${this.generations}, ant ${ant})`,
        deposit
      );
    }

    let from = start;
    for (const node of path) {
      if (node !== from) {
        this.table.deposit(from, node, slot, deposit);
      }
      from = node;
    }

    this.ants++;

    if (totalQuality > this.bestQuality) {
      this.bestQuality = totalQuality;
      this.pathBuf = this.bestBuf;
      this.bestBuf = path;
    }
  }
}

/**
 * Create an empty colony.
 */
export function createColony(): Colony {
  return new Colony();
}
