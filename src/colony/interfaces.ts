/**
 * Colony Collaborators - Traversal and Scoring contracts
 *
 * The colony knows nothing about the graph it explores. A Traversal
 * stands where the current ant stands and reports where it can go next;
 * a Scoring turns raw qualities and pheromone levels into decisions and
 * deposits.
 */

/**
 * A node reachable from the traversal's current position.
 */
export interface TargetCandidate {
  /** Raw, domain-specific quality of moving to `target` */
  quality: number;

  /** Index of the reachable node */
  target: number;
}

/**
 * Stateful view of the graph from one ant's position.
 */
export interface Traversal {
  /**
   * Re-initialize for a new ant and move to a starting node.
   * Called once per ant; must not leak state between ants.
   *
   * @returns The starting node index
   */
  reset(): number;

  /**
   * Enumerate the nodes reachable from `node`, which matches the
   * traversal's current position. Must be finite, and each call starts
   * a fresh enumeration.
   */
  targets(node: number): Iterable<TargetCandidate>;

  /**
   * Move to `node`, one of the targets enumerated at the current position.
   */
  walkTo(node: number): void;
}

/**
 * Pure functions combining quality and pheromone.
 * Identical inputs must give identical outputs.
 */
export interface Scoring {
  /** Visit score used to pick the next node */
  edgeQuality(rawQuality: number, pheromone: number): number;

  /**
   * Pheromone added to every edge of a finished path, from the path's
   * accumulated raw quality. Must be finite and non-negative.
   */
  pheromonesDeposited(totalQuality: number): number;
}

/**
 * Best path found so far.
 */
export interface BestPath {
  /** Accumulated raw quality of the path */
  quality: number;

  /** Nodes reached by the ant, in visiting order */
  path: number[];
}

/**
 * Point-in-time colony statistics.
 */
export interface ColonySnapshot {
  /** Generations run so far */
  generation: number;

  /** Ants simulated across all generations */
  antsSimulated: number;

  /** Edges discovered so far */
  edgeCount: number;

  /** Pheromone slot the next generation will write (0 or 1) */
  activeSlot: PheromoneSlot;

  /** Best quality found, 0 when no path has been recorded */
  bestQuality: number;

  /** Length of the best path, 0 when no path has been recorded */
  bestPathLength: number;
}

/** Index into an edge's two-slot pheromone buffer */
export type PheromoneSlot = 0 | 1;
