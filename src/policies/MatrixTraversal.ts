/**
 * @fileoverview Tour construction over an in-memory distance matrix.
 *
 * Each ant starts on a random node and may move to any node it has not
 * visited yet, provided the distance to it is finite and positive. The
 * walk ends when every reachable node has been visited. Moving is worth
 * `1 / distance`, so short hops score well.
 *
 * @module policies/MatrixTraversal
 */

import { TargetCandidate, Traversal } from "../colony/interfaces";
import { ColonyError, PolicyContractError } from "../utils/errors";

export class MatrixTraversal implements Traversal {
  private readonly distances: readonly (readonly number[])[];
  private readonly random: () => number;
  private readonly visited: boolean[];
  private position = 0;

  /**
   * @param distances - Square, symmetric matrix; `Infinity` marks a missing edge
   * @param random - Source of floats in [0, 1) used to pick start nodes
   */
  constructor(distances: readonly (readonly number[])[], random: () => number = Math.random) {
    validateMatrix(distances);
    this.distances = distances;
    this.random = random;
    this.visited = new Array<boolean>(distances.length).fill(false);
  }

  /** Number of nodes */
  get size(): number {
    return this.distances.length;
  }

  /** Node the ant currently stands on */
  get current(): number {
    return this.position;
  }

  reset(): number {
    this.visited.fill(false);
    this.position = Math.min(Math.floor(this.random() * this.size), this.size - 1);
    this.visited[this.position] = true;
    return this.position;
  }

  *targets(node: number): Generator<TargetCandidate> {
    if (!Number.isInteger(node) || node < 0 || node >= this.size) {
      throw new PolicyContractError(`Node ${node} is outside the ${this.size}-node matrix`, node);
    }
    const row = this.distances[node];
    for (let target = 0; target < row.length; target++) {
      if (this.isReachable(node, target)) {
        yield { quality: 1 / row[target], target };
      }
    }
  }

  walkTo(node: number): void {
    if (!this.isReachable(this.position, node)) {
      throw new PolicyContractError(`Node ${node} is not reachable from ${this.position}`, node);
    }
    this.position = node;
    this.visited[node] = true;
  }

  /**
   * Total distance of a path, starting from `start` and following `path`.
   */
  pathLength(start: number, path: readonly number[]): number {
    let total = 0;
    let from = start;
    for (const node of path) {
      if (node !== from) {
        total += this.distances[from][node];
      }
      from = node;
    }
    return total;
  }

  private isReachable(from: number, to: number): boolean {
    if (to < 0 || to >= this.size || to === from || this.visited[to]) {
      return false;
    }
    const distance = this.distances[from][to];
    return Number.isFinite(distance) && distance > 0;
  }
}

function validateMatrix(distances: readonly (readonly number[])[]): void {
  const n = distances.length;
  if (n === 0) {
    throw new ColonyError("Distance matrix must have at least one node");
  }
  for (let i = 0; i < n; i++) {
    if (distances[i].length !== n) {
      throw new ColonyError(`Distance matrix row ${i} has ${distances[i].length} entries, expected ${n}`);
    }
    for (let j = 0; j < n; j++) {
      const d = distances[i][j];
      if (Number.isNaN(d) || d < 0) {
        throw new ColonyError(`Distance ${i}->${j} must be non-negative, got ${d}`);
      }
      if (d !== distances[j][i]) {
        throw new ColonyError(`Distance matrix is not symmetric at ${i},${j}`);
      }
    }
  }
}
