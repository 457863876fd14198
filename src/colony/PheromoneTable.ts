/**
 * @fileoverview Lazily populated table of undirected, double-buffered edges.
 *
 * Each edge holds two pheromone levels. The colony writes one of them
 * (the active slot) during a generation while the other keeps what the
 * previous generation left behind; which is which is decided by the
 * caller, not stored per edge.
 *
 * @module colony/PheromoneTable
 */

import { sortBy, take } from "lodash";
import { PheromoneSlot } from "./interfaces";

/**
 * Canonical key for the undirected edge between `a` and `b`.
 * `createEdgeKey(a, b) === createEdgeKey(b, a)`.
 */
export function createEdgeKey(a: number, b: number): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

/**
 * An undirected edge with its two pheromone levels.
 */
export interface PheromoneEdge {
  /** Lower node index */
  readonly a: number;
  /** Higher node index */
  readonly b: number;
  /** Double buffer indexed by PheromoneSlot */
  readonly levels: [number, number];
}

/**
 * Frozen copy of an edge, as handed out by a PheromoneTableView.
 */
export interface ReadonlyPheromoneEdge {
  readonly a: number;
  readonly b: number;
  readonly levels: readonly [number, number];
}

/**
 * Read-only view handed out by the colony.
 */
export interface ReadonlyPheromoneTable {
  readonly size: number;
  get(a: number, b: number): ReadonlyPheromoneEdge | undefined;
  level(a: number, b: number, slot: PheromoneSlot): number;
  edges(): IterableIterator<ReadonlyPheromoneEdge>;
  strongest(slot: PheromoneSlot, limit: number): ReadonlyPheromoneEdge[];
}

export class PheromoneTable {
  private readonly table = new Map<string, PheromoneEdge>();

  /** Number of edges discovered so far */
  get size(): number {
    return this.table.size;
  }

  /**
   * Get the edge between `a` and `b`, creating it with zero pheromone in
   * both slots if it has never been seen.
   */
  touch(a: number, b: number): PheromoneEdge {
    const key = createEdgeKey(a, b);
    let edge = this.table.get(key);
    if (!edge) {
      edge = { a: Math.min(a, b), b: Math.max(a, b), levels: [0, 0] };
      this.table.set(key, edge);
    }
    return edge;
  }

  /** Get an edge without creating it */
  get(a: number, b: number): PheromoneEdge | undefined {
    return this.table.get(createEdgeKey(a, b));
  }

  /** Pheromone in one slot; 0 for an edge never seen */
  level(a: number, b: number, slot: PheromoneSlot): number {
    return this.get(a, b)?.levels[slot] ?? 0;
  }

  /**
   * Seed `slot` of every edge with the other slot's value, so deposits
   * made into `slot` accumulate on top of the previous generation's trail.
   */
  carryForward(slot: PheromoneSlot): void {
    const source = slot === 0 ? 1 : 0;
    for (const edge of this.table.values()) {
      edge.levels[slot] = edge.levels[source];
    }
  }

  /** Add `amount` to `slot` of the edge between `a` and `b` */
  deposit(a: number, b: number, slot: PheromoneSlot, amount: number): void {
    this.touch(a, b).levels[slot] += amount;
  }

  edges(): IterableIterator<PheromoneEdge> {
    return this.table.values();
  }

  /**
   * Edges ranked by pheromone in `slot`, highest first.
   * Equal levels keep discovery order.
   */
  strongest(slot: PheromoneSlot, limit: number): PheromoneEdge[] {
    const ranked = sortBy(Array.from(this.table.values()), edge => -edge.levels[slot]);
    return take(ranked, limit);
  }
}

function freezeEdge(edge: PheromoneEdge): ReadonlyPheromoneEdge {
  return Object.freeze({
    a: edge.a,
    b: edge.b,
    levels: Object.freeze([edge.levels[0], edge.levels[1]] as const),
  });
}

/**
 * Read-only view over a PheromoneTable. Every edge it returns is a frozen
 * copy taken at the time of the call.
 */
export class PheromoneTableView implements ReadonlyPheromoneTable {
  constructor(private readonly table: PheromoneTable) {}

  get size(): number {
    return this.table.size;
  }

  get(a: number, b: number): ReadonlyPheromoneEdge | undefined {
    const edge = this.table.get(a, b);
    return edge ? freezeEdge(edge) : undefined;
  }

  level(a: number, b: number, slot: PheromoneSlot): number {
    return this.table.level(a, b, slot);
  }

  *edges(): Generator<ReadonlyPheromoneEdge> {
    for (const edge of this.table.edges()) {
      yield freezeEdge(edge);
    }
  }

  strongest(slot: PheromoneSlot, limit: number): ReadonlyPheromoneEdge[] {
    return this.table.strongest(slot, limit).map(freezeEdge);
  }
}
