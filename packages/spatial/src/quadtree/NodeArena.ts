/**
 * NodeArena - flat storage for quadtree nodes.
 *
 * Nodes reference their children by index into this arena. Slots of
 * torn-down nodes go on a free list and are reused before the arena grows;
 * cleared Intersections stores are kept for the next split.
 * Index 0 is always the root.
 */

import { invariant } from "../errors.js";
import { Intersections } from "./Intersection.js";
import type { Square } from "./Square.js";
import type { Subnodes } from "./Subnodes.js";
import type { Vertexes } from "./Vertex.js";

export const ROOT_INDEX = 0;

/** What a node holds. Leaf data and children are mutually exclusive. */
export type NodeContent =
  | { kind: "empty" }
  | { kind: "vertexes"; vertexes: Vertexes }
  | { kind: "subnodes"; subnodes: Subnodes; intersections: Intersections };

const EMPTY: NodeContent = { kind: "empty" };

export class QuadtreeNode {
  readonly square: Square;
  content: NodeContent = EMPTY;

  constructor(square: Square) {
    this.square = square;
  }

  /** Empties the node, handing back its vertexes if it was a leaf */
  wipe(): Vertexes | null {
    const content = this.content;
    invariant(
      content.kind !== "subnodes",
      "Quadtree",
      "Tried to wipe a subdivided node",
    );
    this.content = EMPTY;
    return content.kind === "vertexes" ? content.vertexes : null;
  }

  /** Turns a leaf whose vertexes were all removed back into an empty node */
  clear(): void {
    const content = this.content;
    invariant(
      content.kind === "vertexes" && content.vertexes.isEmpty(),
      "Quadtree",
      "Cleared a node that still holds content",
    );
    this.content = EMPTY;
  }
}

export class NodeArena {
  private nodes: Array<QuadtreeNode | null> = [];
  private vacantSpots: number[] = [];
  private recycledIntersections: Intersections[] = [];

  readonly rootSquare: Square;
  /** Vertexes a leaf holds before splitting */
  readonly capacity: number;

  constructor(rootSquare: Square, capacity: number) {
    this.rootSquare = rootSquare;
    this.capacity = capacity;
    this.reset();
  }

  node(index: number): QuadtreeNode {
    const node = this.nodes[index];
    invariant(node != null, "Quadtree", `No live node at index ${index}`);
    return node;
  }

  get root(): QuadtreeNode {
    return this.node(ROOT_INDEX);
  }

  /** Number of live nodes */
  get liveCount(): number {
    return this.nodes.length - this.vacantSpots.length;
  }

  /** Allocates a node, reusing a vacant slot when one exists */
  insertNode(square: Square): number {
    const node = new QuadtreeNode(square);
    const index = this.vacantSpots.pop();

    if (index !== undefined) {
      this.nodes[index] = node;
      return index;
    }

    this.nodes.push(node);
    return this.nodes.length - 1;
  }

  /** Frees a leaf or empty node, returning its vertexes */
  removeNode(index: number): Vertexes | null {
    invariant(index !== ROOT_INDEX, "Quadtree", "Tried to free the root node");
    const vertexes = this.node(index).wipe();
    this.nodes[index] = null;
    this.vacantSpots.push(index);
    return vertexes;
  }

  takeIntersections(): Intersections {
    return this.recycledIntersections.pop() ?? new Intersections();
  }

  recycleIntersections(intersections: Intersections): void {
    intersections.clear();
    this.recycledIntersections.push(intersections);
  }

  /** Drops every node but a fresh, empty root */
  reset(): void {
    this.nodes = [new QuadtreeNode(this.rootSquare)];
    this.vacantSpots = [];
    this.recycledIntersections = [];
  }
}
