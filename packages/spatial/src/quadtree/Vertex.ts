/**
 * Vertex / Vertexes - the leaf content of the quadtree.
 *
 * A Vertex is an indexed position shared by the corners of every entity
 * whose corner lands there. A leaf holds up to `capacity` vertexes.
 */

import type * as THREE from "three";
import { invariant } from "../errors.js";
import type { Hull } from "../math/Hull.js";
import { vectorsAroundEqual } from "../math/around-equal.js";
import type { EntityId } from "../types.js";
import type { Corner } from "./Corner.js";
import type { Intersections } from "./Intersection.js";
import {
  ID_REMOVED,
  NOT_FOUND,
  type RemoveResult,
} from "./RemoveResult.js";
import type { SplitSegments } from "./Square.js";

const SYSTEM = "Quadtree";

/** Lowest position, x first, then y */
function lowest(positions: Iterable<THREE.Vector2>): THREE.Vector2 | null {
  let best: THREE.Vector2 | null = null;
  for (const p of positions) {
    if (!best || p.x < best.x || (p.x === best.x && p.y < best.y)) {
      best = p;
    }
  }
  return best;
}

export class Vertex {
  private readonly corners: Map<EntityId, Corner>;
  private position: THREE.Vector2;

  constructor(corners: Map<EntityId, Corner>) {
    const pos = lowest(Array.from(corners.values(), (corner) => corner.pos));
    invariant(pos !== null, SYSTEM, "Vertex created without corners");

    const all = Array.from(corners.values());
    for (const [i, corner] of all.entries()) {
      invariant(
        all.slice(i + 1).every((other) => vectorsAroundEqual(corner.pos, other.pos)),
        SYSTEM,
        "Vertex corners don't share the same position",
      );
    }

    this.corners = corners;
    this.position = pos;
  }

  static of(id: EntityId, corner: Corner): Vertex {
    return new Vertex(new Map([[id, corner]]));
  }

  /** The lowest corner position, so it only depends on which corners are here */
  get pos(): THREE.Vector2 {
    return this.position;
  }

  get size(): number {
    return this.corners.size;
  }

  /** Whether `id` has its corner at `pos` in this vertex */
  holds(id: EntityId, pos: THREE.Vector2): boolean {
    const corner = this.corners.get(id);
    return corner !== undefined && vectorsAroundEqual(corner.pos, pos);
  }

  ids(): IterableIterator<EntityId> {
    return this.corners.keys();
  }

  *hulls(): Generator<[EntityId, Hull]> {
    for (const [id, corner] of this.corners) {
      yield [id, corner.hull()];
    }
  }

  /** Records where each corner's edges cross `split` */
  collectIntersections(
    intersections: Intersections,
    split: SplitSegments,
  ): void {
    for (const [id, corner] of this.corners) {
      const point = corner.intersection(split);
      if (point) {
        intersections.push(id, point, corner);
      }
    }
  }

  /** Whether every corner of `other` is close to every corner here */
  accepts(other: Vertex): boolean {
    for (const theirs of other.corners.values()) {
      for (const ours of this.corners.values()) {
        if (!vectorsAroundEqual(theirs.pos, ours.pos)) return false;
      }
    }
    return true;
  }

  insertCorner(id: EntityId, corner: Corner): void {
    for (const existing of this.corners.values()) {
      invariant(
        vectorsAroundEqual(corner.pos, existing.pos),
        SYSTEM,
        "The new corner does not have the same position as the vertex",
      );
    }
    invariant(
      !this.corners.has(id),
      SYSTEM,
      `Entity ${id} already has a corner at (${this.pos.x}, ${this.pos.y})`,
    );
    this.corners.set(id, corner);

    const pos = lowest([this.position, corner.pos]);
    if (pos) this.position = pos;
  }

  /** Moves every corner of `other` into this vertex */
  absorb(other: Vertex): void {
    for (const [id, corner] of other.corners) {
      this.insertCorner(id, corner);
    }
  }

  /**
   * Drops `id`. Returns true when it was the last corner and the vertex
   * must be discarded.
   */
  removeEntityId(id: EntityId): boolean {
    this.corners.delete(id);

    const pos = lowest(Array.from(this.corners.values(), (corner) => corner.pos));
    if (pos) this.position = pos;
    return this.corners.size === 0;
  }

  /**
   * Groups the corners by `key(pos)`. A vertex whose corners all share a key
   * is returned as is; otherwise each group becomes a new vertex.
   */
  partition<K>(key: (pos: THREE.Vector2) => K): Map<K, Vertex> {
    const groups = new Map<K, Map<EntityId, Corner>>();
    for (const [id, corner] of this.corners) {
      const k = key(corner.pos);
      const group = groups.get(k) ?? new Map<EntityId, Corner>();
      group.set(id, corner);
      groups.set(k, group);
    }

    const parts = new Map<K, Vertex>();
    for (const [k, group] of groups) {
      parts.set(k, groups.size === 1 ? this : new Vertex(group));
    }
    return parts;
  }

  clone(): Vertex {
    return new Vertex(new Map(this.corners));
  }
}

export class Vertexes implements Iterable<Vertex> {
  private readonly items: Vertex[] = [];
  readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = capacity;
  }

  static fromVertex(vertex: Vertex, capacity: number): Vertexes {
    const vertexes = new Vertexes(capacity);
    vertexes.items.push(vertex);
    return vertexes;
  }

  /**
   * Copies of the vertexes of every group gathered into one leaf, merging
   * those within tolerance. Null when they do not fit in `capacity`.
   * The groups are left untouched.
   */
  static merged(groups: Iterable<Vertexes>, capacity: number): Vertexes | null {
    const merged = new Vertexes(capacity);
    for (const group of groups) {
      for (const vx of group) {
        if (merged.insert(vx.clone()) !== null) return null;
      }
    }
    return merged;
  }

  get length(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  [Symbol.iterator](): Iterator<Vertex> {
    return this.items[Symbol.iterator]();
  }

  /**
   * Merges `vertex` into the first one close to all of its corners, or
   * appends it. When the leaf is full and no vertex takes it, the vertex is
   * handed back so the caller can split.
   */
  insert(vertex: Vertex): Vertex | null {
    const match = this.items.find((vx) => vx.accepts(vertex));
    if (match) {
      match.absorb(vertex);
      return null;
    }

    if (this.items.length >= this.capacity) {
      return vertex;
    }

    this.items.push(vertex);
    return null;
  }

  remove(pos: THREE.Vector2, id: EntityId): RemoveResult {
    const index = this.items.findIndex((vx) => vx.holds(id, pos));
    if (index === -1) return NOT_FOUND;

    if (this.items[index].removeEntityId(id)) {
      this.items.splice(index, 1);
      return { kind: "vertexFullyRemoved", leafEmpty: this.isEmpty() };
    }

    return ID_REMOVED;
  }
}
