/**
 * Intersection / Intersections
 *
 * Points where an entity's hull edges cross the split segments of a
 * subdivided node. They let point and range queries find hulls that span
 * a node boundary without owning a vertex inside the queried quadrant.
 */

import type * as THREE from "three";
import { invariant } from "../errors.js";
import type { Hull } from "../math/Hull.js";
import { vectorsAroundEqual } from "../math/around-equal.js";
import type { EntityId } from "../types.js";
import type { Corner } from "./Corner.js";

export class Intersection {
  readonly pos: THREE.Vector2;
  private readonly corners: Map<EntityId, Corner>;

  constructor(pos: THREE.Vector2, corners: Map<EntityId, Corner>) {
    invariant(
      corners.size > 0,
      "Quadtree",
      "No corners associated to the intersection",
    );
    this.pos = pos;
    this.corners = corners;
  }

  get size(): number {
    return this.corners.size;
  }

  ids(): IterableIterator<EntityId> {
    return this.corners.keys();
  }

  *hulls(): Generator<[EntityId, Hull]> {
    for (const [id, corner] of this.corners) {
      yield [id, corner.hull()];
    }
  }

  containsId(id: EntityId): boolean {
    return this.corners.has(id);
  }

  insertCorner(id: EntityId, corner: Corner): void {
    if (!this.corners.has(id)) {
      this.corners.set(id, corner);
    }
  }

  /** Returns true when `id` was removed and nothing is left */
  removeEntityId(id: EntityId): boolean {
    return this.corners.delete(id) && this.corners.size === 0;
  }
}

export class Intersections implements Iterable<Intersection> {
  private readonly items: Intersection[] = [];

  get length(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<Intersection> {
    return this.items[Symbol.iterator]();
  }

  containsId(id: EntityId): boolean {
    return this.items.some((int) => int.containsId(id));
  }

  /** Records `id` at `pos`, unless the id already has an intersection here */
  push(id: EntityId, pos: THREE.Vector2, corner: Corner): void {
    if (this.containsId(id)) return;

    const existing = this.items.find((int) => vectorsAroundEqual(int.pos, pos));
    if (existing) {
      existing.insertCorner(id, corner);
      return;
    }

    this.items.push(new Intersection(pos, new Map([[id, corner]])));
  }

  remove(id: EntityId): void {
    const index = this.items.findIndex((int) => int.containsId(id));
    if (index === -1) return;

    if (this.items[index].removeEntityId(id)) {
      this.items.splice(index, 1);
    }
  }

  clear(): void {
    this.items.length = 0;
  }
}
