/**
 * QuadtreeIds - reusable (entity id → hull) result set.
 *
 * Queries write into a caller-owned instance so per-frame lookups do not
 * allocate a new collection every call.
 */

import type { Hull } from "../math/Hull.js";
import type { EntityId } from "../types.js";

/** Read-only view handed out by cached queries */
export interface ReadonlyQuadtreeIds extends Iterable<[EntityId, Hull]> {
  readonly size: number;
  contains(id: EntityId): boolean;
  hullOf(id: EntityId): Hull | undefined;
  ids(): IterableIterator<EntityId>;
  hulls(): IterableIterator<Hull>;
}

export class QuadtreeIds implements ReadonlyQuadtreeIds {
  private readonly entries = new Map<EntityId, Hull>();

  get size(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): Iterator<[EntityId, Hull]> {
    return this.entries.entries();
  }

  contains(id: EntityId): boolean {
    return this.entries.has(id);
  }

  hullOf(id: EntityId): Hull | undefined {
    return this.entries.get(id);
  }

  ids(): IterableIterator<EntityId> {
    return this.entries.keys();
  }

  hulls(): IterableIterator<Hull> {
    return this.entries.values();
  }

  insert(id: EntityId, hull: Hull): void {
    this.entries.set(id, hull);
  }

  /** Inserts every pair yielded by `source` */
  insertAll(source: Iterable<[EntityId, Hull]>): void {
    for (const [id, hull] of source) {
      this.entries.set(id, hull);
    }
  }

  /** Keeps only the entries for which `predicate` holds */
  retain(predicate: (id: EntityId, hull: Hull) => boolean): void {
    for (const [id, hull] of this.entries) {
      if (!predicate(id, hull)) {
        this.entries.delete(id);
      }
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
