/**
 * Quadtree.ts - corner-indexed region quadtree for editor entities
 *
 * Indexes the four corners of every entity hull over a square world.
 * A leaf holds up to `nodeCapacity` distinct corner positions; one more
 * splits it into four quadrants, and removals merge the quadrants back as
 * soon as they fit in a single leaf again.
 *
 * Hulls that cross a subdivided node's centre lines are also recorded as
 * intersections on that node, so queries find boxes spanning a boundary
 * without owning a vertex in the queried quadrant.
 *
 * **Queries** write into a caller-reused `QuadtreeIds`:
 * - `entitiesAtPos` - hulls containing a point
 * - `entitiesNearPos` - hulls overlapping a square around a point
 * - `entitiesInRange` - hulls fully inside a rectangle
 * - `entitiesIntersectRange` - hulls overlapping a rectangle
 *
 * Bookkeeping defects (double insert, removing an absent id, malformed or
 * out-of-world hulls) throw `SpatialIndexError` before anything is mutated.
 */

import * as THREE from "three";
import { SPATIAL_CONSTANTS } from "../constants.js";
import { fail, invariant } from "../errors.js";
import type { Hull } from "../math/Hull.js";
import { vectorsAroundEqual } from "../math/around-equal.js";
import type { EntityId, HullEntity, HullFn, InsertResult } from "../types.js";
import { Logger } from "../utils/Logger.js";
import { Corner, Sides } from "./Corner.js";
import { NodeArena, ROOT_INDEX } from "./NodeArena.js";
import {
  entitiesAtPos,
  entitiesNearPos,
  insertIntersections,
  insertVertex,
  intersectRange,
  removeIntersections,
  removeVertex,
} from "./node.js";
import type { QuadtreeIds } from "./QuadtreeIds.js";
import { Square } from "./Square.js";
import { Vertex } from "./Vertex.js";

const SYSTEM = "Quadtree";

/**
 * Configuration for the quadtree. The world is the square of side
 * `2 * halfSize` centred on (`centerX`, `centerY`).
 */
export interface QuadtreeConfig {
  /** World centre X (default: 0) */
  centerX?: number;
  /** World centre Y (default: 0) */
  centerY?: number;
  /** Half the side of the world (default: 16384) */
  halfSize?: number;
  /** Corner positions per leaf before it splits, and the collapse threshold (default: 4) */
  nodeCapacity?: number;
  /** Name used in log lines (default: "entities") */
  label?: string;
}

/** Anything carrying an entity id */
export interface Identified {
  readonly id: EntityId;
}

/** Snapshot of a node for debugging and tests */
export interface QuadtreeDebugNode {
  left: number;
  top: number;
  size: number;
  kind: "empty" | "vertexes" | "subnodes";
  vertexes: DebugPoint[];
  intersections: DebugPoint[];
  children: QuadtreeDebugNode[] | null;
}

export interface DebugPoint {
  x: number;
  y: number;
  ids: EntityId[];
}

/** Node outlines and intersection points visible in a viewport */
export interface DebugGrid {
  squares: Hull[];
  intersections: THREE.Vector2[];
}

function isHullEntity(entity: Identified): entity is HullEntity {
  return "hull" in entity && typeof entity.hull === "function";
}

/** The corners of `hull`, skipping those that coincide with an earlier one */
function distinctCorners(hull: Hull): Corner[] {
  const corners: Corner[] = [];
  for (const kind of hull.corners()) {
    const corner = Corner.fromHull(hull, kind);
    if (!corners.some((c) => vectorsAroundEqual(c.pos, corner.pos))) {
      corners.push(corner);
    }
  }
  return corners;
}

function compareIds(a: EntityId, b: EntityId): number {
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function comparePoints(a: DebugPoint, b: DebugPoint): number {
  return a.x - b.x || a.y - b.y;
}

function debugPoint(pos: THREE.Vector2, ids: Iterable<EntityId>): DebugPoint {
  return { x: pos.x, y: pos.y, ids: Array.from(ids).sort(compareIds) };
}

export class Quadtree {
  private readonly arena: NodeArena;
  private readonly hulls = new Map<EntityId, Hull>();
  private readonly label: string;

  /** The whole addressable world */
  readonly bounds: Hull;

  constructor(config: QuadtreeConfig = {}) {
    const centerX = config.centerX ?? 0;
    const centerY = config.centerY ?? 0;
    const halfSize = config.halfSize ?? SPATIAL_CONSTANTS.MAP_HALF_SIZE;
    const capacity = config.nodeCapacity ?? SPATIAL_CONSTANTS.NODE_CAPACITY;
    this.label = config.label ?? "entities";

    if (!Number.isFinite(centerX) || !Number.isFinite(centerY)) {
      fail(SYSTEM, "invalidConfig", `Invalid world centre (${centerX}, ${centerY})`);
    }
    if (!Number.isFinite(halfSize) || halfSize <= 0) {
      fail(SYSTEM, "invalidConfig", `Invalid world half size ${halfSize}`);
    }
    if (!Number.isInteger(capacity) || capacity < 1) {
      fail(SYSTEM, "invalidConfig", `Invalid node capacity ${capacity}`);
    }

    const square = new Square(
      new THREE.Vector2(centerX - halfSize, centerY + halfSize),
      halfSize * 2,
    );
    this.bounds = square.hull();
    this.arena = new NodeArena(square, capacity);

    Logger.systemDebug(
      SYSTEM,
      `Created ${this.label} tree over ${this.bounds.toString()} (capacity ${capacity})`,
    );
  }

  /** Number of indexed entities */
  get size(): number {
    return this.hulls.size;
  }

  /** Number of live nodes in the arena */
  get nodeCount(): number {
    return this.arena.liveCount;
  }

  has(id: EntityId): boolean {
    return this.hulls.has(id);
  }

  /** The hull `id` was inserted with */
  hullOf(id: EntityId): Hull | undefined {
    return this.hulls.get(id);
  }

  // ===== MUTATION =====

  insertHull(id: EntityId, hull: Hull): void {
    this.assertInsertable(id, hull);

    for (const corner of distinctCorners(hull)) {
      invariant(
        insertVertex(this.arena, ROOT_INDEX, Vertex.of(id, corner)),
        SYSTEM,
        `Corner insertion failed for entity ${id}`,
      );
    }

    for (const sides of Sides.fromHull(hull)) {
      insertIntersections(this.arena, ROOT_INDEX, id, sides, hull);
    }

    this.hulls.set(id, hull);
  }

  /**
   * Inserts `entity` with the hull computed by `hullFn` (by default the
   * entity's own `hull()`). Re-inserting a live id with the same hull is a
   * no-op reported as "alreadyPresent"; with a different hull it throws.
   */
  insertEntity(entity: HullEntity): InsertResult;
  insertEntity<E extends Identified>(entity: E, hullFn: HullFn<E>): InsertResult;
  insertEntity<E extends Identified>(entity: E, hullFn?: HullFn<E>): InsertResult {
    let hull: Hull;
    if (hullFn) {
      hull = hullFn(entity);
    } else if (isHullEntity(entity)) {
      hull = entity.hull();
    } else {
      return fail(
        SYSTEM,
        "malformedHull",
        `Entity ${entity.id} has no hull and no hull function was given`,
      );
    }

    const current = this.hulls.get(entity.id);
    if (current && current.aroundEqual(hull)) {
      return "alreadyPresent";
    }

    this.insertHull(entity.id, hull);
    return "inserted";
  }

  removeHull(id: EntityId, hull: Hull): void {
    const stored = this.assertRemovable(id, hull);

    for (const corner of distinctCorners(stored)) {
      const result = removeVertex(this.arena, ROOT_INDEX, corner.pos, id);

      if (result.kind === "notFound") {
        fail(
          SYSTEM,
          "corruptedIndex",
          `Corner (${corner.pos.x}, ${corner.pos.y}) of entity ${id} was not in the tree`,
        );
      }
      // Only the root itself reports an emptied leaf back up here
      if (result.kind === "vertexFullyRemoved" && result.leafEmpty) {
        this.arena.root.clear();
      }
    }

    removeIntersections(this.arena, ROOT_INDEX, id, stored);
    this.hulls.delete(id);
  }

  /** Removes `entity` using the hull it was inserted with. */
  removeEntity(entity: Identified): boolean {
    const stored = this.hulls.get(entity.id);
    if (!stored) {
      fail(SYSTEM, "notPresent", `Entity ${entity.id} is not in the ${this.label} tree`);
    }
    this.removeHull(entity.id, stored);
    return true;
  }

  /**
   * Moves `id` from `previous` to `current`.
   * Returns false, leaving the tree untouched, when the hulls are equal.
   */
  replaceHull(id: EntityId, current: Hull, previous: Hull): boolean {
    if (previous.aroundEqual(current)) {
      return false;
    }

    this.assertReplaceable(id, current, previous);
    this.removeHull(id, previous);
    this.insertHull(id, current);
    return true;
  }

  /** Resets the tree to a single empty root. */
  clear(): void {
    const nodes = this.arena.liveCount;
    this.arena.reset();
    this.hulls.clear();
    Logger.systemDebug(SYSTEM, `Cleared ${this.label} tree (${nodes} nodes)`);
  }

  // ===== VALIDATION =====
  // Each check throws what the matching mutation would, leaving the tree as is.

  assertInsertable(id: EntityId, hull: Hull): void {
    if (this.hulls.has(id)) {
      fail(SYSTEM, "doubleInsert", `Entity ${id} is already in the ${this.label} tree`);
    }
    this.assertInBounds(id, hull);
  }

  /** Returns the stored hull */
  assertRemovable(id: EntityId, hull: Hull): Hull {
    const stored = this.hulls.get(id);
    if (!stored) {
      fail(SYSTEM, "notPresent", `Entity ${id} is not in the ${this.label} tree`);
    }
    if (!stored.aroundEqual(hull)) {
      fail(
        SYSTEM,
        "hullMismatch",
        `Entity ${id} was indexed with ${stored.toString()}, not ${hull.toString()}`,
      );
    }
    return stored;
  }

  assertReplaceable(id: EntityId, current: Hull, previous: Hull): void {
    if (previous.aroundEqual(current)) return;

    this.assertRemovable(id, previous);
    this.assertInBounds(id, current);
  }

  private assertInBounds(id: EntityId, hull: Hull): void {
    if (!this.bounds.containsHull(hull)) {
      fail(
        SYSTEM,
        "outOfBounds",
        `Hull ${hull.toString()} of entity ${id} is outside the world ${this.bounds.toString()}`,
      );
    }
  }

  // ===== QUERIES =====

  /** Entities whose hull contains `pos`. */
  entitiesAtPos(out: QuadtreeIds, pos: THREE.Vector2): void {
    out.clear();
    entitiesAtPos(this.arena, out, ROOT_INDEX, pos);
    out.retain((_, hull) => hull.containsPoint(pos));
  }

  /** Entities whose hull overlaps the square of half side `radius` around `pos`. */
  entitiesNearPos(out: QuadtreeIds, pos: THREE.Vector2, radius: number): void {
    out.clear();
    const range = entitiesNearPos(this.arena, out, ROOT_INDEX, pos, radius);
    out.retain((_, hull) => range.overlaps(hull));
  }

  /** Entities whose hull lies entirely inside `range`. */
  entitiesInRange(out: QuadtreeIds, range: Hull): void {
    out.clear();
    intersectRange(this.arena, out, ROOT_INDEX, range);
    out.retain((_, hull) => range.containsHull(hull));
  }

  /** Entities whose hull overlaps `range`. */
  entitiesIntersectRange(out: QuadtreeIds, range: Hull): void {
    out.clear();
    intersectRange(this.arena, out, ROOT_INDEX, range);
    out.retain((_, hull) => range.overlaps(hull));
  }

  // ===== DEBUG =====

  /**
   * Nested snapshot of the whole tree. Vertexes, intersections and ids are
   * sorted, so equal topologies produce equal snapshots.
   */
  getDebugInfo(): QuadtreeDebugNode {
    return this.debugNode(ROOT_INDEX);
  }

  private debugNode(index: number): QuadtreeDebugNode {
    const node = this.arena.node(index);
    const info: QuadtreeDebugNode = {
      left: node.square.topLeft.x,
      top: node.square.topLeft.y,
      size: node.square.size,
      kind: node.content.kind,
      vertexes: [],
      intersections: [],
      children: null,
    };

    const content = node.content;
    if (content.kind === "vertexes") {
      for (const vx of content.vertexes) {
        info.vertexes.push(debugPoint(vx.pos, vx.ids()));
      }
      info.vertexes.sort(comparePoints);
    } else if (content.kind === "subnodes") {
      for (const int of content.intersections) {
        info.intersections.push(debugPoint(int.pos, int.ids()));
      }
      info.intersections.sort(comparePoints);
      info.children = content.subnodes.map((child) => this.debugNode(child));
    }

    return info;
  }

  /** Outlines and intersection points of the nodes overlapping `viewport`. */
  debugGrid(viewport: Hull): DebugGrid {
    const grid: DebugGrid = { squares: [], intersections: [] };
    this.collectGrid(ROOT_INDEX, viewport, grid);
    return grid;
  }

  private collectGrid(index: number, viewport: Hull, grid: DebugGrid): void {
    const node = this.arena.node(index);
    if (!node.square.overlapsHull(viewport)) return;

    grid.squares.push(node.square.hull());

    const content = node.content;
    if (content.kind !== "subnodes") return;

    for (const int of content.intersections) {
      if (viewport.containsPoint(int.pos)) {
        grid.intersections.push(int.pos.clone());
      }
    }
    for (const child of content.subnodes) {
      this.collectGrid(child, viewport, grid);
    }
  }
}
