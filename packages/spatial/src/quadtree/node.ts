/**
 * Node algorithms: insertion with splitting, removal with collapsing, and
 * the traversals behind point and range queries.
 *
 * Every function works on a node of the arena by index and recurses into
 * children through their indices.
 */

import type * as THREE from "three";
import { fail, invariant } from "../errors.js";
import { Hull } from "../math/Hull.js";
import type { EntityId } from "../types.js";
import type { Sides } from "./Corner.js";
import type { NodeArena } from "./NodeArena.js";
import type { QuadtreeIds } from "./QuadtreeIds.js";
import {
  NOT_FOUND,
  SUBNODES_COLLAPSED,
  VERTEX_REMOVED,
  type RemoveResult,
} from "./RemoveResult.js";
import { createSubnodes, type Subnodes } from "./Subnodes.js";
import { Vertexes, type Vertex } from "./Vertex.js";

const SYSTEM = "Quadtree";

function childContaining(
  arena: NodeArena,
  subnodes: Subnodes,
  pos: THREE.Vector2,
): number {
  const child = subnodes.find((index) =>
    arena.node(index).square.containsPoint(pos),
  );
  invariant(
    child !== undefined,
    SYSTEM,
    `No subnode contains (${pos.x}, ${pos.y})`,
  );
  return child;
}

/**
 * Hands each corner of `vertex` to the child containing its own position,
 * dividing the vertex when its corners straddle a split line.
 */
function distribute(arena: NodeArena, subnodes: Subnodes, vertex: Vertex): void {
  const parts = vertex.partition((pos) => childContaining(arena, subnodes, pos));
  for (const [child, part] of parts) {
    invariant(
      insertVertex(arena, child, part),
      SYSTEM,
      "Vertex insertion in subnode failed",
    );
  }
}

/**
 * Inserts `vertex` in the subtree rooted at `index`, splitting the leaf
 * that overflows. Returns false only when the position is outside the node.
 */
export function insertVertex(
  arena: NodeArena,
  index: number,
  vertex: Vertex,
): boolean {
  const node = arena.node(index);
  if (!node.square.containsPoint(vertex.pos)) {
    return false;
  }

  const content = node.content;
  switch (content.kind) {
    case "empty":
      node.content = {
        kind: "vertexes",
        vertexes: Vertexes.fromVertex(vertex, arena.capacity),
      };
      return true;
    case "vertexes":
      if (content.vertexes.insert(vertex) === null) {
        return true;
      }
      split(arena, index, content.vertexes);
      break;
    case "subnodes":
      break;
  }

  const subdivided = arena.node(index).content;
  invariant(
    subdivided.kind === "subnodes",
    SYSTEM,
    "Node was not subdivided after overflowing",
  );
  distribute(arena, subdivided.subnodes, vertex);
  return true;
}

/**
 * Replaces the leaf content of `index` with four children, spreading the
 * current vertexes among them and recording where their hulls cross the
 * node's split segments.
 */
function split(arena: NodeArena, index: number, vertexes: Vertexes): void {
  const node = arena.node(index);
  const subnodes = createSubnodes(arena, index);
  const splitSegments = node.square.splitSegments();
  const intersections = arena.takeIntersections();

  for (const vx of vertexes) {
    vx.collectIntersections(intersections, splitSegments);
    distribute(arena, subnodes, vx);
  }

  node.content = { kind: "subnodes", subnodes, intersections };
}

/**
 * Records, in every subdivided node `hull` overlaps, the first point where
 * `sides` crosses that node's split segments. At most one entry per id.
 */
export function insertIntersections(
  arena: NodeArena,
  index: number,
  id: EntityId,
  sides: Sides,
  hull: Hull,
): void {
  const node = arena.node(index);
  if (!node.square.overlapsHull(hull)) return;

  const content = node.content;
  if (content.kind !== "subnodes") return;

  const point = sides.intersection(node.square.splitSegments());
  if (point) {
    content.intersections.push(id, point, sides.corner);
  }

  for (const child of content.subnodes) {
    insertIntersections(arena, child, id, sides, hull);
  }
}

/** Removes every intersection recorded for `id` in the nodes `hull` overlaps. */
export function removeIntersections(
  arena: NodeArena,
  index: number,
  id: EntityId,
  hull: Hull,
): void {
  const node = arena.node(index);
  if (!node.square.overlapsHull(hull)) return;

  const content = node.content;
  if (content.kind !== "subnodes") return;

  content.intersections.remove(id);

  for (const child of content.subnodes) {
    removeIntersections(arena, child, id, hull);
  }
}

/**
 * Collects the candidates for `pos`: the vertexes of the leaf containing it
 * and the intersections of every subdivided node on the way down.
 * Returns whether `pos` is inside the node.
 */
export function entitiesAtPos(
  arena: NodeArena,
  out: QuadtreeIds,
  index: number,
  pos: THREE.Vector2,
): boolean {
  const node = arena.node(index);
  if (!node.square.containsPoint(pos)) {
    return false;
  }

  const content = node.content;
  switch (content.kind) {
    case "empty":
      return true;
    case "vertexes":
      for (const vx of content.vertexes) {
        out.insertAll(vx.hulls());
      }
      return true;
    case "subnodes":
      for (const int of content.intersections) {
        out.insertAll(int.hulls());
      }
      for (const child of content.subnodes) {
        if (entitiesAtPos(arena, out, child, pos)) {
          return true;
        }
      }
      return fail(
        SYSTEM,
        "corruptedIndex",
        `Subnodes of a node containing (${pos.x}, ${pos.y}) do not contain it`,
      );
  }
}

/**
 * Collects the candidates of every node overlapping `range`: leaf vertexes
 * and the intersections of subdivided nodes. Returns whether the node
 * overlaps the range.
 */
export function intersectRange(
  arena: NodeArena,
  out: QuadtreeIds,
  index: number,
  range: Hull,
): boolean {
  const node = arena.node(index);
  if (!node.square.overlapsHull(range)) {
    return false;
  }

  const content = node.content;
  switch (content.kind) {
    case "empty":
      break;
    case "vertexes":
      for (const vx of content.vertexes) {
        out.insertAll(vx.hulls());
      }
      break;
    case "subnodes":
      for (const int of content.intersections) {
        out.insertAll(int.hulls());
      }
      for (const child of content.subnodes) {
        intersectRange(arena, out, child, range);
      }
      break;
  }

  return true;
}

/**
 * Candidates around `pos`: the traversal of `intersectRange` over the square
 * of half side `radius` centred on it.
 */
export function entitiesNearPos(
  arena: NodeArena,
  out: QuadtreeIds,
  index: number,
  pos: THREE.Vector2,
  radius: number,
): Hull {
  const range = Hull.squareAround(pos, radius);
  intersectRange(arena, out, index, range);
  return range;
}

/**
 * Removes the corner of `id` at `pos` from the subtree rooted at `index`,
 * collapsing subdivided ancestors whose children fit back in one leaf.
 */
export function removeVertex(
  arena: NodeArena,
  index: number,
  pos: THREE.Vector2,
  id: EntityId,
): RemoveResult {
  const node = arena.node(index);
  if (!node.square.containsPoint(pos)) {
    return NOT_FOUND;
  }

  const content = node.content;
  switch (content.kind) {
    case "empty":
      return NOT_FOUND;
    case "vertexes":
      return content.vertexes.remove(pos, id);
    case "subnodes":
      break;
  }

  for (const child of content.subnodes) {
    const result = removeVertex(arena, child, pos, id);

    switch (result.kind) {
      case "notFound":
        continue;
      case "vertexFullyRemoved":
        if (result.leafEmpty) {
          arena.node(child).clear();
        }
        return tryCollapse(arena, index);
      case "subnodesCollapsed":
        return tryCollapse(arena, index);
      case "idRemovedFromSharedVertex":
      case "vertexRemoved":
        return VERTEX_REMOVED;
    }
  }

  return NOT_FOUND;
}

/**
 * Merges the four children of `index` back into it when none of them is
 * subdivided and their vertexes, merged, fit in a leaf. Vertexes divided by
 * the split join up again.
 */
function tryCollapse(arena: NodeArena, index: number): RemoveResult {
  const node = arena.node(index);
  const content = node.content;
  invariant(content.kind === "subnodes", SYSTEM, "Collapsing a leaf node");

  const groups: Vertexes[] = [];
  for (const child of content.subnodes) {
    const childContent = arena.node(child).content;
    if (childContent.kind === "subnodes") {
      return VERTEX_REMOVED;
    }
    if (childContent.kind === "vertexes") {
      groups.push(childContent.vertexes);
    }
  }

  const merged = Vertexes.merged(groups, arena.capacity);
  if (!merged) {
    return VERTEX_REMOVED;
  }

  for (const child of content.subnodes) {
    arena.removeNode(child);
  }

  arena.recycleIntersections(content.intersections);
  node.content = merged.isEmpty()
    ? { kind: "empty" }
    : { kind: "vertexes", vertexes: merged };

  return SUBNODES_COLLAPSED;
}
