/**
 * Subnodes - the four quadrant children of a subdivided node, stored as
 * arena indices in NorthWest, SouthWest, SouthEast, NorthEast order.
 */

import { CARDINALITIES } from "./Square.js";
import type { NodeArena } from "./NodeArena.js";

export type Subnodes = readonly [number, number, number, number];

/** Allocates the four children of the node at `index` */
export function createSubnodes(arena: NodeArena, index: number): Subnodes {
  const square = arena.node(index).square;
  const [nw, sw, se, ne] = CARDINALITIES.map((cardinality) =>
    arena.insertNode(square.subsquare(cardinality)),
  );
  return [nw, sw, se, ne];
}
