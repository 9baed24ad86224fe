/**
 * Segment math
 */

import * as THREE from "three";
import { aroundEqualNarrow } from "./around-equal.js";

/** A segment as its two endpoints */
export type Segment = readonly [THREE.Vector2, THREE.Vector2];

/**
 * Intersection of the lines through `l1` and `l2`.
 * `t` is the parameter along `l1`, `u` the parameter along `l2`.
 * Returns null for parallel lines.
 */
export function linesIntersection(
  l1: Segment,
  l2: Segment,
): { point: THREE.Vector2; t: number; u: number } | null {
  const [a, b] = l1;
  const [c, d] = l2;
  const bottom = (d.y - c.y) * (b.x - a.x) - (d.x - c.x) * (b.y - a.y);

  if (aroundEqualNarrow(bottom, 0)) {
    return null;
  }

  const t = ((d.x - c.x) * (a.y - c.y) - (d.y - c.y) * (a.x - c.x)) / bottom;
  const u = ((c.y - a.y) * (a.x - b.x) - (c.x - a.x) * (a.y - b.y)) / bottom;

  return { point: new THREE.Vector2().lerpVectors(a, b, t), t, u };
}

/** Point where two segments cross, endpoints included. */
export function segmentsIntersection(
  s1: Segment,
  s2: Segment,
): THREE.Vector2 | null {
  const result = linesIntersection(s1, s2);
  if (!result) return null;

  const { point, t, u } = result;
  if (t < 0 || t > 1 || u < 0 || u > 1) {
    return null;
  }
  return point;
}
