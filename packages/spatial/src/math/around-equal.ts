/**
 * Tolerance comparisons for coordinates that drift through repeated transforms.
 */

import type * as THREE from "three";
import { SPATIAL_CONSTANTS } from "../constants.js";

/** Epsilon for positions that must be considered identical */
export const EPS_NARROW = SPATIAL_CONSTANTS.AROUND_EQUAL_NARROW;

export function aroundEqual(a: number, b: number, eps: number): boolean {
  return Math.abs(a - b) < eps;
}

export function aroundEqualNarrow(a: number, b: number): boolean {
  return aroundEqual(a, b, EPS_NARROW);
}

export function vectorsAroundEqual(
  a: THREE.Vector2,
  b: THREE.Vector2,
  eps: number = EPS_NARROW,
): boolean {
  return aroundEqual(a.x, b.x, eps) && aroundEqual(a.y, b.y, eps);
}
