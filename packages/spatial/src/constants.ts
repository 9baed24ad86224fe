/**
 * Spatial Index Constants
 *
 * Defaults shared by the quadtree and the per-category entity trees.
 * Every value can be overridden through `QuadtreeConfig` or
 * `EntitiesTreesConfig`.
 */

export const SPATIAL_CONSTANTS = {
  // === World ===
  /** Half the side of the square map (the world spans -16384..16384 on both axes) */
  MAP_HALF_SIZE: 16384,

  // === Node balancing ===
  /**
   * Distinct vertex positions a leaf holds before it splits.
   * Also the total below which four leaf children collapse back.
   */
  NODE_CAPACITY: 4,

  // === Tolerances ===
  /** Two coordinates closer than this are the same position */
  AROUND_EQUAL_NARROW: 1e-5,

  // === Cursor proximity ===
  /** Side of a vertex highlight square at camera scale 1 */
  VERTEX_HIGHLIGHT_SIDE: 5,
  /** Multiplier applied to the highlight side for "near position" queries */
  NEAR_POSITION_MULTIPLIER: 4,

  // === Visibility ===
  /** Screen-space margin added around the viewport so panning does not pop entities */
  VIEWPORT_PADDING: 64,
} as const;

/** Half side of the "near position" square for a camera scale */
export function nearPositionRadius(
  cameraScale: number,
  multiplier: number = SPATIAL_CONSTANTS.NEAR_POSITION_MULTIPLIER,
): number {
  return cameraScale * SPATIAL_CONSTANTS.VERTEX_HIGHLIGHT_SIDE * multiplier;
}
