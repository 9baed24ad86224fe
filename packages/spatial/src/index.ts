/**
 * @brushwork/spatial
 *
 * Spatial index for a 2D map editor: a self-balancing corner quadtree and
 * the per-category trees with memoized cursor and viewport lookups.
 */

export { SPATIAL_CONSTANTS, nearPositionRadius } from "./constants.js";
export { SpatialIndexError, type SpatialIndexErrorCode } from "./errors.js";
export type {
  BrushEntity,
  EntityId,
  HullEntity,
  HullFn,
  InsertResult,
  SpriteHulls,
  ThingEntity,
  ViewportCamera,
} from "./types.js";

export { Hull, HullCorner } from "./math/Hull.js";
export { aroundEqual, aroundEqualNarrow, vectorsAroundEqual, EPS_NARROW } from "./math/around-equal.js";
export { linesIntersection, segmentsIntersection, type Segment } from "./math/segments.js";

export {
  Quadtree,
  type DebugGrid,
  type DebugPoint,
  type Identified,
  type QuadtreeConfig,
  type QuadtreeDebugNode,
} from "./quadtree/Quadtree.js";
export { QuadtreeIds, type ReadonlyQuadtreeIds } from "./quadtree/QuadtreeIds.js";
export { Square, Cardinality, CARDINALITIES, type SplitSegments } from "./quadtree/Square.js";
export { Corner, Sides } from "./quadtree/Corner.js";
export type { RemoveResult } from "./quadtree/RemoveResult.js";

export { PositionCache, ViewportCache, paddedViewport } from "./trees/DirtyCaches.js";
export { EntitiesTrees, type EntitiesTreesConfig } from "./trees/EntitiesTrees.js";

export { Logger, type LogLevel } from "./utils/Logger.js";
