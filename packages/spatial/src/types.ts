/**
 * Types shared by the spatial index and its collaborators
 */

import type { Hull } from "./math/Hull.js";

/** Lifetime-stable entity identifier */
export type EntityId = string | number;

/** Anything that can report its id and bounding hull */
export interface HullEntity {
  readonly id: EntityId;
  hull(): Hull;
}

/** Computes an entity's hull at insertion time (e.g. from a loaded texture size) */
export type HullFn<E> = (entity: E) => Hull;

/** Result of inserting an entity into a quadtree */
export type InsertResult = "inserted" | "alreadyPresent";

/**
 * A brush as seen by the entity trees. A brush may own a movement path
 * and a sprite; the corresponding hulls are null when it does not.
 */
export interface BrushEntity extends HullEntity {
  pathHull(): Hull | null;
  spriteHull(): Hull | null;
  spriteAnchorHull(): Hull | null;
}

/** A placed thing instance */
export type ThingEntity = HullEntity;

/** Sprite hull paired with the hull of its anchor highlight */
export interface SpriteHulls {
  sprite: Hull;
  anchor: Hull;
}

/** Camera collaborator used for visibility queries */
export interface ViewportCamera {
  /** World-space rectangle currently shown, minus any UI panels */
  viewport(): Hull;
  /** World units per screen pixel */
  readonly scale: number;
}
