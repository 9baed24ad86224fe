/**
 * Memoized query results with a dirty flag.
 *
 * A cache re-runs its fill callback only when it was dirtied by a mutation
 * or when the query key (cursor position and camera scale, or viewport)
 * changed since the last fill. Otherwise the stored ids are returned as is.
 */

import * as THREE from "three";
import { EPS_NARROW, aroundEqual, vectorsAroundEqual } from "../math/around-equal.js";
import type { Hull } from "../math/Hull.js";
import { QuadtreeIds } from "../quadtree/QuadtreeIds.js";
import type { ViewportCamera } from "../types.js";

/** Result of the last point query, keyed by position and optional scale */
export class PositionCache {
  readonly ids = new QuadtreeIds();
  dirty = true;
  lastPos = new THREE.Vector2(Infinity, Infinity);
  lastScale: number | null = null;

  setDirty(): void {
    this.dirty = true;
  }

  /** Whether `update(pos, scale)` would reuse the stored ids */
  isFresh(pos: THREE.Vector2, scale: number | null): boolean {
    if (this.dirty || !vectorsAroundEqual(this.lastPos, pos)) {
      return false;
    }
    if (this.lastScale === null || scale === null) {
      return this.lastScale === scale;
    }
    return aroundEqual(this.lastScale, scale, EPS_NARROW);
  }

  update(
    pos: THREE.Vector2,
    scale: number | null,
    fill: (ids: QuadtreeIds, pos: THREE.Vector2, scale: number | null) => void,
  ): void {
    if (this.isFresh(pos, scale)) return;

    this.lastPos.copy(pos);
    this.lastScale = scale;
    this.ids.clear();

    fill(this.ids, this.lastPos, scale);
    this.dirty = false;
  }
}

/** Result of the last visibility query, keyed by viewport */
export class ViewportCache {
  readonly ids = new QuadtreeIds();
  dirty = true;
  lastViewport: Hull | null = null;

  setDirty(): void {
    this.dirty = true;
  }

  isFresh(viewport: Hull): boolean {
    return (
      !this.dirty &&
      this.lastViewport !== null &&
      this.lastViewport.aroundEqual(viewport)
    );
  }

  update(viewport: Hull, fill: (ids: QuadtreeIds, viewport: Hull) => void): void {
    if (this.isFresh(viewport)) return;

    this.lastViewport = viewport;
    this.ids.clear();

    fill(this.ids, viewport);
    this.dirty = false;
  }
}

/** The camera viewport grown by `padding` screen pixels on every side */
export function paddedViewport(camera: ViewportCamera, padding: number): Hull {
  return camera.viewport().expanded(padding * camera.scale);
}
