/**
 * Corner - one of a hull's four corners, the unit the quadtree indexes.
 *
 * A corner stores its anchor position plus the signed extents that lead
 * from it to the opposite corner, so the whole hull can be rebuilt from
 * any single corner.
 */

import * as THREE from "three";
import { Hull, HullCorner } from "../math/Hull.js";
import { segmentsIntersection, type Segment } from "../math/segments.js";
import type { SplitSegments } from "./Square.js";

export class Corner {
  readonly kind: HullCorner;
  readonly pos: THREE.Vector2;
  /** Signed horizontal extent towards the opposite corner */
  readonly dx: number;
  /** Signed vertical extent towards the opposite corner */
  readonly dy: number;

  private cachedHull: Hull | null = null;

  constructor(kind: HullCorner, pos: THREE.Vector2, dx: number, dy: number) {
    this.kind = kind;
    this.pos = pos;
    this.dx = dx;
    this.dy = dy;
  }

  static fromHull(hull: Hull, kind: HullCorner): Corner {
    const [width, height] = hull.dimensions();
    const pos = hull.cornerVertex(kind);

    switch (kind) {
      case HullCorner.TopRight:
        return new Corner(kind, pos, -width, -height);
      case HullCorner.TopLeft:
        return new Corner(kind, pos, width, -height);
      case HullCorner.BottomLeft:
        return new Corner(kind, pos, width, height);
      case HullCorner.BottomRight:
        return new Corner(kind, pos, -width, height);
    }
  }

  /** The hull this corner was derived from */
  hull(): Hull {
    if (!this.cachedHull) {
      this.cachedHull = this.rebuildHull();
    }
    return this.cachedHull;
  }

  private rebuildHull(): Hull {
    const { x, y } = this.pos;

    switch (this.kind) {
      case HullCorner.TopRight:
        return new Hull(y, y + this.dy, x + this.dx, x);
      case HullCorner.TopLeft:
        return new Hull(y, y + this.dy, x, x + this.dx);
      case HullCorner.BottomLeft:
        return new Hull(y + this.dy, y, x, x + this.dx);
      case HullCorner.BottomRight:
        return new Hull(y + this.dy, y, x + this.dx, x);
    }
  }

  sides(): Sides {
    return new Sides(this);
  }

  /** First point where the corner's two edges cross `split`, if any */
  intersection(split: SplitSegments): THREE.Vector2 | null {
    return this.sides().intersection(split);
  }
}

/**
 * The two hull edges leaving a corner: the vertical one and the
 * horizontal one.
 */
export class Sides {
  readonly corner: Corner;
  /** Vertical edge */
  readonly x: Segment;
  /** Horizontal edge */
  readonly y: Segment;

  constructor(corner: Corner) {
    const p = corner.pos;
    this.corner = corner;
    this.x = [p, new THREE.Vector2(p.x, p.y + corner.dy)];
    this.y = [p, new THREE.Vector2(p.x + corner.dx, p.y)];
  }

  /**
   * Sides of the TopRight and BottomLeft corners, which together span the
   * four edges of the hull.
   */
  static fromHull(hull: Hull): [Sides, Sides] {
    return [
      Corner.fromHull(hull, HullCorner.TopRight).sides(),
      Corner.fromHull(hull, HullCorner.BottomLeft).sides(),
    ];
  }

  /**
   * First crossing of the vertical edge with the horizontal split, or of
   * the horizontal edge with the vertical split.
   */
  intersection(split: SplitSegments): THREE.Vector2 | null {
    return (
      segmentsIntersection(this.x, split.ySplit) ??
      segmentsIntersection(this.y, split.xSplit)
    );
  }
}
