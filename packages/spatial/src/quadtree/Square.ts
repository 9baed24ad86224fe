/**
 * Square - the area covered by a quadtree node
 */

import * as THREE from "three";
import { Hull } from "../math/Hull.js";
import type { Segment } from "../math/segments.js";

/** Quadrants of a square, in the order subnodes are allocated */
export enum Cardinality {
  NorthWest = 0,
  SouthWest = 1,
  SouthEast = 2,
  NorthEast = 3,
}

export const CARDINALITIES: readonly Cardinality[] = [
  Cardinality.NorthWest,
  Cardinality.SouthWest,
  Cardinality.SouthEast,
  Cardinality.NorthEast,
];

/** The segments cutting a square in half vertically and horizontally */
export interface SplitSegments {
  /** Vertical segment through the top and bottom centres (splits the x axis) */
  xSplit: Segment;
  /** Horizontal segment through the left and right centres (splits the y axis) */
  ySplit: Segment;
}

export class Square {
  /** Position of the top left corner */
  readonly topLeft: THREE.Vector2;
  /** Side length */
  readonly size: number;
  /** Right edge; a child shares it with its parent exactly */
  readonly right: number;
  /** Bottom edge; a child shares it with its parent exactly */
  readonly bottom: number;

  constructor(
    topLeft: THREE.Vector2,
    size: number,
    right: number = topLeft.x + size,
    bottom: number = topLeft.y - size,
  ) {
    this.topLeft = topLeft.clone();
    this.size = size;
    this.right = right;
    this.bottom = bottom;
  }

  get left(): number {
    return this.topLeft.x;
  }

  get top(): number {
    return this.topLeft.y;
  }

  /** Area covered, as a hull */
  hull(): Hull {
    return new Hull(this.top, this.bottom, this.left, this.right);
  }

  /** Inclusive on all four sides */
  containsPoint(point: THREE.Vector2): boolean {
    return (
      point.x >= this.left &&
      point.x <= this.right &&
      point.y >= this.bottom &&
      point.y <= this.top
    );
  }

  overlapsHull(hull: Hull): boolean {
    return hull.overlaps(this.hull());
  }

  /** Centre x, shared by the split segments and the children */
  private get midX(): number {
    return this.left + this.size / 2;
  }

  /** Centre y, shared by the split segments and the children */
  private get midY(): number {
    return this.top - this.size / 2;
  }

  splitSegments(): SplitSegments {
    const { midX, midY } = this;
    return {
      xSplit: [
        new THREE.Vector2(midX, this.top),
        new THREE.Vector2(midX, this.bottom),
      ],
      ySplit: [
        new THREE.Vector2(this.left, midY),
        new THREE.Vector2(this.right, midY),
      ],
    };
  }

  /** The quadrant of this square facing `cardinality` */
  subsquare(cardinality: Cardinality): Square {
    const size = this.size / 2;
    const { left, top, right, bottom, midX, midY } = this;

    switch (cardinality) {
      case Cardinality.NorthWest:
        return new Square(new THREE.Vector2(left, top), size, midX, midY);
      case Cardinality.SouthWest:
        return new Square(new THREE.Vector2(left, midY), size, midX, bottom);
      case Cardinality.SouthEast:
        return new Square(new THREE.Vector2(midX, midY), size, right, bottom);
      case Cardinality.NorthEast:
        return new Square(new THREE.Vector2(midX, top), size, right, midY);
    }
  }
}
