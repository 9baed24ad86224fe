/**
 * Hull - axis-aligned bounding rectangle of an editor entity.
 *
 * The editor's world is y-up: `top` is the largest y, `bottom` the smallest.
 * A hull is immutable; transforms return new instances.
 */

import * as THREE from "three";
import { fail } from "../errors.js";
import { aroundEqual, EPS_NARROW } from "./around-equal.js";

/** The four corners of a hull, in the order hulls enumerate them */
export enum HullCorner {
  TopRight = "TopRight",
  TopLeft = "TopLeft",
  BottomLeft = "BottomLeft",
  BottomRight = "BottomRight",
}

const CORNER_ORDER: readonly HullCorner[] = [
  HullCorner.TopRight,
  HullCorner.TopLeft,
  HullCorner.BottomLeft,
  HullCorner.BottomRight,
];

export class Hull {
  readonly top: number;
  readonly bottom: number;
  readonly left: number;
  readonly right: number;

  constructor(top: number, bottom: number, left: number, right: number) {
    if (
      !Number.isFinite(top) ||
      !Number.isFinite(bottom) ||
      !Number.isFinite(left) ||
      !Number.isFinite(right)
    ) {
      fail(
        "Hull",
        "malformedHull",
        `Non-finite hull (top ${top}, bottom ${bottom}, left ${left}, right ${right})`,
      );
    }
    if (top < bottom || right < left) {
      fail(
        "Hull",
        "malformedHull",
        `Malformed hull (top ${top}, bottom ${bottom}, left ${left}, right ${right})`,
      );
    }

    this.top = top;
    this.bottom = bottom;
    this.left = left;
    this.right = right;
  }

  /** Square of half side `halfSide` centred on `center`. */
  static squareAround(center: THREE.Vector2, halfSide: number): Hull {
    return new Hull(
      center.y + halfSide,
      center.y - halfSide,
      center.x - halfSide,
      center.x + halfSide,
    );
  }

  get width(): number {
    return this.right - this.left;
  }

  get height(): number {
    return this.top - this.bottom;
  }

  /** `[width, height]` */
  dimensions(): [number, number] {
    return [this.width, this.height];
  }

  containsPoint(p: THREE.Vector2): boolean {
    return (
      p.x >= this.left &&
      p.x <= this.right &&
      p.y >= this.bottom &&
      p.y <= this.top
    );
  }

  containsHull(other: Hull): boolean {
    return (
      other.left >= this.left &&
      other.right <= this.right &&
      other.bottom >= this.bottom &&
      other.top <= this.top
    );
  }

  /** Whether the two hulls share at least one point (touching edges count). */
  overlaps(other: Hull): boolean {
    return (
      this.left <= other.right &&
      this.right >= other.left &&
      this.bottom <= other.top &&
      this.top >= other.bottom
    );
  }

  cornerVertex(corner: HullCorner): THREE.Vector2 {
    switch (corner) {
      case HullCorner.TopRight:
        return new THREE.Vector2(this.right, this.top);
      case HullCorner.TopLeft:
        return new THREE.Vector2(this.left, this.top);
      case HullCorner.BottomLeft:
        return new THREE.Vector2(this.left, this.bottom);
      case HullCorner.BottomRight:
        return new THREE.Vector2(this.right, this.bottom);
    }
  }

  corners(): readonly HullCorner[] {
    return CORNER_ORDER;
  }

  /** Corner positions in `corners()` order */
  vertexes(): THREE.Vector2[] {
    return CORNER_ORDER.map((corner) => this.cornerVertex(corner));
  }

  /** Grows every side outward by `amount`. */
  expanded(amount: number): Hull {
    return new Hull(
      this.top + amount,
      this.bottom - amount,
      this.left - amount,
      this.right + amount,
    );
  }

  aroundEqual(other: Hull, eps: number = EPS_NARROW): boolean {
    return (
      aroundEqual(this.top, other.top, eps) &&
      aroundEqual(this.bottom, other.bottom, eps) &&
      aroundEqual(this.left, other.left, eps) &&
      aroundEqual(this.right, other.right, eps)
    );
  }

  toString(): string {
    return `Hull(top ${this.top}, bottom ${this.bottom}, left ${this.left}, right ${this.right})`;
  }
}
