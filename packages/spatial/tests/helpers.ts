/**
 * Shared test fixtures
 */

import * as THREE from "three";
import { SpatialIndexError, type SpatialIndexErrorCode } from "../src/errors.js";
import { Hull } from "../src/math/Hull.js";
import type { ReadonlyQuadtreeIds } from "../src/quadtree/QuadtreeIds.js";
import type { BrushEntity, EntityId, ViewportCamera } from "../src/types.js";

/** Hull from its left, bottom, right and top sides */
export function box(left: number, bottom: number, right: number, top: number): Hull {
  return new Hull(top, bottom, left, right);
}

export function v(x: number, y: number): THREE.Vector2 {
  return new THREE.Vector2(x, y);
}

export function compareIds(a: EntityId, b: EntityId): number {
  return String(a).localeCompare(String(b));
}

export function sortedIds(ids: ReadonlyQuadtreeIds): EntityId[] {
  return Array.from(ids.ids()).sort(compareIds);
}

/** Single-point hull */
export function point(x: number, y: number): Hull {
  return new Hull(y, y, x, x);
}

/** Code of the SpatialIndexError thrown by `fn`, or null when it returns */
export function thrownCode(fn: () => unknown): SpatialIndexErrorCode | null {
  try {
    fn();
  } catch (error) {
    if (error instanceof SpatialIndexError) {
      return error.code;
    }
    throw error;
  }
  return null;
}

/** Deterministic PRNG so property runs are reproducible */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export class TestBrush implements BrushEntity {
  constructor(
    readonly id: EntityId,
    public body: Hull,
    public path: Hull | null = null,
    public sprite: Hull | null = null,
    public anchor: Hull | null = null,
  ) {}

  hull(): Hull {
    return this.body;
  }

  pathHull(): Hull | null {
    return this.path;
  }

  spriteHull(): Hull | null {
    return this.sprite;
  }

  spriteAnchorHull(): Hull | null {
    return this.anchor;
  }
}

export function testCamera(viewport: Hull, scale = 1): ViewportCamera {
  return { viewport: () => viewport, scale };
}
