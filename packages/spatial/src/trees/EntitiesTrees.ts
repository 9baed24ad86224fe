/**
 * EntitiesTrees - one quadtree per editor entity category, with memoized
 * cursor and visibility lookups.
 *
 * Categories: brushes, brush paths, path anchors, sprites (plus the
 * highlight square drawn around each sprite's anchor) and things.
 *
 * Every mutator marks the caches of its category dirty, so the next lookup
 * refills them. Range queries are never memoized; each one owns a result
 * set that is cleared on every call. Returned sets are read-only views that
 * stay valid until the next call of the same lookup.
 */

import type * as THREE from "three";
import { SPATIAL_CONSTANTS, nearPositionRadius } from "../constants.js";
import { fail } from "../errors.js";
import type { Hull } from "../math/Hull.js";
import { Quadtree, type QuadtreeConfig } from "../quadtree/Quadtree.js";
import { QuadtreeIds, type ReadonlyQuadtreeIds } from "../quadtree/QuadtreeIds.js";
import type {
  BrushEntity,
  EntityId,
  SpriteHulls,
  ThingEntity,
  ViewportCamera,
} from "../types.js";
import { Logger } from "../utils/Logger.js";
import { PositionCache, ViewportCache, paddedViewport } from "./DirtyCaches.js";

const SYSTEM = "EntitiesTrees";

export interface EntitiesTreesConfig {
  /** World settings shared by every category tree */
  quadtree?: Omit<QuadtreeConfig, "label">;
  /** Screen pixels added around the viewport for visibility lookups (default: 64) */
  viewportPadding?: number;
  /** Multiplier of the vertex highlight side giving the near-position radius (default: 4) */
  nearPositionScale?: number;
}

export class EntitiesTrees {
  private readonly brushesTree: Quadtree;
  private readonly pathsTree: Quadtree;
  private readonly anchorsTree: Quadtree;
  private readonly spritesTree: Quadtree;
  private readonly spriteHighlightsTree: Quadtree;
  private readonly thingsTree: Quadtree;

  private readonly brushesAtPosCache = new PositionCache();
  private readonly pathsAtPosCache = new PositionCache();
  private readonly spritesAtPosCache = new PositionCache();
  private readonly thingsAtPosCache = new PositionCache();

  private readonly visibleBrushesCache = new ViewportCache();
  private readonly visiblePathsCache = new ViewportCache();
  private readonly visibleAnchorsCache = new ViewportCache();
  private readonly visibleSpritesCache = new ViewportCache();
  private readonly visibleSpriteHighlightsCache = new ViewportCache();
  private readonly visibleThingsCache = new ViewportCache();

  private readonly brushesInRangeIds = new QuadtreeIds();
  private readonly brushesIntersectRangeIds = new QuadtreeIds();
  private readonly pathsIntersectRangeIds = new QuadtreeIds();
  private readonly spritesInRangeIds = new QuadtreeIds();
  private readonly thingsInRangeIds = new QuadtreeIds();

  private readonly viewportPadding: number;
  private readonly nearPositionScale: number;

  constructor(config: EntitiesTreesConfig = {}) {
    const tree = config.quadtree ?? {};
    this.viewportPadding = config.viewportPadding ?? SPATIAL_CONSTANTS.VIEWPORT_PADDING;
    this.nearPositionScale =
      config.nearPositionScale ?? SPATIAL_CONSTANTS.NEAR_POSITION_MULTIPLIER;

    if (!Number.isFinite(this.viewportPadding) || this.viewportPadding < 0) {
      fail(SYSTEM, "invalidConfig", `Invalid viewport padding ${this.viewportPadding}`);
    }
    if (!Number.isFinite(this.nearPositionScale) || this.nearPositionScale <= 0) {
      fail(SYSTEM, "invalidConfig", `Invalid near position scale ${this.nearPositionScale}`);
    }

    this.brushesTree = new Quadtree({ ...tree, label: "brushes" });
    this.pathsTree = new Quadtree({ ...tree, label: "paths" });
    this.anchorsTree = new Quadtree({ ...tree, label: "anchors" });
    this.spritesTree = new Quadtree({ ...tree, label: "sprites" });
    this.spriteHighlightsTree = new Quadtree({ ...tree, label: "sprite highlights" });
    this.thingsTree = new Quadtree({ ...tree, label: "things" });
  }

  /** Half side of the near-position square at `cameraScale` */
  nearRadius(cameraScale: number): number {
    return nearPositionRadius(cameraScale, this.nearPositionScale);
  }

  // ===== ANCHORS =====

  insertAnchorHull(ownerId: EntityId, hull: Hull): void {
    this.anchorsTree.insertHull(ownerId, hull);
    this.setAnchorsDirty();
  }

  removeAnchorHull(ownerId: EntityId, hull: Hull): void {
    this.anchorsTree.removeHull(ownerId, hull);
    this.setAnchorsDirty();
  }

  setAnchorsDirty(): void {
    this.visibleAnchorsCache.setDirty();
  }

  visibleAnchors(camera: ViewportCamera): ReadonlyQuadtreeIds {
    return this.visible(this.anchorsTree, this.visibleAnchorsCache, camera);
  }

  // ===== BRUSHES =====

  insertBrushHull(brush: BrushEntity): void {
    this.brushesTree.insertHull(brush.id, brush.hull());
    this.setBrushesDirty();
  }

  removeBrushHull(brush: BrushEntity): void {
    this.brushesTree.removeEntity(brush);
    this.setBrushesDirty();
  }

  replaceBrushHull(id: EntityId, current: Hull, previous: Hull): void {
    this.brushesTree.replaceHull(id, current, previous);
    this.setBrushesDirty();
  }

  setBrushesDirty(): void {
    this.brushesAtPosCache.setDirty();
    this.visibleBrushesCache.setDirty();
  }

  /**
   * Brushes containing `pos`, or overlapping the near-position square
   * around it when `cameraScale` is given.
   */
  brushesAtPos(pos: THREE.Vector2, cameraScale?: number): ReadonlyQuadtreeIds {
    return this.atPos(this.brushesTree, this.brushesAtPosCache, pos, cameraScale ?? null);
  }

  brushesInRange(range: Hull): ReadonlyQuadtreeIds {
    this.brushesTree.entitiesInRange(this.brushesInRangeIds, range);
    return this.brushesInRangeIds;
  }

  brushesIntersectRange(range: Hull): ReadonlyQuadtreeIds {
    this.brushesTree.entitiesIntersectRange(this.brushesIntersectRangeIds, range);
    return this.brushesIntersectRangeIds;
  }

  visibleBrushes(camera: ViewportCamera): ReadonlyQuadtreeIds {
    return this.visible(this.brushesTree, this.visibleBrushesCache, camera);
  }

  // ===== PATHS =====

  insertPathHull(brush: BrushEntity): void {
    const hull = brush.pathHull();
    if (!hull) {
      fail(SYSTEM, "malformedHull", `Brush ${brush.id} has no path`);
    }
    this.pathsTree.insertHull(brush.id, hull);
    this.setPathsDirty();
  }

  removePathHull(brush: BrushEntity, hull: Hull): void {
    this.pathsTree.removeHull(brush.id, hull);
    this.setPathsDirty();
  }

  replacePathHull(brush: BrushEntity, current: Hull, previous: Hull): void {
    this.pathsTree.replaceHull(brush.id, current, previous);
    this.setPathsDirty();
  }

  setPathsDirty(): void {
    this.pathsAtPosCache.setDirty();
    this.visiblePathsCache.setDirty();
  }

  /** Owners of the paths overlapping the near-position square around `pos` */
  pathsAtPos(pos: THREE.Vector2, cameraScale: number): ReadonlyQuadtreeIds {
    return this.atPos(this.pathsTree, this.pathsAtPosCache, pos, cameraScale);
  }

  pathsIntersectRange(range: Hull): ReadonlyQuadtreeIds {
    this.pathsTree.entitiesIntersectRange(this.pathsIntersectRangeIds, range);
    return this.pathsIntersectRangeIds;
  }

  visiblePaths(camera: ViewportCamera): ReadonlyQuadtreeIds {
    return this.visible(this.pathsTree, this.visiblePathsCache, camera);
  }

  // ===== SPRITES =====

  insertSpriteHull(brush: BrushEntity): void {
    const sprite = brush.spriteHull();
    const anchor = brush.spriteAnchorHull();
    if (!sprite || !anchor) {
      fail(SYSTEM, "malformedHull", `Brush ${brush.id} has no sprite`);
    }

    // Validate both trees before touching either
    this.spritesTree.assertInsertable(brush.id, sprite);
    this.spriteHighlightsTree.assertInsertable(brush.id, anchor);
    this.spritesTree.insertHull(brush.id, sprite);
    this.spriteHighlightsTree.insertHull(brush.id, anchor);
    this.setSpritesDirty();
  }

  removeSpriteHull(brush: BrushEntity, hulls: SpriteHulls): void {
    this.spritesTree.assertRemovable(brush.id, hulls.sprite);
    this.spriteHighlightsTree.assertRemovable(brush.id, hulls.anchor);
    this.spritesTree.removeHull(brush.id, hulls.sprite);
    this.spriteHighlightsTree.removeHull(brush.id, hulls.anchor);
    this.setSpritesDirty();
  }

  replaceSpriteHull(brush: BrushEntity, current: SpriteHulls, previous: SpriteHulls): void {
    this.spritesTree.assertReplaceable(brush.id, current.sprite, previous.sprite);
    this.spriteHighlightsTree.assertReplaceable(brush.id, current.anchor, previous.anchor);
    this.spritesTree.replaceHull(brush.id, current.sprite, previous.sprite);
    this.spriteHighlightsTree.replaceHull(brush.id, current.anchor, previous.anchor);
    this.setSpritesDirty();
  }

  /** Moves only the anchor highlight; the sprite caches stay valid */
  replaceSpriteAnchorHull(brush: BrushEntity, current: Hull, previous: Hull): void {
    this.spriteHighlightsTree.replaceHull(brush.id, current, previous);
    this.visibleSpriteHighlightsCache.setDirty();
  }

  setSpritesDirty(): void {
    this.spritesAtPosCache.setDirty();
    this.visibleSpritesCache.setDirty();
    this.visibleSpriteHighlightsCache.setDirty();
  }

  spritesAtPos(pos: THREE.Vector2): ReadonlyQuadtreeIds {
    return this.atPos(this.spritesTree, this.spritesAtPosCache, pos, null);
  }

  spritesInRange(range: Hull): ReadonlyQuadtreeIds {
    this.spritesTree.entitiesInRange(this.spritesInRangeIds, range);
    return this.spritesInRangeIds;
  }

  visibleSprites(camera: ViewportCamera): ReadonlyQuadtreeIds {
    return this.visible(this.spritesTree, this.visibleSpritesCache, camera);
  }

  visibleSpriteHighlights(camera: ViewportCamera): ReadonlyQuadtreeIds {
    return this.visible(
      this.spriteHighlightsTree,
      this.visibleSpriteHighlightsCache,
      camera,
    );
  }

  // ===== THINGS =====

  insertThingHull(thing: ThingEntity): void {
    this.thingsTree.insertHull(thing.id, thing.hull());
    this.setThingsDirty();
  }

  removeThingHull(thing: ThingEntity): void {
    this.thingsTree.removeHull(thing.id, thing.hull());
    this.setThingsDirty();
  }

  /** Moves `thing` from `previous` to its current hull */
  replaceThingHull(thing: ThingEntity, previous: Hull): void {
    this.thingsTree.replaceHull(thing.id, thing.hull(), previous);
    this.setThingsDirty();
  }

  setThingsDirty(): void {
    this.thingsAtPosCache.setDirty();
    this.visibleThingsCache.setDirty();
  }

  /**
   * Things containing `pos`, or overlapping the near-position square
   * around it when `cameraScale` is given.
   */
  thingsAtPos(pos: THREE.Vector2, cameraScale?: number): ReadonlyQuadtreeIds {
    return this.atPos(this.thingsTree, this.thingsAtPosCache, pos, cameraScale ?? null);
  }

  thingsInRange(range: Hull): ReadonlyQuadtreeIds {
    this.thingsTree.entitiesInRange(this.thingsInRangeIds, range);
    return this.thingsInRangeIds;
  }

  visibleThings(camera: ViewportCamera): ReadonlyQuadtreeIds {
    return this.visible(this.thingsTree, this.visibleThingsCache, camera);
  }

  // ===== LIFECYCLE =====

  /** Empties every tree and dirties every cache */
  clear(): void {
    for (const tree of this.trees()) {
      tree.clear();
    }

    this.setBrushesDirty();
    this.setPathsDirty();
    this.setAnchorsDirty();
    this.setSpritesDirty();
    this.setThingsDirty();

    Logger.system(SYSTEM, "Cleared all entity trees");
  }

  /** Indexed entities per category */
  getStats(): Record<
    "brushes" | "paths" | "anchors" | "sprites" | "spriteHighlights" | "things",
    number
  > {
    return {
      brushes: this.brushesTree.size,
      paths: this.pathsTree.size,
      anchors: this.anchorsTree.size,
      sprites: this.spritesTree.size,
      spriteHighlights: this.spriteHighlightsTree.size,
      things: this.thingsTree.size,
    };
  }

  // ===== INTERNALS =====

  private trees(): Quadtree[] {
    return [
      this.brushesTree,
      this.pathsTree,
      this.anchorsTree,
      this.spritesTree,
      this.spriteHighlightsTree,
      this.thingsTree,
    ];
  }

  private atPos(
    tree: Quadtree,
    cache: PositionCache,
    pos: THREE.Vector2,
    cameraScale: number | null,
  ): ReadonlyQuadtreeIds {
    cache.update(pos, cameraScale, (ids, p, scale) => {
      if (scale === null) {
        tree.entitiesAtPos(ids, p);
      } else {
        tree.entitiesNearPos(ids, p, this.nearRadius(scale));
      }
    });
    return cache.ids;
  }

  private visible(
    tree: Quadtree,
    cache: ViewportCache,
    camera: ViewportCamera,
  ): ReadonlyQuadtreeIds {
    cache.update(paddedViewport(camera, this.viewportPadding), (ids, viewport) => {
      tree.entitiesIntersectRange(ids, viewport);
    });
    return cache.ids;
  }
}
