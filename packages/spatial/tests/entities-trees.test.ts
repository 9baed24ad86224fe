import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Quadtree } from "../src/quadtree/Quadtree.js";
import { EntitiesTrees } from "../src/trees/EntitiesTrees.js";
import type { ThingEntity } from "../src/types.js";
import type { Hull } from "../src/math/Hull.js";
import { TestBrush, box, sortedIds, testCamera, thrownCode, v } from "./helpers.js";

class TestThing implements ThingEntity {
  constructor(
    readonly id: string,
    public body: Hull,
  ) {}

  hull(): Hull {
    return this.body;
  }
}

describe("EntitiesTrees", () => {
  let trees: EntitiesTrees;
  const camera = testCamera(box(-50, -50, 50, 50));

  beforeEach(() => {
    trees = new EntitiesTrees({ quadtree: { halfSize: 1000 } });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects invalid settings", () => {
    expect(thrownCode(() => new EntitiesTrees({ viewportPadding: -1 }))).toBe("invalidConfig");
    expect(thrownCode(() => new EntitiesTrees({ nearPositionScale: 0 }))).toBe("invalidConfig");
    expect(thrownCode(() => new EntitiesTrees({ quadtree: { halfSize: -5 } }))).toBe(
      "invalidConfig",
    );
  });

  it("derives the near radius from the camera scale", () => {
    expect(trees.nearRadius(1)).toBe(20);
    expect(new EntitiesTrees({ nearPositionScale: 2 }).nearRadius(3)).toBe(30);
  });

  // ===== BRUSHES =====
  describe("brushes", () => {
    it("finds brushes under the cursor", () => {
      trees.insertBrushHull(new TestBrush("b1", box(100, 100, 200, 200)));
      expect(sortedIds(trees.brushesAtPos(v(150, 150)))).toEqual(["b1"]);
      expect(trees.brushesAtPos(v(0, 0)).size).toBe(0);
    });

    it("widens the lookup when a camera scale is given", () => {
      trees.insertBrushHull(new TestBrush("b1", box(100, 100, 200, 200)));
      expect(trees.brushesAtPos(v(210, 150)).size).toBe(0);
      expect(sortedIds(trees.brushesAtPos(v(210, 150), 1))).toEqual(["b1"]);
      expect(trees.brushesAtPos(v(230, 150), 0.25).size).toBe(0);
    });

    it("refreshes the cursor lookup after a mutation", () => {
      trees.insertBrushHull(new TestBrush("b1", box(100, 100, 200, 200)));
      const first = trees.brushesAtPos(v(150, 150));
      expect(first.size).toBe(1);

      trees.insertBrushHull(new TestBrush("b2", box(140, 140, 160, 160)));
      expect(sortedIds(trees.brushesAtPos(v(150, 150)))).toEqual(["b1", "b2"]);

      trees.removeBrushHull(new TestBrush("b1", box(100, 100, 200, 200)));
      expect(sortedIds(trees.brushesAtPos(v(150, 150)))).toEqual(["b2"]);
    });

    it("memoizes repeated cursor lookups", () => {
      const atPos = vi.spyOn(Quadtree.prototype, "entitiesAtPos");
      trees.insertBrushHull(new TestBrush("b1", box(100, 100, 200, 200)));

      const first = trees.brushesAtPos(v(150, 150));
      const second = trees.brushesAtPos(v(150, 150));
      expect(second).toBe(first);
      expect(atPos).toHaveBeenCalledTimes(1);
    });

    it("moves a brush", () => {
      trees.insertBrushHull(new TestBrush("b1", box(100, 100, 200, 200)));
      expect(trees.brushesAtPos(v(150, 150)).size).toBe(1);

      trees.replaceBrushHull("b1", box(300, 300, 400, 400), box(100, 100, 200, 200));
      expect(trees.brushesAtPos(v(150, 150)).size).toBe(0);
      expect(sortedIds(trees.brushesAtPos(v(350, 350)))).toEqual(["b1"]);
    });

    it("answers range queries", () => {
      trees.insertBrushHull(new TestBrush("b1", box(100, 100, 200, 200)));
      trees.insertBrushHull(new TestBrush("b2", box(-200, -200, -100, -100)));

      expect(sortedIds(trees.brushesInRange(box(0, 0, 300, 300)))).toEqual(["b1"]);
      expect(sortedIds(trees.brushesIntersectRange(box(-150, -150, 150, 150)))).toEqual([
        "b1",
        "b2",
      ]);
      expect(trees.brushesInRange(box(-150, -150, 150, 150)).size).toBe(0);
    });

    it("lists the brushes in the padded viewport", () => {
      trees.insertBrushHull(new TestBrush("near", box(100, 100, 200, 200)));
      trees.insertBrushHull(new TestBrush("far", box(300, 300, 350, 350)));

      expect(sortedIds(trees.visibleBrushes(camera))).toEqual(["near"]);
      expect(sortedIds(trees.visibleBrushes(testCamera(box(-50, -50, 50, 50), 4)))).toEqual([
        "far",
        "near",
      ]);
    });
  });

  // ===== PATHS =====
  describe("paths", () => {
    const brush = new TestBrush("b1", box(100, 100, 200, 200), box(-200, -200, -100, -100));

    it("requires the brush to have a path", () => {
      expect(thrownCode(() => trees.insertPathHull(new TestBrush("b2", box(0, 0, 1, 1))))).toBe(
        "malformedHull",
      );
    });

    it("looks up paths near the cursor", () => {
      trees.insertPathHull(brush);
      expect(sortedIds(trees.pathsAtPos(v(-90, -150), 1))).toEqual(["b1"]);
      expect(trees.pathsAtPos(v(150, 150), 1).size).toBe(0);
    });

    it("keeps path and brush range results apart", () => {
      trees.insertBrushHull(brush);
      trees.insertPathHull(brush);

      const range = box(-250, -250, -50, -50);
      const brushes = trees.brushesIntersectRange(range);
      const paths = trees.pathsIntersectRange(range);

      expect(paths).not.toBe(brushes);
      expect(brushes.size).toBe(0);
      expect(sortedIds(paths)).toEqual(["b1"]);
    });

    it("moves and removes a path", () => {
      trees.insertPathHull(brush);
      trees.replacePathHull(brush, box(-300, -300, -250, -250), box(-200, -200, -100, -100));
      expect(sortedIds(trees.visiblePaths(testCamera(box(-320, -320, -280, -280))))).toEqual([
        "b1",
      ]);

      trees.removePathHull(brush, box(-300, -300, -250, -250));
      expect(trees.visiblePaths(testCamera(box(-320, -320, -280, -280))).size).toBe(0);
    });
  });

  // ===== ANCHORS =====
  describe("anchors", () => {
    it("tracks visible anchors", () => {
      trees.insertAnchorHull("b1", box(10, 10, 20, 20));
      expect(sortedIds(trees.visibleAnchors(camera))).toEqual(["b1"]);

      trees.removeAnchorHull("b1", box(10, 10, 20, 20));
      expect(trees.visibleAnchors(camera).size).toBe(0);
    });
  });

  // ===== SPRITES =====
  describe("sprites", () => {
    const sprite = box(0, 0, 40, 40);
    const anchor = box(-5, -5, 5, 5);
    const brush = new TestBrush("b1", box(100, 100, 200, 200), null, sprite, anchor);

    it("indexes the sprite and its anchor highlight", () => {
      trees.insertSpriteHull(brush);

      expect(sortedIds(trees.spritesAtPos(v(20, 20)))).toEqual(["b1"]);
      expect(sortedIds(trees.visibleSpriteHighlights(camera))).toEqual(["b1"]);
      expect(sortedIds(trees.spritesInRange(box(-10, -10, 50, 50)))).toEqual(["b1"]);
      expect(trees.getStats()).toMatchObject({ sprites: 1, spriteHighlights: 1 });
    });

    it("requires the brush to have a sprite", () => {
      expect(thrownCode(() => trees.insertSpriteHull(new TestBrush("b2", box(0, 0, 1, 1))))).toBe(
        "malformedHull",
      );
    });

    it("leaves both trees untouched when the highlight is outside the world", () => {
      const stray = new TestBrush("b2", box(0, 0, 1, 1), null, sprite, box(990, 990, 1010, 1010));
      expect(thrownCode(() => trees.insertSpriteHull(stray))).toBe("outOfBounds");
      expect(trees.getStats()).toMatchObject({ sprites: 0, spriteHighlights: 0 });
    });

    it("removes both hulls, checking both trees first", () => {
      trees.insertSpriteHull(brush);
      expect(
        thrownCode(() => trees.removeSpriteHull(brush, { sprite, anchor: box(-6, -6, 6, 6) })),
      ).toBe("hullMismatch");
      expect(trees.getStats()).toMatchObject({ sprites: 1, spriteHighlights: 1 });

      trees.removeSpriteHull(brush, { sprite, anchor });
      expect(trees.getStats()).toMatchObject({ sprites: 0, spriteHighlights: 0 });
      expect(trees.spritesAtPos(v(20, 20)).size).toBe(0);
    });

    it("moves the sprite with its highlight", () => {
      trees.insertSpriteHull(brush);
      trees.replaceSpriteHull(
        brush,
        { sprite: box(500, 500, 540, 540), anchor: box(495, 495, 505, 505) },
        { sprite, anchor },
      );

      expect(trees.spritesAtPos(v(20, 20)).size).toBe(0);
      expect(sortedIds(trees.spritesAtPos(v(520, 520)))).toEqual(["b1"]);
      expect(trees.visibleSpriteHighlights(camera).size).toBe(0);
    });

    it("leaves both trees untouched when the highlight cannot move", () => {
      trees.insertSpriteHull(brush);
      const moved = box(500, 500, 540, 540);

      expect(
        thrownCode(() =>
          trees.replaceSpriteHull(
            brush,
            { sprite: moved, anchor: box(995, 995, 1005, 1005) },
            { sprite, anchor },
          ),
        ),
      ).toBe("outOfBounds");
      expect(sortedIds(trees.spritesAtPos(v(20, 20)))).toEqual(["b1"]);
      expect(trees.spritesAtPos(v(520, 520)).size).toBe(0);

      expect(
        thrownCode(() =>
          trees.replaceSpriteHull(
            brush,
            { sprite: moved, anchor: box(495, 495, 505, 505) },
            { sprite, anchor: box(-6, -6, 6, 6) },
          ),
        ),
      ).toBe("hullMismatch");
      expect(sortedIds(trees.spritesAtPos(v(20, 20)))).toEqual(["b1"]);
      expect(sortedIds(trees.visibleSpriteHighlights(camera))).toEqual(["b1"]);
    });

    it("refreshes only the highlights when the anchor moves", () => {
      trees.insertSpriteHull(brush);
      const intersect = vi.spyOn(Quadtree.prototype, "entitiesIntersectRange");

      trees.visibleSprites(camera);
      trees.visibleSpriteHighlights(camera);
      expect(intersect).toHaveBeenCalledTimes(2);

      trees.replaceSpriteAnchorHull(brush, box(300, 300, 310, 310), anchor);
      trees.visibleSprites(camera);
      expect(intersect).toHaveBeenCalledTimes(2);

      expect(trees.visibleSpriteHighlights(camera).size).toBe(0);
      expect(intersect).toHaveBeenCalledTimes(3);
    });
  });

  // ===== THINGS =====
  describe("things", () => {
    it("indexes and moves things", () => {
      const thing = new TestThing("t1", box(0, 0, 10, 10));
      trees.insertThingHull(thing);
      expect(sortedIds(trees.thingsAtPos(v(5, 5)))).toEqual(["t1"]);
      expect(sortedIds(trees.visibleThings(camera))).toEqual(["t1"]);

      const previous = thing.body;
      thing.body = box(600, 600, 610, 610);
      trees.replaceThingHull(thing, previous);

      expect(trees.thingsAtPos(v(5, 5)).size).toBe(0);
      expect(sortedIds(trees.thingsAtPos(v(615, 605), 1))).toEqual(["t1"]);
      expect(sortedIds(trees.thingsInRange(box(590, 590, 620, 620)))).toEqual(["t1"]);

      trees.removeThingHull(thing);
      expect(trees.thingsInRange(box(590, 590, 620, 620)).size).toBe(0);
    });
  });

  // ===== INVALIDATION =====
  describe("invalidation", () => {
    it("keeps other categories' caches when one category changes", () => {
      const atPos = vi.spyOn(Quadtree.prototype, "entitiesAtPos");
      trees.insertBrushHull(new TestBrush("b1", box(100, 100, 200, 200)));
      trees.brushesAtPos(v(150, 150));
      expect(atPos).toHaveBeenCalledTimes(1);

      trees.insertThingHull(new TestThing("t1", box(140, 140, 160, 160)));
      trees.insertAnchorHull("b1", box(140, 140, 160, 160));
      trees.brushesAtPos(v(150, 150));
      expect(atPos).toHaveBeenCalledTimes(1);

      trees.setBrushesDirty();
      trees.brushesAtPos(v(150, 150));
      expect(atPos).toHaveBeenCalledTimes(2);
    });

    it("empties every tree on clear", () => {
      trees.insertBrushHull(new TestBrush("b1", box(100, 100, 200, 200)));
      trees.insertThingHull(new TestThing("t1", box(0, 0, 10, 10)));
      expect(trees.brushesAtPos(v(150, 150)).size).toBe(1);

      trees.clear();
      expect(trees.brushesAtPos(v(150, 150)).size).toBe(0);
      expect(trees.visibleThings(camera).size).toBe(0);
      expect(trees.getStats()).toEqual({
        brushes: 0,
        paths: 0,
        anchors: 0,
        sprites: 0,
        spriteHighlights: 0,
        things: 0,
      });
    });
  });
});
