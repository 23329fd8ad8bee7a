// tests/tracks/keyframeTracks.test.ts
import type { Affine2D, FlatFrame, FlatInstance } from "../../src/interfaces";
import {
  buildKeyframeTracks,
  countUsage,
  presentFrames,
  selectLayerNames,
} from "../../src/tracks/keyframeTracks";
import { PieceCatalog } from "../../src/catalog/pieceCatalog";
import { IDENTITY, translation } from "../../src/math/affine";

function inst(pieceName: string, worldMatrix: Affine2D = IDENTITY, worldAlpha = 1): FlatInstance {
  return { rawName: pieceName, pieceName, worldMatrix, worldAlpha };
}

const frames: FlatFrame[] = [
  [inst("head", translation(0, 0))],
  [inst("head", translation(1, 0)), inst("eye", translation(2, 0), 0.5), inst("ghost")],
  [],
  [inst("eye", translation(3, 0), 0.3), inst("eye", translation(4, 0), 0.7)],
];

describe("countUsage", () => {
  test("counts every instance, duplicates included", () => {
    expect(Array.from(countUsage(frames))).toEqual([
      ["head", 2],
      ["eye", 3],
      ["ghost", 1],
    ]);
  });
});

describe("selectLayerNames", () => {
  const catalog = PieceCatalog.fromNames(["head", "eye", "arm", "tail"]);
  const usage = countUsage(frames);

  test("used pieces in catalog order", () => {
    expect(selectLayerNames("used", catalog, usage)).toEqual(["head", "eye"]);
  });

  test("all pieces", () => {
    expect(selectLayerNames("all", catalog, usage)).toEqual(["head", "eye", "arm", "tail"]);
  });

  test("allow-list is normalized and limited to the catalog", () => {
    expect(selectLayerNames({ only: ["tail", " parts/arm.png", "nope"] }, catalog, usage)).toEqual(["arm", "tail"]);
  });
});

describe("buildKeyframeTracks", () => {
  test("one slot per frame, present only where drawn", () => {
    const tracks = buildKeyframeTracks(frames, ["head", "eye", "tail"]);
    expect(Array.from(tracks.keys())).toEqual(["head", "eye", "tail"]);

    const head = tracks.get("head");
    const eye = tracks.get("eye");
    const tail = tracks.get("tail");
    expect(head?.slots).toHaveLength(4);
    expect(head && presentFrames(head)).toEqual([0, 1]);
    expect(eye && presentFrames(eye)).toEqual([1, 3]);
    expect(tail && presentFrames(tail)).toEqual([]);
    expect(head?.slots[2]).toEqual({ present: false });
    expect(eye?.slots[1]).toEqual({ present: true, matrix: translation(2, 0), alpha: 0.5 });
  });

  test("last instance in a frame wins", () => {
    const eye = buildKeyframeTracks(frames, ["eye"]).get("eye");
    expect(eye?.slots[3]).toEqual({ present: true, matrix: translation(4, 0), alpha: 0.7 });
  });

  test("instances of unlisted pieces are ignored and names are de-duplicated", () => {
    const tracks = buildKeyframeTracks(frames, ["head", "head"]);
    expect(tracks.size).toBe(1);
    expect(tracks.has("ghost")).toBe(false);
  });

  test("slot matrices go through the composer", () => {
    const compose = jest.fn((piece: string, world: Affine2D) => ({ ...world, ty: piece.length }));
    const head = buildKeyframeTracks(frames, ["head"], compose).get("head");
    expect(compose).toHaveBeenCalledTimes(2);
    expect(compose).toHaveBeenCalledWith("head", translation(1, 0));
    expect(head?.slots[1]).toEqual({ present: true, matrix: { a: 1, b: 0, c: 0, d: 1, tx: 1, ty: 4 }, alpha: 1 });
  });

  test("no frames gives empty tracks", () => {
    const tracks = buildKeyframeTracks([], ["a"]);
    expect(tracks.get("a")?.slots).toEqual([]);
  });
});
