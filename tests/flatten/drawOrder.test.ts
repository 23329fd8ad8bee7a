// tests/flatten/drawOrder.test.ts
import { frameZeroOrder, resolveDrawOrder, toTopFirst } from "../../src/flatten/drawOrder";
import { normalizePieceName } from "../../src/catalog/pieceNames";
import { frame, node, sharedTable } from "../testUtils";

const NO_SHARED = sharedTable({});

describe("draw order", () => {
  test("frame 0 traversal gives bottom-first order", () => {
    const tl = [
      frame(node("body", { children: [node("armL"), node("armR")] }), node("head")),
      frame(node("head"), node("body")),
    ];
    expect(frameZeroOrder(tl, NO_SHARED, normalizePieceName)).toEqual(["body", "armL", "armR", "head"]);
  });

  test("keeps first occurrence of repeated names", () => {
    const tl = [frame(node("a.png"), node("b"), node("dir/a"))];
    expect(frameZeroOrder(tl, NO_SHARED, normalizePieceName)).toEqual(["a", "b"]);
  });

  test("frame 0 uses shared loop entry 0", () => {
    const shared = sharedTable({ blink: [frame(node("lid_open")), frame(node("lid_closed"))] });
    const tl = [frame(node("eye", { ref: "blink" }))];
    expect(frameZeroOrder(tl, shared, normalizePieceName)).toEqual(["eye", "lid_open"]);
  });

  test("fallback names not drawn at frame 0 are appended once", () => {
    const tl = [frame(node("a"), node("b"))];
    expect(resolveDrawOrder(tl, NO_SHARED, normalizePieceName, ["b", "c", "a", "", "c"])).toEqual(["a", "b", "c"]);
  });

  test("repeat runs agree and list every used name once", () => {
    const tl = [
      frame(node("b", { children: [node("a")] })),
      frame(node("c"), node("a"), node("d")),
    ];
    const used = ["a", "b", "c", "d"];
    const first = resolveDrawOrder(tl, NO_SHARED, normalizePieceName, used);
    const second = resolveDrawOrder(tl, NO_SHARED, normalizePieceName, used);
    expect(first).toEqual(["b", "a", "c", "d"]);
    expect(second).toEqual(first);
  });

  test("empty timeline falls back entirely", () => {
    expect(resolveDrawOrder([], NO_SHARED, normalizePieceName, ["x", "y"])).toEqual(["x", "y"]);
    expect(frameZeroOrder([], NO_SHARED, normalizePieceName)).toEqual([]);
  });

  test("toTopFirst reverses without mutating", () => {
    const order = ["a", "b", "c"];
    expect(toTopFirst(order)).toEqual(["c", "b", "a"]);
    expect(order).toEqual(["a", "b", "c"]);
  });
});
