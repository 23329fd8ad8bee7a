// tests/anim/sharedAnimations.test.ts
import { resolveEffectiveChildren, sharedFrameIndex } from "../../src/anim/sharedAnimations";
import { frame, node, sharedTable } from "../testUtils";

describe("sharedFrameIndex", () => {
  test("wraps by modulo", () => {
    expect(sharedFrameIndex(0, 4)).toBe(0);
    expect(sharedFrameIndex(5, 2)).toBe(1);
    expect(sharedFrameIndex(7, 7)).toBe(0);
    expect(sharedFrameIndex(-1, 3)).toBe(2);
  });
});

describe("resolveEffectiveChildren", () => {
  const A = frame(node("lid_open"));
  const B = frame(node("lid_closed"));
  const own = node("own");
  const shared = sharedTable({ blink: [A, B], empty: [] });

  test("blink loop of 2 over 5 outer frames alternates A/B", () => {
    const n = node("eye", { ref: "blink", children: [own] });
    const picked = [0, 1, 2, 3, 4].map((fi) => resolveEffectiveChildren(n, fi, shared));
    expect(picked[0]).toBe(A.children);
    expect(picked[1]).toBe(B.children);
    expect(picked[2]).toBe(A.children);
    expect(picked[3]).toBe(B.children);
    expect(picked[4]).toBe(A.children);
  });

  test("substitution is periodic in the loop length", () => {
    const loop = [frame(node("p0")), frame(node("p1")), frame(node("p2"))];
    const table = sharedTable({ spin: loop });
    const n = node("wheel", { ref: "spin" });
    for (let k = 0; k < 6; k++) {
      expect(resolveEffectiveChildren(n, k + 3, table)).toBe(resolveEffectiveChildren(n, k, table));
    }
  });

  test("no reference: own children", () => {
    const n = node("eye", { children: [own] });
    expect(resolveEffectiveChildren(n, 1, shared)).toBe(n.children);
  });

  test("unknown or empty reference falls back to own children", () => {
    const unknown = node("eye", { ref: "nope", children: [own] });
    const empty = node("eye", { ref: "empty", children: [own] });
    expect(resolveEffectiveChildren(unknown, 3, shared)).toBe(unknown.children);
    expect(resolveEffectiveChildren(empty, 3, shared)).toBe(empty.children);
  });

  test("loop frame without a children field keeps own children", () => {
    const table = sharedTable({ sparse: [{}, frame(node("x"))] });
    const n = node("eye", { ref: "sparse", children: [own] });
    expect(resolveEffectiveChildren(n, 0, table)).toBe(n.children);
    expect(resolveEffectiveChildren(n, 1, table)[0]?.name).toBe("x");
  });

  test("a reference already being expanded falls back to own children", () => {
    const n = node("eye", { ref: "blink", children: [own] });
    expect(resolveEffectiveChildren(n, 0, shared, (ref) => ref === "blink")).toBe(n.children);
    expect(resolveEffectiveChildren(n, 0, shared, () => false)).toBe(A.children);
  });
});
