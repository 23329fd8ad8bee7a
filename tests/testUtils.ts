// tests/testUtils.ts
// Small builders for animation trees.

import type { Affine2D, AnimFrame, AnimNode, SharedFrame } from "../src/interfaces";

export type NodeSpec = {
  matrix?: Partial<Affine2D>;
  alpha?: number;
  children?: AnimNode[];
  ref?: string;
};

export function node(name: string, spec: NodeSpec = {}): AnimNode {
  const m = spec.matrix ?? {};
  const n: AnimNode = {
    name,
    matrix: { a: m.a ?? 1, b: m.b ?? 0, c: m.c ?? 0, d: m.d ?? 1, tx: m.tx ?? 0, ty: m.ty ?? 0 },
    color: { alphaMultiplier: spec.alpha ?? 1, redMultiplier: 1, greenMultiplier: 1, blueMultiplier: 1 },
    children: spec.children ?? [],
  };
  return spec.ref !== undefined ? { ...n, sharedAnimationRef: spec.ref } : n;
}

export function frame(...children: AnimNode[]): AnimFrame {
  return { children };
}

export function sharedTable(entries: Record<string, SharedFrame[]>): Map<string, SharedFrame[]> {
  return new Map(Object.entries(entries));
}

/** Chain of `depth` nodes named n0..n{depth-1}, each translated by (1, 0). */
export function chain(depth: number, i = 0): AnimNode {
  return node(`n${i}`, {
    matrix: { tx: 1 },
    children: i + 1 < depth ? [chain(depth, i + 1)] : [],
  });
}

export function expectAffineClose(actual: Affine2D, expected: Affine2D, digits = 9) {
  expect(actual.a).toBeCloseTo(expected.a, digits);
  expect(actual.b).toBeCloseTo(expected.b, digits);
  expect(actual.c).toBeCloseTo(expected.c, digits);
  expect(actual.d).toBeCloseTo(expected.d, digits);
  expect(actual.tx).toBeCloseTo(expected.tx, digits);
  expect(actual.ty).toBeCloseTo(expected.ty, digits);
}
