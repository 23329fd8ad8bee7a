// src/math/instanceMatrix.ts
// Final per-instance matrix: frame ∘ T(origin) ∘ S(scale), then the global uniform scale.

import type { Affine2D, PieceCatalogEntry } from "../interfaces.js";
import { scaleUniform } from "./affine.js";

type Registration = Pick<PieceCatalogEntry, "originX" | "originY" | "scaleX" | "scaleY">;

const NO_REGISTRATION: Registration = { originX: 0, originY: 0, scaleX: 1, scaleY: 1 };

export function composeInstanceMatrix(
  frame: Affine2D,
  entry?: Registration,
  globalScale = 1
): Affine2D {
  const { originX: ox, originY: oy, scaleX: sx, scaleY: sy } = entry ?? NO_REGISTRATION;
  const { a, b, c, d, tx, ty } = frame;

  const composed: Affine2D = {
    a: a * sx,
    b: b * sx,
    c: c * sy,
    d: d * sy,
    tx: a * ox + c * oy + tx,
    ty: b * ox + d * oy + ty,
  };

  return globalScale !== 1 ? scaleUniform(composed, globalScale) : composed;
}
