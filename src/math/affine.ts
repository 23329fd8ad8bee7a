// src/math/affine.ts
// 2x3 affine helpers (a b c d tx ty, column-vector convention) and alpha composition.
// The *_into variants write into a caller-owned Float64Array and never allocate.

import type { Affine2D } from "../interfaces.js";

export const AFFINE_EPS = 1e-9;

export const IDENTITY: Affine2D = Object.freeze({ a: 1, b: 0, c: 0, d: 1, tx: 0, ty: 0 });

export function affine(a = 1, b = 0, c = 0, d = 1, tx = 0, ty = 0): Affine2D {
  return { a, b, c, d, tx, ty };
}

/** parent ∘ local: `local` is applied first, then `parent`. */
export function composeAffine(parent: Affine2D, local: Affine2D): Affine2D {
  return {
    a:  parent.a * local.a  + parent.c * local.b,
    b:  parent.b * local.a  + parent.d * local.b,
    c:  parent.a * local.c  + parent.c * local.d,
    d:  parent.b * local.c  + parent.d * local.d,
    tx: parent.a * local.tx + parent.c * local.ty + parent.tx,
    ty: parent.b * local.tx + parent.d * local.ty + parent.ty,
  };
}

/** out := P ∘ L, written as [a, b, c, d, tx, ty] at `offset`. */
export function composeAffine_into(
  pa: number, pb: number, pc: number, pd: number, ptx: number, pty: number,
  la: number, lb: number, lc: number, ld: number, ltx: number, lty: number,
  out: Float64Array,
  offset = 0
) {
  out[offset]     = pa * la  + pc * lb;
  out[offset + 1] = pb * la  + pd * lb;
  out[offset + 2] = pa * lc  + pc * ld;
  out[offset + 3] = pb * lc  + pd * ld;
  out[offset + 4] = pa * ltx + pc * lty + ptx;
  out[offset + 5] = pb * ltx + pd * lty + pty;
}

export function composeAlpha(parentAlpha: number, localAlpha: number): number {
  return parentAlpha * localAlpha;
}

export function translation(tx: number, ty: number): Affine2D {
  return { a: 1, b: 0, c: 0, d: 1, tx, ty };
}

export function scaling(sx: number, sy: number): Affine2D {
  return { a: sx, b: 0, c: 0, d: sy, tx: 0, ty: 0 };
}

/** Multiplies every component by `g` (post-multiplication by g·I). */
export function scaleUniform(m: Affine2D, g: number): Affine2D {
  return { a: m.a * g, b: m.b * g, c: m.c * g, d: m.d * g, tx: m.tx * g, ty: m.ty * g };
}

export function affineEquals(x: Affine2D, y: Affine2D, eps = AFFINE_EPS): boolean {
  return Math.abs(x.a - y.a) <= eps &&
         Math.abs(x.b - y.b) <= eps &&
         Math.abs(x.c - y.c) <= eps &&
         Math.abs(x.d - y.d) <= eps &&
         Math.abs(x.tx - y.tx) <= eps &&
         Math.abs(x.ty - y.ty) <= eps;
}

/** Applies `m` to a point. */
export function applyToPoint(m: Affine2D, x: number, y: number): [number, number] {
  return [m.a * x + m.c * y + m.tx, m.b * x + m.d * y + m.ty];
}
