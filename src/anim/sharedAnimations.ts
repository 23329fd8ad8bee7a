// src/anim/sharedAnimations.ts
// Substitution of shared-loop children. Looked up per (node, outer frame); never cached,
// since different outer frames land on different loop entries.

import type { AnimNode, SharedAnimationTable } from "../interfaces.js";

/** fi mod length, always in [0, length). */
export function sharedFrameIndex(frameIndex: number, length: number): number {
  const m = frameIndex % length;
  return m < 0 ? m + length : m;
}

/**
 * Children to walk under `node` at outer frame `frameIndex`.
 * Falls back to the node's own children when it has no reference, the reference is
 * unknown or empty, the selected loop frame has no children field, or the reference
 * is already being expanded further up the same path (`isActive`).
 */
export function resolveEffectiveChildren(
  node: AnimNode,
  frameIndex: number,
  shared: SharedAnimationTable,
  isActive?: (ref: string) => boolean
): readonly AnimNode[] {
  const ref = node.sharedAnimationRef;
  if (ref === undefined) return node.children;

  const loop = shared.get(ref);
  if (!loop || loop.length === 0) return node.children;
  if (isActive && isActive(ref)) return node.children;

  const entry = loop[sharedFrameIndex(frameIndex, loop.length)];
  return entry?.children ?? node.children;
}

