// src/flatten/drawOrder.ts
// Frame-independent stacking order: first-occurrence walk of frame 0 (bottom-first),
// then every fallback name that frame 0 never reached.

import type { NameResolver, SharedAnimationTable, Timeline } from "../interfaces.js";
import { flattenFrame, FlattenWorkspace } from "./flattenFrames.js";

export function frameZeroOrder(
  timeline: Timeline,
  shared: SharedAnimationTable,
  resolveName: NameResolver,
  workspace?: FlattenWorkspace
): string[] {
  const order: string[] = [];
  const seen = new Set<string>();
  const first = timeline[0];
  if (!first) return order;

  flattenFrame(first, 0, shared, (raw) => {
    const n = resolveName(raw);
    if (!n || seen.has(n)) return;
    seen.add(n);
    order.push(n);
  }, workspace);
  return order;
}

/**
 * Bottom-to-top order. `fallback` lists the names that must appear even if frame 0
 * never draws them (callers pass used names in catalog order); each appears once.
 */
export function resolveDrawOrder(
  timeline: Timeline,
  shared: SharedAnimationTable,
  resolveName: NameResolver,
  fallback: Iterable<string> = [],
  workspace?: FlattenWorkspace
): string[] {
  const order = frameZeroOrder(timeline, shared, resolveName, workspace);
  const seen = new Set(order);
  for (const n of fallback) {
    if (!n || seen.has(n)) continue;
    seen.add(n);
    order.push(n);
  }
  return order;
}

/** Topmost-first enumeration, for formats that list layers from the top. */
export function toTopFirst(order: readonly string[]): string[] {
  return order.slice().reverse();
}
