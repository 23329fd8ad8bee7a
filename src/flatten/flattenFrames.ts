// src/flatten/flattenFrames.ts
//
// Per-frame flattening of the node tree into (piece, world matrix, world alpha) records.
// - Depth-first, root-to-leaf, siblings in authored order.
// - Shared-loop substitution is resolved per node per outer frame.
// - Parent state lives in a per-depth arena (FlattenWorkspace) reused across siblings
//   and frames, so a walk allocates only the records it emits.

import type {
  AnimFrame,
  AnimNode,
  Affine2D,
  FlatFrame,
  FlatInstance,
  NameResolver,
  SharedAnimationTable,
  Timeline,
} from "../interfaces.js";
import { composeAffine_into, composeAlpha } from "../math/affine.js";
import { resolveEffectiveChildren } from "../anim/sharedAnimations.js";

const START_STACK_SIZE = 32;
const STRIDE = 6; // a b c d tx ty

export type FlattenVisitor = (name: string, world: Affine2D, alpha: number) => void;

// Workspace can be kept and reused across frames
export class FlattenWorkspace {
  // Sibling list and cursor per depth
  lists: (readonly AnimNode[])[] = [];
  cursor = new Int32Array(START_STACK_SIZE);
  // Shared reference that produced the list at each depth ("" = none)
  refs: string[] = [];
  // Parent world per depth, STRIDE numbers each
  parentWorld = new Float64Array(START_STACK_SIZE * STRIDE);
  parentAlpha = new Float64Array(START_STACK_SIZE);
  // Scratch for the node being entered
  current = new Float64Array(STRIDE);

  ensure(depthNeeded: number) {
    let n = this.cursor.length;
    if (depthNeeded < n) return;
    while (n <= depthNeeded) n = Math.max(2, n << 1);

    const cursor = new Int32Array(n);
    cursor.set(this.cursor);
    this.cursor = cursor;

    const world = new Float64Array(n * STRIDE);
    world.set(this.parentWorld);
    this.parentWorld = world;

    const alpha = new Float64Array(n);
    alpha.set(this.parentAlpha);
    this.parentAlpha = alpha;
  }

  /** Whether `ref` produced one of the lists at depths 1..depth. */
  isRefActive(ref: string, depth: number): boolean {
    for (let i = 1; i <= depth; i++) if (this.refs[i] === ref) return true;
    return false;
  }
}

/**
 * Walks one outer frame and calls `visit` for every node with a non-empty name,
 * in traversal order.
 */
export function flattenFrame(
  frame: AnimFrame,
  frameIndex: number,
  shared: SharedAnimationTable,
  visit: FlattenVisitor,
  workspace?: FlattenWorkspace
) {
  const ws = workspace ?? new FlattenWorkspace();
  const cur = ws.current;

  // Seed depth 0 with the frame's roots under identity / alpha 1
  let depth = 0;
  ws.ensure(depth);
  ws.lists[0] = frame.children;
  ws.refs[0] = "";
  ws.cursor[0] = 0;
  ws.parentWorld.set([1, 0, 0, 1, 0, 0], 0);
  ws.parentAlpha[0] = 1;

  while (depth >= 0) {
    const list = ws.lists[depth] ?? [];
    const i = ws.cursor[depth] ?? 0;
    if (i >= list.length) {
      // Siblings exhausted → pop
      depth--;
      continue;
    }
    ws.cursor[depth] = i + 1;

    const node = list[i];
    if (!node) continue;

    // --- ENTER NODE ---
    const base = depth * STRIDE;
    const pw = ws.parentWorld;
    const m = node.matrix;
    composeAffine_into(
      pw[base] ?? 1, pw[base + 1] ?? 0, pw[base + 2] ?? 0, pw[base + 3] ?? 1, pw[base + 4] ?? 0, pw[base + 5] ?? 0,
      m.a, m.b, m.c, m.d, m.tx, m.ty,
      cur
    );
    const alpha = composeAlpha(ws.parentAlpha[depth] ?? 1, node.color.alphaMultiplier);

    if (node.name) {
      visit(node.name, readAffine(cur), alpha);
    }

    const kids = resolveEffectiveChildren(node, frameIndex, shared, (ref) => ws.isRefActive(ref, depth));
    if (kids.length === 0) continue;

    // Descend: this node's world becomes the parent of the next level
    const next = depth + 1;
    ws.ensure(next);
    ws.lists[next] = kids;
    ws.refs[next] = kids !== node.children && node.sharedAnimationRef !== undefined ? node.sharedAnimationRef : "";
    ws.cursor[next] = 0;
    ws.parentWorld.set(cur, next * STRIDE);
    ws.parentAlpha[next] = alpha;
    depth = next;
  }

  // Drop references to the walked tree
  ws.lists.length = 0;
  ws.refs.length = 0;
}

/**
 * Flattens every outer frame. `resolveName` maps authored names to catalog piece names;
 * instances whose resolved name is empty are dropped.
 */
export function flattenTimeline(
  timeline: Timeline,
  shared: SharedAnimationTable,
  resolveName: NameResolver,
  workspace?: FlattenWorkspace
): FlatFrame[] {
  const ws = workspace ?? new FlattenWorkspace();
  const cache = new Map<string, string>();
  const resolve = (raw: string) => {
    let n = cache.get(raw);
    if (n === undefined) {
      n = resolveName(raw);
      cache.set(raw, n);
    }
    return n;
  };

  const out: FlatFrame[] = [];
  for (let fi = 0; fi < timeline.length; fi++) {
    const frame = timeline[fi];
    const instances: FlatInstance[] = [];
    if (frame) {
      flattenFrame(frame, fi, shared, (rawName, worldMatrix, worldAlpha) => {
        const pieceName = resolve(rawName);
        if (pieceName) instances.push({ rawName, pieceName, worldMatrix, worldAlpha });
      }, ws);
    }
    out.push(instances);
  }
  return out;
}

function readAffine(buf: Float64Array): Affine2D {
  return {
    a: buf[0] ?? 1,
    b: buf[1] ?? 0,
    c: buf[2] ?? 0,
    d: buf[3] ?? 1,
    tx: buf[4] ?? 0,
    ty: buf[5] ?? 0,
  };
}
