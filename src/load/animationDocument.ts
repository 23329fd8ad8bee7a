// src/load/animationDocument.ts
// Animation JSON document -> typed records.
//
// Accepted layout (every part optional except a frame list somewhere):
//   { animation?: { frames, shared_animations, width, height }, labels, plist, ... }
// Malformed numbers fall back component-wise (identity matrix, alpha 1); malformed
// nodes are skipped. Only a non-object root is rejected.

import type {
  Affine2D,
  AnimFrame,
  AnimNode,
  ColorTint,
  PieceCatalogEntry,
  SharedFrame,
  Timeline,
} from "../interfaces.js";
import { PieceCatalog } from "../catalog/pieceCatalog.js";

export const DEFAULT_DOCUMENT_SIZE = 390;

type JsonRecord = Readonly<Record<string, unknown>>;

export interface AnimationDocument {
  readonly timeline: Timeline;
  readonly shared: Map<string, SharedFrame[]>;
  readonly labels: Map<string, number>;
  readonly catalog: PieceCatalog;
  readonly width: number;
  readonly height: number;
  /** Where the frame list was found, e.g. "frames" or "$.data[0].seq"; "" when none. */
  readonly framesPath: string;
}

export function isRecord(v: unknown): v is JsonRecord {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Finite numbers and numeric strings pass; anything else yields `fallback`. */
export function toNumber(v: unknown, fallback: number): number {
  if (typeof v === "number") return Number.isFinite(v) ? v : fallback;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    return Number.isFinite(n) ? n : fallback;
  }
  return fallback;
}

export function decodeMatrix(v: unknown): Affine2D {
  const m: JsonRecord = isRecord(v) ? v : {};
  return {
    a:  toNumber(m.a, 1),
    b:  toNumber(m.b, 0),
    c:  toNumber(m.c, 0),
    d:  toNumber(m.d, 1),
    tx: toNumber(m.tx, 0),
    ty: toNumber(m.ty, 0),
  };
}

export function decodeColor(v: unknown): ColorTint {
  const c: JsonRecord = isRecord(v) ? v : {};
  return {
    alphaMultiplier: toNumber(c.alphaMultiplier, 1),
    redMultiplier:   toNumber(c.redMultiplier, 1),
    greenMultiplier: toNumber(c.greenMultiplier, 1),
    blueMultiplier:  toNumber(c.blueMultiplier, 1),
  };
}

// Falsy values ("" and 0) mean the node has no reference.
function decodeSharedRef(v: unknown): string | undefined {
  if (typeof v === "string") return v !== "" ? v : undefined;
  if (typeof v === "number" && Number.isFinite(v) && v !== 0) return String(v);
  return undefined;
}

export function decodeNode(v: unknown): AnimNode | undefined {
  if (!isRecord(v)) return undefined;
  const ref = decodeSharedRef(v.references_shared_animation);
  const node: AnimNode = {
    name: typeof v.name === "string" ? v.name : "",
    matrix: decodeMatrix(v.matrix),
    color: decodeColor(v.color),
    children: decodeChildren(v.children),
  };
  return ref !== undefined ? { ...node, sharedAnimationRef: ref } : node;
}

export function decodeChildren(v: unknown): AnimNode[] {
  if (!Array.isArray(v)) return [];
  const out: AnimNode[] = [];
  for (const item of v) {
    const node = decodeNode(item);
    if (node) out.push(node);
  }
  return out;
}

export function decodeFrame(v: unknown): AnimFrame {
  return { children: isRecord(v) ? decodeChildren(v.children) : [] };
}

function decodeSharedFrame(v: unknown): SharedFrame {
  // No "children" key: the referencing node keeps its own children.
  if (!isRecord(v) || !("children" in v)) return {};
  return { children: decodeChildren(v.children) };
}

export function decodeSharedAnimations(v: unknown): Map<string, SharedFrame[]> {
  const out = new Map<string, SharedFrame[]>();
  if (!isRecord(v)) return out;
  for (const [id, frames] of Object.entries(v)) {
    if (!Array.isArray(frames)) continue;
    out.set(id, frames.map(decodeSharedFrame));
  }
  return out;
}

/** `{name: frame}` or `[{name, frame}]`; entries without a usable frame are dropped. */
export function decodeLabels(v: unknown): Map<string, number> {
  const out = new Map<string, number>();
  if (Array.isArray(v)) {
    for (const item of v) {
      if (!isRecord(item) || typeof item.name !== "string") continue;
      const frame = toNumber(item.frame, NaN);
      if (Number.isFinite(frame)) out.set(item.name, Math.trunc(frame));
    }
  } else if (isRecord(v)) {
    for (const [name, raw] of Object.entries(v)) {
      const frame = toNumber(raw, NaN);
      if (Number.isFinite(frame)) out.set(name, Math.trunc(frame));
    }
  }
  return out;
}

export function decodeCatalogEntry(v: unknown): PieceCatalogEntry | undefined {
  if (!isRecord(v) || typeof v.name !== "string") return undefined;
  const name = v.name.trim();
  if (!name) return undefined;
  return {
    name,
    originX: toNumber(v.origin_x, 0),
    originY: toNumber(v.origin_y, 0),
    scaleX:  toNumber(v.scale_x, 1),
    scaleY:  toNumber(v.scale_y, 1),
  };
}

export function decodeCatalog(v: unknown): PieceCatalog {
  const entries: PieceCatalogEntry[] = [];
  if (Array.isArray(v)) {
    for (const item of v) {
      const e = decodeCatalogEntry(item);
      if (e) entries.push(e);
    }
  }
  return new PieceCatalog(entries);
}

function frameList(v: unknown): unknown[] | undefined {
  if (!Array.isArray(v)) return undefined;
  const head: unknown = v[0];
  return isRecord(head) ? v : undefined;
}

function firstFrames(v: unknown): unknown {
  const head: unknown = Array.isArray(v) ? v[0] : undefined;
  return isRecord(head) ? head.frames : undefined;
}

/** Depth-first search for the first array of node-like records. */
function scanForFrames(node: unknown, trail: string): [unknown[], string] | undefined {
  if (Array.isArray(node)) {
    const head: unknown = node[0];
    if (isRecord(head) && ("children" in head || "matrix" in head)) return [node, trail];
    for (let i = 0; i < node.length; i++) {
      const r = scanForFrames(node[i], `${trail}[${i}]`);
      if (r) return r;
    }
  } else if (isRecord(node)) {
    for (const [k, v] of Object.entries(node)) {
      const r = scanForFrames(v, `${trail}.${k}`);
      if (r) return r;
    }
  }
  return undefined;
}

/** Locates the frame list in a loosely shaped animation object. */
export function discoverFrames(data: JsonRecord): [unknown[], string] {
  const candidates: [string, unknown][] = [
    ["frames", data.frames],
    ["anims[0].frames", firstFrames(data.anims)],
    ["animations[0].frames", firstFrames(data.animations)],
    ["timeline.frames", isRecord(data.timeline) ? data.timeline.frames : undefined],
  ];
  for (const [path, v] of candidates) {
    const list = frameList(v);
    if (list) return [list, path];
  }
  return scanForFrames(data, "$") ?? [[], ""];
}

export function loadAnimationDocument(json: unknown): AnimationDocument {
  if (!isRecord(json)) throw new Error("Unsupported animation document");

  const anim = isRecord(json.animation) ? json.animation : json;
  let [frames, framesPath] = discoverFrames(anim);
  if (frames.length === 0 && anim !== json) [frames, framesPath] = discoverFrames(json);

  const width = toNumber(anim.width, 0) || toNumber(json.width, 0) || DEFAULT_DOCUMENT_SIZE;
  const height = toNumber(anim.height, 0) || toNumber(json.height, 0) || DEFAULT_DOCUMENT_SIZE;

  return {
    timeline: frames.map(decodeFrame),
    shared: decodeSharedAnimations(anim.shared_animations ?? json.shared_animations),
    labels: decodeLabels(json.labels ?? anim.labels),
    catalog: decodeCatalog(json.plist ?? anim.plist),
    width,
    height,
    framesPath,
  };
}

/** JSON.parse errors propagate to the caller. */
export function parseAnimationDocument(text: string): AnimationDocument {
  const json: unknown = JSON.parse(text);
  return loadAnimationDocument(json);
}
