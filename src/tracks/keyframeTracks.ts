// src/tracks/keyframeTracks.ts
// Sparse per-piece tracks: one slot per outer frame, present only where the piece is drawn.

import type { Affine2D, FlatFrame, KeyframeSlot, KeyframeTrack } from "../interfaces.js";
import type { PieceCatalog } from "../catalog/pieceCatalog.js";
import { normalizeAllowList } from "../catalog/pieceNames.js";

/** "used": catalog pieces drawn at least once; "all": every catalog piece; or an allow-list. */
export type LayerMode = "used" | "all" | Readonly<{ only: readonly string[] }>;

export type MatrixComposer = (pieceName: string, world: Affine2D) => Affine2D;

const ABSENT: KeyframeSlot = Object.freeze({ present: false });

/** Occurrences per piece over all frames; every instance counts, duplicates included. */
export function countUsage(frames: readonly FlatFrame[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const frame of frames) {
    for (const inst of frame) counts.set(inst.pieceName, (counts.get(inst.pieceName) ?? 0) + 1);
  }
  return counts;
}

/** Layer names in catalog order for the given mode. */
export function selectLayerNames(
  mode: LayerMode,
  catalog: PieceCatalog,
  usage: ReadonlyMap<string, number>
): string[] {
  if (mode === "all") return catalog.names.slice();
  if (mode === "used") return catalog.names.filter((n) => (usage.get(n) ?? 0) > 0);
  const allow = normalizeAllowList(mode.only);
  return catalog.names.filter((n) => allow.has(n));
}

/**
 * One track of length frames.length per name. When a piece is drawn more than once in
 * a frame, the last instance in traversal order fills the slot.
 */
export function buildKeyframeTracks(
  frames: readonly FlatFrame[],
  names: Iterable<string>,
  compose?: MatrixComposer
): Map<string, KeyframeTrack> {
  const tracks = new Map<string, KeyframeTrack>();
  for (const name of names) {
    if (tracks.has(name)) continue;
    tracks.set(name, { pieceName: name, slots: new Array<KeyframeSlot>(frames.length).fill(ABSENT) });
  }

  for (let fi = 0; fi < frames.length; fi++) {
    const frame = frames[fi] ?? [];
    for (const inst of frame) {
      const track = tracks.get(inst.pieceName);
      if (!track) continue;
      const matrix = compose ? compose(inst.pieceName, inst.worldMatrix) : inst.worldMatrix;
      track.slots[fi] = { present: true, matrix, alpha: inst.worldAlpha };
    }
  }
  return tracks;
}

export function presentFrames(track: KeyframeTrack): number[] {
  const out: number[] = [];
  track.slots.forEach((s, i) => { if (s.present) out.push(i); });
  return out;
}
