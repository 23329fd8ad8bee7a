// src/tracks/labelSpans.ts

import type { LabelSpan, LabelTable } from "../interfaces.js";

export const DEFAULT_MAIN_LABEL = "idle";

/** 1-based label frame -> 0-based start, never below 0. */
export function labelStart(frameNumber: number): number {
  return Math.max(0, Math.trunc(frameNumber) - 1);
}

/**
 * Run-length label spans covering [0, frameCount) exactly.
 * Frame 0 always starts a span; labels at or past frameCount are dropped; a span is
 * named by the first label (table order) whose start equals the span start.
 */
export function buildLabelSpans(labels: LabelTable, frameCount: number): LabelSpan[] {
  const total = Math.max(1, Math.trunc(frameCount));

  const nameAt = new Map<number, string>();
  for (const [name, frame] of labels) {
    const s = labelStart(frame);
    if (s >= total || nameAt.has(s)) continue;
    nameAt.set(s, name);
  }

  const starts = Array.from(nameAt.keys());
  if (!nameAt.has(0)) starts.push(0);
  starts.sort((a, b) => a - b);
  starts.push(total);

  const spans: LabelSpan[] = [];
  for (let i = 0; i < starts.length - 1; i++) {
    const s = starts[i] ?? 0;
    const e = starts[i + 1] ?? total;
    const name = nameAt.get(s);
    const span: LabelSpan = name !== undefined
      ? { startFrame: s, durationFrames: Math.max(1, e - s), name }
      : { startFrame: s, durationFrames: Math.max(1, e - s) };
    spans.push(span);
  }
  return spans;
}

/** Label with the lowest frame number (ties: table order), else `fallback`. */
export function mainLabel(labels: LabelTable, fallback = DEFAULT_MAIN_LABEL): string {
  let best: string | undefined;
  let bestFrame = Infinity;
  for (const [name, frame] of labels) {
    if (frame < bestFrame) {
      best = name;
      bestFrame = frame;
    }
  }
  return best ?? fallback;
}
