// src/pipeline/plainTimeline.ts
// JSON-ready view of a flattened timeline (Maps become ordered arrays).

import type { FlattenedTimeline, KeyframeSlot, LabelSpan, PieceUsage } from "../interfaces.js";
import { DEFAULT_DOCUMENT_SIZE } from "../load/animationDocument.js";

export type StageSize = Readonly<{ width: number; height: number }>;

export interface PlainTimelineV1 {
  version: 1;
  stage: StageSize;
  frameCount: number;
  mainLabel: string;
  layers: { name: string; frames: KeyframeSlot[] }[];
  labels: LabelSpan[];
  diagnostics: { usage: PieceUsage[]; unmatched: string[] };
}

const DEFAULT_STAGE: StageSize = { width: DEFAULT_DOCUMENT_SIZE, height: DEFAULT_DOCUMENT_SIZE };

export function toPlainTimeline(t: FlattenedTimeline, stage: StageSize = DEFAULT_STAGE): PlainTimelineV1 {
  return {
    version: 1,
    stage: { width: stage.width, height: stage.height },
    frameCount: t.frameCount,
    mainLabel: t.mainLabel,
    layers: t.layers.map((name) => ({ name, frames: t.tracks.get(name)?.slots.slice() ?? [] })),
    labels: t.labelSpans.slice(),
    diagnostics: {
      usage: t.diagnostics.usage.slice(),
      unmatched: t.diagnostics.unmatched.slice(),
    },
  };
}
