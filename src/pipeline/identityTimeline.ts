// src/pipeline/identityTimeline.ts
// Single-frame preview: every catalog piece at its registration point.

import type { FlattenedTimeline, KeyframeTrack } from "../interfaces.js";
import type { PieceCatalog } from "../catalog/pieceCatalog.js";
import { IDENTITY } from "../math/affine.js";
import { composeInstanceMatrix } from "../math/instanceMatrix.js";
import { DEFAULT_MAIN_LABEL } from "../tracks/labelSpans.js";
import { resolveGlobalScale } from "../options.js";
import type { Logger } from "../log.js";

export function buildIdentityTimeline(catalog: PieceCatalog, scale?: number, logger?: Logger): FlattenedTimeline {
  const globalScale = resolveGlobalScale(scale, logger);
  const tracks = new Map<string, KeyframeTrack>();
  for (const name of catalog.names) {
    const matrix = composeInstanceMatrix(IDENTITY, catalog.get(name), globalScale);
    tracks.set(name, { pieceName: name, slots: [{ present: true, matrix, alpha: 1 }] });
  }

  return {
    frameCount: 1,
    layers: catalog.names.slice(),
    tracks,
    labelSpans: [{ startFrame: 0, durationFrames: 1 }],
    mainLabel: DEFAULT_MAIN_LABEL,
    diagnostics: {
      usage: catalog.names.map((name) => ({ name, count: 0, layered: true })),
      unmatched: [],
    },
  };
}
