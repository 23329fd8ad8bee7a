// src/pipeline/buildTimeline.ts
//
// Decoded animation + shared loops + labels + catalog -> layered keyframe timeline.
// 1) flatten every outer frame (names normalized and aliased on the way)
// 2) usage counts and unmatched names
// 3) layer selection and draw order (frame 0 first, then used pieces in catalog order)
// 4) tracks through the origin/scale compositor, label spans, main label

import type {
  Affine2D,
  FlattenedTimeline,
  LabelTable,
  SharedAnimationTable,
  SharedFrame,
  Timeline,
  TimelineResult,
} from "../interfaces.js";
import { PieceCatalog, matchPieces } from "../catalog/pieceCatalog.js";
import { resolvePieceName } from "../catalog/pieceNames.js";
import { FlattenWorkspace, flattenTimeline } from "../flatten/flattenFrames.js";
import { resolveDrawOrder, toTopFirst } from "../flatten/drawOrder.js";
import { buildKeyframeTracks, countUsage, selectLayerNames } from "../tracks/keyframeTracks.js";
import { buildLabelSpans, mainLabel } from "../tracks/labelSpans.js";
import { composeInstanceMatrix } from "../math/instanceMatrix.js";
import { resolveOptions, type TimelineOptions } from "../options.js";
import { formatMissingWarning, formatUsageTrace, usageRows } from "./report.js";

export type TimelineInput = Readonly<{
  timeline: Timeline;
  shared?: SharedAnimationTable;
  labels?: LabelTable;
  catalog: PieceCatalog;
}>;

const NO_SHARED: SharedAnimationTable = new Map<string, readonly SharedFrame[]>();
const NO_LABELS: LabelTable = new Map<string, number>();

export function buildTimeline(input: TimelineInput, options: TimelineOptions = {}): TimelineResult {
  const opts = resolveOptions(options);
  const log = opts.logger;
  const { timeline, catalog } = input;
  const shared = input.shared ?? NO_SHARED;
  const labels = input.labels ?? NO_LABELS;

  if (timeline.length === 0) {
    return { ok: false, error: { code: "no-frames", message: "animation has no frames" } };
  }

  const resolveName = (raw: string) => resolvePieceName(raw, opts.aliases);
  const ws = new FlattenWorkspace();

  // 1) Flatten
  const flat = flattenTimeline(timeline, shared, resolveName, ws);
  log.info(`flattened ${flat.length} frames`);

  // 2) Usage and unmatched
  const usage = countUsage(flat);
  const { matched, unmatched } = matchPieces(usage.keys(), catalog);
  if (opts.reportMissing) {
    const warning = formatMissingWarning(unmatched);
    if (warning) log.warn(warning);
  }

  // 3) Layers + draw order
  const selected = new Set(selectLayerNames(opts.layers, catalog, usage));
  const catalogOrdered = catalog.names.filter((n) => selected.has(n) || usage.has(n));
  const fallback = [...catalogOrdered, ...unmatched];
  const bottomFirst = resolveDrawOrder(timeline, shared, resolveName, fallback, ws)
    .filter((n) => selected.has(n));
  const layers = opts.topFirst ? toTopFirst(bottomFirst) : bottomFirst;
  log.info(`${layers.length} layers (${matched.length} drawn pieces in catalog, ${unmatched.length} unmatched)`);

  // 4) Tracks + labels
  const compose = opts.rawWorldMatrices
    ? undefined
    : (piece: string, world: Affine2D) =>
        composeInstanceMatrix(world, catalog.get(piece), opts.globalScale);
  const tracks = buildKeyframeTracks(flat, layers, compose);
  const labelSpans = buildLabelSpans(labels, flat.length);

  const rows = usageRows(catalog.names, usage, selected);
  if (opts.traceNames) {
    for (const line of formatUsageTrace(rows)) log.info(line);
  }

  const value: FlattenedTimeline = {
    frameCount: flat.length,
    layers,
    tracks,
    labelSpans,
    mainLabel: mainLabel(labels),
    diagnostics: { usage: rows, unmatched },
  };
  return { ok: true, value };
}
