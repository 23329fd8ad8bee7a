// src/index.ts
export type * from "./interfaces.js";

export {
  AFFINE_EPS,
  IDENTITY,
  affine,
  affineEquals,
  applyToPoint,
  composeAffine,
  composeAffine_into,
  composeAlpha,
  scaleUniform,
  scaling,
  translation,
} from "./math/affine.js";
export { composeInstanceMatrix } from "./math/instanceMatrix.js";

export { normalizePieceName, resolvePieceName, parseAliasPairs, normalizeAllowList } from "./catalog/pieceNames.js";
export { PieceCatalog, matchPieces, type PieceMatch } from "./catalog/pieceCatalog.js";

export { sharedFrameIndex, resolveEffectiveChildren } from "./anim/sharedAnimations.js";

export { FlattenWorkspace, flattenFrame, flattenTimeline, type FlattenVisitor } from "./flatten/flattenFrames.js";
export { frameZeroOrder, resolveDrawOrder, toTopFirst } from "./flatten/drawOrder.js";

export {
  buildKeyframeTracks,
  countUsage,
  presentFrames,
  selectLayerNames,
  type LayerMode,
  type MatrixComposer,
} from "./tracks/keyframeTracks.js";
export { DEFAULT_MAIN_LABEL, buildLabelSpans, labelStart, mainLabel } from "./tracks/labelSpans.js";

export {
  DEFAULT_DOCUMENT_SIZE,
  discoverFrames,
  loadAnimationDocument,
  parseAnimationDocument,
  type AnimationDocument,
} from "./load/animationDocument.js";

export { buildTimeline, type TimelineInput } from "./pipeline/buildTimeline.js";
export { buildIdentityTimeline } from "./pipeline/identityTimeline.js";
export { formatMissingWarning, formatUsageTrace } from "./pipeline/report.js";

export { resolveGlobalScale, resolveOptions, type TimelineOptions, type ResolvedTimelineOptions } from "./options.js";
export { createLogger, consoleSink, silentLogger, type Logger, type LogLevel, type LogSink } from "./log.js";
export { toPlainTimeline, type PlainTimelineV1, type StageSize } from "./pipeline/plainTimeline.js";
