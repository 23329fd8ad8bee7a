// src/interfaces.ts
// Shared record types for the flattening engine. Everything here is read-only once built,
// except the output tracks, which are handed over to whoever serializes them.

/** 2x3 affine matrix; x' = a*x + c*y + tx, y' = b*x + d*y + ty. */
export type Affine2D = Readonly<{
  a: number;
  b: number;
  c: number;
  d: number;
  tx: number;
  ty: number;
}>;

/** Color transform carried by a node. Only alpha takes part in composition. */
export type ColorTint = Readonly<{
  alphaMultiplier: number;
  redMultiplier: number;
  greenMultiplier: number;
  blueMultiplier: number;
}>;

export interface AnimNode {
  /** Empty for pure grouping nodes. */
  readonly name: string;
  readonly matrix: Affine2D;
  readonly color: ColorTint;
  readonly children: readonly AnimNode[];
  /** Key into the shared-animation table; absent when the node owns its sub-tree. */
  readonly sharedAnimationRef?: string;
}

/** One top-level animation sample. */
export interface AnimFrame {
  readonly children: readonly AnimNode[];
}

/** Frame of a shared loop. A missing `children` means "keep the referencing node's own". */
export interface SharedFrame {
  readonly children?: readonly AnimNode[];
}

export type Timeline = readonly AnimFrame[];

export type SharedAnimationTable = ReadonlyMap<string, readonly SharedFrame[]>;

export type PieceCatalogEntry = Readonly<{
  name: string;
  originX: number;
  originY: number;
  scaleX: number;
  scaleY: number;
}>;

/** label name -> 1-based frame number */
export type LabelTable = ReadonlyMap<string, number>;

/** raw (normalized) name -> catalog name */
export type AliasMap = ReadonlyMap<string, string>;

/** Maps an authored node name to its catalog piece name ("" when nothing is left). */
export type NameResolver = (rawName: string) => string;

export type FlatInstance = Readonly<{
  rawName: string;
  pieceName: string;
  worldMatrix: Affine2D;
  worldAlpha: number;
}>;

/** All instances of one outer frame, in traversal order. */
export type FlatFrame = readonly FlatInstance[];

export type KeyframeSlot =
  | Readonly<{ present: false }>
  | Readonly<{ present: true; matrix: Affine2D; alpha: number }>;

export interface KeyframeTrack {
  readonly pieceName: string;
  readonly slots: KeyframeSlot[];
}

export type LabelSpan = Readonly<{
  startFrame: number;
  durationFrames: number;
  name?: string;
}>;

export type PieceUsage = Readonly<{
  name: string;
  count: number;
  layered: boolean;
}>;

export type TimelineDiagnostics = Readonly<{
  usage: readonly PieceUsage[];
  unmatched: readonly string[];
}>;

export interface FlattenedTimeline {
  readonly frameCount: number;
  /** Layer names in stacking order (bottom-first unless built with `topFirst`). */
  readonly layers: readonly string[];
  readonly tracks: ReadonlyMap<string, KeyframeTrack>;
  readonly labelSpans: readonly LabelSpan[];
  readonly mainLabel: string;
  readonly diagnostics: TimelineDiagnostics;
}

export type TimelineErrorCode = "no-frames";

export type TimelineError = Readonly<{
  code: TimelineErrorCode;
  message: string;
}>;

export type TimelineResult =
  | Readonly<{ ok: true; value: FlattenedTimeline }>
  | Readonly<{ ok: false; error: TimelineError }>;
