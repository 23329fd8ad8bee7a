// src/options.ts

import type { AliasMap } from "./interfaces.js";
import type { LayerMode } from "./tracks/keyframeTracks.js";
import { silentLogger, type Logger } from "./log.js";

export type TimelineOptions = Readonly<{
  /** normalized authored name -> catalog name */
  aliases?: AliasMap;
  /** Which pieces get a layer. Default "used". */
  layers?: LayerMode;
  /** Uniform factor applied to every instance matrix after origin/scale. Default 1. */
  globalScale?: number;
  /** List layers topmost-first instead of bottom-first. Default false. */
  topFirst?: boolean;
  /** Log drawn names that have no catalog piece. Default false. */
  reportMissing?: boolean;
  /** Log per-piece usage and whether it got a layer. Default false. */
  traceNames?: boolean;
  /** Skip origin/scale composition and keep raw world matrices. Default false. */
  rawWorldMatrices?: boolean;
  logger?: Logger;
}>;

export type ResolvedTimelineOptions = Readonly<{
  aliases: AliasMap;
  layers: LayerMode;
  globalScale: number;
  topFirst: boolean;
  reportMissing: boolean;
  traceNames: boolean;
  rawWorldMatrices: boolean;
  logger: Logger;
}>;

/** Any finite factor applies, zero and negative included; NaN and infinities fall back to 1. */
export function resolveGlobalScale(g: number | undefined, logger: Logger = silentLogger): number {
  if (g === undefined) return 1;
  if (Number.isFinite(g)) return g;
  logger.warn(`ignoring global scale ${g}; using 1`);
  return 1;
}

export function resolveOptions(opts: TimelineOptions = {}): ResolvedTimelineOptions {
  const logger = opts.logger ?? silentLogger;

  return {
    aliases: opts.aliases ?? new Map<string, string>(),
    layers: opts.layers ?? "used",
    globalScale: resolveGlobalScale(opts.globalScale, logger),
    topFirst: opts.topFirst ?? false,
    reportMissing: opts.reportMissing ?? false,
    traceNames: opts.traceNames ?? false,
    rawWorldMatrices: opts.rawWorldMatrices ?? false,
    logger,
  };
}
