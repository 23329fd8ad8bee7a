// src/catalog/pieceNames.ts
// Authored part name -> catalog piece name. Pure string work, no catalog access.

import type { AliasMap } from "../interfaces.js";

const IMAGE_EXT = /\.(png|jpe?g|gif|webp|bmp|tga)$/i;

/** Trims, drops any path prefix (either separator) and a trailing image extension. */
export function normalizePieceName(raw: string | null | undefined): string {
  if (!raw) return "";
  let n = raw.trim();
  const cut = Math.max(n.lastIndexOf("/"), n.lastIndexOf("\\"));
  if (cut >= 0) n = n.slice(cut + 1);
  n = n.replace(IMAGE_EXT, "");
  return n.trim();
}

export function resolvePieceName(raw: string | null | undefined, aliases?: AliasMap): string {
  const n = normalizePieceName(raw);
  if (!n || !aliases) return n;
  return aliases.get(n) ?? n;
}

/**
 * Parses `from=to` pairs; both sides are normalized. Entries without `=` or with an
 * empty side are skipped. Later pairs override earlier ones.
 */
export function parseAliasPairs(pairs: Iterable<string>): Map<string, string> {
  const out = new Map<string, string>();
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq < 0) continue;
    const from = normalizePieceName(pair.slice(0, eq));
    const to = normalizePieceName(pair.slice(eq + 1));
    if (from && to) out.set(from, to);
  }
  return out;
}

export function normalizeAllowList(names: Iterable<string>): Set<string> {
  const out = new Set<string>();
  for (const n of names) {
    const norm = normalizePieceName(n);
    if (norm) out.add(norm);
  }
  return out;
}
