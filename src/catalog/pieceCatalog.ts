// src/catalog/pieceCatalog.ts

import type { PieceCatalogEntry } from "../interfaces.js";

export type PieceMatch = Readonly<{
  matched: string[];
  /** Sorted, de-duplicated. */
  unmatched: string[];
}>;

/**
 * Ordered, keyed view over the exportable pieces. Order is first-seen; when a name
 * is listed twice the later record wins for lookup.
 */
export class PieceCatalog {
  private readonly byName = new Map<string, PieceCatalogEntry>();
  private readonly ordered: string[] = [];

  constructor(entries: Iterable<PieceCatalogEntry> = []) {
    for (const e of entries) {
      if (!e.name) continue;
      if (!this.byName.has(e.name)) this.ordered.push(e.name);
      this.byName.set(e.name, e);
    }
  }

  static fromNames(names: Iterable<string>): PieceCatalog {
    const entries: PieceCatalogEntry[] = [];
    for (const name of names) entries.push({ name, originX: 0, originY: 0, scaleX: 1, scaleY: 1 });
    return new PieceCatalog(entries);
  }

  get size(): number {
    return this.ordered.length;
  }

  /** Names in catalog order. */
  get names(): readonly string[] {
    return this.ordered;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): PieceCatalogEntry | undefined {
    return this.byName.get(name);
  }

  /** Position in catalog order, -1 when absent. */
  indexOf(name: string): number {
    return this.ordered.indexOf(name);
  }
}

export function matchPieces(names: Iterable<string>, catalog: PieceCatalog): PieceMatch {
  const matched: string[] = [];
  const unmatched = new Set<string>();
  for (const n of names) {
    if (!n) continue;
    if (catalog.has(n)) {
      if (!matched.includes(n)) matched.push(n);
    } else {
      unmatched.add(n);
    }
  }
  return { matched, unmatched: Array.from(unmatched).sort() };
}
