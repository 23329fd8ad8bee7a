// src/pipeline/report.ts
// Text renderings of the non-fatal diagnostics.

import type { PieceUsage } from "../interfaces.js";

export const MISSING_PREVIEW = 20;

/** One warning line for unmatched names, or undefined when there are none. */
export function formatMissingWarning(unmatched: readonly string[], limit = MISSING_PREVIEW): string | undefined {
  if (unmatched.length === 0) return undefined;
  const shown = unmatched.slice(0, limit).join(", ");
  const more = unmatched.length > limit ? " ..." : "";
  return `names in frames but not in catalog (after normalization/alias): ${shown}${more}`;
}

export function formatUsageTrace(usage: readonly PieceUsage[]): string[] {
  const lines = ["piece usage (occurrences) -> layered?:"];
  for (const u of usage) {
    lines.push(`  ${u.name.padEnd(35)} ${String(u.count).padStart(5)}  ${u.layered ? "YES" : "no"}`);
  }
  return lines;
}

/** Usage rows for every catalog or drawn name, sorted by name. */
export function usageRows(
  catalogNames: Iterable<string>,
  counts: ReadonlyMap<string, number>,
  layered: ReadonlySet<string>
): PieceUsage[] {
  const names = new Set<string>(catalogNames);
  for (const n of counts.keys()) names.add(n);
  return Array.from(names)
    .sort()
    .map((name) => ({ name, count: counts.get(name) ?? 0, layered: layered.has(name) }));
}
