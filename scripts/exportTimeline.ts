#!/usr/bin/env node
// scripts/exportTimeline.ts
//
// Headless export of an animation JSON document to a flattened timeline JSON.
// Run after `npm run build`:
//   node dist/scripts/exportTimeline.js <animation.json> [out.json]
// Output defaults to <input>.timeline.json next to the input.

import { readFileSync, writeFileSync, mkdirSync } from "node:fs";
import { dirname, resolve, basename, extname } from "node:path";

import { parseAnimationDocument } from "../src/load/animationDocument.js";
import { buildTimeline } from "../src/pipeline/buildTimeline.js";
import { buildIdentityTimeline } from "../src/pipeline/identityTimeline.js";
import { toPlainTimeline } from "../src/pipeline/plainTimeline.js";
import type { FlattenedTimeline } from "../src/interfaces.js";
import { createLogger } from "../src/log.js";

const log = createLogger();

function defaultOutput(input: string) {
  return resolve(dirname(input), `${basename(input, extname(input))}.timeline.json`);
}

async function main() {
  const [inputArg, outputArg] = process.argv.slice(2);
  if (!inputArg) {
    throw new Error("usage: exportTimeline <animation.json> [out.json]");
  }
  const input = resolve(inputArg);
  const output = outputArg ? resolve(outputArg) : defaultOutput(input);

  const doc = parseAnimationDocument(readFileSync(input, "utf-8"));
  log.info(`frames: ${doc.timeline.length} (at ${doc.framesPath || "-"})  labels: ${doc.labels.size}  catalog: ${doc.catalog.size}`);

  let timeline: FlattenedTimeline;
  const result = buildTimeline(doc, { reportMissing: true, logger: log });
  if (result.ok) {
    timeline = result.value;
  } else {
    log.warn(`${result.error.message}; writing identity timeline (all pieces at registration point)`);
    timeline = buildIdentityTimeline(doc.catalog, undefined, log);
  }

  mkdirSync(dirname(output), { recursive: true });
  writeFileSync(output, JSON.stringify(toPlainTimeline(timeline, { width: doc.width, height: doc.height }), null, 2));
  log.info(`timeline written to ${output}`);
}

main().catch((err) => {
  log.error("Timeline export failed:", err);
  process.exitCode = 1;
});
