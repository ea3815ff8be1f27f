/**
 * Replay script: feed a recorded recognizer stream through the router
 *
 * Each line of the input file is one JSON message: either a result message
 * (with "tokens" or "error_code") or a single token.
 *
 * Usage:
 *   npm run replay -- <file.jsonl> [--primary=en] [--secondary=te] [--require-translation]
 *
 * Options:
 *   --primary              Doctor language (default: TRANSCRIPT_PRIMARY_LANGUAGE or en)
 *   --secondary            Patient language (default: TRANSCRIPT_SECONDARY_LANGUAGE or te)
 *   --require-translation  Fail instead of switching to same-language mode
 */

import { readFile } from "node:fs/promises";
import { initMonitoring } from "../src/lib/monitoring";
import { loadRouterConfig } from "../src/lib/transcript/transcript-config";
import { TranscriptRouter } from "../src/lib/transcript/transcript-router";
import { parseErrorMessage } from "../src/lib/utils";

// Parse command line arguments
const args = process.argv.slice(2);
const inputPath = args.find(a => !a.startsWith("--"));
const primaryArg = args.find(a => a.startsWith("--primary="));
const secondaryArg = args.find(a => a.startsWith("--secondary="));
const requireTranslation = args.includes("--require-translation");

if (!inputPath) {
  console.error("Error: Missing input file");
  console.error("Usage: npm run replay -- <file.jsonl> [--primary=en] [--secondary=te] [--require-translation]");
  process.exit(1);
}

function isResultMessage(message: unknown): boolean {
  return typeof message === "object" && message !== null && ("tokens" in message || "error_code" in message || "response" in message);
}

async function replayTranscript(path: string) {
  initMonitoring();

  const config = loadRouterConfig();
  const router = new TranscriptRouter({
    config,
    callbacks: {
      onSpeakerRegistered: (hint, label) => console.log(`Speaker ${hint} -> ${label}`),
      onLineFinalized: (view, line) => console.log(`[${view}] ${line.speaker}: ${line.text}`),
    },
  });
  router.configure(
    primaryArg ? primaryArg.split("=")[1] : config.primaryLanguage,
    secondaryArg ? secondaryArg.split("=")[1] : config.secondaryLanguage,
    { requireTranslation: requireTranslation || config.requireTranslation }
  );

  const content = await readFile(path, "utf8");
  const lines = content.split(/\r?\n/).filter(line => line.trim());

  let skipped = 0;
  for (const [index, line] of lines.entries()) {
    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch (error) {
      console.warn(`Line ${index + 1}: invalid JSON (${parseErrorMessage(error)})`);
      skipped++;
      continue;
    }

    if (isResultMessage(message)) {
      router.processResult(message);
    } else if (!router.processToken(message)) {
      skipped++;
    }
  }

  const snapshot = router.finish();

  console.log("");
  console.log("=".repeat(60));
  console.log(`Replayed ${lines.length} lines (${skipped} skipped), mode: ${router.getMode()}`);
  console.log("=".repeat(60));
  console.log(JSON.stringify({ snapshot, speakers: router.getSpeakers(), entries: router.exportEntries() }, null, 2));
}

// Run the script
replayTranscript(inputPath).catch(error => {
  console.error("Fatal error:", error);
  process.exit(1);
});
