/**
 * group-letters.ts
 *
 * Letters stage only: loads page text, asks the model how the pages group
 * into letters, reconciles the answer against the pages on disk and writes
 * one folder per letter.
 *
 * Usage:
 *   npx tsx scripts/group-letters.ts --pages-dir ./collection/pages --letters-dir ./collection/letters
 *   npx tsx scripts/group-letters.ts --letters-dir ./collection/letters --reuse-grouping
 *   npx tsx scripts/group-letters.ts --base ./collection --run-ocr --images-dir ./collection/IMAGES
 */

import "dotenv/config";
import path from "path";
import { createClaudeModel, UsageTracker } from "../src/lib/claude.js";
import { loadConfig, requireApiKey } from "../src/lib/config.js";
import { ConfigurationError } from "../src/lib/errors.js";
import { runLetterStage } from "../src/lib/letters.js";
import { fmtMs, fmtUsd, isDirectory } from "../src/lib/utils.js";
import type { TextModel } from "../src/types/index.js";

interface CliArgs {
  pagesDir: string;
  lettersDir: string;
  translationsDir?: string;
  collection?: string;
  reuseGrouping: boolean;
  saveInput: boolean;
  ocrImagesDir?: string;
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  let base = ".";
  let pagesDir = "";
  let lettersDir = "";
  let translationsDir: string | undefined;
  let collection: string | undefined;
  let reuseGrouping = false;
  let saveInput = false;
  let runOcr = false;
  let imagesDir: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const next = () => {
      const value = args[++i];
      if (value === undefined) {
        console.error(`Error: ${flag} requires a value.`);
        process.exit(1);
      }
      return value;
    };
    switch (flag) {
      case "--base":
        base = next();
        break;
      case "--pages-dir":
        pagesDir = next();
        break;
      case "--letters-dir":
        lettersDir = next();
        break;
      case "--translations-dir":
        translationsDir = next();
        break;
      case "--collection":
        collection = next();
        break;
      case "--reuse-grouping":
        reuseGrouping = true;
        break;
      case "--save-input":
        saveInput = true;
        break;
      case "--run-ocr":
        runOcr = true;
        break;
      case "--images-dir":
        imagesDir = next();
        break;
      case "--help":
        console.log(`Usage:
  npx tsx scripts/group-letters.ts [--base <dir>] [options]

Options:
  --base <dir>              Collection folder (default: .)
  --pages-dir <dir>         Page text files (default: <base>/pages)
  --letters-dir <dir>       Output folder (default: <base>/letters)
  --translations-dir <dir>  "<key>_english.txt" files sent alongside page text
  --collection <name>       Letter folder prefix (default: name of the letters dir's parent)
  --reuse-grouping          Reuse <letters-dir>/llm_grouping.json if present
  --save-input              Save the grouping request as llm_grouping_input.txt
  --run-ocr                 Transcribe scans that have no page text yet (needs --images-dir)
  --images-dir <dir>        Page scans (.jpg, .jpeg, .png) for --run-ocr`);
        process.exit(0);
      default:
        console.error(`Error: unknown argument "${flag}". Run with --help for usage.`);
        process.exit(1);
    }
  }

  if (runOcr && !imagesDir) {
    console.error("Error: --run-ocr requires --images-dir.");
    process.exit(1);
  }

  return {
    pagesDir: pagesDir || path.join(base, "pages"),
    lettersDir: lettersDir || path.join(base, "letters"),
    translationsDir,
    collection,
    reuseGrouping,
    saveInput,
    ocrImagesDir: runOcr ? imagesDir : undefined,
  };
}

async function main() {
  const args = parseArgs();
  const t0 = Date.now();

  if (args.ocrImagesDir && !isDirectory(args.ocrImagesDir)) {
    console.error(`Error: images directory not found: ${args.ocrImagesDir}`);
    process.exit(1);
  }
  if (!args.ocrImagesDir && !isDirectory(args.pagesDir)) {
    console.error(`Error: pages directory not found: ${args.pagesDir}`);
    process.exit(1);
  }

  const config = loadConfig();
  const tracker = new UsageTracker();
  let model: TextModel | undefined;
  if (config.apiKey || !args.reuseGrouping || args.ocrImagesDir) {
    requireApiKey(config);
    model = createClaudeModel(config, { tracker });
  }

  console.log(`\n[Letters] ${args.pagesDir} → ${args.lettersDir}`);
  const result = await runLetterStage({
    pagesDir: args.pagesDir,
    lettersDir: args.lettersDir,
    translationDir: args.translationsDir,
    collection: args.collection,
    model,
    reuseGrouping: args.reuseGrouping,
    saveInput: args.saveInput,
    ocrImagesDir: args.ocrImagesDir,
  });

  console.log(`
  DONE in ${fmtMs(Date.now() - t0)}
  Status:        ${result.status}
  API calls:     ${tracker.calls}
  Est. cost:     ${fmtUsd(tracker.costUsd)}
`);
  if (result.status === "malformed-grouping") process.exit(1);
}

main().catch((err) => {
  if (err instanceof ConfigurationError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error("\nFatal error:", err);
  }
  process.exit(1);
});
