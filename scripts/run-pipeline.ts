/**
 * run-pipeline.ts
 *
 * Runs the corpus pipeline stages over one collection folder:
 *   natives   → per-workbook JSON analyses of Excel spreadsheets
 *   images    → per-image JSON analyses
 *   text      → per-file "_extraction.json" records
 *   letters   → optional OCR of missing pages, then model grouping of pages,
 *               reconciled and written as letter folders
 *   translate → en.txt beside each assembled letter
 *   summary   → corpus aggregation and the README strategic summary
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts --base ./collection --process letters
 *   npx tsx scripts/run-pipeline.ts --base ./collection --process all --skip-existing
 *
 * Requires ANTHROPIC_API_KEY in .env or the environment; only a letters run
 * that replays a saved grouping can do without it.
 */

import "dotenv/config";
import path from "path";
import { createClaudeModel, UsageTracker } from "../src/lib/claude.js";
import { loadConfig, requireApiKey } from "../src/lib/config.js";
import type { PipelineConfig } from "../src/lib/config.js";
import { ConfigurationError } from "../src/lib/errors.js";
import { runImageAnalysis } from "../src/lib/analyzeImages.js";
import { runNativesAnalysis } from "../src/lib/natives.js";
import { runTextExtraction } from "../src/lib/extractText.js";
import { runLetterStage } from "../src/lib/letters.js";
import { isStage, needsModel, STAGES } from "../src/lib/stages.js";
import type { Stage } from "../src/lib/stages.js";
import { translateLetters } from "../src/lib/translate.js";
import { runSummaryStage } from "../src/lib/summary.js";
import { fmtMs, fmtUsd, isDirectory } from "../src/lib/utils.js";
import type { TextModel } from "../src/types/index.js";

// ── CLI ─────────────────────────────────────────────────────────────────────

interface CliArgs {
  base: string;
  imagesDir: string;
  nativesDir: string;
  textDir: string;
  pagesDir: string;
  translationsDir?: string;
  lettersDir: string;
  stages: Stage[];
  reuseGrouping: boolean;
  saveInput: boolean;
  runOcr: boolean;
  skipExisting: boolean;
  forceTranslate: boolean;
  limit?: number;
  saveSnapshot: boolean;
}

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith("--")) {
    console.error(`Error: ${flag} requires a value.`);
    process.exit(1);
  }
  return value;
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  let base = ".";
  let imagesDir = "";
  let nativesDir = "";
  let textDir = "";
  let pagesDir = "";
  let translationsDir: string | undefined;
  let lettersDir = "";
  const stages = new Set<Stage>();
  let reuseGrouping = false;
  let saveInput = false;
  let runOcr = false;
  let skipExisting = false;
  let forceTranslate = false;
  let limit: number | undefined;
  let saveSnapshot = false;

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    switch (flag) {
      case "--base":
        base = requireValue(args, ++i, flag);
        break;
      case "--images-dir":
        imagesDir = requireValue(args, ++i, flag);
        break;
      case "--natives-dir":
        nativesDir = requireValue(args, ++i, flag);
        break;
      case "--text-dir":
        textDir = requireValue(args, ++i, flag);
        break;
      case "--pages-dir":
        pagesDir = requireValue(args, ++i, flag);
        break;
      case "--translations-dir":
        translationsDir = requireValue(args, ++i, flag);
        break;
      case "--letters-dir":
        lettersDir = requireValue(args, ++i, flag);
        break;
      case "--process": {
        const value = requireValue(args, ++i, flag);
        if (value === "all") {
          for (const s of STAGES) stages.add(s);
        } else if (isStage(value)) {
          stages.add(value);
        } else {
          console.error(`Error: --process must be one of ${STAGES.join(", ")}, all.`);
          process.exit(1);
        }
        break;
      }
      case "--reuse-grouping":
        reuseGrouping = true;
        break;
      case "--save-input":
        saveInput = true;
        break;
      case "--run-ocr":
        runOcr = true;
        break;
      case "--skip-existing":
        skipExisting = true;
        break;
      case "--force-translate":
        forceTranslate = true;
        break;
      case "--limit": {
        const n = parseInt(requireValue(args, ++i, flag), 10);
        if (!Number.isInteger(n) || n < 1) {
          console.error("Error: --limit must be a positive integer.");
          process.exit(1);
        }
        limit = n;
        break;
      }
      case "--save-snapshot":
        saveSnapshot = true;
        break;
      case "--help":
        console.log(`Usage:
  npx tsx scripts/run-pipeline.ts --base <dir> --process <stage> [options]

Stages (repeatable; default: all):
  --process natives    Analyze Excel spreadsheets into per-workbook JSON
  --process images     Analyze scanned images into per-image JSON
  --process text       Extract structured JSON from text files
  --process letters    Group pages into letters and write letter folders
  --process translate  Translate assembled letters to English (en.txt)
  --process summary    Aggregate all JSON and update README.md
  --process all        Every stage above, in that order

Directories:
  --base <dir>              Collection folder (default: .)
  --images-dir <dir>        Images (default: <base>/IMAGES)
  --natives-dir <dir>       Excel spreadsheets (default: <base>/NATIVES)
  --text-dir <dir>          Text files (default: <base>/TEXT)
  --pages-dir <dir>         Page text for grouping (default: <base>/pages)
  --translations-dir <dir>  "<key>_english.txt" files sent alongside page text
  --letters-dir <dir>       Letter output (default: <base>/letters)

Options:
  --reuse-grouping   Reuse letters/llm_grouping.json instead of calling the model
  --save-input       Save the grouping request as llm_grouping_input.txt
  --run-ocr          Transcribe images with no page text into the pages dir before grouping
  --skip-existing    Skip spreadsheets/images/text files whose JSON output already exists
  --force-translate  Re-translate letters that already have en.txt
  --limit <n>        Analyze at most n images
  --save-snapshot    Write the aggregated snapshot to <base>/pipeline/
  --help             Show this help

Environment:
  ANTHROPIC_API_KEY        Required, except for a letters run with --reuse-grouping
  PIPELINE_MODEL           Claude model (default: claude-sonnet-4-20250514)
  PIPELINE_MAX_RETRIES     Rate-limit retries per call (default: 3)
  PIPELINE_RETRY_BASE_MS   First rate-limit wait, doubled each retry (default: 60000)`);
        process.exit(0);
      default:
        console.error(`Error: unknown argument "${flag}". Run with --help for usage.`);
        process.exit(1);
    }
  }

  return {
    base,
    imagesDir: imagesDir || path.join(base, "IMAGES"),
    nativesDir: nativesDir || path.join(base, "NATIVES"),
    textDir: textDir || path.join(base, "TEXT"),
    pagesDir: pagesDir || path.join(base, "pages"),
    translationsDir,
    lettersDir: lettersDir || path.join(base, "letters"),
    stages: stages.size ? STAGES.filter((s) => stages.has(s)) : [...STAGES],
    reuseGrouping,
    saveInput,
    runOcr,
    skipExisting,
    forceTranslate,
    limit,
    saveSnapshot,
  };
}

// ── Stages ──────────────────────────────────────────────────────────────────

/** Input directory each stage needs; a missing one skips the stage. */
function inputDirFor(stage: Stage, args: CliArgs): string {
  switch (stage) {
    case "images":
      return args.imagesDir;
    case "natives":
      return args.nativesDir;
    case "text":
      return args.textDir;
    case "letters":
      return args.runOcr ? args.imagesDir : args.pagesDir;
    case "translate":
      return args.lettersDir;
    case "summary":
      return args.base;
  }
}

async function runStage(stage: Stage, args: CliArgs, config: PipelineConfig, model: TextModel | undefined) {
  switch (stage) {
    case "images": {
      if (!model) return;
      const result = await runImageAnalysis(args.imagesDir, {
        model,
        modelName: config.model,
        skipExisting: args.skipExisting,
        limit: args.limit,
      });
      console.log(`  Images: ${result.processed} analyzed, ${result.skipped} skipped, ${result.failed} failed`);
      return;
    }
    case "natives": {
      if (!model) return;
      const result = await runNativesAnalysis(args.nativesDir, {
        model,
        modelName: config.model,
        skipExisting: args.skipExisting,
      });
      console.log(`  Natives: ${result.processed} analyzed, ${result.skipped} skipped, ${result.failed} failed`);
      return;
    }
    case "text": {
      if (!model) return;
      const result = await runTextExtraction(args.textDir, {
        model,
        modelName: config.model,
        skipExisting: args.skipExisting,
      });
      console.log(`  Text: ${result.processed} extracted, ${result.skipped} skipped, ${result.failed} failed`);
      return;
    }
    case "letters": {
      const result = await runLetterStage({
        pagesDir: args.pagesDir,
        lettersDir: args.lettersDir,
        translationDir: args.translationsDir,
        model,
        reuseGrouping: args.reuseGrouping,
        saveInput: args.saveInput,
        ocrImagesDir: args.runOcr ? args.imagesDir : undefined,
      });
      if (result.status === "malformed-grouping") {
        console.log(`  Letters: grouping unusable; see ${result.errorFile}`);
      }
      return;
    }
    case "translate": {
      if (!model) return;
      const result = await translateLetters(args.lettersDir, { model, force: args.forceTranslate });
      console.log(`  Translate: ${result.translated} translated, ${result.skipped} skipped, ${result.failed} failed`);
      return;
    }
    case "summary":
      if (!model) return;
      await runSummaryStage({ baseDir: args.base, model, saveSnapshot: args.saveSnapshot });
      return;
  }
}

// ── Main ────────────────────────────────────────────────────────────────────

async function main() {
  const args = parseArgs();
  const t0 = Date.now();

  let config: PipelineConfig;
  try {
    config = loadConfig();
    if (needsModel(args.stages, { reuseGrouping: args.reuseGrouping, runOcr: args.runOcr })) {
      requireApiKey(config);
    }
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const tracker = new UsageTracker();
  const model = config.apiKey ? createClaudeModel(config, { tracker }) : undefined;

  console.log(`\n  Corpus Pipeline`);
  console.log(`  ===============`);
  console.log(`  Base:   ${args.base}`);
  console.log(`  Stages: ${args.stages.join(", ")}`);
  console.log(`  Model:  ${model ? config.model : "(none)"}`);
  console.log();

  for (const stage of args.stages) {
    console.log(`\n[${stage[0].toUpperCase()}${stage.slice(1)}]`);
    const dir = inputDirFor(stage, args);
    if (!isDirectory(dir)) {
      console.log(`  Directory not found: ${dir}; skipping`);
      continue;
    }
    await runStage(stage, args, config, model);
  }

  console.log(`
  ══════════════════════════════════════
  DONE in ${fmtMs(Date.now() - t0)}
  API calls:     ${tracker.calls}
  Input tokens:  ${tracker.inputTokens.toLocaleString()}
  Output tokens: ${tracker.outputTokens.toLocaleString()}
  Est. cost:     ${fmtUsd(tracker.costUsd)}
  ══════════════════════════════════════
`);
}

main().catch((err) => {
  console.error("\nFatal error:", err);
  process.exit(1);
});
