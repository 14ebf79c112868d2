import fs from "fs";
import path from "path";
import type { GroupingProposal, LetterOutcome, ModelImage, Reconciliation, TextModel } from "@/types";
import { assembleLetters, collectionNameFor } from "@/lib/assemble";
import { ConfigurationError, MalformedResponseError, errorMessage } from "@/lib/errors";
import { parseGroupingResponse } from "@/lib/grouping";
import { buildGroupingPayload } from "@/lib/groupingPrompt";
import { transcribeMissingPages } from "@/lib/ocr";
import { loadPages } from "@/lib/pages";
import { reconcileGroups } from "@/lib/reconcile";
import { writeJson } from "@/lib/utils";

// ── Letters stage ───────────────────────────────────────────────────────────
// (OCR of missing pages) → pages on disk → grouping payload →
// model (or replayed grouping) → validated proposal → reconciliation →
// letter folders.

export const GROUPING_INPUT_FILE = "llm_grouping_input.txt";
export const GROUPING_RESPONSE_FILE = "llm_grouping.json";
export const GROUPING_ERROR_FILE = "llm_grouping_error.json";

export interface LetterStageOptions {
  pagesDir: string;
  lettersDir: string;
  translationDir?: string;
  /** Required unless a previous grouping is replayed without OCR. */
  model?: TextModel;
  /** Scans to transcribe into pagesDir before grouping, where page text is missing. */
  ocrImagesDir?: string;
  loadImage?: (imagePath: string) => Promise<ModelImage>;
  reuseGrouping?: boolean;
  saveInput?: boolean;
  /** Base for recorded source paths (default: process.cwd()). */
  relativeTo?: string;
  collection?: string;
}

export type LetterStageResult =
  | { status: "no-pages" }
  | { status: "malformed-grouping"; error: string; errorFile: string }
  | {
      status: "assembled";
      proposal: GroupingProposal;
      reconciliation: Reconciliation;
      outcomes: LetterOutcome[];
      reusedGrouping: boolean;
    };

async function obtainGrouping(
  payload: string,
  options: LetterStageOptions,
  pageCount: number,
): Promise<{ raw: string; reused: boolean }> {
  const responsePath = path.join(options.lettersDir, GROUPING_RESPONSE_FILE);
  if (options.reuseGrouping && fs.existsSync(responsePath)) {
    console.log(`  Reusing existing grouping JSON: ${responsePath}`);
    return { raw: fs.readFileSync(responsePath, "utf-8"), reused: true };
  }
  if (!options.model) {
    throw new ConfigurationError(`No model configured and no grouping to reuse at ${responsePath}`);
  }

  console.log(`  Submitting ${pageCount} pages for grouping...`);
  const response = await options.model({ prompt: payload, maxTokens: 8192, temperature: 0.3 });
  fs.writeFileSync(responsePath, response.text, "utf-8");
  console.log(`  Saved grouping JSON to: ${responsePath}`);
  return { raw: response.text, reused: false };
}

function logReconciliation(reconciliation: Reconciliation): void {
  const { report } = reconciliation;
  for (const { groupId, reference } of report.unresolved) {
    console.log(`  Warning: ${groupId}: page "${reference}" not found; dropped`);
  }
  for (const { prefix, keys } of report.ambiguousPrefixes) {
    console.log(`  Warning: prefix "${prefix}" matches ${keys.length} pages (${keys.join(", ")}); used the last`);
  }
  if (report.multiplyAssigned.length) {
    console.log(`  Warning: pages in more than one letter: ${report.multiplyAssigned.join(", ")}`);
  }
  if (report.unreferenced.length) {
    console.log(`  Note: ${report.unreferenced.length} page(s) neither grouped nor listed as unassigned`);
  }
}

/**
 * Run grouping and assembly for one collection. Collaborator errors propagate
 * to the caller; malformed grouping output is persisted and reported instead.
 */
export async function runLetterStage(options: LetterStageOptions): Promise<LetterStageResult> {
  if (options.ocrImagesDir) {
    if (!options.model) throw new ConfigurationError("OCR of missing pages needs a model configured");
    const ocr = await transcribeMissingPages(options.ocrImagesDir, options.pagesDir, {
      model: options.model,
      loadImage: options.loadImage,
    });
    console.log(`  OCR: ${ocr.transcribed} transcribed, ${ocr.skipped} already present, ${ocr.failed} failed`);
  }

  const { pages, skipped, collisions } = loadPages(options.pagesDir, {
    translationDir: options.translationDir,
    relativeTo: options.relativeTo,
  });
  if (skipped.length) console.log(`  Skipped ${skipped.length} unreadable file(s)`);
  for (const key of collisions) {
    console.log(`  Warning: several files map to page key "${key}"; kept the last`);
  }
  if (pages.length === 0) {
    console.log(`  No page text files found in ${options.pagesDir}`);
    return { status: "no-pages" };
  }
  console.log(`  Loaded ${pages.length} pages`);

  fs.mkdirSync(options.lettersDir, { recursive: true });
  const payload = buildGroupingPayload(pages);
  if (options.saveInput) {
    fs.writeFileSync(path.join(options.lettersDir, GROUPING_INPUT_FILE), payload, "utf-8");
  }

  const { raw, reused } = await obtainGrouping(payload, options, pages.length);

  let proposal: GroupingProposal;
  try {
    proposal = parseGroupingResponse(raw);
  } catch (err) {
    if (!(err instanceof MalformedResponseError)) throw err;
    const errorFile = path.join(options.lettersDir, GROUPING_ERROR_FILE);
    writeJson(errorFile, { error: err.message, raw_response_preview: raw.slice(0, 2000) });
    console.error(`  Error parsing grouping JSON: ${errorMessage(err)} (details in ${errorFile})`);
    return { status: "malformed-grouping", error: err.message, errorFile };
  }
  fs.rmSync(path.join(options.lettersDir, GROUPING_ERROR_FILE), { force: true });
  console.log(`  Grouping: ${proposal.groups.length} letters, ${proposal.unassigned.length} unassigned pages`);

  const reconciliation = reconcileGroups(proposal, pages);
  logReconciliation(reconciliation);

  const collection = options.collection ?? collectionNameFor(options.lettersDir);
  const outcomes = assembleLetters(reconciliation.groups, options.lettersDir, collection);
  const written = outcomes.filter((o) => o.written).length;
  console.log(`  Assembled ${written}/${outcomes.length} letters under: ${options.lettersDir}`);

  return { status: "assembled", proposal, reconciliation, outcomes, reusedGrouping: reused };
}
