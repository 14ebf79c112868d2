import fs from "fs";
import path from "path";
import type { AggregatedSnapshot, TextModel } from "@/types";
import { aggregateCorpus, snapshotToJson } from "@/lib/aggregate";
import { STRATEGIC_SUMMARY_PROMPT } from "@/lib/analysisPrompts";
import { stripMarkdownFences } from "@/lib/claude";
import { errorMessage } from "@/lib/errors";
import { writeJson } from "@/lib/utils";

export const NO_DOCUMENTS_SUMMARY =
  "No documents have been processed yet. Summary will appear as processing begins.";

export const SUMMARY_HEADING = "### Latest Context Update";
const STATUS_LINE = "**Status:** Processing";

function jsonList(values: readonly unknown[], limit: number): string {
  return values.length ? JSON.stringify(values.slice(0, limit), null, 2) : "[]";
}

/** Strategic-summary request: instructions plus an excerpt of the snapshot. */
export function buildSummaryPrompt(snapshot: AggregatedSnapshot): string {
  return `${STRATEGIC_SUMMARY_PROMPT}

AGGREGATED DATA FROM ALL PROCESSED DOCUMENTS:

Total Documents Analyzed: ${snapshot.totalDocuments}

Named Individuals Found: ${snapshot.namedIndividuals.length}
${jsonList(snapshot.namedIndividuals, 50)}

Organizations Found: ${snapshot.organizations.length}
${jsonList(snapshot.organizations, 30)}

Locations Identified: ${snapshot.locations.length}
${jsonList(snapshot.locations, 30)}

Document Types:
${JSON.stringify(snapshot.documentTypeCounts, null, 2)}

Sample Document Data (for context):
${JSON.stringify(snapshot.samples.slice(0, 10), null, 2)}

Now create the strategic summary as specified above. Focus on newsworthiness, named individuals, and explosive findings.`;
}

/** Status report used whenever the model cannot produce the summary. */
export function fallbackSummary(snapshot: AggregatedSnapshot): string {
  return `### Processing Status

- Total documents analyzed: ${snapshot.totalDocuments}
- Named individuals identified: ${snapshot.namedIndividuals.length}
- Organizations found: ${snapshot.organizations.length}
- Document types: ${Object.keys(snapshot.documentTypeCounts).join(", ")}

(Strategic analysis temporarily unavailable - processing continues)`;
}

/**
 * Ask the model for the strategic summary. Never throws: an empty corpus
 * short-circuits without a call, and any failure yields fallbackSummary().
 */
export async function generateSummary(snapshot: AggregatedSnapshot, model: TextModel): Promise<string> {
  if (snapshot.totalDocuments === 0) return NO_DOCUMENTS_SUMMARY;

  try {
    console.log(`  Sending aggregated data from ${snapshot.totalDocuments} documents to the model...`);
    const { text } = await model({ prompt: buildSummaryPrompt(snapshot), maxTokens: 4096 });
    const summary = stripMarkdownFences(text);
    if (!summary) {
      console.log("  Warning: model returned an empty summary; using fallback report");
      return fallbackSummary(snapshot);
    }
    console.log(`  Received strategic summary (${summary.length} chars)`);
    return summary;
  } catch (err) {
    console.log(`  Warning: summary request failed: ${errorMessage(err)}`);
    return fallbackSummary(snapshot);
  }
}

// ── README section ──────────────────────────────────────────────────────────

/**
 * Put `summary` under the "Latest Context Update" heading: replace the
 * section body if present, else add the section after the status line, else
 * append it.
 */
export function replaceSummarySection(content: string, summary: string): string {
  const pattern = /(### Latest Context Update\n\n)([\s\S]*?)(\n\n---)/;
  if (pattern.test(content)) {
    return content.replace(pattern, (_match, head: string, _body: string, tail: string) => `${head}${summary}${tail}`);
  }
  if (content.includes(STATUS_LINE)) {
    return content.replace(STATUS_LINE, () => `${STATUS_LINE}\n\n${SUMMARY_HEADING}\n\n${summary}\n\n---`);
  }
  return `${content}\n\n${SUMMARY_HEADING}\n\n${summary}\n\n---\n`;
}

/** Returns true when the README was rewritten. */
export function updateReadmeSummary(readmePath: string, summary: string): boolean {
  if (!fs.existsSync(readmePath)) {
    console.log(`  README not found at ${readmePath}; summary not written`);
    return false;
  }
  const content = fs.readFileSync(readmePath, "utf-8");
  const updated = replaceSummarySection(content, summary);
  if (updated === content) return false;
  fs.writeFileSync(readmePath, updated, "utf-8");
  return true;
}

// ── Summary stage ───────────────────────────────────────────────────────────

/** Working area under the base folder; aggregation never reads it. */
export const WORK_DIR = "pipeline";
export const SNAPSHOT_FILE = "aggregated_snapshot.json";

export function writeSnapshot(filePath: string, snapshot: AggregatedSnapshot): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  writeJson(filePath, snapshotToJson(snapshot));
}

export interface SummaryStageOptions {
  baseDir: string;
  model: TextModel;
  readmePath?: string;
  saveSnapshot?: boolean;
}

export interface SummaryStageResult {
  snapshot: AggregatedSnapshot;
  summary: string;
  readmeUpdated: boolean;
  snapshotPath?: string;
}

export async function runSummaryStage(options: SummaryStageOptions): Promise<SummaryStageResult> {
  const { snapshot, skipped } = aggregateCorpus(options.baseDir);
  if (skipped.length) console.log(`  Skipped ${skipped.length} unreadable file(s)`);
  console.log(
    `  Aggregated ${snapshot.totalDocuments} documents: ${snapshot.namedIndividuals.length} people, ` +
      `${snapshot.organizations.length} organizations, ${snapshot.locations.length} locations`,
  );

  let snapshotPath: string | undefined;
  if (options.saveSnapshot) {
    snapshotPath = path.join(options.baseDir, WORK_DIR, SNAPSHOT_FILE);
    writeSnapshot(snapshotPath, snapshot);
    console.log(`  Saved snapshot to: ${snapshotPath}`);
  }

  const summary = await generateSummary(snapshot, options.model);

  const readmePath = options.readmePath ?? path.join(options.baseDir, "README.md");
  const readmeUpdated = updateReadmeSummary(readmePath, summary);
  if (readmeUpdated) console.log(`  Updated summary in: ${readmePath}`);

  return { snapshot, summary, readmeUpdated, snapshotPath };
}
