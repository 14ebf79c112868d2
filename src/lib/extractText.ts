import fs from "fs";
import path from "path";
import type { TextModel } from "@/types";
import { buildTextExtractionPrompt } from "@/lib/analysisPrompts";
import { extractAnalysisId, processingMetadata } from "@/lib/analysis";
import { extractJson, isRecord } from "@/lib/claude";
import { MalformedResponseError, errorMessage, responseExcerpt } from "@/lib/errors";
import { isPageTextFile } from "@/lib/pages";
import { listFilesRecursive, toPosixPath, writeJson } from "@/lib/utils";

// ── Text extraction stage ───────────────────────────────────────────────────
// One model call per text file; the structured result is written beside the
// file as "<stem>_extraction.json". Failures still produce that JSON (with an
// "error" field) plus a "<stem>_extraction_error.log".

export interface ExtractTextOptions {
  model: TextModel;
  modelName: string;
  skipExisting?: boolean;
  /** Base for the recorded file_path (default: the text directory's parent). */
  relativeTo?: string;
}

export interface ExtractTextSummary {
  processed: number;
  skipped: number;
  failed: number;
}

export function extractionPathFor(textPath: string): string {
  const stem = path.basename(textPath, path.extname(textPath));
  return path.join(path.dirname(textPath), `${stem}_extraction.json`);
}

export function extractionErrorLogPathFor(textPath: string): string {
  const stem = path.basename(textPath, path.extname(textPath));
  return path.join(path.dirname(textPath), `${stem}_extraction_error.log`);
}

const RULE = "=".repeat(80);

function writeExtractionErrorLog(
  textPath: string,
  message: string,
  sections: { rawResponse?: string; attemptedJson?: string } = {},
): string | null {
  const logPath = extractionErrorLogPathFor(textPath);
  const parts = [message.trim(), ""];
  if (sections.rawResponse) {
    parts.push(RULE, "RAW RESPONSE (first 2000 chars):", RULE, sections.rawResponse, "");
  }
  if (sections.attemptedJson) {
    parts.push(RULE, "ATTEMPTED JSON TEXT:", RULE, sections.attemptedJson.slice(0, 2000), "");
  }
  try {
    fs.writeFileSync(logPath, parts.join("\n"), "utf-8");
  } catch (err) {
    console.log(`    Warning: could not write ${logPath}: ${errorMessage(err)}`);
    return null;
  }
  return logPath;
}

/**
 * Extract one text file. Always returns a record to persist; collaborator
 * and parse failures come back as a fallback record with "error" set.
 */
export async function extractTextFile(
  textPath: string,
  options: ExtractTextOptions,
): Promise<Record<string, unknown>> {
  const fileName = path.basename(textPath);
  const relativeTo = options.relativeTo ?? path.dirname(path.dirname(textPath));
  const filePath = toPosixPath(path.relative(relativeTo, textPath));

  let text: string;
  try {
    text = fs.readFileSync(textPath, "utf-8");
  } catch (err) {
    return { file_name: fileName, file_path: filePath, error: `Failed to read file: ${errorMessage(err)}` };
  }

  let result: Record<string, unknown>;
  try {
    const response = await options.model({
      prompt: buildTextExtractionPrompt(fileName, text),
      maxTokens: 16384,
      temperature: 0.3,
    });
    const parsed = extractJson(response.text);
    if (!isRecord(parsed)) {
      throw new MalformedResponseError("Extraction response is not a JSON object", response.text);
    }
    result = parsed;
  } catch (err) {
    const message =
      err instanceof MalformedResponseError
        ? `Failed to parse LLM response: ${err.message}`
        : `LLM request failed: ${errorMessage(err)}`;
    const logPath = writeExtractionErrorLog(textPath, message, {
      rawResponse: responseExcerpt(err, 2000),
      attemptedJson: err instanceof MalformedResponseError ? err.attempted : undefined,
    });
    const preview = responseExcerpt(err, 500);
    console.log(`    Warning: ${message}.${logPath ? ` Error saved to ${path.basename(logPath)}` : ""}`);
    result = {
      file_name: fileName,
      file_path: filePath,
      content: { full_text: text },
      error: message,
      ...(preview ? { raw_response_preview: preview } : {}),
    };
  }

  if (!("file_name" in result)) result.file_name = fileName;
  if (!("file_path" in result)) result.file_path = filePath;
  const documentId = extractAnalysisId(fileName);
  if (documentId && !("document_id" in result)) result.document_id = documentId;
  result.processing_metadata = processingMetadata(options.modelName);
  return result;
}

export async function runTextExtraction(textDir: string, options: ExtractTextOptions): Promise<ExtractTextSummary> {
  const files = listFilesRecursive(textDir, isPageTextFile, {
    onError: (dir, err) => console.log(`  Warning: skipping unreadable directory ${dir}: ${errorMessage(err)}`),
  });
  const summary: ExtractTextSummary = { processed: 0, skipped: 0, failed: 0 };

  if (files.length === 0) {
    console.log(`  No text files found in ${textDir}`);
    return summary;
  }
  console.log(`  Found ${files.length} text file(s)`);

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    const outPath = extractionPathFor(file);
    if (options.skipExisting && fs.existsSync(outPath)) {
      summary.skipped++;
      continue;
    }
    console.log(`  [${i + 1}/${files.length}] Extracting: ${path.relative(textDir, file)}`);
    const result = await extractTextFile(file, options);
    try {
      writeJson(outPath, result);
    } catch (err) {
      console.log(`    Warning: could not write ${outPath}: ${errorMessage(err)}`);
      summary.failed++;
      continue;
    }
    if ("error" in result) summary.failed++;
    else summary.processed++;
  }

  return summary;
}
