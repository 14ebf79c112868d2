import fs from "fs";
import path from "path";
import ExcelJS from "exceljs";
import type { TextModel } from "@/types";
import { buildSpreadsheetPrompt } from "@/lib/analysisPrompts";
import { extractAnalysisId, processingMetadata } from "@/lib/analysis";
import { extractJson, isRecord } from "@/lib/claude";
import { MalformedResponseError, errorMessage, responseExcerpt } from "@/lib/errors";
import { listFilesRecursive, toPosixPath, writeJson } from "@/lib/utils";

// ── Spreadsheet (natives) stage ─────────────────────────────────────────────
// Each workbook is flattened to a plain-text listing of its sheets, sent to
// the model once, and the analysis written beside it as "<stem>_analysis.json".

export const SPREADSHEET_EXTENSIONS = [".xlsx", ".xls"] as const;
export const SPREADSHEET_DOCUMENT_TYPE = "spreadsheet";

export interface NativesOptions {
  model: TextModel;
  modelName: string;
  skipExisting?: boolean;
  /** Base for the recorded file_path (default: the natives directory's parent). */
  relativeTo?: string;
}

export interface NativesSummary {
  processed: number;
  skipped: number;
  failed: number;
}

export function isSpreadsheetFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return SPREADSHEET_EXTENSIONS.some((e) => e === ext);
}

export function spreadsheetAnalysisPathFor(filePath: string): string {
  const stem = path.basename(filePath, path.extname(filePath));
  return path.join(path.dirname(filePath), `${stem}_analysis.json`);
}

function sheetRows(sheet: ExcelJS.Worksheet): string[][] {
  const rows: string[][] = [];
  for (let r = 1; r <= sheet.rowCount; r++) {
    const cells: string[] = [];
    for (let c = 1; c <= sheet.columnCount; c++) {
      cells.push(sheet.getCell(r, c).text);
    }
    rows.push(cells);
  }
  return rows;
}

/**
 * Text listing of a workbook: a header naming the sheets, then each sheet's
 * dimensions and its rows, one line per row, cells separated by tabs and
 * prefixed with the zero-based row index.
 */
export async function readWorkbookText(filePath: string): Promise<string> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);

  const parts = [
    `FILE: ${path.basename(filePath)}`,
    `SHEETS: ${workbook.worksheets.map((s) => s.name).join(", ")}`,
    "",
  ];
  for (const sheet of workbook.worksheets) {
    const rows = sheetRows(sheet);
    parts.push(
      `=== WORKSHEET: ${sheet.name} ===`,
      `Dimensions: ${sheet.rowCount} rows x ${sheet.columnCount} columns`,
      "",
      "Data:",
      ...rows.map((cells, i) => [String(i), ...cells].join("\t")),
      "",
    );
  }
  return parts.join("\n");
}

/** Analyze one workbook. Failures come back as a record with "error" set. */
export async function analyzeSpreadsheet(
  filePath: string,
  options: NativesOptions,
): Promise<Record<string, unknown>> {
  const fileName = path.basename(filePath);
  const relativeTo = options.relativeTo ?? path.dirname(path.dirname(filePath));
  const recordedPath = toPosixPath(path.relative(relativeTo, filePath));

  if (path.extname(filePath).toLowerCase() === ".xls") {
    return { file_name: fileName, file_path: recordedPath, error: "Legacy .xls workbooks are not supported; save as .xlsx" };
  }

  let workbookText: string;
  try {
    workbookText = await readWorkbookText(filePath);
  } catch (err) {
    return { file_name: fileName, file_path: recordedPath, error: `Failed to read workbook: ${errorMessage(err)}` };
  }

  let result: Record<string, unknown>;
  try {
    const response = await options.model({
      prompt: buildSpreadsheetPrompt(workbookText),
      maxTokens: 16384,
      temperature: 0.3,
    });
    const parsed = extractJson(response.text);
    if (!isRecord(parsed)) {
      throw new MalformedResponseError("Spreadsheet analysis response is not a JSON object", response.text);
    }
    result = parsed;
  } catch (err) {
    const raw = responseExcerpt(err, 2000);
    return {
      file_name: fileName,
      file_path: recordedPath,
      error:
        err instanceof MalformedResponseError
          ? "Failed to parse LLM response as JSON"
          : `LLM request failed: ${errorMessage(err)}`,
      ...(raw ? { raw_response: raw } : {}),
    };
  }

  if (!("file_name" in result)) result.file_name = fileName;
  result.file_path = recordedPath;
  if (!("document_type" in result)) result.document_type = SPREADSHEET_DOCUMENT_TYPE;
  const documentId = extractAnalysisId(fileName);
  if (documentId) result.document_id = documentId;
  result.processing_metadata = processingMetadata(options.modelName);
  return result;
}

export async function runNativesAnalysis(nativesDir: string, options: NativesOptions): Promise<NativesSummary> {
  const files = listFilesRecursive(nativesDir, isSpreadsheetFile, {
    onError: (dir, err) => console.log(`  Warning: skipping unreadable directory ${dir}: ${errorMessage(err)}`),
  });
  const summary: NativesSummary = { processed: 0, skipped: 0, failed: 0 };

  if (files.length === 0) {
    console.log(`  No Excel files found in ${nativesDir}`);
    return summary;
  }
  console.log(`  Found ${files.length} Excel file(s)`);

  const relativeTo = options.relativeTo ?? path.dirname(nativesDir);
  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    const outPath = spreadsheetAnalysisPathFor(file);
    if (options.skipExisting && fs.existsSync(outPath)) {
      console.log(`  Skipping (exists): ${path.basename(outPath)}`);
      summary.skipped++;
      continue;
    }
    console.log(`  [${i + 1}/${files.length}] ${path.relative(nativesDir, file)}`);
    const result = await analyzeSpreadsheet(file, { ...options, relativeTo });
    try {
      writeJson(outPath, result);
    } catch (err) {
      console.log(`    Warning: could not write ${outPath}: ${errorMessage(err)}`);
      summary.failed++;
      continue;
    }
    if ("error" in result) {
      console.log(`    Warning: ${String(result.error)}`);
      summary.failed++;
    } else {
      summary.processed++;
    }
  }

  return summary;
}
