import fs from "fs";
import path from "path";
import type { TextModel } from "@/types";
import { buildTranslationPrompt } from "@/lib/analysisPrompts";
import { LETTER_TEXT_FILES } from "@/lib/assemble";
import { errorMessage } from "@/lib/errors";

export const TRANSLATION_FILE = "en.txt";
export const TRANSLATION_ERROR_LOG = "translation_error.log";

/** Letter folders (legacy "L0001" or "<collection> L0001") that hold source text. */
export function listLetterDirs(lettersDir: string): string[] {
  if (!fs.existsSync(lettersDir)) return [];
  return fs
    .readdirSync(lettersDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => path.join(lettersDir, entry.name))
    .filter((dir) => LETTER_TEXT_FILES.some((name) => fs.existsSync(path.join(dir, name))))
    .sort();
}

function sourceTextPath(letterDir: string): string | undefined {
  return LETTER_TEXT_FILES.map((name) => path.join(letterDir, name)).find((p) => fs.existsSync(p));
}

export interface TranslateOptions {
  model: TextModel;
  force?: boolean;
}

export interface TranslateSummary {
  translated: number;
  skipped: number;
  failed: number;
}

type LetterStatus = "translated" | "skipped" | "failed";

async function translateLetter(dir: string, options: TranslateOptions): Promise<LetterStatus> {
  const sourcePath = sourceTextPath(dir);
  if (!sourcePath) return "skipped";
  const enPath = path.join(dir, TRANSLATION_FILE);
  if (fs.existsSync(enPath) && !options.force) {
    console.log(`  Skip existing: ${enPath}`);
    return "skipped";
  }

  const source = fs.readFileSync(sourcePath, "utf-8").trim();
  if (!source) {
    fs.writeFileSync(enPath, "", "utf-8");
    return "translated";
  }

  console.log(`  Translating ${path.basename(dir)} (${source.length} chars)`);
  let english: string;
  try {
    const response = await options.model({
      prompt: buildTranslationPrompt(source),
      maxTokens: 8192,
      temperature: 0.6,
    });
    english = response.text.trim();
  } catch (err) {
    const message = errorMessage(err);
    console.log(`    Warning: translation failed: ${message}`);
    fs.writeFileSync(path.join(dir, TRANSLATION_ERROR_LOG), `${message}\n`, "utf-8");
    return "failed";
  }

  fs.writeFileSync(enPath, english + "\n", "utf-8");
  fs.rmSync(path.join(dir, TRANSLATION_ERROR_LOG), { force: true });
  return "translated";
}

/**
 * Translate each assembled letter to English as en.txt. A failed letter gets a
 * translation_error.log and the rest of the batch carries on.
 */
export async function translateLetters(lettersDir: string, options: TranslateOptions): Promise<TranslateSummary> {
  const summary: TranslateSummary = { translated: 0, skipped: 0, failed: 0 };
  const dirs = listLetterDirs(lettersDir);
  if (dirs.length === 0) {
    console.log(`  No letter directories found in ${lettersDir}`);
    return summary;
  }

  for (const dir of dirs) {
    try {
      const status = await translateLetter(dir, options);
      summary[status]++;
    } catch (err) {
      console.log(`    Warning: skipping ${path.basename(dir)}: ${errorMessage(err)}`);
      summary.failed++;
    }
  }

  return summary;
}
