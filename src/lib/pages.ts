import fs from "fs";
import path from "path";
import type { Page, PageLoadResult, SkippedFile } from "@/types";
import { FileSystemError, errorMessage } from "@/lib/errors";
import { listFilesRecursive, toPosixPath } from "@/lib/utils";

// ── Page keys ───────────────────────────────────────────────────────────────

/** Checked in order; the first match is stripped. */
export const PAGE_SUFFIXES = ["_german.txt", "_text.txt", ".txt"] as const;

export const TRANSLATION_SUFFIX = "_english.txt";

/** Error logs written by the text extraction stage sit beside page files. */
const EXTRACTION_ERROR_MARKER = "_extraction_error";

/**
 * Canonical page key for a page-text filename:
 * "HOUSE_OVERSIGHT_010477_german.txt" → "HOUSE_OVERSIGHT_010477".
 */
export function pageKeyFor(filename: string): string {
  const name = path.basename(filename);
  const lower = name.toLowerCase();
  for (const suffix of PAGE_SUFFIXES) {
    if (lower.endsWith(suffix)) return name.slice(0, -suffix.length);
  }
  const ext = path.extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

export function isPageTextFile(filePath: string): boolean {
  const name = path.basename(filePath).toLowerCase();
  return name.endsWith(".txt") && !name.includes(EXTRACTION_ERROR_MARKER);
}

// ── Loading ─────────────────────────────────────────────────────────────────

export interface LoadPagesOptions {
  /** Directory holding "<key>_english.txt" side-channel translations. */
  translationDir?: string;
  /** Base for the recorded source paths (default: process.cwd()). */
  relativeTo?: string;
}

function readTranslation(translationDir: string, key: string): string | undefined {
  const translationPath = path.join(translationDir, `${key}${TRANSLATION_SUFFIX}`);
  if (!fs.existsSync(translationPath)) return undefined;
  try {
    return fs.readFileSync(translationPath, "utf-8");
  } catch (err) {
    console.log(`  Warning: could not read translation ${translationPath}: ${errorMessage(err)}`);
    return undefined;
  }
}

/**
 * Discover every page-text file under `rootDir` and load it as a Page.
 *
 * Files are processed in sorted path order. When two files derive the same key
 * the later one replaces the earlier and takes its place in the order.
 */
export function loadPages(rootDir: string, options: LoadPagesOptions = {}): PageLoadResult {
  const relativeTo = options.relativeTo ?? process.cwd();
  const skipped: SkippedFile[] = [];

  let files: string[];
  try {
    files = listFilesRecursive(rootDir, isPageTextFile, {
      onError: (dir, err) => {
        console.log(`  Warning: skipping unreadable directory ${dir}: ${errorMessage(err)}`);
        skipped.push({ path: dir, reason: errorMessage(err) });
      },
    });
  } catch (err) {
    throw new FileSystemError(`Cannot read page directory: ${rootDir}`, rootDir, { cause: err });
  }

  const byKey = new Map<string, Page>();
  const collisions = new Set<string>();

  for (const file of files) {
    let text: string;
    try {
      text = fs.readFileSync(file, "utf-8");
    } catch (err) {
      console.log(`  Warning: skipping unreadable page ${file}: ${errorMessage(err)}`);
      skipped.push({ path: file, reason: errorMessage(err) });
      continue;
    }

    const key = pageKeyFor(file);
    const page: Page = { key, text, sourcePath: toPosixPath(path.relative(relativeTo, file)) };
    if (options.translationDir) {
      const translation = readTranslation(options.translationDir, key);
      if (translation !== undefined) page.translation = translation;
    }

    if (byKey.has(key)) {
      collisions.add(key);
      byKey.delete(key);
    }
    byKey.set(key, page);
  }

  return { pages: Array.from(byKey.values()), skipped, collisions: Array.from(collisions) };
}
