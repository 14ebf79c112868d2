import fs from "fs";
import path from "path";
import type { Letter, LetterOutcome, Page, ReconciledGroup } from "@/types";
import { errorMessage, FileSystemError } from "@/lib/errors";
import { uniqueInOrder, writeJson } from "@/lib/utils";

// ── Reference IDs ───────────────────────────────────────────────────────────

/** The corpus's canonical identifier scheme, e.g. "HOUSE_OVERSIGHT_010477". */
export const CANONICAL_ID_PATTERN = /house[_-]?oversight[_-]?(\d+)/gi;
const GENERIC_ID_PATTERN = /\d{4,}/g;

/**
 * Reference IDs embedded in a source filename. Canonical IDs win; only when
 * there are none does any run of four or more digits count.
 */
export function extractReferenceIds(filename: string): string[] {
  const canonical = Array.from(filename.matchAll(CANONICAL_ID_PATTERN), (m) => m[1]);
  if (canonical.length > 0) return canonical;
  return Array.from(filename.matchAll(GENERIC_ID_PATTERN), (m) => m[0]);
}

// ── Letter identity ─────────────────────────────────────────────────────────

export const LETTER_META_FILE = "meta.json";
/** Both names hold the same text; older readers look for de.txt. */
export const LETTER_TEXT_FILES = ["de.txt", "text.txt"] as const;
export const ASSEMBLY_ERROR_LOG = "assembly-errors.log";

/** Collection = name of the folder that contains the letters directory. */
export function collectionNameFor(lettersDir: string): string {
  const parent = path.basename(path.dirname(path.resolve(lettersDir)));
  return parent === "." ? "" : parent;
}

export function letterFolderName(id: string, collection: string): string {
  return collection ? `${collection} ${id}`.trim() : id;
}

// ── Assembly ────────────────────────────────────────────────────────────────

/** Ordered concatenation of page texts. Nothing is added between pages. */
export function concatenatePages(pages: readonly Page[]): string {
  return pages.map((p) => p.text).join("");
}

export function buildLetter(group: ReconciledGroup, collection: string): Letter {
  const sourceFiles = uniqueInOrder(group.pages.map((p) => p.sourcePath));
  const referenceIds = uniqueInOrder(sourceFiles.flatMap((f) => extractReferenceIds(path.posix.basename(f))));

  return {
    id: group.proposed.id,
    folderName: letterFolderName(group.proposed.id, collection),
    pageKeys: group.pages.map((p) => p.key),
    concatenatedText: concatenatePages(group.pages),
    sourceFiles,
    referenceIds,
    proposed: group.proposed,
  };
}

/** Provenance record: the group as the model proposed it, plus what it resolved to. */
export function letterMetadata(letter: Letter): Record<string, unknown> {
  return {
    ...letter.proposed.raw,
    source_files: letter.sourceFiles,
    reference_ids: letter.referenceIds,
  };
}

/** Replace the letter's folder wholesale with fresh metadata and text files. */
export function writeLetter(letter: Letter, lettersDir: string): string {
  const folder = path.join(lettersDir, letter.folderName);
  if (path.dirname(path.resolve(folder)) !== path.resolve(lettersDir)) {
    throw new FileSystemError(`Letter folder "${letter.folderName}" is not directly under ${lettersDir}`, folder);
  }
  fs.rmSync(folder, { recursive: true, force: true });
  fs.mkdirSync(folder, { recursive: true });

  writeJson(path.join(folder, LETTER_META_FILE), letterMetadata(letter));
  for (const name of LETTER_TEXT_FILES) {
    fs.writeFileSync(path.join(folder, name), letter.concatenatedText, "utf-8");
  }
  return folder;
}

function recordAssemblyError(lettersDir: string, letter: Letter, message: string): void {
  const line = `${new Date().toISOString()}\t${letter.folderName}\t${message}\n`;
  try {
    fs.appendFileSync(path.join(lettersDir, ASSEMBLY_ERROR_LOG), line, "utf-8");
  } catch (err) {
    console.error(`  Error: could not write ${ASSEMBLY_ERROR_LOG}: ${errorMessage(err)}`);
  }
}

/**
 * Build and persist one letter per reconciled group. Each write stands alone:
 * a failure is logged and recorded, and the remaining letters still get written.
 */
export function assembleLetters(
  groups: readonly ReconciledGroup[],
  lettersDir: string,
  collection: string = collectionNameFor(lettersDir),
): LetterOutcome[] {
  fs.mkdirSync(lettersDir, { recursive: true });
  const outcomes: LetterOutcome[] = [];

  for (const group of groups) {
    const letter = buildLetter(group, collection);
    const folder = path.join(lettersDir, letter.folderName);
    try {
      writeLetter(letter, lettersDir);
      outcomes.push({ letter, written: true, folder });
    } catch (err) {
      const message = errorMessage(err);
      console.log(`  Warning: failed to write ${letter.folderName}: ${message}`);
      recordAssemblyError(lettersDir, letter, message);
      outcomes.push({ letter, written: false, folder, error: message });
    }
  }

  return outcomes;
}
