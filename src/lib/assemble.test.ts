import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import type { Page, ProposedGroup, ReconciledGroup } from "@/types";
import {
  ASSEMBLY_ERROR_LOG,
  assembleLetters,
  buildLetter,
  collectionNameFor,
  concatenatePages,
  extractReferenceIds,
  letterFolderName,
} from "./assemble";
import { listFilesRecursive } from "./utils";

function page(key: string, text: string): Page {
  return { key, text, sourcePath: `pages/${key}_german.txt` };
}

function reconciled(id: string, pages: Page[], extra: Record<string, unknown> = {}): ReconciledGroup {
  const raw = { id, pages: pages.map((p) => p.key), ...extra };
  const proposed: ProposedGroup = {
    id,
    pageReferences: pages.map((p) => p.key),
    confidence: extra.confidence,
    reason: extra.reason,
    raw,
  };
  return {
    proposed,
    resolutions: pages.map((p) => ({ status: "exact" as const, reference: p.key, page: p })),
    pages,
  };
}

function lettersDirIn(collection: string): { base: string; lettersDir: string } {
  const base = fs.mkdtempSync(path.join(os.tmpdir(), "assemble-"));
  return { base, lettersDir: path.join(base, collection, "letters") };
}

function readTree(dir: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const file of listFilesRecursive(dir, () => true)) {
    out[path.relative(dir, file)] = fs.readFileSync(file, "utf-8");
  }
  return out;
}

test("extractReferenceIds prefers canonical IDs over bare digit runs", () => {
  assert.deepStrictEqual(extractReferenceIds("HOUSE_OVERSIGHT_010477_german.txt"), ["010477"]);
  assert.deepStrictEqual(extractReferenceIds("house-oversight-22 and HOUSEOVERSIGHT5.txt"), ["22", "5"]);
  assert.deepStrictEqual(extractReferenceIds("scan_2023_0456.txt"), ["2023", "0456"]);
  assert.deepStrictEqual(extractReferenceIds("p12.txt"), []);
});

test("letter folder names carry the collection prefix when there is one", () => {
  assert.strictEqual(letterFolderName("L0001", "Briefe"), "Briefe L0001");
  assert.strictEqual(letterFolderName("L0001", ""), "L0001");
  assert.strictEqual(collectionNameFor(path.join("data", "Briefe", "letters")), "Briefe");
});

test("concatenatePages adds nothing between pages", () => {
  assert.strictEqual(concatenatePages([page("A1", "Dear Hans,"), page("A2", "Yours, Karl")]), "Dear Hans,Yours, Karl");
  assert.strictEqual(concatenatePages([]), "");
});

test("buildLetter lists each source file and reference ID once, in first-seen order", () => {
  const a = page("HOUSE_OVERSIGHT_010478", "two");
  const b: Page = { key: "X", text: "one", sourcePath: "extra/HOUSE_OVERSIGHT_010477_HOUSE_OVERSIGHT_010478.txt" };

  const letter = buildLetter(reconciled("L0001", [a, b, a]), "Briefe");

  assert.deepStrictEqual(letter.sourceFiles, [
    "pages/HOUSE_OVERSIGHT_010478_german.txt",
    "extra/HOUSE_OVERSIGHT_010477_HOUSE_OVERSIGHT_010478.txt",
  ]);
  assert.deepStrictEqual(letter.referenceIds, ["010478", "010477"]);
  assert.strictEqual(letter.concatenatedText, "twoonetwo");
  assert.deepStrictEqual(letter.pageKeys, ["HOUSE_OVERSIGHT_010478", "X", "HOUSE_OVERSIGHT_010478"]);
});

test("assembleLetters writes metadata and both text files per letter", () => {
  const { base, lettersDir } = lettersDirIn("Briefe");
  try {
    const group = reconciled(
      "L0001",
      [page("HOUSE_OVERSIGHT_010477", "Dear Hans,"), page("HOUSE_OVERSIGHT_010478", "Yours, Karl")],
      { confidence: 0.9, reason: "shared signature" },
    );

    const outcomes = assembleLetters([group], lettersDir);

    const folder = path.join(lettersDir, "Briefe L0001");
    assert.deepStrictEqual(outcomes.map((o) => [o.written, o.folder]), [[true, folder]]);
    assert.strictEqual(fs.readFileSync(path.join(folder, "de.txt"), "utf-8"), "Dear Hans,Yours, Karl");
    assert.strictEqual(fs.readFileSync(path.join(folder, "text.txt"), "utf-8"), "Dear Hans,Yours, Karl");
    assert.deepStrictEqual(JSON.parse(fs.readFileSync(path.join(folder, "meta.json"), "utf-8")), {
      id: "L0001",
      pages: ["HOUSE_OVERSIGHT_010477", "HOUSE_OVERSIGHT_010478"],
      confidence: 0.9,
      reason: "shared signature",
      source_files: ["pages/HOUSE_OVERSIGHT_010477_german.txt", "pages/HOUSE_OVERSIGHT_010478_german.txt"],
      reference_ids: ["010477", "010478"],
    });
  } finally {
    fs.rmSync(base, { recursive: true, force: true });
  }
});

test("assembleLetters writes an empty letter for a group with no pages", () => {
  const { base, lettersDir } = lettersDirIn("Briefe");
  try {
    assembleLetters([reconciled("L0002", [])], lettersDir);

    const folder = path.join(lettersDir, "Briefe L0002");
    assert.strictEqual(fs.readFileSync(path.join(folder, "de.txt"), "utf-8"), "");
    const meta = JSON.parse(fs.readFileSync(path.join(folder, "meta.json"), "utf-8"));
    assert.deepStrictEqual(meta.source_files, []);
    assert.deepStrictEqual(meta.reference_ids, []);
  } finally {
    fs.rmSync(base, { recursive: true, force: true });
  }
});

test("assembleLetters produces identical output when run twice", () => {
  const { base, lettersDir } = lettersDirIn("Briefe");
  try {
    const groups = [
      reconciled("L0001", [page("A1", "Dear Hans,"), page("A2", "Yours, Karl")]),
      reconciled("L0002", [page("B1", "Memo")]),
    ];

    assembleLetters(groups, lettersDir);
    const first = readTree(lettersDir);
    fs.writeFileSync(path.join(lettersDir, "Briefe L0001", "stale.txt"), "left over", "utf-8");
    assembleLetters(groups, lettersDir);

    assert.deepStrictEqual(readTree(lettersDir), first);
  } finally {
    fs.rmSync(base, { recursive: true, force: true });
  }
});

test("assembleLetters keeps going after one letter fails to write", () => {
  const { base, lettersDir } = lettersDirIn("Briefe");
  try {
    const groups = [
      reconciled("L0001", [page("A1", "one")]),
      reconciled("bad\u0000id", [page("B1", "two")]),
      reconciled("L0003", [page("C1", "three")]),
    ];

    const outcomes = assembleLetters(groups, lettersDir);

    assert.deepStrictEqual(outcomes.map((o) => o.written), [true, false, true]);
    assert.strictEqual(fs.readFileSync(path.join(lettersDir, "Briefe L0001", "de.txt"), "utf-8"), "one");
    assert.strictEqual(fs.readFileSync(path.join(lettersDir, "Briefe L0003", "de.txt"), "utf-8"), "three");
    const log = fs.readFileSync(path.join(lettersDir, ASSEMBLY_ERROR_LOG), "utf-8");
    assert.strictEqual(log.split("\n").filter(Boolean).length, 1);
    assert.strictEqual(log.split("\t")[1], "Briefe bad\u0000id");
  } finally {
    fs.rmSync(base, { recursive: true, force: true });
  }
});

test("assembleLetters refuses a folder outside the letters directory", () => {
  const { base, lettersDir } = lettersDirIn("Briefe");
  try {
    const pagesDir = path.join(base, "Briefe", "pages");
    fs.mkdirSync(pagesDir, { recursive: true });
    fs.writeFileSync(path.join(pagesDir, "A1_german.txt"), "keep me", "utf-8");

    const outcomes = assembleLetters(
      [reconciled("x/../../..", [page("A1", "one")]), reconciled("L0002", [page("B1", "two")])],
      lettersDir,
    );

    assert.deepStrictEqual(outcomes.map((o) => o.written), [false, true]);
    assert.strictEqual(fs.readFileSync(path.join(pagesDir, "A1_german.txt"), "utf-8"), "keep me");
    assert.strictEqual(fs.readFileSync(path.join(lettersDir, "Briefe L0002", "de.txt"), "utf-8"), "two");
    const log = fs.readFileSync(path.join(lettersDir, ASSEMBLY_ERROR_LOG), "utf-8");
    assert.strictEqual(log.split("\t")[1], "Briefe x/../../..");
  } finally {
    fs.rmSync(base, { recursive: true, force: true });
  }
});
