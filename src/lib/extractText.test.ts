import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import type { TextModel } from "@/types";
import { extractionErrorLogPathFor, extractionPathFor, extractTextFile, runTextExtraction } from "./extractText";

function replying(text: string): TextModel {
  return async () => ({ text, usage: { inputTokens: 1, outputTokens: 1, costUsd: 0, durationMs: 1 } });
}

function makeTextDir(files: Record<string, string>): { base: string; textDir: string } {
  const base = fs.mkdtempSync(path.join(os.tmpdir(), "extract-"));
  const textDir = path.join(base, "TEXT");
  fs.mkdirSync(textDir);
  for (const [name, text] of Object.entries(files)) fs.writeFileSync(path.join(textDir, name), text, "utf-8");
  return { base, textDir };
}

test("output paths sit beside the text file", () => {
  assert.strictEqual(extractionPathFor(path.join("TEXT", "a.txt")), path.join("TEXT", "a_extraction.json"));
  assert.strictEqual(extractionErrorLogPathFor(path.join("TEXT", "a.txt")), path.join("TEXT", "a_extraction_error.log"));
});

test("extractTextFile adds provenance to the model's record", async () => {
  const { base, textDir } = makeTextDir({ "HOUSE_OVERSIGHT_010477.txt": "Hello" });
  try {
    const model = replying('{"content": {"full_text": "Hello"}, "structured_data": {"people": ["Jane Doe"]}}');

    const result = await extractTextFile(path.join(textDir, "HOUSE_OVERSIGHT_010477.txt"), {
      model,
      modelName: "test-model",
    });

    const { processing_metadata: meta, ...rest } = result;
    assert.deepStrictEqual(rest, {
      content: { full_text: "Hello" },
      structured_data: { people: ["Jane Doe"] },
      file_name: "HOUSE_OVERSIGHT_010477.txt",
      file_path: "TEXT/HOUSE_OVERSIGHT_010477.txt",
      document_id: "HOUSE_OVERSIGHT_010477",
    });
    assert.ok(typeof meta === "object" && meta !== null && "model" in meta);
    assert.strictEqual(meta.model, "test-model");
  } finally {
    fs.rmSync(base, { recursive: true, force: true });
  }
});

test("extractTextFile falls back to the raw text when the model fails", async () => {
  const { base, textDir } = makeTextDir({ "note.txt": "Hello" });
  try {
    const model: TextModel = async () => {
      throw new Error("boom");
    };
    const textPath = path.join(textDir, "note.txt");

    const result = await extractTextFile(textPath, { model, modelName: "test-model" });

    assert.strictEqual(result.error, "LLM request failed: boom");
    assert.deepStrictEqual(result.content, { full_text: "Hello" });
    assert.strictEqual("raw_response_preview" in result, false);
    assert.strictEqual(fs.readFileSync(extractionErrorLogPathFor(textPath), "utf-8"), "LLM request failed: boom\n");
  } finally {
    fs.rmSync(base, { recursive: true, force: true });
  }
});

test("extractTextFile keeps a preview of a response that is not an object", async () => {
  const { base, textDir } = makeTextDir({ "note.txt": "Hello" });
  try {
    const result = await extractTextFile(path.join(textDir, "note.txt"), {
      model: replying('"just a string"'),
      modelName: "test-model",
    });

    assert.strictEqual(result.error, "Failed to parse LLM response: Extraction response is not a JSON object");
    assert.strictEqual(result.raw_response_preview, '"just a string"');
  } finally {
    fs.rmSync(base, { recursive: true, force: true });
  }
});

test("runTextExtraction writes one JSON per file and can skip existing output", async () => {
  const { base, textDir } = makeTextDir({ "a.txt": "first", "b.txt": "second" });
  try {
    const model = replying('{"content": {"full_text": "x"}}');

    const first = await runTextExtraction(textDir, { model, modelName: "test-model" });
    assert.deepStrictEqual(first, { processed: 2, skipped: 0, failed: 0 });
    assert.deepStrictEqual(fs.readdirSync(textDir).sort(), ["a.txt", "a_extraction.json", "b.txt", "b_extraction.json"]);

    const second = await runTextExtraction(textDir, { model, modelName: "test-model", skipExisting: true });
    assert.deepStrictEqual(second, { processed: 0, skipped: 2, failed: 0 });
  } finally {
    fs.rmSync(base, { recursive: true, force: true });
  }
});
