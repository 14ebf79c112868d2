import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import type { ModelImage, ModelRequest, TextModel } from "@/types";
import { analysisPathFor, analyzeImage, isImageFile, runImageAnalysis } from "./analyzeImages";

const IMAGE: ModelImage = { base64: "aGVsbG8=", mediaType: "image/png" };
const loadImage = async (): Promise<ModelImage> => IMAGE;

function stubModel(text: string): { model: TextModel; requests: ModelRequest[] } {
  const requests: ModelRequest[] = [];
  const model: TextModel = async (request) => {
    requests.push(request);
    return { text, usage: { inputTokens: 1, outputTokens: 1, costUsd: 0, durationMs: 1 } };
  };
  return { model, requests };
}

test("isImageFile accepts scan formats regardless of case", () => {
  assert.strictEqual(isImageFile("scan.JPG"), true);
  assert.strictEqual(isImageFile("scan.tiff"), true);
  assert.strictEqual(isImageFile("scan.pdf"), false);
  assert.strictEqual(isImageFile("scan.bmp"), false);
  assert.strictEqual(analysisPathFor(path.join("IMAGES", "scan.tif")), path.join("IMAGES", "scan.json"));
});

test("analyzeImage sends the image and tags the result", async () => {
  const { model, requests } = stubModel('```json\n{"document_type": "letter"}\n```');

  const result = await analyzeImage(path.join("IMAGES", "EFTA00000001.png"), {
    model,
    modelName: "test-model",
    loadImage,
  });

  assert.deepStrictEqual(requests[0].images, [IMAGE]);
  assert.strictEqual(result.document_type, "letter");
  assert.strictEqual(result.file_name, "EFTA00000001.png");
  assert.strictEqual(result.document_id, "EFTA00000001");
  assert.ok("processing_metadata" in result);
});

test("analyzeImage reports load and parse failures as records", async () => {
  const { model, requests } = stubModel('"not an object"');

  const unreadable = await analyzeImage("IMAGES/a.png", {
    model,
    modelName: "test-model",
    loadImage: async () => {
      throw new Error("corrupt header");
    },
  });
  assert.deepStrictEqual(unreadable, { file_name: "a.png", error: "Failed to load image: corrupt header" });
  assert.strictEqual(requests.length, 0);

  const malformed = await analyzeImage("IMAGES/a.png", { model, modelName: "test-model", loadImage });
  assert.deepStrictEqual(malformed, {
    file_name: "a.png",
    error: "Failed to parse LLM response as JSON",
    raw_response: '"not an object"',
  });
});

test("runImageAnalysis honours the limit and writes JSON beside each image", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "images-"));
  try {
    for (const name of ["a.png", "b.jpg", "notes.txt"]) fs.writeFileSync(path.join(dir, name), "x");
    const { model } = stubModel('{"document_type": "photo"}');

    const summary = await runImageAnalysis(dir, { model, modelName: "test-model", loadImage, limit: 1 });

    assert.deepStrictEqual(summary, { processed: 1, skipped: 0, failed: 0 });
    assert.deepStrictEqual(fs.readdirSync(dir).sort(), ["a.json", "a.png", "b.jpg", "notes.txt"]);
    const written = JSON.parse(fs.readFileSync(path.join(dir, "a.json"), "utf-8"));
    assert.strictEqual(written.document_type, "photo");
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
