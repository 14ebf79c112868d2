import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import type { AggregatedSnapshot, ModelRequest, TextModel } from "@/types";
import {
  fallbackSummary,
  generateSummary,
  NO_DOCUMENTS_SUMMARY,
  replaceSummarySection,
  runSummaryStage,
  SNAPSHOT_FILE,
  updateReadmeSummary,
  WORK_DIR,
} from "./summary";

const snapshot: AggregatedSnapshot = {
  namedIndividuals: ["Jane Doe", "John Roe"],
  organizations: ["Acme"],
  locations: [],
  dates: ["1990"],
  documentTypeCounts: { memo: 2, letter: 1 },
  totalDocuments: 3,
  samples: [],
  explosiveFindings: [],
};

const emptySnapshot: AggregatedSnapshot = {
  ...snapshot,
  namedIndividuals: [],
  organizations: [],
  dates: [],
  documentTypeCounts: {},
  totalDocuments: 0,
};

function stubModel(reply: () => string): { model: TextModel; requests: ModelRequest[] } {
  const requests: ModelRequest[] = [];
  const model: TextModel = async (request) => {
    requests.push(request);
    return { text: reply(), usage: { inputTokens: 1, outputTokens: 1, costUsd: 0, durationMs: 1 } };
  };
  return { model, requests };
}

const unavailableModel: TextModel = async () => {
  throw new Error("service unavailable");
};

const FALLBACK = `### Processing Status

- Total documents analyzed: 3
- Named individuals identified: 2
- Organizations found: 1
- Document types: memo, letter

(Strategic analysis temporarily unavailable - processing continues)`;

test("fallbackSummary reports the snapshot counts", () => {
  assert.strictEqual(fallbackSummary(snapshot), FALLBACK);
});

test("generateSummary does not call the model for an empty corpus", async () => {
  const { model, requests } = stubModel(() => "unused");
  assert.strictEqual(await generateSummary(emptySnapshot, model), NO_DOCUMENTS_SUMMARY);
  assert.strictEqual(requests.length, 0);
});

test("generateSummary returns the model's text without fences", async () => {
  const { model, requests } = stubModel(() => "```markdown\n## Key Findings\n- Jane Doe\n```");
  assert.strictEqual(await generateSummary(snapshot, model), "## Key Findings\n- Jane Doe");
  assert.strictEqual(requests.length, 1);
  assert.ok(requests[0].prompt.includes("Total Documents Analyzed: 3"));
});

test("generateSummary falls back when the model fails or answers empty", async () => {
  const failing = stubModel(() => {
    throw new Error("overloaded");
  });
  assert.strictEqual(await generateSummary(snapshot, failing.model), FALLBACK);

  const blank = stubModel(() => "  \n ");
  assert.strictEqual(await generateSummary(snapshot, blank.model), FALLBACK);
});

test("replaceSummarySection replaces an existing section body", () => {
  const readme = "# Corpus\n\n### Latest Context Update\n\nold body\nmore old\n\n---\n\n## Files\n";
  assert.strictEqual(
    replaceSummarySection(readme, "Costs $& more"),
    "# Corpus\n\n### Latest Context Update\n\nCosts $& more\n\n---\n\n## Files\n",
  );
});

test("replaceSummarySection inserts after the status line", () => {
  assert.strictEqual(
    replaceSummarySection("# Corpus\n**Status:** Processing\n\n## Files\n", "New"),
    "# Corpus\n**Status:** Processing\n\n### Latest Context Update\n\nNew\n\n---\n\n## Files\n",
  );
});

test("replaceSummarySection appends the section otherwise", () => {
  assert.strictEqual(replaceSummarySection("# Corpus", "New"), "# Corpus\n\n### Latest Context Update\n\nNew\n\n---\n");
});

test("updateReadmeSummary writes only when the content changes", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "summary-"));
  try {
    const readme = path.join(dir, "README.md");
    assert.strictEqual(updateReadmeSummary(readme, "New"), false);

    fs.writeFileSync(readme, "# Corpus", "utf-8");
    assert.strictEqual(updateReadmeSummary(readme, "New"), true);
    assert.strictEqual(fs.readFileSync(readme, "utf-8"), "# Corpus\n\n### Latest Context Update\n\nNew\n\n---\n");
    assert.strictEqual(updateReadmeSummary(readme, "New"), false);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("runSummaryStage writes the status report and snapshot when the model fails", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "summary-"));
  try {
    fs.mkdirSync(path.join(dir, "IMAGES"));
    fs.writeFileSync(
      path.join(dir, "IMAGES", "scan.json"),
      JSON.stringify({ structured_data: { people: ["Jane Doe"] } }),
      "utf-8",
    );
    fs.writeFileSync(path.join(dir, "README.md"), "# Corpus", "utf-8");

    const result = await runSummaryStage({ baseDir: dir, model: unavailableModel, saveSnapshot: true });

    const expected = `### Processing Status

- Total documents analyzed: 1
- Named individuals identified: 1
- Organizations found: 0
- Document types: image_analysis

(Strategic analysis temporarily unavailable - processing continues)`;
    assert.strictEqual(result.summary, expected);
    assert.strictEqual(result.readmeUpdated, true);
    assert.strictEqual(result.snapshotPath, path.join(dir, WORK_DIR, SNAPSHOT_FILE));
    const saved = JSON.parse(fs.readFileSync(path.join(dir, WORK_DIR, SNAPSHOT_FILE), "utf-8"));
    assert.deepStrictEqual(saved.named_individuals, ["Jane Doe"]);
    assert.strictEqual(saved.total_documents, 1);

    // the saved snapshot sits in the working area and is not aggregated again
    const again = await runSummaryStage({ baseDir: dir, model: unavailableModel });
    assert.strictEqual(again.snapshot.totalDocuments, 1);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
