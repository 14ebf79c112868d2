import fs from "fs";
import path from "path";
import type { AggregatedSnapshot, AggregationResult, DocumentSample, Finding, SkippedFile } from "@/types";
import { isRecord } from "@/lib/claude";
import { errorMessage, FileSystemError } from "@/lib/errors";
import { listFilesRecursive } from "@/lib/utils";

/** The pipeline's own working area and version-control metadata. */
export const DEFAULT_EXCLUDED_SEGMENTS = ["pipeline", ".git"] as const;
export const MAX_SAMPLES = 20;

const ENTITY_FIELDS = {
  people: "namedIndividuals",
  organizations: "organizations",
  locations: "locations",
  dates: "dates",
} as const;

type EntitySetName = (typeof ENTITY_FIELDS)[keyof typeof ENTITY_FIELDS];

export interface AggregateOptions {
  excludeSegments?: readonly string[];
  maxSamples?: number;
}

/** Trimmed string form of an entity value, or null when it isn't one. */
function normalizeEntity(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * Document type of a parsed analysis: its own document_type field when it
 * has one, otherwise a guess from the filename.
 */
export function classifyDocument(fileName: string, data: Record<string, unknown>): string {
  if ("document_type" in data) return String(data.document_type);
  if (fileName === "meta.json") return "letter";
  if (fileName.startsWith("llm_grouping")) return "grouping";
  if (fileName.includes("_extraction")) return "text_extraction";
  return "image_analysis";
}

function noteText(note: unknown): string {
  return typeof note === "string" ? note : JSON.stringify(note);
}

function isNonEmptyNote(note: unknown): boolean {
  if (note === null || note === undefined || note === false || note === 0) return false;
  if (typeof note === "string") return note.trim().length > 0;
  if (Array.isArray(note)) return note.length > 0;
  if (isRecord(note)) return Object.keys(note).length > 0;
  return true;
}

/**
 * Fold every per-document JSON analysis under `baseDir` into one snapshot.
 *
 * State lives only for the duration of this call; the returned snapshot is
 * frozen. Files that fail to parse are skipped and do not count as documents.
 */
export function aggregateCorpus(baseDir: string, options: AggregateOptions = {}): AggregationResult {
  const excluded = new Set(options.excludeSegments ?? DEFAULT_EXCLUDED_SEGMENTS);
  const maxSamples = options.maxSamples ?? MAX_SAMPLES;
  const skipped: SkippedFile[] = [];

  let files: string[];
  try {
    files = listFilesRecursive(baseDir, (f) => f.toLowerCase().endsWith(".json"), {
      skipDirs: Array.from(excluded),
      onError: (dir, err) => {
        console.log(`  Warning: skipping unreadable directory ${dir}: ${errorMessage(err)}`);
        skipped.push({ path: dir, reason: errorMessage(err) });
      },
    });
  } catch (err) {
    throw new FileSystemError(`Cannot read corpus directory: ${baseDir}`, baseDir, { cause: err });
  }

  const sets: Record<EntitySetName, Set<string>> = {
    namedIndividuals: new Set(),
    organizations: new Set(),
    locations: new Set(),
    dates: new Set(),
  };
  const documentTypeCounts = new Map<string, number>();
  const samples: DocumentSample[] = [];
  const findings: Finding[] = [];
  let totalDocuments = 0;

  console.log(`  Found ${files.length} JSON files to aggregate`);

  for (const file of files) {
    const fileName = path.basename(file);
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(file, "utf-8"));
    } catch (err) {
      console.log(`  Warning: could not process ${fileName}: ${errorMessage(err)}`);
      skipped.push({ path: file, reason: errorMessage(err) });
      continue;
    }

    totalDocuments++;
    if (!isRecord(data)) continue;

    const structured = data.structured_data;
    if (isRecord(structured)) {
      for (const [field, setName] of Object.entries(ENTITY_FIELDS)) {
        const values = structured[field];
        if (!Array.isArray(values)) continue;
        for (const value of values) {
          const normalized = normalizeEntity(value);
          if (normalized) sets[setName].add(normalized);
        }
      }
    }

    const metadata = data.document_metadata;
    if (isRecord(metadata)) {
      const date = normalizeEntity(metadata.date);
      if (date) sets.dates.add(date);
    }

    if (isNonEmptyNote(data.notes)) {
      findings.push({ file: fileName, note: noteText(data.notes) });
    }

    const type = classifyDocument(fileName, data);
    documentTypeCounts.set(type, (documentTypeCounts.get(type) ?? 0) + 1);

    if (samples.length < maxSamples) {
      samples.push({ file: fileName, data });
    }
  }

  const snapshot: AggregatedSnapshot = Object.freeze({
    namedIndividuals: Object.freeze(Array.from(sets.namedIndividuals).sort()),
    organizations: Object.freeze(Array.from(sets.organizations).sort()),
    locations: Object.freeze(Array.from(sets.locations).sort()),
    dates: Object.freeze(Array.from(sets.dates).sort()),
    documentTypeCounts: Object.freeze(Object.fromEntries(documentTypeCounts)),
    totalDocuments,
    samples: Object.freeze(samples),
    explosiveFindings: Object.freeze(findings),
  });

  return { snapshot, skipped };
}

/** JSON form of a snapshot, using the field names downstream readers expect. */
export function snapshotToJson(snapshot: AggregatedSnapshot): Record<string, unknown> {
  return {
    named_individuals: snapshot.namedIndividuals,
    organizations: snapshot.organizations,
    locations: snapshot.locations,
    dates: snapshot.dates,
    document_types: snapshot.documentTypeCounts,
    total_documents: snapshot.totalDocuments,
    explosive_findings: snapshot.explosiveFindings,
    file_samples: snapshot.samples,
  };
}
