// ── Pages ───────────────────────────────────────────────────────────────────

/** One OCR'd or extracted page of text, tied to a single source file. */
export interface Page {
  key: string;
  text: string;
  sourcePath: string;
  translation?: string;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface PageLoadResult {
  pages: Page[];
  skipped: SkippedFile[];
  /** Page keys that more than one source file mapped to. */
  collisions: string[];
}

// ── Grouping (untrusted model output) ───────────────────────────────────────

export interface ProposedGroup {
  id: string;
  pageReferences: string[];
  /** Passed through as received; the model does not always send a number. */
  confidence: unknown;
  reason: unknown;
  /** Every field of the group as the model sent it, for the provenance record. */
  raw: Record<string, unknown>;
}

export interface GroupingProposal {
  groups: ProposedGroup[];
  unassigned: string[];
}

// ── Reconciliation ──────────────────────────────────────────────────────────

export type ReferenceResolution =
  | { status: "exact"; reference: string; page: Page }
  | { status: "prefix"; reference: string; prefix: string; page: Page }
  | { status: "unresolved"; reference: string };

export interface ReconciledGroup {
  proposed: ProposedGroup;
  resolutions: ReferenceResolution[];
  /** Resolved pages in reference order; unresolved references are dropped. */
  pages: Page[];
}

export interface ReconciliationReport {
  unresolved: Array<{ groupId: string; reference: string }>;
  ambiguousPrefixes: Array<{ prefix: string; keys: string[] }>;
  multiplyAssigned: string[];
  unreferenced: string[];
}

export interface Reconciliation {
  groups: ReconciledGroup[];
  report: ReconciliationReport;
}

// ── Letters ─────────────────────────────────────────────────────────────────

export interface Letter {
  id: string;
  folderName: string;
  pageKeys: string[];
  concatenatedText: string;
  sourceFiles: string[];
  referenceIds: string[];
  proposed: ProposedGroup;
}

export type LetterOutcome =
  | { letter: Letter; written: true; folder: string }
  | { letter: Letter; written: false; folder: string; error: string };

// ── Aggregation ─────────────────────────────────────────────────────────────

export interface DocumentSample {
  file: string;
  data: unknown;
}

export interface Finding {
  file: string;
  note: string;
}

export interface AggregatedSnapshot {
  readonly namedIndividuals: readonly string[];
  readonly organizations: readonly string[];
  readonly locations: readonly string[];
  readonly dates: readonly string[];
  readonly documentTypeCounts: Readonly<Record<string, number>>;
  readonly totalDocuments: number;
  readonly samples: readonly DocumentSample[];
  readonly explosiveFindings: readonly Finding[];
}

export interface AggregationResult {
  snapshot: AggregatedSnapshot;
  skipped: SkippedFile[];
}

// ── Model collaborator ──────────────────────────────────────────────────────

export type ImageMediaType = "image/jpeg" | "image/png" | "image/gif" | "image/webp";

export interface ModelImage {
  base64: string;
  mediaType: ImageMediaType;
}

export interface ModelRequest {
  system?: string;
  prompt: string;
  images?: ModelImage[];
  maxTokens?: number;
  temperature?: number;
}

export interface CallUsage {
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  durationMs: number;
}

export interface ModelResponse {
  text: string;
  usage: CallUsage;
}

/** A blocking request/response call to the hosted model. */
export type TextModel = (request: ModelRequest) => Promise<ModelResponse>;
