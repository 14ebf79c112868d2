import path from "path";

/** Document IDs look like "HOUSE_OVERSIGHT_010477" or "EFTA00000001". */
const DOCUMENT_ID_PATTERN = /[A-Z]+(?:_[A-Z]+)*_?\d+/;

/** First document ID in a filename's stem, if any. */
export function extractAnalysisId(fileName: string): string | undefined {
  const stem = path.basename(fileName, path.extname(fileName));
  return DOCUMENT_ID_PATTERN.exec(stem)?.[0];
}

export function processingMetadata(model: string, now: Date = new Date()): { processed_at: string; model: string } {
  return { processed_at: now.toISOString(), model };
}
