import type { Page } from "@/types";

/**
 * Task instructions for the grouping call. The model answers with the
 * letters/unassigned_pages object that parseGroupingResponse() validates.
 */
export const GROUPING_INSTRUCTIONS = `You will receive a list of document pages from an investigative document release.
Each item has a filename and its full text content.
Group pages that belong to the same narrative/letter/memo and order pages within each group.

Rules:
- Use ONLY the provided pages. Do not invent or omit pages.
- Group pages that clearly continue the same document (shared salutations, signatures, identifiers, dates, or topics).
- Order pages according to content flow; maintain chronological continuity when dates are present.
- If a page is ambiguous, place it in the best-fitting group with low confidence or leave it unassigned.
- Do NOT alter or rewrite page text. Preserve provenance.
- Output STRICT JSON only with this schema (no commentary):
  {
    "letters": [
      { "id": "L0001", "pages": ["<filename>", ...], "confidence": 0.0, "reason": "..." },
      { "id": "L0002", "pages": [ ... ], "confidence": 0.0, "reason": "..." }
    ],
    "unassigned_pages": ["<filename>", ...]
  }`;

export const LISTING_START = "--- PAGES START ---";
export const LISTING_END = "--- PAGES END ---";
export const PAGE_START = "=== PAGE START ===";
export const PAGE_END = "=== PAGE END ===";

/**
 * Serialize pages for the grouping call. Page text and translation are
 * copied verbatim between explicit markers, in the given order.
 */
export function buildPageListing(pages: readonly Page[]): string {
  const parts: string[] = [LISTING_START];
  for (const page of pages) {
    parts.push(PAGE_START);
    parts.push(`filename: ${page.key}`);
    parts.push("text:");
    parts.push(page.text);
    if (page.translation) {
      parts.push("english:");
      parts.push(page.translation);
    }
    parts.push(PAGE_END);
  }
  parts.push(LISTING_END);
  return parts.join("\n");
}

/** The exact request body sent to the model (and saved for audit). */
export function buildGroupingPayload(pages: readonly Page[]): string {
  return `${GROUPING_INSTRUCTIONS}\n\n${buildPageListing(pages)}`;
}
