import type { GroupingProposal, ProposedGroup } from "@/types";
import { extractJson, isRecord } from "@/lib/claude";
import { MalformedResponseError } from "@/lib/errors";

function stringEntries(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string");
}

function fallbackLetterId(position: number): string {
  return `L${String(position).padStart(4, "0")}`;
}

/**
 * Letter IDs name a folder directly under the letters directory, so anything
 * that could address another path is refused.
 */
export function isSafeLetterId(id: string): boolean {
  if (id === "." || id === "..") return false;
  return !/[\/\\\u0000]/.test(id);
}

function letterIdFor(value: unknown, position: number): string {
  const id = typeof value === "string" ? value.trim() : "";
  if (!id) return fallbackLetterId(position);
  if (!isSafeLetterId(id)) {
    console.log(`  Warning: letter id ${JSON.stringify(id)} is not a plain name; using ${fallbackLetterId(position)}`);
    return fallbackLetterId(position);
  }
  return id;
}

/**
 * Validate the model's grouping answer field by field.
 *
 * The result is data, not routing: page references are kept as plain strings
 * and only become pages once reconcileGroups() finds them on disk.
 */
export function parseGroupingResponse(raw: string): GroupingProposal {
  const parsed = extractJson(raw);

  if (!isRecord(parsed) || !Array.isArray(parsed.letters)) {
    throw new MalformedResponseError("Grouping response has no \"letters\" array", raw);
  }

  const groups: ProposedGroup[] = [];
  parsed.letters.forEach((entry: unknown, index: number) => {
    if (!isRecord(entry)) {
      console.log(`  Warning: ignoring non-object letter entry at position ${index + 1}`);
      return;
    }
    const id = letterIdFor(entry.id, index + 1);
    groups.push({
      id,
      pageReferences: stringEntries(entry.pages),
      confidence: entry.confidence,
      reason: entry.reason,
      raw: { ...entry, id },
    });
  });

  return { groups, unassigned: stringEntries(parsed.unassigned_pages) };
}
