import type {
  GroupingProposal,
  Page,
  ReconciledGroup,
  Reconciliation,
  ReconciliationReport,
  ReferenceResolution,
} from "@/types";

export const PREFIX_SEPARATOR = "_";

/**
 * The ID prefix of a page key or reference: everything before the first "_".
 * Models often drop suffixes such as "_1_105_c", leaving just this prefix.
 */
export function prefixOf(key: string): string {
  const idx = key.indexOf(PREFIX_SEPARATOR);
  return idx === -1 ? key : key.slice(0, idx);
}

export interface PageIndex {
  byKey: Map<string, Page>;
  /** Last page (in page order) per prefix. */
  byPrefix: Map<string, Page>;
  /** Every key seen per prefix, to report ambiguous fallbacks. */
  keysByPrefix: Map<string, string[]>;
}

export function buildPageIndex(pages: readonly Page[]): PageIndex {
  const byKey = new Map<string, Page>();
  const byPrefix = new Map<string, Page>();
  const keysByPrefix = new Map<string, string[]>();

  for (const page of pages) {
    byKey.set(page.key, page);
    const prefix = prefixOf(page.key);
    byPrefix.set(prefix, page);
    const keys = keysByPrefix.get(prefix);
    if (keys) keys.push(page.key);
    else keysByPrefix.set(prefix, [page.key]);
  }

  return { byKey, byPrefix, keysByPrefix };
}

/** Exact key first, then the reference's own prefix against the prefix index. */
export function resolveReference(reference: string, index: PageIndex): ReferenceResolution {
  const exact = index.byKey.get(reference);
  if (exact) return { status: "exact", reference, page: exact };

  const prefix = prefixOf(reference);
  const byPrefix = index.byPrefix.get(prefix);
  if (byPrefix) return { status: "prefix", reference, prefix, page: byPrefix };

  return { status: "unresolved", reference };
}

/**
 * Resolve every page reference of the proposed groups against the pages on disk.
 *
 * References that match nothing are dropped from their group; a group whose
 * references all fail still comes back, with no pages. The same page may end
 * up in several groups; that is reported, not corrected.
 */
export function reconcileGroups(proposal: GroupingProposal, pages: readonly Page[]): Reconciliation {
  const index = buildPageIndex(pages);
  const report: ReconciliationReport = {
    unresolved: [],
    ambiguousPrefixes: [],
    multiplyAssigned: [],
    unreferenced: [],
  };

  const assignedCount = new Map<string, number>();
  const usedAmbiguous = new Set<string>();
  const groups: ReconciledGroup[] = [];

  for (const proposed of proposal.groups) {
    const resolutions = proposed.pageReferences.map((ref) => resolveReference(ref, index));
    const groupPages: Page[] = [];
    const groupKeys = new Set<string>();

    for (const res of resolutions) {
      if (res.status === "unresolved") {
        report.unresolved.push({ groupId: proposed.id, reference: res.reference });
        continue;
      }
      if (res.status === "prefix" && (index.keysByPrefix.get(res.prefix)?.length ?? 0) > 1) {
        usedAmbiguous.add(res.prefix);
      }
      groupPages.push(res.page);
      groupKeys.add(res.page.key);
    }

    for (const key of Array.from(groupKeys)) {
      assignedCount.set(key, (assignedCount.get(key) ?? 0) + 1);
    }
    groups.push({ proposed, resolutions, pages: groupPages });
  }

  for (const prefix of Array.from(usedAmbiguous).sort()) {
    report.ambiguousPrefixes.push({ prefix, keys: index.keysByPrefix.get(prefix) ?? [] });
  }

  const unassigned = new Set<string>();
  for (const ref of proposal.unassigned) {
    const res = resolveReference(ref, index);
    if (res.status !== "unresolved") unassigned.add(res.page.key);
  }
  for (const page of pages) {
    const count = assignedCount.get(page.key) ?? 0;
    if (count > 1) report.multiplyAssigned.push(page.key);
    if (count === 0 && !unassigned.has(page.key)) report.unreferenced.push(page.key);
  }

  return { groups, report };
}
