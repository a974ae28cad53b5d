import type { DocsFile } from "@shared/schema";
import type { ProviderDocument } from "../providers/types";

export interface SyncPlan {
  toIndex: ProviderDocument[];
  unchanged: ProviderDocument[];
  toRemove: DocsFile[];
  /** Ids that appeared more than once in the listing; only the first was kept. */
  duplicates: string[];
}

/**
 * A tracked document counts as unchanged only when the provider reports at
 * least one of etag/lastModified and every reported one matches. Either
 * marker differing is enough to re-index.
 */
export function hasChanged(remote: ProviderDocument, tracked: DocsFile | undefined): boolean {
  if (!tracked) return true;
  if (remote.etag === undefined && remote.lastModified === undefined) return true;

  if (remote.etag !== undefined && remote.etag !== tracked.etag) return true;
  if (remote.lastModified !== undefined) {
    if (!tracked.lastModified) return true;
    if (remote.lastModified.getTime() !== tracked.lastModified.getTime()) return true;
  }
  return false;
}

export function diffDocuments(remote: readonly ProviderDocument[], tracked: readonly DocsFile[]): SyncPlan {
  const trackedById = new Map(tracked.map((t) => [t.docId, t]));
  const seen = new Set<string>();
  const duplicates: string[] = [];
  const toIndex: ProviderDocument[] = [];
  const unchanged: ProviderDocument[] = [];

  for (const doc of remote) {
    if (seen.has(doc.documentId)) {
      duplicates.push(doc.documentId);
      continue;
    }
    seen.add(doc.documentId);

    if (hasChanged(doc, trackedById.get(doc.documentId))) {
      toIndex.push(doc);
    } else {
      unchanged.push(doc);
    }
  }

  const toRemove = tracked.filter((t) => !seen.has(t.docId));
  return { toIndex, unchanged, toRemove, duplicates };
}
