import type { AnnotationStore } from "@numbermark/core";
import type { PDFDocument } from "pdf-lib";

/**
 * The store travels inside the document's Keywords entry as
 * `<key>:<store JSON>`. Whatever keywords were there before are replaced.
 */
export function writeStoreMetadata(
  document: PDFDocument,
  store: AnnotationStore,
  key: string
): void {
  document.setKeywords([`${key}:${store.toJSON()}`]);
}

/** Returns the stored JSON, or undefined when the keywords are not ours. */
export function readStoreMetadata(document: PDFDocument, key: string): string | undefined {
  const keywords = document.getKeywords();
  const prefix = `${key}:`;
  if (!keywords?.startsWith(prefix)) {
    return undefined;
  }
  return keywords.slice(prefix.length);
}
