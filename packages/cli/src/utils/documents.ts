import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { AnnotationStore, type NumbermarkConfig, type NumbermarkLogger } from "@numbermark/core";
import { type PdfSessionHandle, openPdfSession } from "@numbermark/pdf";
import { type DocumentReport, buildReport } from "./output";

export function isPdfPath(path: string): boolean {
  return extname(path).toLowerCase() === ".pdf";
}

export async function openPdfFile(
  path: string,
  config: NumbermarkConfig,
  logger: NumbermarkLogger
): Promise<PdfSessionHandle> {
  const bytes = await readFile(path);
  return openPdfSession(bytes, { config, logger, docId: path });
}

export function reportForPdf(path: string, handle: PdfSessionHandle): DocumentReport {
  const linked = new Set(
    handle.surface
      .listMarks()
      .map((mark) => mark.name)
      .filter((name): name is string => name !== undefined)
  );
  return buildReport(path, handle.session.store, {
    pages: handle.document.getPageCount(),
    isLinked: (annotation) => linked.has(annotation.id),
  });
}

/** Reports on a PDF's stored annotations or on an exported positions file. */
export async function reportForFile(
  path: string,
  config: NumbermarkConfig,
  logger: NumbermarkLogger
): Promise<DocumentReport> {
  if (isPdfPath(path)) {
    return reportForPdf(path, await openPdfFile(path, config, logger));
  }
  const store = new AnnotationStore({ logger });
  store.fromJSON(await readFile(path, "utf8"));
  return buildReport(path, store);
}
