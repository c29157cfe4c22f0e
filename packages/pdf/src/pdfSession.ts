/**
 * PDF sessions
 *
 * Binds a loaded PDF, its annotation surface and a document session. Opening
 * restores the annotations saved in the document's metadata and re-links
 * them to their marks; saving writes the metadata back and serializes.
 */

import {
  DEFAULT_CONFIG,
  DocumentSession,
  type NumbermarkConfig,
  type NumbermarkLogger,
  type NumberStyle,
  type StyleCatalog,
  type UndoLogCallbacks,
  getLogger,
  isNumbermarkError,
} from "@numbermark/core";
import { PDFDocument } from "pdf-lib";
import { PdfAnnotationSurface } from "./pdfAnnotationSurface.js";
import { readStoreMetadata, writeStoreMetadata } from "./metadata.js";

export interface OpenPdfSessionOptions {
  config?: NumbermarkConfig;
  logger?: NumbermarkLogger;
  catalog?: StyleCatalog;
  /** Identifies the document in log entries, usually its path */
  docId?: string;
  initialStyle?: Readonly<NumberStyle>;
  historyCallbacks?: UndoLogCallbacks;
}

export type PdfSessionHandle = {
  document: PDFDocument;
  surface: PdfAnnotationSurface;
  session: DocumentSession;
  config: NumbermarkConfig;
  /** Annotations restored from metadata; 0 when there was none or it was unreadable */
  restored: number;
};

export async function openPdfSession(
  bytes: Uint8Array | ArrayBuffer,
  options: OpenPdfSessionOptions = {}
): Promise<PdfSessionHandle> {
  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? getLogger();
  const document = await PDFDocument.load(bytes);
  const surface = new PdfAnnotationSurface(document, {
    matchTolerance: config.pdf.matchTolerance,
    logger,
  });
  const session = new DocumentSession({
    config,
    surface,
    logger,
    catalog: options.catalog,
    docId: options.docId,
    pageCount: document.getPageCount(),
    initialStyle: options.initialStyle,
    historyCallbacks: options.historyCallbacks,
  });

  let restored = 0;
  const payload = readStoreMetadata(document, config.pdf.metadataKey);
  if (payload !== undefined) {
    try {
      restored = session.load(payload, { redraw: false });
      surface.syncLocators(session.store);
    } catch (error) {
      if (!isNumbermarkError(error)) {
        throw error;
      }
      logger.warn(
        "persistence",
        "Ignoring unreadable annotation metadata",
        { docId: options.docId },
        error
      );
    }
  }
  session.acknowledgeSave();
  logger.info("persistence", `Opened document with ${restored} annotations`, {
    docId: options.docId,
    pages: document.getPageCount(),
  });
  return { document, surface, session, config, restored };
}

export async function savePdfSession(handle: PdfSessionHandle): Promise<Uint8Array> {
  writeStoreMetadata(handle.document, handle.session.store, handle.config.pdf.metadataKey);
  const bytes = await handle.document.save();
  handle.session.acknowledgeSave();
  return bytes;
}
