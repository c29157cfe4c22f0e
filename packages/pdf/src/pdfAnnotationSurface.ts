/**
 * PDF annotation surface
 *
 * Draws each number annotation as a FreeText annotation with its own
 * appearance stream, named (/NM) after the entity id. Marks are found again
 * by the stored locator (the annotation's object reference), then by name,
 * then by their rectangle on the annotation's page.
 */

import {
  type AnnotationStore,
  type AnnotationSurface,
  type NumberAnnotation,
  type NumbermarkLogger,
  NumbermarkError,
  type SurfaceLocator,
  getLogger,
} from "@numbermark/core";
import {
  PDFArray,
  PDFDict,
  type PDFDocument,
  type PDFFont,
  PDFHexString,
  PDFName,
  type PDFOperator,
  type PDFPage,
  PDFRef,
  PDFString,
  StandardFonts,
  beginText,
  endText,
  fill,
  lineTo,
  moveText,
  moveTo,
  popGraphicsState,
  pushGraphicsState,
  rectangle,
  setFillingRgbColor,
  setFontAndSize,
  setLineWidth,
  setStrokingRgbColor,
  showText,
  stroke,
} from "pdf-lib";
import {
  type MarkGeometry,
  type Rect,
  hexToRgb,
  layoutMark,
  rectsMatch,
  toPdfRectArray,
} from "./geometry.js";

// ============================================================================
// Types
// ============================================================================

export interface PdfAnnotationSurfaceOptions {
  /** Points of slack allowed when matching a mark by its rectangle */
  matchTolerance?: number;
  logger?: NumbermarkLogger;
}

export type MarkInfo = {
  page: number;
  /** Value of /NM, when present */
  name?: string;
  /** Value of /Contents, when present */
  contents?: string;
  rect?: Rect;
  objectNumber?: number;
};

type MarkHit = {
  page: number;
  annots: PDFArray;
  index: number;
  dict: PDFDict;
  ref?: PDFRef;
};

const FONT_KEY = "Helv";
const DEFAULT_MATCH_TOLERANCE = 2;

const NAME = {
  annots: PDFName.of("Annots"),
  subtype: PDFName.of("Subtype"),
  freeText: PDFName.of("FreeText"),
  nm: PDFName.of("NM"),
  contents: PDFName.of("Contents"),
  rect: PDFName.of("Rect"),
  ap: PDFName.of("AP"),
  n: PDFName.of("N"),
};

function readText(dict: PDFDict, key: PDFName): string | undefined {
  const value = dict.get(key);
  if (value instanceof PDFString || value instanceof PDFHexString) {
    return value.decodeText();
  }
  return undefined;
}

function readRect(dict: PDFDict): Rect | undefined {
  const array = dict.lookupMaybe(NAME.rect, PDFArray);
  if (!array || array.size() !== 4) {
    return undefined;
  }
  const { x, y, width, height } = array.asRectangle();
  // Rect corners may come in any order
  return {
    x: Math.min(x, x + width),
    y: Math.min(y, y + height),
    width: Math.abs(width),
    height: Math.abs(height),
  };
}

function isFreeText(dict: PDFDict): boolean {
  return dict.get(NAME.subtype) === NAME.freeText;
}

function locatorRef(locator: SurfaceLocator | undefined): PDFRef | undefined {
  const objectNumber = locator?.objectNumber;
  const generation = locator?.generation;
  if (typeof objectNumber !== "number" || typeof generation !== "number") {
    return undefined;
  }
  return PDFRef.of(objectNumber, generation);
}

// ============================================================================
// Surface
// ============================================================================

export class PdfAnnotationSurface implements AnnotationSurface {
  private readonly logger: NumbermarkLogger;
  private readonly tolerance: number;
  private font?: PDFFont;

  constructor(
    readonly document: PDFDocument,
    options: PdfAnnotationSurfaceOptions = {}
  ) {
    this.logger = options.logger ?? getLogger();
    this.tolerance = options.matchTolerance ?? DEFAULT_MATCH_TOLERANCE;
  }

  apply(annotation: Readonly<NumberAnnotation>): SurfaceLocator {
    const page = this.page(annotation.page);
    const previous = this.findMark(annotation, false);
    if (previous) {
      this.deleteMark(previous);
    }

    const geometry = this.layout(annotation, page);
    const ref = this.document.context.register(this.buildMark(annotation, page, geometry));
    this.ensureAnnots(page).push(ref);

    this.logger.debug("surface", `Drew #${annotation.label}`, {
      annotationId: annotation.id,
      page: annotation.page,
      replaced: previous !== undefined,
    });
    return { objectNumber: ref.objectNumber, generation: ref.generationNumber };
  }

  remove(annotation: Readonly<NumberAnnotation>): boolean {
    const hit = this.findMark(annotation, true);
    if (!hit) {
      return false;
    }
    this.deleteMark(hit);
    this.logger.debug("surface", `Erased #${annotation.label}`, { annotationId: annotation.id });
    return true;
  }

  /** Redraws every annotation of the store, replacing the marks named after it. */
  rebuild(store: AnnotationStore): number {
    const ids = new Set(store.all().map((annotation) => annotation.id));
    for (const hit of [...this.marks()].reverse()) {
      const name = readText(hit.dict, NAME.nm);
      if (name !== undefined && ids.has(name)) {
        this.deleteMark(hit);
      }
    }
    for (const annotation of store.all()) {
      annotation.locator = this.apply(annotation);
    }
    return ids.size;
  }

  /** Re-reads every locator from the marks' names; returns how many matched. */
  syncLocators(store: AnnotationStore): number {
    const byId = new Map(store.all().map((annotation) => [annotation.id, annotation] as const));
    const found = new Set<string>();
    for (const hit of this.marks()) {
      const name = readText(hit.dict, NAME.nm);
      const annotation = name === undefined ? undefined : byId.get(name);
      if (annotation && hit.ref) {
        annotation.locator = {
          objectNumber: hit.ref.objectNumber,
          generation: hit.ref.generationNumber,
        };
        found.add(annotation.id);
      }
    }
    for (const annotation of byId.values()) {
      if (!found.has(annotation.id)) {
        delete annotation.locator;
        this.logger.logSurfaceMiss(annotation.id, annotation.label, "sync");
      }
    }
    return found.size;
  }

  /** Every FreeText annotation in the document, in page order. */
  listMarks(): MarkInfo[] {
    return [...this.marks()].map((hit) => ({
      page: hit.page,
      name: readText(hit.dict, NAME.nm),
      contents: readText(hit.dict, NAME.contents),
      rect: readRect(hit.dict),
      objectNumber: hit.ref?.objectNumber,
    }));
  }

  // --------------------------------------------------------------------------
  // Lookup
  // --------------------------------------------------------------------------

  private findMark(
    annotation: Readonly<NumberAnnotation>,
    byPosition: boolean
  ): MarkHit | undefined {
    const ref = locatorRef(annotation.locator);
    if (ref) {
      for (const hit of this.marks(annotation.page)) {
        if (hit.ref === ref && readText(hit.dict, NAME.nm) === annotation.id) {
          return hit;
        }
      }
      this.logger.debug("surface", `Stale locator for #${annotation.label}`, {
        annotationId: annotation.id,
      });
    }

    for (const hit of this.marks(annotation.page)) {
      if (readText(hit.dict, NAME.nm) === annotation.id) {
        return hit;
      }
    }

    if (!byPosition || annotation.page >= this.document.getPageCount()) {
      return undefined;
    }
    const expected = this.layout(annotation, this.page(annotation.page)).rect;
    for (const hit of this.marks(annotation.page)) {
      if (hit.page !== annotation.page) {
        break;
      }
      const name = readText(hit.dict, NAME.nm);
      const rect = readRect(hit.dict);
      const claimable = name === undefined || name === annotation.id;
      if (claimable && rect && rectsMatch(rect, expected, this.tolerance)) {
        return hit;
      }
    }
    return undefined;
  }

  /** FreeText marks of every page, starting with `firstPage` when given. */
  private *marks(firstPage?: number): Generator<MarkHit> {
    const pages = this.document.getPages();
    const order = pages.map((_page, index) => index);
    if (firstPage !== undefined && firstPage < pages.length) {
      order.splice(firstPage, 1);
      order.unshift(firstPage);
    }
    for (const pageIndex of order) {
      const annots = pages[pageIndex].node.lookupMaybe(NAME.annots, PDFArray);
      if (!annots) {
        continue;
      }
      for (let index = 0; index < annots.size(); index += 1) {
        const dict = annots.lookupMaybe(index, PDFDict);
        if (!dict || !isFreeText(dict)) {
          continue;
        }
        const raw = annots.get(index);
        const ref = raw instanceof PDFRef ? raw : undefined;
        yield { page: pageIndex, annots, index, dict, ref };
      }
    }
  }

  // --------------------------------------------------------------------------
  // Drawing
  // --------------------------------------------------------------------------

  private page(index: number): PDFPage {
    const count = this.document.getPageCount();
    if (!Number.isInteger(index) || index < 0 || index >= count) {
      throw new NumbermarkError(
        "PAGE_OUT_OF_RANGE",
        `Page ${index} is outside the document (${count} pages)`,
        { context: { page: index, pageCount: count } }
      );
    }
    return this.document.getPage(index);
  }

  private helvetica(): PDFFont {
    if (!this.font) {
      this.font = this.document.embedStandardFont(StandardFonts.Helvetica);
    }
    return this.font;
  }

  private layout(annotation: Readonly<NumberAnnotation>, page: PDFPage): MarkGeometry {
    const font = this.helvetica();
    const measure = (text: string, size: number) => font.widthOfTextAtSize(text, size);
    return layoutMark(annotation.label, annotation.style, annotation, page.getHeight(), measure);
  }

  private buildMark(
    annotation: Readonly<NumberAnnotation>,
    page: PDFPage,
    geometry: MarkGeometry
  ): PDFDict {
    const { context } = this.document;
    const { style } = annotation;
    const textColor = hexToRgb(style.textColor);
    const borderWidth = style.borderEnabled ? style.borderWidth : 0;

    const appearance = context.register(
      context.formXObject(this.appearanceOperators(annotation, geometry), {
        BBox: [0, 0, geometry.rect.width, geometry.rect.height],
        Resources: { Font: { [FONT_KEY]: this.helvetica().ref } },
      })
    );

    const dict = context.obj({
      Type: "Annot",
      Subtype: "FreeText",
      Rect: toPdfRectArray(geometry.rect),
      P: page.ref,
      F: 4,
      Q: 1,
      NM: PDFHexString.fromText(annotation.id),
      Contents: PDFHexString.fromText(annotation.label),
      DA: PDFString.of(`/${FONT_KEY} ${style.fontSize} Tf ${textColor.join(" ")} rg`),
      Border: [0, 0, borderWidth],
      AP: { N: appearance },
    });

    if (style.bgOpacity > 0) {
      dict.set(PDFName.of("C"), context.obj(hexToRgb(style.bgColor)));
      if (style.bgOpacity < 1) {
        dict.set(PDFName.of("CA"), context.obj(style.bgOpacity));
      }
    }
    if (style.borderEnabled) {
      dict.set(PDFName.of("BS"), context.obj({ W: style.borderWidth, S: "S" }));
    }
    if (geometry.tail > 0) {
      const centre = geometry.rect.x + geometry.rect.width / 2;
      dict.set(PDFName.of("IT"), PDFName.of("FreeTextCallout"));
      const callout = [centre, geometry.rect.y, centre, geometry.rect.y + geometry.tail];
      dict.set(PDFName.of("CL"), context.obj(callout));
      dict.set(PDFName.of("RD"), context.obj([0, 0, 0, geometry.tail]));
    }
    return dict;
  }

  private appearanceOperators(
    annotation: Readonly<NumberAnnotation>,
    geometry: MarkGeometry
  ): PDFOperator[] {
    const { style } = annotation;
    const { box } = geometry;
    const font = this.helvetica();
    const textColor = hexToRgb(style.textColor);
    const operators: PDFOperator[] = [pushGraphicsState()];

    if (style.bgOpacity > 0) {
      operators.push(
        setFillingRgbColor(...hexToRgb(style.bgColor)),
        rectangle(box.x, box.y, box.width, box.height),
        fill()
      );
    }
    if (style.borderEnabled) {
      const inset = style.borderWidth / 2;
      operators.push(
        setStrokingRgbColor(...textColor),
        setLineWidth(style.borderWidth),
        rectangle(
          box.x + inset,
          box.y + inset,
          box.width - style.borderWidth,
          box.height - style.borderWidth
        ),
        stroke()
      );
    }
    if (geometry.tail > 0) {
      operators.push(
        setStrokingRgbColor(...textColor),
        setLineWidth(style.tailWidth),
        moveTo(box.width / 2, 0),
        lineTo(box.width / 2, geometry.tail),
        stroke()
      );
    }

    const fullHeight = font.heightAtSize(style.fontSize);
    const descent = fullHeight - font.heightAtSize(style.fontSize, { descender: false });
    const baseline = box.y + style.padding + (style.fontSize - fullHeight) / 2 + descent;
    operators.push(
      beginText(),
      setFillingRgbColor(...textColor),
      setFontAndSize(FONT_KEY, style.fontSize),
      moveText((box.width - geometry.textWidth) / 2, baseline),
      showText(font.encodeText(annotation.label)),
      endText(),
      popGraphicsState()
    );
    return operators;
  }

  private ensureAnnots(page: PDFPage): PDFArray {
    let annots = page.node.lookupMaybe(NAME.annots, PDFArray);
    if (!annots) {
      annots = PDFArray.withContext(this.document.context);
      page.node.set(NAME.annots, annots);
    }
    return annots;
  }

  private deleteMark(hit: MarkHit): void {
    const appearance = hit.dict.lookupMaybe(NAME.ap, PDFDict)?.get(NAME.n);
    hit.annots.remove(hit.index);
    if (appearance instanceof PDFRef) {
      this.document.context.delete(appearance);
    }
    if (hit.ref) {
      this.document.context.delete(hit.ref);
    }
  }
}
