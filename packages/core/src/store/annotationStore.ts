/**
 * Annotation Store
 *
 * Authoritative collection of number annotations for one open document, and
 * home of every sequence-level algorithm: label lookup, next-number
 * allocation, advance/decrease renumbering, gap detection and serialization.
 *
 * The store is mechanism only. It never checks for duplicate labels on
 * insert and never touches rendering; the session decides policy and keeps
 * the surface in sync.
 *
 * Invariants:
 * - Ids are unique; new ids are never user-supplied.
 * - At most one annotation holds a token, except inside a renumbering that
 *   the caller completes within the same operation.
 * - `modified` is set by every structural or label change and cleared only
 *   by {@link AnnotationStore.acknowledgeSave}.
 */

import { z } from "zod";
import { NumbermarkError, SerializationError, describeError } from "../errors.js";
import { type NumbermarkLogger, getLogger } from "../observability/index.js";
import {
  type NumberToken,
  compareTokens,
  formatLabel,
  hasEmptyMarker,
  parseLabel,
  tokenKey,
  withEmptyMarker,
} from "../numbering/numberToken.js";
import {
  AnnotationRecordSchema,
  type NumberAnnotation,
  type Placement,
  annotationFromParsedRecord,
  annotationToRecord,
  assertPlacement,
} from "../annotations/numberAnnotation.js";
import { type NumberStyle, copyStyle } from "../styles/numberStyle.js";

// ============================================================================
// Types
// ============================================================================

export type RenumberChange = {
  annotation: NumberAnnotation;
  oldLabel: string;
  newLabel: string;
};

export type RenumberOptions = {
  /** Annotation ids left untouched by the renumbering */
  exclude?: ReadonlySet<string>;
};

export type SequenceValidation = {
  valid: boolean;
  message: string;
  /** How many whole numbers are missing */
  missing: number;
  /** The missing numbers, listed only when there are at most five */
  gaps: number[];
};

type GapSummary = {
  count: number;
  first?: number;
  last?: number;
  listed: number[];
};

export type MoveResult = {
  annotation: NumberAnnotation;
  from: Placement;
  to: Placement;
};

export type RestyleResult = {
  annotation: NumberAnnotation;
  oldStyle: NumberStyle;
  newStyle: NumberStyle;
};

export interface AnnotationStoreOptions {
  logger?: NumbermarkLogger;
}

const MAX_LISTED_GAPS = 5;

const StoreRecordSchema = z.array(AnnotationRecordSchema);

type Entry = {
  annotation: NumberAnnotation;
  token: NumberToken;
};

function assertDelta(delta: number): void {
  if (!Number.isSafeInteger(delta) || delta <= 0) {
    throw new NumbermarkError("INVALID_DELTA", `Renumber delta must be a positive integer`, {
      context: { delta },
    });
  }
}

export function describeGaps(gaps: readonly number[]): string {
  return describeGapSummary({
    count: gaps.length,
    first: gaps[0],
    last: gaps[gaps.length - 1],
    listed: gaps.slice(0, MAX_LISTED_GAPS),
  });
}

function describeGapSummary({ count, first, last, listed }: GapSummary): string {
  if (count === 0) {
    return "Sequence is complete";
  }
  if (count === 1) {
    return `Missing number: ${first}`;
  }
  if (count <= MAX_LISTED_GAPS) {
    return `Missing numbers: ${listed.join(", ")}`;
  }
  return `${count} missing: ${first}...${last}`;
}

// ============================================================================
// Store
// ============================================================================

export class AnnotationStore {
  private readonly annotations = new Map<string, NumberAnnotation>();
  private readonly logger: NumbermarkLogger;
  private dirty = false;

  constructor(options: AnnotationStoreOptions = {}) {
    this.logger = options.logger ?? getLogger();
  }

  get modified(): boolean {
    return this.dirty;
  }

  markModified(): void {
    this.dirty = true;
  }

  /** Called by the shell once the document has been written out. */
  acknowledgeSave(): void {
    this.dirty = false;
  }

  // --------------------------------------------------------------------------
  // Collection
  // --------------------------------------------------------------------------

  add(annotation: NumberAnnotation): void {
    this.annotations.set(annotation.id, annotation);
    this.dirty = true;
    this.logger.debug("store", `Added #${annotation.label}`, { annotationId: annotation.id });
  }

  remove(id: string): NumberAnnotation | undefined {
    const annotation = this.annotations.get(id);
    if (!annotation) {
      return undefined;
    }
    this.annotations.delete(id);
    this.dirty = true;
    this.logger.debug("store", `Removed #${annotation.label}`, { annotationId: id });
    return annotation;
  }

  get(id: string): NumberAnnotation | undefined {
    return this.annotations.get(id);
  }

  has(id: string): boolean {
    return this.annotations.has(id);
  }

  getForPage(page: number): NumberAnnotation[] {
    return this.all().filter((annotation) => annotation.page === page);
  }

  all(): NumberAnnotation[] {
    return Array.from(this.annotations.values());
  }

  /** Ascending by token; equal tokens keep insertion order. */
  allSorted(): NumberAnnotation[] {
    return this.entries()
      .sort((a, b) => compareTokens(a.token, b.token))
      .map((entry) => entry.annotation);
  }

  count(): number {
    return this.annotations.size;
  }

  pages(): number[] {
    const pages = new Set(this.all().map((annotation) => annotation.page));
    return Array.from(pages).sort((a, b) => a - b);
  }

  clear(): void {
    const removed = this.annotations.size;
    this.annotations.clear();
    this.dirty = true;
    this.logger.debug("store", `Cleared ${removed} annotations`);
  }

  // --------------------------------------------------------------------------
  // Labels
  // --------------------------------------------------------------------------

  hasLabel(label: string): boolean {
    return this.getByLabel(label) !== undefined;
  }

  getByLabel(label: string): NumberAnnotation | undefined {
    const key = tokenKey(label);
    for (const annotation of this.annotations.values()) {
      if (tokenKey(annotation.label) === key) {
        return annotation;
      }
    }
    return undefined;
  }

  /** Every annotation holding the label's token, in insertion order. */
  findByLabel(label: string): NumberAnnotation[] {
    const key = tokenKey(label);
    return this.all().filter((annotation) => tokenKey(annotation.label) === key);
  }

  /** Groups of annotations sharing a token, ordered by token. */
  findDuplicates(): NumberAnnotation[][] {
    const groups = new Map<string, NumberAnnotation[]>();
    for (const { annotation, token } of this.entries().sort((a, b) =>
      compareTokens(a.token, b.token)
    )) {
      const key = `${token.main}.${token.sub}`;
      const group = groups.get(key);
      if (group) {
        group.push(annotation);
      } else {
        groups.set(key, [annotation]);
      }
    }
    return Array.from(groups.values()).filter((group) => group.length > 1);
  }

  nextWholeNumber(): string {
    const mains = this.wholeNumberMains();
    if (mains.length === 0) {
      return formatLabel(1);
    }
    return formatLabel(Math.max(...mains) + 1);
  }

  nextSubNumber(mainLabel: string): string {
    const { main } = parseLabel(mainLabel);
    let maxSub = 0;
    for (const { token } of this.entries()) {
      if (token.main === main && token.sub > maxSub) {
        maxSub = token.sub;
      }
    }
    return formatLabel(main, maxSub + 1);
  }

  relabel(id: string, label: string): RenumberChange | undefined {
    parseLabel(label);
    const annotation = this.annotations.get(id);
    if (!annotation) {
      return undefined;
    }
    const oldLabel = annotation.label;
    annotation.label = label;
    this.dirty = true;
    this.logger.debug("store", `Relabelled #${oldLabel} -> #${label}`, { annotationId: id });
    return { annotation, oldLabel, newLabel: label };
  }

  // --------------------------------------------------------------------------
  // Sequence renumbering
  // --------------------------------------------------------------------------

  /**
   * Shifts every whole number whose main is >= the label's main up by
   * `delta`, keeping any empty marker. Sub-numbers are never touched.
   */
  advanceFrom(label: string, delta = 1, options: RenumberOptions = {}): RenumberChange[] {
    const { main: target } = parseLabel(label);
    assertDelta(delta);
    const highest = this.wholeNumberEntries(options).at(-1);
    const overflows = highest && !Number.isSafeInteger(highest.token.main + delta);
    if (highest && overflows && highest.token.main >= target) {
      throw new NumbermarkError(
        "INVALID_DELTA",
        `Advancing #${highest.annotation.label} by ${delta} would exceed the largest number`,
        { context: { label: highest.annotation.label, delta } }
      );
    }
    const changes = this.shiftWholeNumbers(
      (main) => main >= target,
      (main) => main + delta,
      options
    );
    this.logger.logRenumber("advance", label, changes);
    return changes;
  }

  /**
   * Shifts every whole number whose main is strictly greater than the
   * label's main down by `delta`. The label's own holder is excluded: it is
   * the entry about to be deleted.
   */
  decreaseFrom(label: string, delta = 1, options: RenumberOptions = {}): RenumberChange[] {
    const { main: target } = parseLabel(label);
    assertDelta(delta);
    const lowest = this.wholeNumberEntries(options).find((entry) => entry.token.main > target);
    if (lowest && lowest.token.main - delta < 0) {
      throw new NumbermarkError(
        "INVALID_DELTA",
        `Decreasing #${lowest.annotation.label} by ${delta} would go below zero`,
        { context: { label: lowest.annotation.label, delta } }
      );
    }
    const changes = this.shiftWholeNumbers(
      (main) => main > target,
      (main) => main - delta,
      options
    );
    this.logger.logRenumber("decrease", label, changes);
    return changes;
  }

  /** Missing whole numbers between the lowest and highest present, ascending. */
  findGaps(): number[] {
    const gaps: number[] = [];
    for (const [low, high] of this.presentRuns()) {
      for (let n = low + 1; n < high; n += 1) {
        gaps.push(n);
      }
    }
    return gaps;
  }

  /** Counts the gaps without listing them all. */
  validateSequence(): SequenceValidation {
    const summary: GapSummary = { count: 0, listed: [] };
    for (const [low, high] of this.presentRuns()) {
      if (summary.first === undefined) {
        summary.first = low + 1;
      }
      summary.last = high - 1;
      summary.count += high - low - 1;
      for (let n = low + 1; n < high && summary.listed.length < MAX_LISTED_GAPS; n += 1) {
        summary.listed.push(n);
      }
    }
    return {
      valid: summary.count === 0,
      message: describeGapSummary(summary),
      missing: summary.count,
      gaps: summary.count <= MAX_LISTED_GAPS ? summary.listed : [],
    };
  }

  // --------------------------------------------------------------------------
  // Placement and style
  // --------------------------------------------------------------------------

  move(id: string, to: Placement): MoveResult | undefined {
    assertPlacement(to);
    const annotation = this.annotations.get(id);
    if (!annotation) {
      return undefined;
    }
    const from: Placement = { page: annotation.page, x: annotation.x, y: annotation.y };
    annotation.page = to.page;
    annotation.x = to.x;
    annotation.y = to.y;
    this.dirty = true;
    return { annotation, from, to: { ...to } };
  }

  restyle(id: string, style: Readonly<NumberStyle>): RestyleResult | undefined {
    const annotation = this.annotations.get(id);
    if (!annotation) {
      return undefined;
    }
    const oldStyle = annotation.style;
    annotation.style = copyStyle(style);
    this.dirty = true;
    return { annotation, oldStyle, newStyle: copyStyle(style) };
  }

  // --------------------------------------------------------------------------
  // Serialization
  // --------------------------------------------------------------------------

  toJSON(): string {
    return JSON.stringify(
      this.all().map((annotation) => annotationToRecord(annotation)),
      null,
      2
    );
  }

  /**
   * Replaces the whole contents with a serialized store. Nothing changes
   * unless every record is valid.
   */
  fromJSON(json: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw new SerializationError(`Annotation data is not valid JSON: ${describeError(error)}`, {
        cause: error,
      });
    }

    const result = StoreRecordSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new SerializationError(
        `Invalid annotation data at ${issue?.path.join(".") || "<root>"}: ${issue?.message}`,
        { context: { issues: result.error.issues } }
      );
    }

    const loaded = new Map<string, NumberAnnotation>();
    for (const record of result.data) {
      if (loaded.has(record.id)) {
        throw new SerializationError(`Duplicate annotation id ${record.id}`, {
          context: { id: record.id },
        });
      }
      loaded.set(record.id, annotationFromParsedRecord(record));
    }

    this.annotations.clear();
    for (const [id, annotation] of loaded) {
      this.annotations.set(id, annotation);
    }
    this.dirty = true;
    this.logger.debug("store", `Loaded ${loaded.size} annotations`);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private entries(): Entry[] {
    return this.all().map((annotation) => ({ annotation, token: parseLabel(annotation.label) }));
  }

  private wholeNumberEntries(options: RenumberOptions): Entry[] {
    return this.entries()
      .filter((entry) => entry.token.sub === 0 && !options.exclude?.has(entry.annotation.id))
      .sort((a, b) => compareTokens(a.token, b.token));
  }

  /** Pairs of neighbouring present mains with at least one number between them. */
  private presentRuns(): Array<[low: number, high: number]> {
    const sorted = Array.from(new Set(this.wholeNumberMains())).sort((a, b) => a - b);
    const runs: Array<[low: number, high: number]> = [];
    for (let index = 1; index < sorted.length; index += 1) {
      if (sorted[index] - sorted[index - 1] > 1) {
        runs.push([sorted[index - 1], sorted[index]]);
      }
    }
    return runs;
  }

  private wholeNumberMains(): number[] {
    return this.entries()
      .filter((entry) => entry.token.sub === 0)
      .map((entry) => entry.token.main);
  }

  private shiftWholeNumbers(
    selects: (main: number) => boolean,
    shift: (main: number) => number,
    options: RenumberOptions
  ): RenumberChange[] {
    const changes: RenumberChange[] = [];
    for (const { annotation, token } of this.wholeNumberEntries(options)) {
      if (!selects(token.main)) {
        continue;
      }
      const oldLabel = annotation.label;
      const newLabel = withEmptyMarker(formatLabel(shift(token.main)), hasEmptyMarker(oldLabel));
      annotation.label = newLabel;
      changes.push({ annotation, oldLabel, newLabel });
    }
    if (changes.length > 0) {
      this.dirty = true;
    }
    return changes;
  }
}
