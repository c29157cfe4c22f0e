/**
 * Document Session
 *
 * Orchestrates one open document: turns shell gestures into store
 * mutations, applies the duplicate-label and delete-with-renumber policies,
 * keeps the surface's marks in sync and records one undo entry per
 * user-visible action, however many entities it touched.
 *
 * All operations are synchronous and run to completion before returning.
 * Labels and placements are validated before anything is mutated.
 */

import { randomUUID } from "node:crypto";
import {
  type NumberAnnotation,
  type Placement,
  assertPlacement,
  createAnnotation,
  isSubNumbered,
} from "../annotations/numberAnnotation.js";
import { type DuplicateChoice, type NumbermarkConfig, DEFAULT_CONFIG } from "../config.js";
import { NumbermarkError, SerializationError } from "../errors.js";
import { CommandExecutor } from "../history/commandExecutor.js";
import {
  type AnnotationCommand,
  addCommand,
  batchCommand,
  bulkRenumberCommand,
  moveCommand,
  relabelCommand,
  removeCommand,
  restyleCommand,
} from "../history/commands.js";
import { UndoLog, type UndoLogCallbacks, type UndoLogState } from "../history/undoLog.js";
import { isWholeNumber, parseLabel } from "../numbering/numberToken.js";
import { type NumbermarkLogger, getLogger } from "../observability/index.js";
import {
  AnnotationStore,
  type RenumberChange,
  type SequenceValidation,
} from "../store/annotationStore.js";
import {
  DEFAULT_NUMBER_STYLE,
  DEFAULT_STYLE_NAME,
  type NumberStyle,
  copyStyle,
  withStyleName,
} from "../styles/numberStyle.js";
import type { StyleCatalog } from "../styles/styleCatalog.js";
import { type AnnotationSurface, detachedSurface } from "../surface/annotationSurface.js";

// ============================================================================
// Types
// ============================================================================

export type DuplicateConflict = {
  operation: "insert" | "relabel";
  /** Label that was asked for */
  label: string;
  /** Annotation currently holding the label's token */
  existing: NumberAnnotation;
  /** Label the "use sub-number" choice would produce */
  suggestedSubNumber: string;
};

export type DuplicateResolver = (conflict: DuplicateConflict) => DuplicateChoice;

/** Either a fixed answer or a synchronous prompt (a modal dialog, usually). */
export type DuplicatePolicy = DuplicateChoice | DuplicateResolver;

export type Resolution = "none" | "advance" | "subNumber";

export type InsertRequest = Placement & {
  /** Defaults to the next whole number */
  label?: string;
  /** Defaults to the session's current style */
  style?: Readonly<NumberStyle>;
  onDuplicate?: DuplicatePolicy;
};

export type InsertOutcome =
  | {
      status: "inserted";
      annotation: NumberAnnotation;
      resolution: Resolution;
      advanced: RenumberChange[];
      message: string;
    }
  | { status: "cancelled"; label: string; message: string };

export type RelabelOutcome =
  | {
      status: "relabelled";
      annotation: NumberAnnotation;
      oldLabel: string;
      newLabel: string;
      resolution: Resolution;
      advanced: RenumberChange[];
      message: string;
    }
  | { status: "unchanged"; annotation: NumberAnnotation; message: string }
  | { status: "cancelled"; label: string; message: string }
  | { status: "notFound"; message: string };

export type RenumberOnDelete = "decrease" | "keep";

export type DeleteOutcome =
  | {
      status: "deleted";
      annotation: NumberAnnotation;
      decreased: RenumberChange[];
      message: string;
    }
  | { status: "notFound"; message: string };

export type MoveOutcome =
  | { status: "moved"; annotation: NumberAnnotation; from: Placement; to: Placement; message: string }
  | { status: "notFound"; message: string };

export type RestyleOutcome =
  | { status: "restyled"; annotation: NumberAnnotation; message: string }
  | { status: "notFound"; message: string };

export type MoveTarget = {
  page?: number;
  x: number;
  y: number;
};

export interface DocumentSessionOptions {
  config?: NumbermarkConfig;
  store?: AnnotationStore;
  surface?: AnnotationSurface;
  catalog?: StyleCatalog;
  logger?: NumbermarkLogger;
  /** Identifies the document in log entries */
  docId?: string;
  /** When set, placements on pages outside [0, pageCount) are rejected */
  pageCount?: number;
  initialStyle?: Readonly<NumberStyle>;
  historyCallbacks?: UndoLogCallbacks;
}

function pluralOthers(count: number): string {
  return count === 1 ? "1 other" : `${count} others`;
}

// ============================================================================
// Session
// ============================================================================

export class DocumentSession {
  readonly store: AnnotationStore;
  readonly sessionId: string;
  private readonly config: NumbermarkConfig;
  private readonly logger: NumbermarkLogger;
  private readonly executor: CommandExecutor;
  private readonly history: UndoLog<AnnotationCommand>;
  private readonly catalog?: StyleCatalog;
  private readonly pageCount?: number;
  private style: NumberStyle;

  constructor(options: DocumentSessionOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.sessionId = randomUUID();
    this.logger = (options.logger ?? getLogger()).child({
      sessionId: this.sessionId,
      docId: options.docId,
    });
    this.store = options.store ?? new AnnotationStore({ logger: this.logger });
    this.catalog = options.catalog;
    this.pageCount = options.pageCount;
    this.style = copyStyle(
      options.initialStyle ?? this.catalog?.get(DEFAULT_STYLE_NAME) ?? DEFAULT_NUMBER_STYLE
    );
    this.executor = new CommandExecutor(this.store, options.surface ?? detachedSurface, {
      logger: this.logger,
    });
    this.history = new UndoLog<AnnotationCommand>(this.executor, {
      maxDepth: this.config.history.maxDepth,
      logger: this.logger,
      callbacks: options.historyCallbacks,
    });
  }

  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  get modified(): boolean {
    return this.store.modified;
  }

  acknowledgeSave(): void {
    this.store.acknowledgeSave();
    this.logger.info("session", "Save acknowledged", { count: this.store.count() });
  }

  get currentStyle(): NumberStyle {
    return copyStyle(this.style);
  }

  setCurrentStyle(style: Readonly<NumberStyle>): void {
    this.style = copyStyle(style);
  }

  /** Loads a preset into the current style; false when the preset is unknown. */
  applyPreset(name: string): boolean {
    const preset = this.catalog?.get(name);
    if (!preset) {
      return false;
    }
    this.style = preset;
    return true;
  }

  saveCurrentStyleAsPreset(name: string): boolean {
    if (!this.catalog) {
      return false;
    }
    this.catalog.save(withStyleName(this.style, name));
    return true;
  }

  nextLabel(): string {
    return this.store.nextWholeNumber();
  }

  validate(): SequenceValidation {
    return this.store.validateSequence();
  }

  historyState(): UndoLogState {
    return this.history.getState();
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  // --------------------------------------------------------------------------
  // Mutations
  // --------------------------------------------------------------------------

  insert(request: InsertRequest): InsertOutcome {
    const label = request.label ?? this.store.nextWholeNumber();
    parseLabel(label);
    this.assertPlacement(request);
    const style = request.style ?? this.style;

    const existing = this.store.getByLabel(label);
    if (!existing) {
      return this.commitInsert(request, style, label, "none", []);
    }

    const suggestedSubNumber = this.store.nextSubNumber(label);
    const choice = this.resolveDuplicate(request.onDuplicate, {
      operation: "insert",
      label,
      existing,
      suggestedSubNumber,
    });

    switch (choice) {
      case "cancel":
        return { status: "cancelled", label, message: `Number ${label} already exists` };
      case "subNumber":
        return this.commitInsert(request, style, suggestedSubNumber, "subNumber", []);
      case "advance": {
        // Advancing only shifts whole numbers, so it cannot free a sub-number.
        if (!isWholeNumber(label)) {
          return this.commitInsert(request, style, suggestedSubNumber, "subNumber", []);
        }
        const advanced = this.store.advanceFrom(label, 1);
        this.refreshAll(advanced);
        return this.commitInsert(request, style, label, "advance", advanced);
      }
    }
  }

  relabel(id: string, label: string, options: { onDuplicate?: DuplicatePolicy } = {}): RelabelOutcome {
    parseLabel(label);
    const annotation = this.store.get(id);
    if (!annotation) {
      return { status: "notFound", message: "Annotation not found" };
    }
    if (annotation.label === label) {
      return { status: "unchanged", annotation, message: `#${label} unchanged` };
    }

    const existing = this.store.findByLabel(label).find((other) => other.id !== id);
    if (!existing) {
      return this.commitRelabel(annotation, label, "none", []);
    }

    const suggestedSubNumber = this.store.nextSubNumber(label);
    const choice = this.resolveDuplicate(options.onDuplicate, {
      operation: "relabel",
      label,
      existing,
      suggestedSubNumber,
    });

    switch (choice) {
      case "cancel":
        return { status: "cancelled", label, message: `Number ${label} already exists` };
      case "subNumber":
        return this.commitRelabel(annotation, suggestedSubNumber, "subNumber", []);
      case "advance": {
        if (!isWholeNumber(label)) {
          return this.commitRelabel(annotation, suggestedSubNumber, "subNumber", []);
        }
        const advanced = this.store.advanceFrom(label, 1, { exclude: new Set([id]) });
        this.refreshAll(advanced);
        return this.commitRelabel(annotation, label, "advance", advanced);
      }
    }
  }

  /**
   * Deletes an annotation. With `decrease`, every higher whole number moves
   * down by one to close the gap; sub-numbers never renumber.
   */
  remove(id: string, options: { renumber?: RenumberOnDelete } = {}): DeleteOutcome {
    const annotation = this.store.get(id);
    if (!annotation) {
      return { status: "notFound", message: "Annotation not found" };
    }
    const renumber = options.renumber ?? "keep";
    const removal = removeCommand(annotation);

    this.executor.erase(annotation);
    this.store.remove(id);

    const decreased =
      renumber === "decrease" && !isSubNumbered(annotation)
        ? this.store.decreaseFrom(annotation.label, 1)
        : [];
    this.refreshAll(decreased);

    this.history.push({
      description: `Delete #${annotation.label}`,
      command: batchCommand([removal, bulkRenumberCommand(decreased)]),
    });

    const message =
      decreased.length > 0
        ? `Deleted #${annotation.label}, decreased ${pluralOthers(decreased.length)}`
        : `Deleted #${annotation.label}`;
    this.logger.info("session", message, { annotationId: id });
    return { status: "deleted", annotation, decreased, message };
  }

  move(id: string, target: MoveTarget): MoveOutcome {
    const annotation = this.store.get(id);
    if (!annotation) {
      return { status: "notFound", message: "Annotation not found" };
    }
    const to: Placement = { page: target.page ?? annotation.page, x: target.x, y: target.y };
    this.assertPlacement(to);

    const result = this.store.move(id, to);
    if (!result) {
      return { status: "notFound", message: "Annotation not found" };
    }
    this.executor.refresh(annotation);
    this.history.push({
      description: `Move #${annotation.label}`,
      command: moveCommand(id, result.from, result.to),
    });
    return {
      status: "moved",
      annotation,
      from: result.from,
      to: result.to,
      message: `Moved #${annotation.label}`,
    };
  }

  restyle(id: string, style: Readonly<NumberStyle>): RestyleOutcome {
    const result = this.store.restyle(id, style);
    if (!result) {
      return { status: "notFound", message: "Annotation not found" };
    }
    this.executor.refresh(result.annotation);
    this.history.push({
      description: `Restyle #${result.annotation.label}`,
      command: restyleCommand(id, result.oldStyle, result.newStyle),
    });
    return {
      status: "restyled",
      annotation: result.annotation,
      message: `Restyled #${result.annotation.label}`,
    };
  }

  /** Removes every annotation and forgets the history. Not undoable. */
  clearAll(): number {
    const annotations = this.store.all();
    for (const annotation of annotations) {
      this.executor.erase(annotation);
    }
    this.store.clear();
    this.history.clear();
    this.logger.info("session", `Cleared ${annotations.length} annotations`);
    return annotations.length;
  }

  undo(): string | undefined {
    return this.history.undo();
  }

  redo(): string | undefined {
    return this.history.redo();
  }

  // --------------------------------------------------------------------------
  // Persistence and surface
  // --------------------------------------------------------------------------

  exportJSON(): string {
    return this.store.toJSON();
  }

  /**
   * Replaces every annotation with a serialized set, redraws the marks and
   * clears the history. A payload that fails validation changes nothing.
   *
   * With `redraw: false` the surface is left as it is; the caller already
   * holds matching marks (a document reopened with its own metadata).
   */
  load(json: string, options: { redraw?: boolean } = {}): number {
    const redraw = options.redraw ?? true;
    const staged = new AnnotationStore({ logger: this.logger });
    try {
      staged.fromJSON(json);
    } catch (error) {
      if (error instanceof SerializationError) {
        this.logger.warn("persistence", "Rejected annotation data", undefined, error);
      }
      throw error;
    }
    for (const annotation of staged.all()) {
      this.assertPlacement(annotation);
    }

    if (redraw) {
      for (const annotation of this.store.all()) {
        this.executor.erase(annotation);
      }
    }
    this.store.fromJSON(json);
    if (redraw) {
      this.rebuildSurface();
    }
    this.history.clear();
    this.logger.info("persistence", `Loaded ${this.store.count()} annotations`);
    return this.store.count();
  }

  /** Re-applies the mark of every annotation, e.g. after switching surfaces. */
  rebuildSurface(): void {
    for (const annotation of this.store.all()) {
      this.executor.refresh(annotation);
    }
  }

  attachSurface(surface: AnnotationSurface): void {
    this.executor.setSurface(surface);
    this.rebuildSurface();
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private commitInsert(
    placement: Placement,
    style: Readonly<NumberStyle>,
    label: string,
    resolution: Resolution,
    advanced: RenumberChange[]
  ): InsertOutcome {
    const annotation = createAnnotation({
      page: placement.page,
      x: placement.x,
      y: placement.y,
      label,
      style,
    });
    this.store.add(annotation);
    this.executor.refresh(annotation);

    this.history.push({
      description:
        advanced.length > 0 ? `Insert #${label} (advanced ${advanced.length})` : `Insert #${label}`,
      command: batchCommand([bulkRenumberCommand(advanced), addCommand(annotation)]),
    });

    const message =
      resolution === "advance"
        ? `Inserted #${label}, advanced ${pluralOthers(advanced.length)}`
        : `Inserted #${label}`;
    this.logger.info("session", message, { annotationId: annotation.id, resolution });
    return { status: "inserted", annotation, resolution, advanced, message };
  }

  private commitRelabel(
    annotation: NumberAnnotation,
    label: string,
    resolution: Resolution,
    advanced: RenumberChange[]
  ): RelabelOutcome {
    const change = this.store.relabel(annotation.id, label);
    if (!change) {
      return { status: "notFound", message: "Annotation not found" };
    }
    this.executor.refresh(annotation);

    this.history.push({
      description: `Change #${change.oldLabel} to #${change.newLabel}`,
      command: batchCommand([bulkRenumberCommand(advanced), relabelCommand(change)]),
    });

    const message =
      resolution === "advance"
        ? `Changed #${change.oldLabel} to #${change.newLabel}, advanced ${pluralOthers(advanced.length)}`
        : `Changed #${change.oldLabel} to #${change.newLabel}`;
    this.logger.info("session", message, { annotationId: annotation.id, resolution });
    return {
      status: "relabelled",
      annotation,
      oldLabel: change.oldLabel,
      newLabel: change.newLabel,
      resolution,
      advanced,
      message,
    };
  }

  private refreshAll(changes: readonly RenumberChange[]): void {
    for (const change of changes) {
      this.executor.refresh(change.annotation);
    }
  }

  private resolveDuplicate(
    policy: DuplicatePolicy | undefined,
    conflict: DuplicateConflict
  ): DuplicateChoice {
    const effective = policy ?? this.config.duplicates.defaultChoice;
    const choice = typeof effective === "function" ? effective(conflict) : effective;
    this.logger.debug("session", `Duplicate #${conflict.label} resolved with ${choice}`, {
      operation: conflict.operation,
      existingId: conflict.existing.id,
    });
    return choice;
  }

  private assertPlacement(placement: Placement): void {
    assertPlacement(placement);
    if (this.pageCount !== undefined && placement.page >= this.pageCount) {
      throw new NumbermarkError(
        "PAGE_OUT_OF_RANGE",
        `Page ${placement.page} is outside the document (${this.pageCount} pages)`,
        { context: { page: placement.page, pageCount: this.pageCount } }
      );
    }
  }
}
