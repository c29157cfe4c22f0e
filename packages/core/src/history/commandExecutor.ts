import { type NumberAnnotation, cloneAnnotation } from "../annotations/numberAnnotation.js";
import { type NumbermarkLogger, getLogger } from "../observability/index.js";
import type { AnnotationStore } from "../store/annotationStore.js";
import type { AnnotationSurface } from "../surface/annotationSurface.js";
import type { AnnotationCommand } from "./commands.js";
import type { HistoryExecutor } from "./undoLog.js";

type Direction = "forward" | "backward";

export interface CommandExecutorOptions {
  logger?: NumbermarkLogger;
}

/**
 * Applies annotation commands to a store and keeps the surface's marks in
 * step with every entity the command touches.
 */
export class CommandExecutor implements HistoryExecutor<AnnotationCommand> {
  private readonly logger: NumbermarkLogger;

  constructor(
    private readonly store: AnnotationStore,
    private surface: AnnotationSurface,
    options: CommandExecutorOptions = {}
  ) {
    this.logger = options.logger ?? getLogger();
  }

  setSurface(surface: AnnotationSurface): void {
    this.surface = surface;
  }

  undo(command: AnnotationCommand): void {
    this.run(command, "backward");
  }

  redo(command: AnnotationCommand): void {
    this.run(command, "forward");
  }

  /** Creates or replaces the mark of an annotation and stores its locator. */
  refresh(annotation: NumberAnnotation): void {
    const locator = this.surface.apply(annotation);
    if (locator) {
      annotation.locator = locator;
    } else {
      delete annotation.locator;
    }
  }

  /** Erases the mark of an annotation; the entity itself is left alone. */
  erase(annotation: NumberAnnotation): void {
    if (!this.surface.remove(annotation)) {
      this.logger.logSurfaceMiss(annotation.id, annotation.label, "remove");
    }
    delete annotation.locator;
  }

  private run(command: AnnotationCommand, direction: Direction): void {
    const forward = direction === "forward";
    switch (command.type) {
      case "add":
        if (forward) {
          this.insert(command.annotation);
        } else {
          this.discard(command.annotation.id);
        }
        return;
      case "remove":
        if (forward) {
          this.discard(command.annotation.id);
        } else {
          this.insert(command.annotation);
        }
        return;
      case "move":
        this.update(command.annotationId, () =>
          this.store.move(command.annotationId, forward ? command.to : command.from)
        );
        return;
      case "relabel": {
        const { annotationId, oldLabel, newLabel } = command.change;
        this.update(annotationId, () => this.store.relabel(annotationId, forward ? newLabel : oldLabel));
        return;
      }
      case "restyle":
        this.update(command.annotationId, () =>
          this.store.restyle(command.annotationId, forward ? command.newStyle : command.oldStyle)
        );
        return;
      case "bulkRenumber": {
        const changes = forward ? command.changes : [...command.changes].reverse();
        for (const { annotationId, oldLabel, newLabel } of changes) {
          this.update(annotationId, () =>
            this.store.relabel(annotationId, forward ? newLabel : oldLabel)
          );
        }
        return;
      }
      case "batch": {
        const commands = forward ? command.commands : [...command.commands].reverse();
        for (const inner of commands) {
          this.run(inner, direction);
        }
        return;
      }
    }
  }

  private insert(snapshot: NumberAnnotation): void {
    const annotation = cloneAnnotation(snapshot);
    delete annotation.locator;
    this.store.add(annotation);
    this.refresh(annotation);
  }

  private discard(id: string): void {
    const annotation = this.store.get(id);
    if (!annotation) {
      this.logger.warn("history", "Annotation to remove is no longer in the store", {
        annotationId: id,
      });
      return;
    }
    this.erase(annotation);
    this.store.remove(id);
  }

  private update(id: string, mutate: () => unknown): void {
    const annotation = this.store.get(id);
    if (!annotation) {
      this.logger.warn("history", "Annotation to update is no longer in the store", {
        annotationId: id,
      });
      return;
    }
    mutate();
    this.refresh(annotation);
  }
}
