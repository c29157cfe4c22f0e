/**
 * Undo Log
 *
 * Linear undo/redo history over opaque commands. The log knows nothing about
 * what a command does: an executor applies it in either direction. Pushing a
 * new entry drops the redo stack, and the undo stack is capped at `maxDepth`
 * with the oldest entries evicted first.
 */

import { NumbermarkError } from "../errors.js";
import { type NumbermarkLogger, getLogger } from "../observability/index.js";

export type HistoryEntry<TCommand> = {
  /** Human-readable description, e.g. "Insert #5" */
  description: string;
  command: TCommand;
};

export interface HistoryExecutor<TCommand> {
  undo(command: TCommand): void;
  redo(command: TCommand): void;
}

export type UndoLogState = {
  canUndo: boolean;
  canRedo: boolean;
  undoDescription?: string;
  redoDescription?: string;
};

export type UndoLogCallbacks = {
  /** Called whenever undo/redo availability may have changed */
  onChange?: (state: UndoLogState) => void;
};

export interface UndoLogOptions {
  maxDepth?: number;
  logger?: NumbermarkLogger;
  callbacks?: UndoLogCallbacks;
}

export const DEFAULT_MAX_HISTORY = 50;

export class UndoLog<TCommand> {
  private readonly undoStack: HistoryEntry<TCommand>[] = [];
  private readonly redoStack: HistoryEntry<TCommand>[] = [];
  private readonly executor: HistoryExecutor<TCommand>;
  private readonly maxDepth: number;
  private readonly logger: NumbermarkLogger;
  private callbacks: UndoLogCallbacks;
  private executing = false;

  constructor(executor: HistoryExecutor<TCommand>, options: UndoLogOptions = {}) {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_HISTORY;
    if (!Number.isInteger(maxDepth) || maxDepth <= 0) {
      throw new NumbermarkError("INVALID_CONFIG", `History depth must be a positive integer`, {
        context: { maxDepth },
      });
    }
    this.executor = executor;
    this.maxDepth = maxDepth;
    this.logger = options.logger ?? getLogger();
    this.callbacks = options.callbacks ?? {};
  }

  setCallbacks(callbacks: UndoLogCallbacks): void {
    this.callbacks = callbacks;
  }

  push(entry: HistoryEntry<TCommand>): void {
    this.assertIdle("push");
    this.undoStack.push(entry);
    this.redoStack.length = 0;
    while (this.undoStack.length > this.maxDepth) {
      const evicted = this.undoStack.shift();
      this.logger.debug("history", `Evicted "${evicted?.description}"`);
    }
    this.notify();
  }

  /** Returns the undone entry's description, or undefined when there is nothing to undo. */
  undo(): string | undefined {
    return this.step("undo");
  }

  redo(): string | undefined {
    return this.step("redo");
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  undoDescription(): string | undefined {
    return this.undoStack[this.undoStack.length - 1]?.description;
  }

  redoDescription(): string | undefined {
    return this.redoStack[this.redoStack.length - 1]?.description;
  }

  depth(): { undo: number; redo: number } {
    return { undo: this.undoStack.length, redo: this.redoStack.length };
  }

  clear(): void {
    this.assertIdle("clear");
    this.undoStack.length = 0;
    this.redoStack.length = 0;
    this.notify();
  }

  getState(): UndoLogState {
    return {
      canUndo: this.canUndo(),
      canRedo: this.canRedo(),
      undoDescription: this.undoDescription(),
      redoDescription: this.redoDescription(),
    };
  }

  private step(direction: "undo" | "redo"): string | undefined {
    this.assertIdle(direction);
    const source = direction === "undo" ? this.undoStack : this.redoStack;
    const target = direction === "undo" ? this.redoStack : this.undoStack;
    const entry = source.pop();
    if (!entry) {
      return undefined;
    }

    this.executing = true;
    try {
      if (direction === "undo") {
        this.executor.undo(entry.command);
      } else {
        this.executor.redo(entry.command);
      }
    } catch (error) {
      source.push(entry);
      this.logger.error(
        "history",
        `Failed to ${direction} "${entry.description}"`,
        error instanceof Error ? error : undefined
      );
      throw error;
    } finally {
      this.executing = false;
    }

    target.push(entry);
    this.logger.debug("history", `${direction === "undo" ? "Undid" : "Redid"} "${entry.description}"`);
    this.notify();
    return entry.description;
  }

  private assertIdle(operation: string): void {
    if (this.executing) {
      throw new NumbermarkError(
        "HISTORY_REENTRANT",
        `Cannot ${operation} while a history entry is being applied`
      );
    }
  }

  private notify(): void {
    this.callbacks.onChange?.(this.getState());
  }
}
