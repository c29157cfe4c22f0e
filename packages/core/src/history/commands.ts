/**
 * Annotation commands
 *
 * Tagged records of every undoable store mutation. A command carries the
 * data for both directions, so the log can undo or redo it without holding
 * closures over live objects. Annotations are referenced by id; `add` and
 * `remove` keep a detached snapshot to recreate the entity from.
 */

import {
  type NumberAnnotation,
  type Placement,
  cloneAnnotation,
} from "../annotations/numberAnnotation.js";
import type { RenumberChange } from "../store/annotationStore.js";
import { type NumberStyle, copyStyle } from "../styles/numberStyle.js";

export type LabelChange = {
  annotationId: string;
  oldLabel: string;
  newLabel: string;
};

export type AddCommand = { type: "add"; annotation: NumberAnnotation };
export type RemoveCommand = { type: "remove"; annotation: NumberAnnotation };
export type MoveCommand = { type: "move"; annotationId: string; from: Placement; to: Placement };
export type RelabelCommand = { type: "relabel"; change: LabelChange };
export type RestyleCommand = {
  type: "restyle";
  annotationId: string;
  oldStyle: NumberStyle;
  newStyle: NumberStyle;
};
export type BulkRenumberCommand = { type: "bulkRenumber"; changes: LabelChange[] };
/** Ordered composite; undone in reverse order. */
export type BatchCommand = { type: "batch"; commands: AnnotationCommand[] };

export type AnnotationCommand =
  | AddCommand
  | RemoveCommand
  | MoveCommand
  | RelabelCommand
  | RestyleCommand
  | BulkRenumberCommand
  | BatchCommand;

export type AnnotationCommandType = AnnotationCommand["type"];

function snapshot(annotation: Readonly<NumberAnnotation>): NumberAnnotation {
  const copy = cloneAnnotation(annotation);
  delete copy.locator;
  return copy;
}

function toLabelChange(change: RenumberChange): LabelChange {
  return {
    annotationId: change.annotation.id,
    oldLabel: change.oldLabel,
    newLabel: change.newLabel,
  };
}

export function addCommand(annotation: Readonly<NumberAnnotation>): AddCommand {
  return { type: "add", annotation: snapshot(annotation) };
}

export function removeCommand(annotation: Readonly<NumberAnnotation>): RemoveCommand {
  return { type: "remove", annotation: snapshot(annotation) };
}

export function moveCommand(annotationId: string, from: Placement, to: Placement): MoveCommand {
  return { type: "move", annotationId, from: { ...from }, to: { ...to } };
}

export function relabelCommand(change: RenumberChange): RelabelCommand {
  return { type: "relabel", change: toLabelChange(change) };
}

export function restyleCommand(
  annotationId: string,
  oldStyle: Readonly<NumberStyle>,
  newStyle: Readonly<NumberStyle>
): RestyleCommand {
  return {
    type: "restyle",
    annotationId,
    oldStyle: copyStyle(oldStyle),
    newStyle: copyStyle(newStyle),
  };
}

export function bulkRenumberCommand(changes: readonly RenumberChange[]): BulkRenumberCommand {
  return { type: "bulkRenumber", changes: changes.map(toLabelChange) };
}

/**
 * Collapses a list of commands into one history entry. Empty renumberings
 * are dropped and a single remaining command is returned as is.
 */
export function batchCommand(commands: readonly AnnotationCommand[]): AnnotationCommand {
  const meaningful = commands.filter(
    (command) => command.type !== "bulkRenumber" || command.changes.length > 0
  );
  if (meaningful.length === 1) {
    return meaningful[0];
  }
  return { type: "batch", commands: meaningful };
}

/** Ids of every annotation a command touches, in command order. */
export function commandTargets(command: AnnotationCommand): string[] {
  switch (command.type) {
    case "add":
    case "remove":
      return [command.annotation.id];
    case "move":
    case "restyle":
      return [command.annotationId];
    case "relabel":
      return [command.change.annotationId];
    case "bulkRenumber":
      return command.changes.map((change) => change.annotationId);
    case "batch":
      return command.commands.flatMap(commandTargets);
  }
}
