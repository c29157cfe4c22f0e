/**
 * Number annotations
 *
 * One placed number on one page. Coordinates are in document space (PDF
 * points from the page's top-left corner), never screen pixels, so they
 * survive zoom and pan.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { NumbermarkError, SerializationError } from "../errors.js";
import { type NumberToken, parseLabel } from "../numbering/numberToken.js";
import {
  DEFAULT_NUMBER_STYLE,
  type NumberStyle,
  NumberStyleRecordSchema,
  copyStyle,
  styleFromParsedRecord,
  styleToRecord,
  type NumberStyleRecord,
} from "../styles/numberStyle.js";

/**
 * Opaque handle the render surface keeps on an annotation to find its mark
 * again. The engine stores and persists it but never reads it.
 */
export type SurfaceLocator = Readonly<Record<string, string | number | boolean>>;

export type NumberAnnotation = {
  readonly id: string;
  page: number;
  x: number;
  y: number;
  label: string;
  style: NumberStyle;
  locator?: SurfaceLocator;
};

export type Placement = {
  page: number;
  x: number;
  y: number;
};

export type NewAnnotationInput = Placement & {
  label: string;
  style?: Readonly<NumberStyle>;
};

export type CreateAnnotationOptions = {
  idFactory?: () => string;
};

export function assertPlacement(placement: Placement): void {
  if (!Number.isInteger(placement.page) || placement.page < 0) {
    throw new NumbermarkError("INVALID_ANNOTATION", `Invalid page index ${placement.page}`, {
      context: { page: placement.page },
    });
  }
  if (!Number.isFinite(placement.x) || !Number.isFinite(placement.y)) {
    throw new NumbermarkError("INVALID_ANNOTATION", "Annotation position must be finite", {
      context: { x: placement.x, y: placement.y },
    });
  }
}

export function createAnnotation(
  input: NewAnnotationInput,
  options: CreateAnnotationOptions = {}
): NumberAnnotation {
  parseLabel(input.label);
  assertPlacement(input);
  const idFactory = options.idFactory ?? randomUUID;
  return {
    id: idFactory(),
    page: input.page,
    x: input.x,
    y: input.y,
    label: input.label,
    style: copyStyle(input.style ?? DEFAULT_NUMBER_STYLE),
  };
}

/** Independent copy with the same identity. */
export function cloneAnnotation(annotation: Readonly<NumberAnnotation>): NumberAnnotation {
  const clone: NumberAnnotation = {
    id: annotation.id,
    page: annotation.page,
    x: annotation.x,
    y: annotation.y,
    label: annotation.label,
    style: copyStyle(annotation.style),
  };
  if (annotation.locator) {
    clone.locator = { ...annotation.locator };
  }
  return clone;
}

/** Copy under a fresh id, not yet placed on any surface. */
export function duplicateAnnotation(
  annotation: Readonly<NumberAnnotation>,
  options: CreateAnnotationOptions = {}
): NumberAnnotation {
  const idFactory = options.idFactory ?? randomUUID;
  return {
    id: idFactory(),
    page: annotation.page,
    x: annotation.x,
    y: annotation.y,
    label: annotation.label,
    style: copyStyle(annotation.style),
  };
}

export function annotationToken(annotation: Readonly<NumberAnnotation>): NumberToken {
  return parseLabel(annotation.label);
}

export function isSubNumbered(annotation: Readonly<NumberAnnotation>): boolean {
  return annotationToken(annotation).sub > 0;
}

// ============================================================================
// Records
// ============================================================================

const LocatorSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const AnnotationRecordSchema = z.object({
  id: z.string().min(1),
  page: z.number().int().nonnegative(),
  x: z.number().finite(),
  y: z.number().finite(),
  // Older files stored plain integers.
  number: z.union([z.string(), z.number().int().nonnegative()]).transform(String),
  style: NumberStyleRecordSchema.default({}),
  locator: LocatorSchema.optional(),
});

export type AnnotationRecord = {
  id: string;
  page: number;
  x: number;
  y: number;
  number: string;
  style: NumberStyleRecord;
  locator?: SurfaceLocator;
};

export function annotationToRecord(annotation: Readonly<NumberAnnotation>): AnnotationRecord {
  const record: AnnotationRecord = {
    id: annotation.id,
    page: annotation.page,
    x: annotation.x,
    y: annotation.y,
    number: annotation.label,
    style: styleToRecord(annotation.style),
  };
  if (annotation.locator) {
    record.locator = { ...annotation.locator };
  }
  return record;
}

export function annotationFromParsedRecord(
  record: z.output<typeof AnnotationRecordSchema>
): NumberAnnotation {
  try {
    parseLabel(record.number);
  } catch (error) {
    throw new SerializationError(`Annotation ${record.id} has an invalid number`, {
      cause: error,
      context: { id: record.id, number: record.number },
    });
  }
  const annotation: NumberAnnotation = {
    id: record.id,
    page: record.page,
    x: record.x,
    y: record.y,
    label: record.number,
    style: styleFromParsedRecord(record.style),
  };
  if (record.locator) {
    annotation.locator = { ...record.locator };
  }
  return annotation;
}

export function annotationFromRecord(record: unknown): NumberAnnotation {
  const result = AnnotationRecordSchema.safeParse(record);
  if (!result.success) {
    throw new SerializationError(`Invalid annotation record: ${result.error.issues[0]?.message}`, {
      context: { issues: result.error.issues },
    });
  }
  return annotationFromParsedRecord(result.data);
}
