import type { NumberAnnotation, SurfaceLocator } from "../annotations/numberAnnotation.js";
import { createAnnotation } from "../annotations/numberAnnotation.js";
import { NumbermarkLogger } from "../observability/index.js";
import { AnnotationStore } from "../store/annotationStore.js";
import type { AnnotationSurface } from "../surface/annotationSurface.js";

export const quietLogger = new NumbermarkLogger({ console: false });

export function sequentialIds(prefix = "a"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}${next}`;
  };
}

/** Adds one annotation per label, on page 0, with ids a1, a2, ... */
export function seedStore(labels: readonly string[], store?: AnnotationStore): AnnotationStore {
  const target = store ?? new AnnotationStore({ logger: quietLogger });
  const idFactory = sequentialIds();
  labels.forEach((label, index) => {
    target.add(createAnnotation({ page: 0, x: 10 * index, y: 20, label }, { idFactory }));
  });
  return target;
}

export function labelsOf(store: AnnotationStore): string[] {
  return store.all().map((annotation) => annotation.label);
}

type Mark = { label: string; page: number; x: number; y: number };

/** In-memory surface that records one mark per annotation id. */
export class RecordingSurface implements AnnotationSurface {
  readonly marks = new Map<string, Mark>();
  readonly calls: string[] = [];
  private serial = 0;

  apply(annotation: Readonly<NumberAnnotation>): SurfaceLocator {
    this.serial += 1;
    this.calls.push(`apply:${annotation.label}`);
    this.marks.set(annotation.id, {
      label: annotation.label,
      page: annotation.page,
      x: annotation.x,
      y: annotation.y,
    });
    return { mark: this.serial };
  }

  remove(annotation: Readonly<NumberAnnotation>): boolean {
    this.calls.push(`remove:${annotation.label}`);
    return this.marks.delete(annotation.id);
  }

  labels(): string[] {
    return Array.from(this.marks.values())
      .map((mark) => mark.label)
      .sort();
  }
}
