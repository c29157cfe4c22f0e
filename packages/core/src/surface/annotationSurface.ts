import type { NumberAnnotation, SurfaceLocator } from "../annotations/numberAnnotation.js";

/**
 * Render/edit collaborator that owns the visible marks.
 *
 * `apply` creates or replaces the mark of an annotation and returns the
 * locator to store on it. `remove` erases the mark, using the stored locator
 * first and falling back to the annotation's position when the locator is
 * stale; it reports whether a mark was found.
 */
export interface AnnotationSurface {
  apply(annotation: Readonly<NumberAnnotation>): SurfaceLocator | undefined;
  remove(annotation: Readonly<NumberAnnotation>): boolean;
}

/** Surface for sessions without an open document. */
export const detachedSurface: AnnotationSurface = {
  apply: () => undefined,
  remove: () => false,
};
