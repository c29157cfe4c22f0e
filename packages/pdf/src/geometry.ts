import type { NumberStyle } from "@numbermark/core";

export type Rect = {
  /** Lower-left corner in PDF user space */
  x: number;
  y: number;
  width: number;
  height: number;
};

export type MarkGeometry = {
  /** Full annotation rectangle, tail included */
  rect: Rect;
  /** Label box inside the rectangle, relative to its lower-left corner */
  box: Rect;
  textWidth: number;
  /** Extra height below the box taken by the callout tail */
  tail: number;
};

export type TextMeasure = (text: string, fontSize: number) => number;

/**
 * Lays out the mark of a label placed at (x, y), where y grows downward from
 * the page's top edge. The box is the text plus padding on every side; the
 * tail, when enabled, hangs below the box from its centre.
 */
export function layoutMark(
  label: string,
  style: Readonly<NumberStyle>,
  position: { x: number; y: number },
  pageHeight: number,
  measure: TextMeasure
): MarkGeometry {
  const textWidth = measure(label, style.fontSize);
  const width = textWidth + style.padding * 2;
  const boxHeight = style.fontSize + style.padding * 2;
  const tail = style.tailEnabled ? style.tailLength : 0;
  const top = pageHeight - position.y;

  return {
    rect: { x: position.x, y: top - boxHeight - tail, width, height: boxHeight + tail },
    box: { x: 0, y: tail, width, height: boxHeight },
    textWidth,
    tail,
  };
}

export function toPdfRectArray(rect: Rect): [number, number, number, number] {
  return [rect.x, rect.y, rect.x + rect.width, rect.y + rect.height];
}

export function rectsMatch(a: Rect, b: Rect, tolerance: number): boolean {
  return (
    Math.abs(a.x - b.x) <= tolerance &&
    Math.abs(a.y - b.y) <= tolerance &&
    Math.abs(a.x + a.width - (b.x + b.width)) <= tolerance &&
    Math.abs(a.y + a.height - (b.y + b.height)) <= tolerance
  );
}

export type Rgb = [number, number, number];

export function hexToRgb(hex: string): Rgb {
  const value = hex.replace(/^#/, "");
  const channel = (offset: number) =>
    Math.round((Number.parseInt(value.slice(offset, offset + 2), 16) / 255) * 1000) / 1000;
  return [channel(0), channel(2), channel(4)];
}
