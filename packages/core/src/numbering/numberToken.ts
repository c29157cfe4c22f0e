/**
 * Number tokens
 *
 * Labels follow `<main>[.<sub>][p]`. The trailing `p` marks an empty
 * placeholder; it is kept verbatim on the annotation but takes no part in
 * ordering or uniqueness. The ordering key is the `(main, sub)` pair with
 * `sub` defaulting to 0, so `5` < `5.1` < `5.2` < `6`.
 */

import { InvalidLabelError } from "../errors.js";

export type NumberToken = {
  main: number;
  sub: number;
};

export const EMPTY_MARKER = "p";

const DIGITS = /^[0-9]+$/;

function parseComponent(label: string, part: string, name: "main" | "sub"): number {
  if (!DIGITS.test(part)) {
    throw new InvalidLabelError(label, `${name} component "${part}" is not a non-negative integer`);
  }
  if (part.length > 1 && part.startsWith("0")) {
    throw new InvalidLabelError(label, `${name} component "${part}" has a leading zero`);
  }
  const value = Number(part);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidLabelError(label, `${name} component "${part}" is too large`);
  }
  return value;
}

export function hasEmptyMarker(label: string): boolean {
  return label.endsWith(EMPTY_MARKER);
}

/** Removes one trailing `p`, if present. */
export function stripEmptyMarker(label: string): string {
  return hasEmptyMarker(label) ? label.slice(0, -EMPTY_MARKER.length) : label;
}

export function withEmptyMarker(label: string, marked: boolean): string {
  const bare = stripEmptyMarker(label);
  return marked ? `${bare}${EMPTY_MARKER}` : bare;
}

export function parseLabel(label: string): NumberToken {
  const numeric = stripEmptyMarker(label);
  const parts = numeric.split(".");
  if (parts.length > 2) {
    throw new InvalidLabelError(label, "more than one '.' separator");
  }
  const main = parseComponent(label, parts[0], "main");
  const sub = parts.length === 2 ? parseComponent(label, parts[1], "sub") : 0;
  if (parts.length === 2 && sub === 0) {
    throw new InvalidLabelError(label, "sub-number must be at least 1");
  }
  return { main, sub };
}

export function isValidLabel(label: string): boolean {
  try {
    parseLabel(label);
    return true;
  } catch (error) {
    if (error instanceof InvalidLabelError) {
      return false;
    }
    throw error;
  }
}

/**
 * Formats the numeric part of a label. The empty marker is never re-added;
 * callers that need it use {@link withEmptyMarker}.
 */
export function formatLabel(main: number, sub = 0): string {
  return sub === 0 ? String(main) : `${main}.${sub}`;
}

export function formatToken(token: NumberToken): string {
  return formatLabel(token.main, token.sub);
}

export function compareTokens(a: NumberToken, b: NumberToken): -1 | 0 | 1 {
  if (a.main !== b.main) {
    return a.main < b.main ? -1 : 1;
  }
  if (a.sub !== b.sub) {
    return a.sub < b.sub ? -1 : 1;
  }
  return 0;
}

export function compareLabels(a: string, b: string): -1 | 0 | 1 {
  return compareTokens(parseLabel(a), parseLabel(b));
}

export function labelSortKey(label: string): [main: number, sub: number] {
  const { main, sub } = parseLabel(label);
  return [main, sub];
}

export function isWholeNumber(label: string): boolean {
  return parseLabel(label).sub === 0;
}

/** Uniqueness key: equal for `5` and `5p`. */
export function tokenKey(label: string): string {
  const { main, sub } = parseLabel(label);
  return `${main}.${sub}`;
}
