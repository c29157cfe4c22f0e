/**
 * Number styles
 *
 * A style is a plain value. Every holder (toolbar, preset, annotation) owns
 * its own copy; {@link copyStyle} is applied at each hand-over so that editing
 * one holder never rewrites another.
 *
 * The builder schema rejects unknown fields. The persisted record schema
 * fills gaps with defaults and drops fields it does not know.
 */

import { z } from "zod";
import { NumbermarkError, SerializationError } from "../errors.js";

export type NumberStyle = {
  name: string;
  fontFamily: string;
  fontSize: number;
  textColor: string;
  bgColor: string;
  bgOpacity: number;
  padding: number;
  borderEnabled: boolean;
  borderWidth: number;
  tailEnabled: boolean;
  tailLength: number;
  tailWidth: number;
};

export const DEFAULT_STYLE_NAME = "Default";

export const DEFAULT_NUMBER_STYLE: Readonly<NumberStyle> = Object.freeze({
  name: DEFAULT_STYLE_NAME,
  fontFamily: "Arial",
  fontSize: 24,
  textColor: "#000000",
  bgColor: "#FFFF00",
  bgOpacity: 1,
  padding: 4,
  borderEnabled: false,
  borderWidth: 1,
  tailEnabled: false,
  tailLength: 20,
  tailWidth: 2,
});

const HexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, "expected a #RRGGBB colour");

const StyleFieldsSchema = z
  .object({
    name: z.string().min(1),
    fontFamily: z.string().min(1),
    fontSize: z.number().int().positive(),
    textColor: HexColorSchema,
    bgColor: HexColorSchema,
    bgOpacity: z.number().min(0).max(1),
    padding: z.number().nonnegative(),
    borderEnabled: z.boolean(),
    borderWidth: z.number().nonnegative(),
    tailEnabled: z.boolean(),
    tailLength: z.number().nonnegative(),
    tailWidth: z.number().nonnegative(),
  })
  .strict();

/** Persisted form, with the field names used in saved files. */
export const NumberStyleRecordSchema = z.object({
  name: z.string().min(1).default(DEFAULT_NUMBER_STYLE.name),
  font_family: z.string().min(1).default(DEFAULT_NUMBER_STYLE.fontFamily),
  font_size: z.number().int().positive().default(DEFAULT_NUMBER_STYLE.fontSize),
  text_color: HexColorSchema.default(DEFAULT_NUMBER_STYLE.textColor),
  bg_color: HexColorSchema.default(DEFAULT_NUMBER_STYLE.bgColor),
  bg_opacity: z.number().min(0).max(1).default(DEFAULT_NUMBER_STYLE.bgOpacity),
  padding: z.number().nonnegative().default(DEFAULT_NUMBER_STYLE.padding),
  border_enabled: z.boolean().default(DEFAULT_NUMBER_STYLE.borderEnabled),
  border_width: z.number().nonnegative().default(DEFAULT_NUMBER_STYLE.borderWidth),
  tail_enabled: z.boolean().default(DEFAULT_NUMBER_STYLE.tailEnabled),
  tail_length: z.number().nonnegative().default(DEFAULT_NUMBER_STYLE.tailLength),
  tail_width: z.number().nonnegative().default(DEFAULT_NUMBER_STYLE.tailWidth),
});

export type NumberStyleRecord = z.output<typeof NumberStyleRecordSchema>;

function invalidStyle(error: z.ZodError): NumbermarkError {
  return new NumbermarkError("INVALID_STYLE", `Invalid style: ${error.issues[0]?.message}`, {
    context: { issues: error.issues },
  });
}

export function createNumberStyle(fields: Partial<NumberStyle> = {}): NumberStyle {
  const result = StyleFieldsSchema.safeParse({ ...DEFAULT_NUMBER_STYLE, ...fields });
  if (!result.success) {
    throw invalidStyle(result.error);
  }
  return result.data;
}

/** Checks a complete style; fields outside `NumberStyle` are dropped. */
export function validateStyle(style: Readonly<NumberStyle>): NumberStyle {
  const result = StyleFieldsSchema.strip().safeParse(style);
  if (!result.success) {
    throw invalidStyle(result.error);
  }
  return result.data;
}

export function copyStyle(style: Readonly<NumberStyle>): NumberStyle {
  return { ...style };
}

export function withStyleName(style: Readonly<NumberStyle>, name: string): NumberStyle {
  return createNumberStyle({ ...style, name });
}

export function stylesEqual(a: Readonly<NumberStyle>, b: Readonly<NumberStyle>): boolean {
  return (
    a.name === b.name &&
    a.fontFamily === b.fontFamily &&
    a.fontSize === b.fontSize &&
    a.textColor === b.textColor &&
    a.bgColor === b.bgColor &&
    a.bgOpacity === b.bgOpacity &&
    a.padding === b.padding &&
    a.borderEnabled === b.borderEnabled &&
    a.borderWidth === b.borderWidth &&
    a.tailEnabled === b.tailEnabled &&
    a.tailLength === b.tailLength &&
    a.tailWidth === b.tailWidth
  );
}

export function styleToRecord(style: Readonly<NumberStyle>): NumberStyleRecord {
  return {
    name: style.name,
    font_family: style.fontFamily,
    font_size: style.fontSize,
    text_color: style.textColor,
    bg_color: style.bgColor,
    bg_opacity: style.bgOpacity,
    padding: style.padding,
    border_enabled: style.borderEnabled,
    border_width: style.borderWidth,
    tail_enabled: style.tailEnabled,
    tail_length: style.tailLength,
    tail_width: style.tailWidth,
  };
}

export function styleFromParsedRecord(record: NumberStyleRecord): NumberStyle {
  return {
    name: record.name,
    fontFamily: record.font_family,
    fontSize: record.font_size,
    textColor: record.text_color,
    bgColor: record.bg_color,
    bgOpacity: record.bg_opacity,
    padding: record.padding,
    borderEnabled: record.border_enabled,
    borderWidth: record.border_width,
    tailEnabled: record.tail_enabled,
    tailLength: record.tail_length,
    tailWidth: record.tail_width,
  };
}

export function styleFromRecord(record: unknown): NumberStyle {
  const result = NumberStyleRecordSchema.safeParse(record);
  if (!result.success) {
    throw new SerializationError(`Invalid style record: ${result.error.issues[0]?.message}`, {
      context: { issues: result.error.issues },
    });
  }
  return styleFromParsedRecord(result.data);
}
