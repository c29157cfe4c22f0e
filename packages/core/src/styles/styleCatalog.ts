import { z } from "zod";
import { SerializationError, describeError } from "../errors.js";
import { type NumbermarkLogger, getLogger } from "../observability/index.js";
import {
  DEFAULT_STYLE_NAME,
  type NumberStyle,
  NumberStyleRecordSchema,
  copyStyle,
  createNumberStyle,
  styleFromParsedRecord,
  styleToRecord,
  validateStyle,
} from "./numberStyle.js";

export const BUILT_IN_PRESETS: readonly NumberStyle[] = [
  createNumberStyle(),
  createNumberStyle({ name: "Red on White", textColor: "#FF0000", bgColor: "#FFFFFF" }),
  createNumberStyle({ name: "White on Black", textColor: "#FFFFFF", bgColor: "#000000" }),
  createNumberStyle({ name: "Large Yellow", fontSize: 72, bgColor: "#FFFF00" }),
  createNumberStyle({
    name: "Subtle Gray",
    textColor: "#333333",
    bgColor: "#CCCCCC",
    bgOpacity: 0.7,
  }),
];

const CatalogRecordSchema = z.record(z.string().min(1), z.unknown());

export interface StyleCatalogOptions {
  logger?: NumbermarkLogger;
}

/**
 * Named style presets. Entries go in and come out as copies; "Default" is
 * always present.
 */
export class StyleCatalog {
  private readonly presets = new Map<string, NumberStyle>();
  private readonly logger: NumbermarkLogger;

  constructor(options: StyleCatalogOptions = {}) {
    this.logger = options.logger ?? getLogger();
    for (const preset of BUILT_IN_PRESETS) {
      this.presets.set(preset.name, copyStyle(preset));
    }
  }

  get(name: string): NumberStyle | undefined {
    const preset = this.presets.get(name);
    return preset ? copyStyle(preset) : undefined;
  }

  has(name: string): boolean {
    return this.presets.has(name);
  }

  names(): string[] {
    return Array.from(this.presets.keys());
  }

  /** Stores a validated copy; throws `INVALID_STYLE` on out-of-range fields. */
  save(style: Readonly<NumberStyle>): void {
    this.presets.set(style.name, validateStyle(style));
    this.logger.debug("catalog", `Saved preset "${style.name}"`);
  }

  delete(name: string): boolean {
    if (name === DEFAULT_STYLE_NAME || !this.presets.has(name)) {
      return false;
    }
    this.presets.delete(name);
    this.logger.debug("catalog", `Deleted preset "${name}"`);
    return true;
  }

  toJSON(): string {
    const data: Record<string, unknown> = {};
    for (const [name, style] of this.presets) {
      data[name] = styleToRecord(style);
    }
    return JSON.stringify(data, null, 2);
  }

  /**
   * Merges presets from a serialized catalog over the current ones. The whole
   * payload is validated before anything is applied.
   */
  fromJSON(json: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw new SerializationError(`Style catalog is not valid JSON: ${describeError(error)}`, {
        cause: error,
      });
    }

    const catalog = CatalogRecordSchema.safeParse(raw);
    if (!catalog.success) {
      throw new SerializationError("Style catalog must be an object of name -> style");
    }

    const loaded: NumberStyle[] = [];
    for (const [name, record] of Object.entries(catalog.data)) {
      const parsed = NumberStyleRecordSchema.safeParse(
        record !== null && typeof record === "object" ? { name, ...record } : record
      );
      if (!parsed.success) {
        throw new SerializationError(
          `Invalid preset "${name}": ${parsed.error.issues[0]?.message}`,
          { context: { preset: name, issues: parsed.error.issues } }
        );
      }
      loaded.push({ ...styleFromParsedRecord(parsed.data), name });
    }

    for (const style of loaded) {
      this.presets.set(style.name, style);
    }
    this.logger.debug("catalog", `Loaded ${loaded.length} presets`);
  }
}
