import { describe, expect, it } from "vitest";
import { NumbermarkError, SerializationError } from "../errors.js";
import { NumbermarkLogger } from "../observability/index.js";
import {
  DEFAULT_NUMBER_STYLE,
  type NumberStyle,
  copyStyle,
  createNumberStyle,
  styleFromRecord,
  styleToRecord,
  stylesEqual,
} from "../styles/numberStyle.js";
import { StyleCatalog } from "../styles/styleCatalog.js";

const quietLogger = new NumbermarkLogger({ console: false });

describe("NumberStyle", () => {
  it("fills every field from the defaults", () => {
    const style = createNumberStyle();
    expect(style.fontFamily).toBe("Arial");
    expect(style.fontSize).toBe(24);
    expect(style.bgOpacity).toBe(1);
    expect(style.borderEnabled).toBe(false);
    expect(style.tailEnabled).toBe(false);
    expect(stylesEqual(style, DEFAULT_NUMBER_STYLE)).toBe(true);
  });

  it("rejects invalid values", () => {
    expect(() => createNumberStyle({ fontSize: 0 })).toThrow(NumbermarkError);
    expect(() => createNumberStyle({ fontSize: 12.5 })).toThrow(NumbermarkError);
    expect(() => createNumberStyle({ bgOpacity: 1.5 })).toThrow(NumbermarkError);
    expect(() => createNumberStyle({ textColor: "red" })).toThrow(NumbermarkError);
  });

  it("rejects fields it does not know", () => {
    const fields = { fontSize: 30, shadow: true };
    expect(() => createNumberStyle(fields)).toThrow(/Invalid style/);
  });

  it("copies by value", () => {
    const original = createNumberStyle({ name: "Mine" });
    const copy = copyStyle(original);
    copy.bgOpacity = 0.2;
    expect(original.bgOpacity).toBe(1);
    expect(stylesEqual(original, copy)).toBe(false);
  });

  it("round-trips through the persisted record", () => {
    const style = createNumberStyle({ fontSize: 48, textColor: "#FF0000", tailEnabled: true });
    const record = styleToRecord(style);
    expect(record.font_size).toBe(48);
    expect(record.text_color).toBe("#FF0000");
    expect(stylesEqual(styleFromRecord(record), style)).toBe(true);
  });

  it("loads partial records with defaults and ignores unknown keys", () => {
    const style = styleFromRecord({ font_size: 36, nonexistent: true });
    expect(style.fontSize).toBe(36);
    expect(style.fontFamily).toBe("Arial");
    expect(style).not.toHaveProperty("nonexistent");
  });

  it("refuses wrongly typed record fields", () => {
    expect(() => styleFromRecord({ font_size: "big" })).toThrow(SerializationError);
  });
});

describe("StyleCatalog", () => {
  it("starts with the built-in presets", () => {
    const catalog = new StyleCatalog({ logger: quietLogger });
    expect(catalog.names()).toEqual([
      "Default",
      "Red on White",
      "White on Black",
      "Large Yellow",
      "Subtle Gray",
    ]);
    expect(catalog.get("Large Yellow")?.fontSize).toBe(72);
    expect(catalog.get("Subtle Gray")?.bgOpacity).toBe(0.7);
  });

  it("saves and returns independent copies", () => {
    const catalog = new StyleCatalog({ logger: quietLogger });
    const style: NumberStyle = createNumberStyle({ name: "Big", fontSize: 100 });
    catalog.save(style);
    style.fontSize = 10;

    const first = catalog.get("Big");
    const second = catalog.get("Big");
    expect(first?.fontSize).toBe(100);
    expect(first).not.toBe(second);

    if (first) {
      first.bgOpacity = 0;
    }
    expect(catalog.get("Big")?.bgOpacity).toBe(1);
  });

  it("rejects invalid presets so its own output always reloads", () => {
    const catalog = new StyleCatalog({ logger: quietLogger });
    const broken: NumberStyle = { ...createNumberStyle({ name: "Broken" }), fontSize: -1 };

    expect(() => catalog.save(broken)).toThrow(NumbermarkError);
    expect(() => catalog.save({ ...broken, fontSize: 12, name: "" })).toThrow(/Invalid style/);
    expect(catalog.has("Broken")).toBe(false);

    const reloaded = new StyleCatalog({ logger: quietLogger });
    reloaded.fromJSON(catalog.toJSON());
    expect(reloaded.names()).toEqual(catalog.names());
  });

  it("returns undefined for unknown presets", () => {
    const catalog = new StyleCatalog({ logger: quietLogger });
    expect(catalog.get("Nope")).toBeUndefined();
  });

  it("deletes presets but never Default", () => {
    const catalog = new StyleCatalog({ logger: quietLogger });
    catalog.save(createNumberStyle({ name: "Temp" }));
    expect(catalog.delete("Temp")).toBe(true);
    expect(catalog.get("Temp")).toBeUndefined();
    expect(catalog.delete("Temp")).toBe(false);
    expect(catalog.delete("Default")).toBe(false);
    expect(catalog.has("Default")).toBe(true);
  });

  it("round-trips through JSON", () => {
    const catalog = new StyleCatalog({ logger: quietLogger });
    catalog.save(createNumberStyle({ name: "Custom", fontSize: 72 }));

    const restored = new StyleCatalog({ logger: quietLogger });
    restored.fromJSON(catalog.toJSON());
    expect(restored.get("Custom")?.fontSize).toBe(72);
    expect(restored.get("Custom")?.name).toBe("Custom");
  });

  it("names loaded presets after their key", () => {
    const catalog = new StyleCatalog({ logger: quietLogger });
    catalog.fromJSON(JSON.stringify({ Plan: { font_size: 30 } }));
    expect(catalog.get("Plan")?.name).toBe("Plan");
    expect(catalog.get("Plan")?.fontSize).toBe(30);
  });

  it("leaves the catalog untouched when any preset is invalid", () => {
    const catalog = new StyleCatalog({ logger: quietLogger });
    const payload = JSON.stringify({
      Good: { font_size: 30 },
      Bad: { bg_opacity: 3 },
    });
    expect(() => catalog.fromJSON(payload)).toThrow(SerializationError);
    expect(catalog.has("Good")).toBe(false);
    expect(() => catalog.fromJSON("{not json")).toThrow(SerializationError);
    expect(() => catalog.fromJSON("[]")).toThrow(SerializationError);
  });
});
