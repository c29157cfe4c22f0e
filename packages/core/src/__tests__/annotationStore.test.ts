import { describe, expect, it } from "vitest";
import { createAnnotation } from "../annotations/numberAnnotation.js";
import { InvalidLabelError, NumbermarkError, SerializationError } from "../errors.js";
import { AnnotationStore, describeGaps } from "../store/annotationStore.js";
import { createNumberStyle, stylesEqual } from "../styles/numberStyle.js";
import { labelsOf, quietLogger, seedStore } from "./helpers.js";

describe("AnnotationStore", () => {
  describe("collection", () => {
    it("keeps insertion order and looks up by id", () => {
      const store = seedStore(["3", "1", "2"]);
      expect(labelsOf(store)).toEqual(["3", "1", "2"]);
      expect(store.count()).toBe(3);
      expect(store.get("a2")?.label).toBe("1");
      expect(store.has("a4")).toBe(false);
    });

    it("sorts by token and keeps insertion order for equal tokens", () => {
      const store = seedStore(["3", "1", "2.1", "2", "1"]);
      const sorted = store.allSorted();
      expect(sorted.map((annotation) => annotation.label)).toEqual(["1", "1", "2", "2.1", "3"]);
      expect(sorted.map((annotation) => annotation.id).slice(0, 2)).toEqual(["a2", "a5"]);
    });

    it("groups annotations by page", () => {
      const store = new AnnotationStore({ logger: quietLogger });
      store.add(createAnnotation({ page: 2, x: 0, y: 0, label: "1" }, { idFactory: () => "p2" }));
      store.add(createAnnotation({ page: 0, x: 0, y: 0, label: "2" }, { idFactory: () => "p0" }));
      expect(store.pages()).toEqual([0, 2]);
      expect(store.getForPage(2).map((annotation) => annotation.id)).toEqual(["p2"]);
      expect(store.getForPage(1)).toEqual([]);
    });

    it("returns undefined when removing an unknown id", () => {
      const store = seedStore(["1"]);
      expect(store.remove("missing")).toBeUndefined();
      expect(store.remove("a1")?.label).toBe("1");
      expect(store.count()).toBe(0);
    });
  });

  describe("labels", () => {
    it("matches labels by token, ignoring the empty marker", () => {
      const store = seedStore(["1", "2", "2p", "3", "3"]);
      expect(store.getByLabel("2p")?.id).toBe("a2");
      expect(store.hasLabel("3p")).toBe(true);
      expect(store.hasLabel("4")).toBe(false);
      expect(store.findByLabel("2").map((annotation) => annotation.id)).toEqual(["a2", "a3"]);
    });

    it("reports groups of duplicates in token order", () => {
      const store = seedStore(["3", "2", "3p", "1", "2"]);
      const groups = store.findDuplicates().map((group) => group.map((annotation) => annotation.id));
      expect(groups).toEqual([
        ["a2", "a5"],
        ["a1", "a3"],
      ]);
    });

    it("allocates the next whole number", () => {
      expect(seedStore([]).nextWholeNumber()).toBe("1");
      expect(seedStore(["1", "3", "2.5"]).nextWholeNumber()).toBe("4");
      expect(seedStore(["7p"]).nextWholeNumber()).toBe("8");
      expect(seedStore(["2.1"]).nextWholeNumber()).toBe("1");
    });

    it("allocates the next sub-number", () => {
      expect(seedStore(["5", "5.1", "5.2"]).nextSubNumber("5")).toBe("5.3");
      expect(seedStore(["5"]).nextSubNumber("5")).toBe("5.1");
      expect(seedStore(["5", "6.4"]).nextSubNumber("5p")).toBe("5.1");
    });

    it("validates a label before relabelling", () => {
      const store = seedStore(["1"]);
      expect(() => store.relabel("a1", "x")).toThrow(InvalidLabelError);
      expect(store.get("a1")?.label).toBe("1");
      expect(store.relabel("missing", "2")).toBeUndefined();

      const change = store.relabel("a1", "4p");
      expect(change?.oldLabel).toBe("1");
      expect(change?.newLabel).toBe("4p");
      expect(store.get("a1")?.label).toBe("4p");
    });
  });

  describe("advanceFrom", () => {
    it("shifts the label and everything above it", () => {
      const store = seedStore(["1", "2", "3"]);
      const changes = store.advanceFrom("2");
      expect(changes).toHaveLength(2);
      expect(labelsOf(store)).toEqual(["1", "3", "4"]);
    });

    it("keeps the empty marker", () => {
      const store = seedStore(["1", "2p", "3"]);
      store.advanceFrom("2");
      expect(labelsOf(store)).toEqual(["1", "3p", "4"]);
    });

    it("never touches sub-numbers", () => {
      const store = seedStore(["2", "2.1", "3"]);
      store.advanceFrom("2");
      expect(labelsOf(store)).toEqual(["3", "2.1", "4"]);
    });

    it("honours the delta and the exclusion set", () => {
      const store = seedStore(["1", "2", "3"]);
      const changes = store.advanceFrom("1", 10, { exclude: new Set(["a2"]) });
      expect(changes.map((change) => change.annotation.id)).toEqual(["a1", "a3"]);
      expect(labelsOf(store)).toEqual(["11", "2", "13"]);
    });

    it("reports changes in ascending order", () => {
      const store = seedStore(["3", "1", "2"]);
      const changes = store.advanceFrom("1");
      expect(changes.map((change) => change.oldLabel)).toEqual(["1", "2", "3"]);
      expect(changes.map((change) => change.newLabel)).toEqual(["2", "3", "4"]);
    });

    it("rejects non-positive deltas", () => {
      const store = seedStore(["1"]);
      expect(() => store.advanceFrom("1", 0)).toThrow(NumbermarkError);
      expect(() => store.advanceFrom("1", 1.5)).toThrow(/positive integer/);
      expect(labelsOf(store)).toEqual(["1"]);
    });
  });

  describe("decreaseFrom", () => {
    it("shifts only labels strictly above the target", () => {
      const store = seedStore(["1", "2", "3"]);
      const changes = store.decreaseFrom("1");
      expect(changes).toHaveLength(2);
      expect(labelsOf(store)).toEqual(["1", "1", "2"]);
    });

    it("keeps markers and ignores sub-numbers", () => {
      const store = seedStore(["1", "3p", "3.1", "4"]);
      store.decreaseFrom("2");
      expect(labelsOf(store)).toEqual(["1", "2p", "3.1", "3"]);
    });

    it("refuses to go below zero and changes nothing", () => {
      const store = seedStore(["1", "2"]);
      expect(() => store.decreaseFrom("0", 2)).toThrow(/below zero/);
      expect(labelsOf(store)).toEqual(["1", "2"]);
      expect(store.decreaseFrom("1", 2).map((change) => change.newLabel)).toEqual(["0"]);
    });

    it("refuses to advance past the largest safe number and changes nothing", () => {
      const store = seedStore(["1", "9007199254740991"]);
      store.acknowledgeSave();
      expect(() => store.advanceFrom("1")).toThrow(/exceed the largest number/);
      expect(labelsOf(store)).toEqual(["1", "9007199254740991"]);
      expect(store.hasLabel("1")).toBe(true);
      expect(store.modified).toBe(false);
      expect(store.advanceFrom("1", 1, { exclude: new Set(["a2"]) })).toHaveLength(1);
    });
  });

  describe("gaps", () => {
    it("finds missing whole numbers between the lowest and highest", () => {
      const store = seedStore(["1", "2", "5", "6"]);
      expect(store.findGaps()).toEqual([3, 4]);
      expect(store.validateSequence()).toEqual({
        valid: false,
        message: "Missing numbers: 3, 4",
        missing: 2,
        gaps: [3, 4],
      });
    });

    it("ignores sub-numbers", () => {
      expect(seedStore(["1", "2.1", "3"]).findGaps()).toEqual([2]);
    });

    it("treats an empty or complete sequence as valid", () => {
      expect(seedStore([]).validateSequence()).toEqual({
        valid: true,
        message: "Sequence is complete",
        missing: 0,
        gaps: [],
      });
      expect(seedStore(["3", "4p", "5"]).validateSequence().valid).toBe(true);
    });

    it("summarises long gap lists", () => {
      expect(describeGaps([7])).toBe("Missing number: 7");
      expect(seedStore(["1", "10"]).validateSequence().message).toBe("8 missing: 2...9");
    });

    it("counts a huge gap without listing it", () => {
      expect(seedStore(["1", "999999999", "4"]).validateSequence()).toEqual({
        valid: false,
        message: "999999996 missing: 2...999999998",
        missing: 999999996,
        gaps: [],
      });
    });
  });

  describe("placement and style", () => {
    it("moves an annotation and reports both placements", () => {
      const store = seedStore(["1"]);
      const result = store.move("a1", { page: 1, x: 5, y: 6 });
      expect(result?.from).toEqual({ page: 0, x: 0, y: 20 });
      expect(result?.to).toEqual({ page: 1, x: 5, y: 6 });
      expect(store.get("a1")?.page).toBe(1);
      expect(() => store.move("a1", { page: -1, x: 0, y: 0 })).toThrow(NumbermarkError);
      expect(store.move("missing", { page: 0, x: 0, y: 0 })).toBeUndefined();
    });

    it("stores a copy of the new style", () => {
      const store = seedStore(["1"]);
      const style = createNumberStyle({ fontSize: 40 });
      const result = store.restyle("a1", style);
      style.fontSize = 10;
      expect(store.get("a1")?.style.fontSize).toBe(40);
      expect(result?.oldStyle.fontSize).toBe(24);
    });
  });

  describe("modified flag", () => {
    it("tracks changes until a save is acknowledged", () => {
      const store = new AnnotationStore({ logger: quietLogger });
      expect(store.modified).toBe(false);
      seedStore(["1"], store);
      expect(store.modified).toBe(true);

      store.acknowledgeSave();
      expect(store.modified).toBe(false);
      store.remove("missing");
      store.advanceFrom("5");
      expect(store.modified).toBe(false);

      store.relabel("a1", "2");
      expect(store.modified).toBe(true);
    });
  });

  describe("serialization", () => {
    it("round-trips labels, ids and styles", () => {
      const store = seedStore(["1", "2.1", "3p"]);
      store.restyle("a2", createNumberStyle({ textColor: "#FF0000" }));

      const restored = new AnnotationStore({ logger: quietLogger });
      restored.fromJSON(store.toJSON());
      expect(labelsOf(restored)).toEqual(["1", "2.1", "3p"]);
      expect(restored.all().map((annotation) => annotation.id)).toEqual(["a1", "a2", "a3"]);
      const original = store.get("a2");
      const loaded = restored.get("a2");
      expect(original && loaded && stylesEqual(original.style, loaded.style)).toBe(true);
      expect(restored.modified).toBe(true);
    });

    it("writes the persisted field names", () => {
      const store = seedStore(["4"]);
      const [record] = JSON.parse(store.toJSON());
      expect(Object.keys(record).sort()).toEqual(["id", "number", "page", "style", "x", "y"]);
      expect(record.number).toBe("4");
      expect(record.style.font_family).toBe("Arial");
    });

    it("accepts numeric labels and missing styles", () => {
      const store = new AnnotationStore({ logger: quietLogger });
      store.fromJSON(JSON.stringify([{ id: "x", page: 0, x: 1, y: 2, number: 7 }]));
      expect(store.get("x")?.label).toBe("7");
      expect(store.get("x")?.style.fontSize).toBe(24);
    });

    it.each([
      ["malformed JSON", "nope"],
      ["a non-array", "{}"],
      ["an invalid label", JSON.stringify([{ id: "x", page: 0, x: 0, y: 0, number: "abc" }])],
      ["a negative page", JSON.stringify([{ id: "x", page: -1, x: 0, y: 0, number: "1" }])],
      [
        "duplicate ids",
        JSON.stringify([
          { id: "x", page: 0, x: 0, y: 0, number: "1" },
          { id: "x", page: 0, x: 0, y: 0, number: "2" },
        ]),
      ],
    ])("leaves the store untouched on %s", (_name, payload) => {
      const store = seedStore(["1", "2"]);
      store.acknowledgeSave();
      expect(() => store.fromJSON(payload)).toThrow(SerializationError);
      expect(labelsOf(store)).toEqual(["1", "2"]);
      expect(store.modified).toBe(false);
    });
  });
});
