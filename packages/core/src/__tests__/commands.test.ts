import { describe, expect, it } from "vitest";
import { createAnnotation } from "../annotations/numberAnnotation.js";
import {
  addCommand,
  batchCommand,
  bulkRenumberCommand,
  commandTargets,
  moveCommand,
  removeCommand,
} from "../history/commands.js";
import { seedStore } from "./helpers.js";

describe("annotation commands", () => {
  it("snapshots annotations without their surface locator", () => {
    const annotation = createAnnotation({ page: 0, x: 1, y: 2, label: "3" }, { idFactory: () => "a" });
    annotation.locator = { objectNumber: 12 };

    const command = removeCommand(annotation);
    annotation.label = "9";
    annotation.style.fontSize = 99;

    expect(command.annotation.label).toBe("3");
    expect(command.annotation.style.fontSize).toBe(24);
    expect(command.annotation.locator).toBeUndefined();
    expect(annotation.locator).toEqual({ objectNumber: 12 });
  });

  it("drops empty renumberings when batching", () => {
    const annotation = createAnnotation({ page: 0, x: 0, y: 0, label: "1" }, { idFactory: () => "a" });
    const add = addCommand(annotation);
    expect(batchCommand([bulkRenumberCommand([]), add])).toBe(add);
  });

  it("lists the touched ids in command order", () => {
    const store = seedStore(["1", "2", "3"]);
    const changes = store.advanceFrom("2");
    const added = createAnnotation({ page: 0, x: 0, y: 0, label: "2" }, { idFactory: () => "new" });

    const command = batchCommand([
      bulkRenumberCommand(changes),
      addCommand(added),
      moveCommand("a1", { page: 0, x: 0, y: 0 }, { page: 1, x: 0, y: 0 }),
    ]);
    expect(command.type).toBe("batch");
    expect(commandTargets(command)).toEqual(["a2", "a3", "new", "a1"]);
  });
});
