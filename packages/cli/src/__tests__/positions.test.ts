import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import { NumbermarkLogger, SerializationError, resolveConfig } from "@numbermark/core";
import { openPdfSession, savePdfSession } from "@numbermark/pdf";
import { PDFDocument } from "pdf-lib";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { exportPositions, importPositions, readPositions } from "../commands/positions";
import { reportForFile } from "../utils/documents";

const logger = new NumbermarkLogger({ console: false });
const config = resolveConfig({ logging: { console: false } });

function pipedInput(text: string): PassThrough {
  const stream = new PassThrough();
  stream.end(text);
  return stream;
}

async function writeNumberedPdf(path: string): Promise<void> {
  const document = await PDFDocument.create();
  document.addPage([600, 800]);
  const handle = await openPdfSession(await document.save(), { logger });
  handle.session.insert({ page: 0, x: 10, y: 10 });
  handle.session.insert({ page: 0, x: 50, y: 10 });
  await writeFile(path, await savePdfSession(handle));
}

describe("positions commands", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "numbermark-cli-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("exports the numbers stored in a PDF", async () => {
    const pdfPath = join(dir, "plan.pdf");
    await writeNumberedPdf(pdfPath);

    const records = JSON.parse(await exportPositions(pdfPath, config, logger)) as Array<{
      number: string;
    }>;
    expect(records.map((record) => record.number)).toEqual(["1", "2"]);
  });

  it("reports on a PDF and its marks", async () => {
    const pdfPath = join(dir, "plan.pdf");
    await writeNumberedPdf(pdfPath);

    const report = await reportForFile(pdfPath, config, logger);
    expect(report.pages).toBe(1);
    expect(report.annotations.map((row) => [row.label, row.linked])).toEqual([
      ["1", true],
      ["2", true],
    ]);
    expect(report.validation.valid).toBe(true);
  });

  it("imports positions and redraws the marks", async () => {
    const pdfPath = join(dir, "plan.pdf");
    const outPath = join(dir, "out.pdf");
    await writeNumberedPdf(pdfPath);
    const positions = JSON.stringify([
      { id: "x1", page: 0, x: 10, y: 10, number: "1" },
      { id: "x2", page: 0, x: 50, y: 10, number: "2" },
      { id: "x3", page: 0, x: 90, y: 10, number: "4" },
    ]);

    expect(await importPositions(pdfPath, positions, outPath, config, logger)).toBe(3);

    const report = await reportForFile(outPath, config, logger);
    expect(report.annotations.map((row) => row.id)).toEqual(["x1", "x2", "x3"]);
    expect(report.annotations.every((row) => row.linked)).toBe(true);
    expect(report.validation.message).toBe("Missing number: 3");
  });

  it("validates an exported positions file", async () => {
    const jsonPath = join(dir, "positions.json");
    await writeFile(
      jsonPath,
      JSON.stringify([
        { id: "a", page: 0, x: 0, y: 0, number: "2" },
        { id: "b", page: 0, x: 0, y: 0, number: "2p" },
      ]),
      "utf8"
    );

    const report = await reportForFile(jsonPath, config, logger);
    expect(report.pages).toBeUndefined();
    expect(report.duplicates).toEqual(["2 (x2)"]);
    expect(report.annotations[0]?.linked).toBeUndefined();
  });

  it("imports positions piped to standard input", async () => {
    const pdfPath = join(dir, "plan.pdf");
    const outPath = join(dir, "piped.pdf");
    await writeNumberedPdf(pdfPath);
    const positions = JSON.stringify([{ id: "s1", page: 0, x: 20, y: 30, number: "7" }]);

    const json = await readPositions("-", pipedInput(positions));
    expect(json).toBe(positions);
    expect(await importPositions(pdfPath, json, outPath, config, logger)).toBe(1);

    const report = await reportForFile(outPath, config, logger);
    expect(report.annotations.map((row) => [row.id, row.label, row.linked])).toEqual([
      ["s1", "7", true],
    ]);
  });

  it("refuses an empty or interactive standard input", async () => {
    await expect(readPositions("-", pipedInput("  \n"))).rejects.toThrow(SerializationError);
    const terminal = Object.assign(new PassThrough(), { isTTY: true });
    await expect(readPositions("-", terminal)).rejects.toThrow(
      "No positions were piped to standard input"
    );
  });

  it("reads a positions file by path", async () => {
    const jsonPath = join(dir, "positions.json");
    await writeFile(jsonPath, "[]", "utf8");
    expect(await readPositions(jsonPath)).toBe("[]");
  });

  it("leaves the source PDF untouched on import", async () => {
    const pdfPath = join(dir, "plan.pdf");
    await writeNumberedPdf(pdfPath);
    const before = await readFile(pdfPath);

    await importPositions(pdfPath, "[]", join(dir, "empty.pdf"), config, logger);
    expect((await readFile(pdfPath)).equals(before)).toBe(true);
    const report = await reportForFile(join(dir, "empty.pdf"), config, logger);
    expect(report.annotations).toEqual([]);
  });
});
