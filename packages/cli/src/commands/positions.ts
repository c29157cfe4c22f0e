import { readFile, writeFile } from "node:fs/promises";
import type { Readable } from "node:stream";
import { type NumbermarkConfig, type NumbermarkLogger, SerializationError } from "@numbermark/core";
import { savePdfSession } from "@numbermark/pdf";
import { Command } from "commander";
import { openPdfFile } from "../utils/documents";
import { createCliLogger, resolveCliConfig } from "../utils/runtimeOptions";
import { readStdin, writeStdout } from "../utils/terminal";

export function exportCommand(): Command {
  return new Command("export")
    .description("Write the numbers stored in a PDF as a positions JSON file")
    .argument("<pdf>", "PDF document")
    .option("-o, --out <file>", "Target file (default: stdout)")
    .action(async (path: string, options: { out?: string }) => {
      const config = resolveCliConfig();
      const json = await exportPositions(path, config, createCliLogger(config));
      if (options.out) {
        await writeFile(options.out, json, "utf8");
        writeStdout(`Exported positions to ${options.out}`);
      } else {
        writeStdout(json);
      }
    });
}

export function importCommand(): Command {
  return new Command("import")
    .description("Replace a PDF's numbers with those of a positions JSON file")
    .argument("<pdf>", "PDF document")
    .argument("<positions>", "Positions JSON file, or - for stdin")
    .requiredOption("-o, --out <file>", "Where to write the updated PDF")
    .action(async (path: string, positions: string, options: { out: string }) => {
      const config = resolveCliConfig();
      const json = await readPositions(positions);
      const count = await importPositions(path, json, options.out, config, createCliLogger(config));
      writeStdout(`Imported ${count} annotations into ${options.out}`);
    });
}

/** Reads a positions file, or standard input when `source` is "-". */
export async function readPositions(
  source: string,
  stdin: Readable = process.stdin
): Promise<string> {
  if (source !== "-") {
    return readFile(source, "utf8");
  }
  const json = await readStdin(stdin);
  if (!json.trim()) {
    throw new SerializationError("No positions were piped to standard input");
  }
  return json;
}

export async function exportPositions(
  path: string,
  config: NumbermarkConfig,
  logger: NumbermarkLogger
): Promise<string> {
  const handle = await openPdfFile(path, config, logger);
  return handle.session.exportJSON();
}

/** Loads positions into the PDF, redraws every mark and writes the result. */
export async function importPositions(
  path: string,
  json: string,
  out: string,
  config: NumbermarkConfig,
  logger: NumbermarkLogger
): Promise<number> {
  const handle = await openPdfFile(path, config, logger);
  const count = handle.session.load(json);
  await writeFile(out, await savePdfSession(handle));
  logger.info("cli", `Imported ${count} annotations`, { source: path, target: out });
  return count;
}
