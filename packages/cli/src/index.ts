#!/usr/bin/env tsx
import { describeError } from "@numbermark/core";
import { Command } from "commander";
import { inspectCommand } from "./commands/inspect";
import { exportCommand, importCommand } from "./commands/positions";
import { validateCommand } from "./commands/validate";
import { writeStderr } from "./utils/terminal";

const program = new Command();

program.name("numbermark").description("Numbered annotations for PDF documents").version("0.1.0");

program.addCommand(inspectCommand());
program.addCommand(validateCommand());
program.addCommand(exportCommand());
program.addCommand(importCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  writeStderr(describeError(error));
  process.exit(1);
});
