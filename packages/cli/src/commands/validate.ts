import { Command } from "commander";
import { formatReport, reportHasProblems } from "../utils/output";
import { reportForFile } from "../utils/documents";
import {
  createCliLogger,
  resolveCliConfig,
  resolveOutput,
  resolveRuntimeConfigString,
} from "../utils/runtimeOptions";
import { writeStdout } from "../utils/terminal";

export function validateCommand(): Command {
  return new Command("validate")
    .description("Check a PDF or an exported positions file for gaps and duplicates")
    .argument("<input>", "PDF document or positions JSON")
    .option("--output <format>", "Output format (text|json)")
    .action(async (path: string, options: { output?: string }) => {
      const config = resolveCliConfig();
      const report = await reportForFile(path, config, createCliLogger(config));
      const output = resolveOutput(
        resolveRuntimeConfigString(options.output, "text", "NUMBERMARK_OUTPUT")
      );
      writeStdout(formatReport(report, output));
      if (reportHasProblems(report)) {
        process.exitCode = 1;
      }
    });
}
