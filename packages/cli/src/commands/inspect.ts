import { Command } from "commander";
import { formatReport } from "../utils/output";
import { openPdfFile, reportForPdf } from "../utils/documents";
import {
  createCliLogger,
  resolveCliConfig,
  resolveOutput,
  resolveRuntimeConfigString,
} from "../utils/runtimeOptions";
import { writeStdout } from "../utils/terminal";

export function inspectCommand(): Command {
  return new Command("inspect")
    .description("List the numbers stored in a PDF and check them against its marks")
    .argument("<pdf>", "PDF document")
    .option("--output <format>", "Output format (text|json)")
    .action(async (path: string, options: { output?: string }) => {
      const config = resolveCliConfig();
      const logger = createCliLogger(config);
      const handle = await openPdfFile(path, config, logger);
      const output = resolveOutput(
        resolveRuntimeConfigString(options.output, "text", "NUMBERMARK_OUTPUT")
      );
      writeStdout(formatReport(reportForPdf(path, handle), output));
    });
}
