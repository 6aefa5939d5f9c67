#!/usr/bin/env node
import { Command, Option } from "commander";
import { runPreviewCommand, type OutputFormat } from "./commands/preview";
import { getConfig } from "./config";
import { formatError } from "./errors";
import { configureLogging, createLogger } from "./logger";

const logger = createLogger("cli");

const program = new Command();

program
  .name("sheet-query")
  .description("Preview cross-sheet queries over catalogued CSV and Excel sheets")
  .version("0.1.0");

program
  .command("preview")
  .description("Join, filter and project sheets described by a request file")
  .requiredOption("-r, --request <file>", "JSON preview request")
  .option("-c, --catalog <file>", "sheet catalog manifest (defaults to SHEET_CATALOG_PATH)")
  .addOption(
    new Option("-f, --format <format>", "output format").choices(["json", "table"]).default("table")
  )
  .action((opts: { request: string; catalog?: string; format: OutputFormat }) => {
    const config = getConfig();
    configureLogging({ level: config.logLevel, nodeEnv: config.nodeEnv });
    const output = runPreviewCommand(opts, { config, logger });
    process.stdout.write(`${output}\n`);
  });

try {
  program.parse();
} catch (error) {
  logger.error("query preview failed", error);
  process.stderr.write(`Error: ${formatError(error)}\n`);
  process.exitCode = 1;
}
