import fs from "node:fs";
import type { AppConfig } from "../config";
import { ValidationError } from "../errors";
import type { Logger } from "../logger";
import { QueryBuilderService, type PreviewResult, type RowSource, type SheetCatalog } from "../queryBuilder";
import { parsePreviewRequest, toPreviewResponse } from "../request";
import { ManifestSheetStore } from "../sheetStore";

export type OutputFormat = "json" | "table";

export interface PreviewCommandOptions {
  request: string;
  catalog?: string;
  format: OutputFormat;
}

export interface PreviewCommandDeps {
  config: AppConfig;
  logger: Logger;
  readFile?: (filePath: string) => string;
  openStore?: (catalogPath: string) => SheetCatalog & RowSource;
}

export function renderTable(result: PreviewResult): string {
  const widths = result.headers.map((header, column) =>
    Math.max(header.length, ...result.rows.map((row) => (row[column] ?? "").length))
  );
  const line = (cells: string[]) =>
    cells.map((cell, column) => cell.padEnd(widths[column] ?? 0)).join(" | ").trimEnd();

  const out = [line(result.headers), widths.map((w) => "-".repeat(w)).join("-+-")];
  result.rows.forEach((row) => out.push(line(row)));
  result.warnings.forEach((warning) => out.push(`warning: ${warning}`));
  out.push(`${result.rowCount} row(s) in ${result.executionMs.toFixed(1)} ms`);
  return out.join("\n");
}

export function runPreviewCommand(options: PreviewCommandOptions, deps: PreviewCommandDeps): string {
  const readFile = deps.readFile ?? ((filePath: string) => fs.readFileSync(filePath, "utf-8"));
  const openStore = deps.openStore ?? ((catalogPath: string) => ManifestSheetStore.fromFile(catalogPath));

  let payload: unknown;
  try {
    payload = JSON.parse(readFile(options.request));
  } catch (error) {
    throw new ValidationError(`request file '${options.request}' is not valid JSON`, {
      cause: String(error),
    });
  }

  const request = parsePreviewRequest(payload);
  if (request.limit === null && deps.config.previewMaxRows !== undefined) {
    request.limit = deps.config.previewMaxRows;
  }

  const catalogPath = options.catalog ?? deps.config.catalogPath;
  const store = openStore(catalogPath);
  deps.logger.debug("running query preview", {
    catalog: catalogPath,
    sheets: request.sheets.length,
    projections: request.projections.length,
  });

  const result = new QueryBuilderService(store, store, deps.logger).preview(request);
  return options.format === "json"
    ? JSON.stringify(toPreviewResponse(result), null, 2)
    : renderTable(result);
}
