import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import * as XLSX from "xlsx";
import { z } from "zod";
import { ConfigurationError, SourceUnavailableError } from "./errors";
import type {
  ColumnSchema,
  RowSource,
  SheetCatalog,
  SheetDescriptor,
  SheetStatus,
} from "./queryBuilder";
import type { CellValue, SheetRow } from "./values";

/* --------------------------------------------------------------------------
 * SCHEMA INFERENCE
 * -------------------------------------------------------------------------- */

/**
 * Column schema from the rows themselves: columns in first-seen order, typed
 * "number" when every non-null value is a number and "string" otherwise.
 */
export function inferColumnSchema(rows: SheetRow[]): ColumnSchema[] {
  const types = new Map<string, Set<string>>();
  for (const row of rows) {
    for (const [name, value] of Object.entries(row)) {
      const seen = types.get(name) ?? new Set<string>();
      if (value !== null) seen.add(typeof value);
      types.set(name, seen);
    }
  }
  return Array.from(types, ([name, seen]) => ({
    name,
    inferredType: seen.size === 1 && seen.has("number") ? "number" : "string",
  }));
}

/* --------------------------------------------------------------------------
 * IN-MEMORY STORE
 * -------------------------------------------------------------------------- */

export interface InMemorySheet {
  id: string;
  rows: SheetRow[];
  displayLabel?: string;
  status?: SheetStatus;
  schema?: ColumnSchema[];
}

export class InMemorySheetStore implements SheetCatalog, RowSource {
  private readonly sheets = new Map<string, Required<InMemorySheet>>();

  constructor(sheets: InMemorySheet[] = []) {
    sheets.forEach((sheet) => this.register(sheet));
  }

  register(sheet: InMemorySheet): this {
    this.sheets.set(sheet.id, {
      id: sheet.id,
      rows: sheet.rows,
      displayLabel: sheet.displayLabel ?? sheet.id,
      status: sheet.status ?? "active",
      schema: sheet.schema ?? inferColumnSchema(sheet.rows),
    });
    return this;
  }

  resolve(sheetId: string): SheetDescriptor | null {
    const sheet = this.sheets.get(sheetId);
    if (!sheet) return null;
    return { displayLabel: sheet.displayLabel, status: sheet.status, schema: sheet.schema };
  }

  load(sheetId: string): SheetRow[] {
    const sheet = this.sheets.get(sheetId);
    if (!sheet) {
      throw new SourceUnavailableError(sheetId, "no rows registered");
    }
    return sheet.rows;
  }
}

/* --------------------------------------------------------------------------
 * FILE PARSING
 * -------------------------------------------------------------------------- */

const csvRecordsSchema = z.array(z.record(z.string()));

/** CSV with a header row; every value stays raw text. */
export function parseCsvRows(text: string, delimiter = ","): SheetRow[] {
  const records: unknown = parse(text, {
    columns: true,
    delimiter,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return csvRecordsSchema.parse(records);
}

function normalizeCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
  return String(value);
}

/**
 * Rows of one worksheet (the first when no name is given). The first row is
 * the header; columns with a blank header are dropped.
 */
export function parseWorkbookRows(buffer: Buffer, sheetName?: string): SheetRow[] | null {
  const workbook = XLSX.read(buffer, { type: "buffer", cellDates: true });
  const name = sheetName ?? workbook.SheetNames[0];
  const sheet = name === undefined ? undefined : workbook.Sheets[name];
  if (!sheet) return null;

  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    blankrows: false,
    defval: null,
  });
  const [headerRow = [], ...dataRows] = grid;
  const headers = headerRow.map((cell) => {
    const label = normalizeCell(cell);
    return label === null ? "" : String(label);
  });

  return dataRows.map((values) => {
    const row: SheetRow = {};
    headers.forEach((header, index) => {
      if (!header) return;
      row[header] = normalizeCell(values[index]);
    });
    return row;
  });
}

/* --------------------------------------------------------------------------
 * MANIFEST-BACKED STORE
 * -------------------------------------------------------------------------- */

export const manifestSchema = z.object({
  sheets: z.array(
    z.object({
      id: z.string().min(1),
      displayLabel: z.string().min(1),
      status: z.enum(["active", "inactive", "deprecated"]).default("active"),
      schema: z
        .array(z.object({ name: z.string().min(1), inferredType: z.string().nullish() }))
        .default([]),
      file: z.object({
        path: z.string().min(1),
        type: z.enum(["csv", "excel"]),
        delimiter: z.string().length(1).optional(),
        sheetName: z.string().min(1).optional(),
      }),
    })
  ),
});

export type SheetManifest = z.infer<typeof manifestSchema>;
export type ManifestSheet = SheetManifest["sheets"][number];

/**
 * Catalog and row source over a JSON manifest of CSV and Excel files. File
 * paths resolve against `baseDir`.
 */
export class ManifestSheetStore implements SheetCatalog, RowSource {
  private readonly sheets: Map<string, ManifestSheet>;
  private readonly baseDir: string;

  constructor(manifest: SheetManifest, baseDir: string) {
    this.sheets = new Map(manifest.sheets.map((sheet) => [sheet.id, sheet]));
    this.baseDir = baseDir;
  }

  static fromManifest(data: unknown, baseDir: string): ManifestSheetStore {
    const parsed = manifestSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? issue.path.join(".") : "manifest";
      throw new ConfigurationError(`Invalid sheet manifest at '${where}': ${issue?.message ?? "invalid"}`);
    }
    return new ManifestSheetStore(parsed.data, baseDir);
  }

  static fromFile(manifestPath: string): ManifestSheetStore {
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Cannot read sheet manifest '${manifestPath}': ${reason}`);
    }
    return ManifestSheetStore.fromManifest(data, path.dirname(manifestPath));
  }

  resolve(sheetId: string): SheetDescriptor | null {
    const sheet = this.sheets.get(sheetId);
    if (!sheet) return null;
    return { displayLabel: sheet.displayLabel, status: sheet.status, schema: sheet.schema };
  }

  load(sheetId: string): SheetRow[] {
    const sheet = this.sheets.get(sheetId);
    if (!sheet) {
      throw new SourceUnavailableError(sheetId, "sheet is not in the manifest");
    }

    const filePath = path.resolve(this.baseDir, sheet.file.path);
    let buffer: Buffer;
    try {
      buffer = fs.readFileSync(filePath);
    } catch (error) {
      throw new SourceUnavailableError(sheetId, `cannot read ${filePath}`, { cause: String(error) });
    }

    try {
      if (sheet.file.type === "csv") {
        return parseCsvRows(buffer.toString("utf-8"), sheet.file.delimiter ?? ",");
      }
      const rows = parseWorkbookRows(buffer, sheet.file.sheetName);
      if (!rows) {
        throw new SourceUnavailableError(
          sheetId,
          `worksheet '${sheet.file.sheetName ?? ""}' not found in ${filePath}`
        );
      }
      return rows;
    } catch (error) {
      if (error instanceof SourceUnavailableError) throw error;
      throw new SourceUnavailableError(sheetId, `cannot parse ${filePath}`, { cause: String(error) });
    }
  }
}
