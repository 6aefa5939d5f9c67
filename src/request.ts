import { z } from "zod";
import { ValidationError } from "./errors";
import type { PreviewRequest, PreviewResult, SheetSelection } from "./queryBuilder";

/* --------------------------------------------------------------------------
 * WIRE SCHEMA
 *
 * JSON payloads use camelCase names (sheetId, joinKeys, sheetAlias) and are
 * validated here before they reach the engine.
 * -------------------------------------------------------------------------- */

const nonBlank = (message: string) =>
  z.string({ invalid_type_error: message, required_error: message }).refine(
    (value) => value.trim().length > 0,
    message
  );

const joinKeySchema = z
  .union([z.string(), z.number()], {
    errorMap: () => ({ message: "joinKeys must contain only strings or numbers" }),
  })
  .transform((key) => (typeof key === "number" ? String(key) : key.trim()))
  .refine((key) => key.length > 0, "joinKeys entries must be non-empty strings");

const sheetSchema = z.object({
  sheetId: nonBlank("sheetId is required for each sheet"),
  alias: z.string().nullish(),
  role: z
    .enum(["primary", "join", "union"], {
      errorMap: () => ({ message: "role must be one of primary, join, union" }),
    })
    .default("primary"),
  joinKeys: z.array(joinKeySchema).nullish(),
});

const projectionSchema = z.object({
  expression: nonBlank("projection expression must be a non-empty string"),
  label: nonBlank("projection label must be a non-empty string"),
});

const filterSchema = z.object({
  sheetAlias: nonBlank("filter sheetAlias must be a non-empty string"),
  column: nonBlank("filter column must be a non-empty string"),
  operator: nonBlank("filter operator must be a non-empty string"),
  value: z
    .union([z.string(), z.number(), z.boolean(), z.null()], {
      errorMap: () => ({ message: "filter value must be a string, number, boolean or null" }),
    })
    .optional(),
});

export const previewPayloadSchema = z.object({
  sheets: z
    .array(sheetSchema, {
      invalid_type_error: "sheets must be a non-empty array",
      required_error: "sheets must be a non-empty array",
    })
    .min(1, "sheets must be a non-empty array"),
  projections: z
    .array(projectionSchema, {
      invalid_type_error: "projections must be a non-empty array",
      required_error: "projections must be a non-empty array",
    })
    .min(1, "projections must be a non-empty array"),
  filters: z.array(filterSchema).nullish(),
  limit: z
    .number({ invalid_type_error: "limit must be an integer when provided" })
    .int("limit must be an integer when provided")
    .positive("limit must be greater than zero")
    .nullish(),
});

export type PreviewPayload = z.input<typeof previewPayloadSchema>;

export function parsePreviewRequest(payload: unknown): PreviewRequest {
  const parsed = previewPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError(`${where}${issue?.message ?? "invalid preview request"}`, {
      issues: parsed.error.issues,
    });
  }

  const { sheets, projections, filters, limit } = parsed.data;
  return {
    sheets: sheets.map(
      (sheet, index): SheetSelection => ({
        sheetId: sheet.sheetId,
        alias: sheet.alias?.trim() || `sheet_${index + 1}`,
        role: sheet.role,
        joinKeys: sheet.joinKeys ?? [],
      })
    ),
    projections: projections.map(({ expression, label }) => ({ expression, label })),
    filters: (filters ?? []).map((filter) => ({
      alias: filter.sheetAlias,
      column: filter.column,
      operator: filter.operator,
      value: filter.value ?? null,
    })),
    limit: limit ?? null,
  };
}

/* --------------------------------------------------------------------------
 * RESPONSE
 * -------------------------------------------------------------------------- */

export interface PreviewResponse {
  headers: string[];
  rows: string[][];
  warnings: string[];
  executionMetrics: {
    rowCount: number;
    executionMs: number;
  };
}

export function toPreviewResponse(result: PreviewResult): PreviewResponse {
  return {
    headers: result.headers,
    rows: result.rows,
    warnings: result.warnings,
    executionMetrics: {
      rowCount: result.rowCount,
      executionMs: result.executionMs,
    },
  };
}
