// queryBuilder.ts
// Cross-sheet query preview engine
//
// Key ideas:
//
// - Every sheet in a request is addressed by its alias. The working unit is a
//   CombinedRow: alias -> that sheet's row.
// - The primary selection seeds the combined rows. Each join selection, in
//   request order, is an inner hash join keyed off the *primary* row's
//   columns, never off a previously joined alias.
// - Filters are AND-ed and run over the joined rows.
// - Projections are either all columns (one output row per combined row) or
//   all aggregates (exactly one output row over the whole filtered set).
// - Stale sheets and join-key type mismatches become warnings, not errors.

import Enumerable from "linq";
import { ValidationError } from "./errors";
import {
  isAggregateExpression,
  parseProjection,
  type AggregateExpression,
  type ProjectionExpression,
} from "./expression";
import { createLogger, type Logger } from "./logger";
import {
  coerceNumber,
  readCell,
  stringifyValue,
  type CellValue,
  type SheetRow,
} from "./values";

/* --------------------------------------------------------------------------
 * BASIC TYPES
 * -------------------------------------------------------------------------- */

export type { CellValue, SheetRow };

export type CombinedRow = Record<string, SheetRow>;

export type SheetRole = "primary" | "join" | "union";
export type SheetStatus = "active" | "inactive" | "deprecated";

export interface ColumnSchema {
  name: string;
  inferredType?: string | null;
}

export interface SheetDescriptor {
  displayLabel: string;
  status: SheetStatus;
  schema: ColumnSchema[];
}

/* --------------------------------------------------------------------------
 * COLLABORATORS
 * -------------------------------------------------------------------------- */

export interface SheetCatalog {
  resolve(sheetId: string): SheetDescriptor | null;
}

/**
 * Loads the materialized rows of one sheet, in file order. Implementations
 * throw SourceUnavailableError when the backing data cannot be read.
 */
export interface RowSource {
  load(sheetId: string): SheetRow[];
}

/* --------------------------------------------------------------------------
 * REQUEST / RESULT
 * -------------------------------------------------------------------------- */

export interface SheetSelection {
  sheetId: string;
  alias: string;
  role: SheetRole;
  joinKeys: string[];
}

export interface Projection {
  expression: string;
  label: string;
}

export type FilterOperator = "eq" | "ne" | "contains" | "gt" | "lt";
export type FilterValue = string | number | boolean | null;

export interface Filter {
  alias: string;
  column: string;
  operator: string;
  value: FilterValue;
}

export interface PreviewRequest {
  sheets: SheetSelection[];
  projections: Projection[];
  filters?: Filter[];
  limit?: number | null;
}

export interface PreviewResult {
  headers: string[];
  rows: string[][];
  warnings: string[];
  executionMs: number;
  rowCount: number;
}

/* --------------------------------------------------------------------------
 * SCHEMA VALIDATION
 * -------------------------------------------------------------------------- */

export interface JoinKeyContext {
  joinKeys: string[];
  primaryAlias: string;
  joinAlias: string;
}

/**
 * Checks that every join key exists on both sides. Declared types that differ
 * only produce a warning; values are still compared as-is at join time.
 */
export function validateJoinKeys(
  primarySchema: ColumnSchema[],
  joinSchema: ColumnSchema[],
  { joinKeys, primaryAlias, joinAlias }: JoinKeyContext
): string[] {
  if (!joinKeys.length) {
    throw new ValidationError(`join keys required for alias ${joinAlias}`);
  }

  const primaryLookup = new Map(primarySchema.map((column) => [column.name, column]));
  const joinLookup = new Map(joinSchema.map((column) => [column.name, column]));

  const warnings: string[] = [];
  for (const key of joinKeys) {
    const primaryColumn = primaryLookup.get(key);
    if (!primaryColumn) {
      throw new ValidationError(`join column '${key}' missing on sheet alias '${primaryAlias}'`);
    }
    const joinColumn = joinLookup.get(key);
    if (!joinColumn) {
      throw new ValidationError(`join column '${key}' missing on sheet alias '${joinAlias}'`);
    }

    const primaryType = (primaryColumn.inferredType ?? "").toLowerCase();
    const joinType = (joinColumn.inferredType ?? "").toLowerCase();
    if (primaryType && joinType && primaryType !== joinType) {
      warnings.push(
        `Join column '${key}' uses incompatible types between ` +
          `'${primaryAlias}' (${primaryType}) and '${joinAlias}' (${joinType}).`
      );
    }
  }
  return warnings;
}

/* --------------------------------------------------------------------------
 * JOIN
 * -------------------------------------------------------------------------- */

function readSheetRow(merged: CombinedRow, alias: string): SheetRow | null {
  return Object.hasOwn(merged, alias) ? merged[alias] ?? null : null;
}

// Tuple of key values; JSON keeps "1" and 1 apart and treats missing as null.
function joinKeyOf(row: SheetRow, joinKeys: string[]): string {
  return JSON.stringify(joinKeys.map((key) => readCell(row, key)));
}

export function joinRows(
  combined: CombinedRow[],
  joinSheetRows: SheetRow[],
  { joinKeys, primaryAlias, joinAlias }: JoinKeyContext
): CombinedRow[] {
  if (!combined.length) return [];

  const index = Enumerable.from(joinSheetRows).toLookup((row: SheetRow) =>
    joinKeyOf(row, joinKeys)
  );

  return Enumerable.from(combined)
    .selectMany((merged: CombinedRow): CombinedRow[] => {
      const primaryRow = readSheetRow(merged, primaryAlias);
      if (!primaryRow) return [];
      return index
        .get(joinKeyOf(primaryRow, joinKeys))
        .select((match: SheetRow): CombinedRow => ({ ...merged, [joinAlias]: match }))
        .toArray();
    })
    .toArray();
}

/* --------------------------------------------------------------------------
 * FILTERS
 * -------------------------------------------------------------------------- */

export interface CompiledFilter {
  alias: string;
  column: string;
  operator: FilterOperator;
  value: FilterValue;
}

const filterOperators: FilterOperator[] = ["eq", "ne", "contains", "gt", "lt"];

function toFilterOperator(operator: string): FilterOperator {
  const normalized = operator.trim().toLowerCase();
  const match = filterOperators.find((op) => op === normalized);
  if (!match) {
    throw new ValidationError(`unsupported filter operator '${operator}'`);
  }
  return match;
}

export function compileFilter(filter: Filter, aliases: Set<string>): CompiledFilter {
  if (!aliases.has(filter.alias)) {
    throw new ValidationError(`filter references unknown alias '${filter.alias}'`);
  }
  return {
    alias: filter.alias,
    column: filter.column,
    operator: toFilterOperator(filter.operator),
    value: filter.value,
  };
}

export function matchesFilter(value: CellValue, operator: FilterOperator, expected: FilterValue): boolean {
  switch (operator) {
    case "eq":
      return value === expected;
    case "ne":
      return value !== expected;
    case "contains":
      return (
        typeof value === "string" &&
        typeof expected === "string" &&
        value.toLowerCase().includes(expected.toLowerCase())
      );
    case "gt":
    case "lt": {
      const lhs = coerceNumber(value);
      const rhs = coerceNumber(expected);
      if (lhs === null || rhs === null) return false;
      return operator === "gt" ? lhs > rhs : lhs < rhs;
    }
  }
}

export function applyFilters(rows: CombinedRow[], filters: CompiledFilter[]): CombinedRow[] {
  return filters
    .reduce(
      (relation, filter) =>
        relation.where((merged: CombinedRow) => {
          const sheetRow = readSheetRow(merged, filter.alias);
          if (!sheetRow) return false;
          return matchesFilter(readCell(sheetRow, filter.column), filter.operator, filter.value);
        }),
      Enumerable.from(rows)
    )
    .toArray();
}

/* --------------------------------------------------------------------------
 * PROJECTIONS + AGGREGATES
 * -------------------------------------------------------------------------- */

export type ColumnProjection = { kind: "Column"; alias: string; column: string };

export type CompiledProjections =
  | { mode: "scalar"; columns: ColumnProjection[] }
  | { mode: "aggregate"; aggregates: AggregateExpression[] };

export function compileProjections(
  projections: Projection[],
  primaryAlias: string
): CompiledProjections {
  const parsed: ProjectionExpression[] = projections.map((p) => parseProjection(p.expression));

  const aggregates = parsed.filter(isAggregateExpression);
  if (aggregates.length === parsed.length) {
    return { mode: "aggregate", aggregates };
  }
  if (aggregates.length > 0) {
    throw new ValidationError("cannot mix aggregate and scalar projections");
  }

  const columns: ColumnProjection[] = [];
  for (const expr of parsed) {
    if (expr.kind === "Column") {
      columns.push({ kind: "Column", alias: expr.alias ?? primaryAlias, column: expr.column });
    }
  }
  return { mode: "scalar", columns };
}

export function projectRows(rows: CombinedRow[], columns: ColumnProjection[]): string[][] {
  return rows.map((merged) =>
    columns.map(({ alias, column }) => {
      const sheetRow = readSheetRow(merged, alias);
      return sheetRow ? stringifyValue(readCell(sheetRow, column)) : "";
    })
  );
}

/**
 * Evaluates one aggregate over the whole filtered set. With no rows left the
 * alias is checked against the request instead, and a known alias yields 0.
 */
export function computeAggregate(
  expr: AggregateExpression,
  rows: CombinedRow[],
  aliases: Set<string>
): number {
  if (expr.kind === "CountStar") return rows.length;

  const { fn, alias, column } = expr;
  const known = rows.length
    ? rows.some((merged) => readSheetRow(merged, alias) !== null)
    : aliases.has(alias);
  if (!known) {
    throw new ValidationError(`unknown sheet alias '${alias}' in aggregate '${fn}'`);
  }

  const values: CellValue[] = [];
  for (const merged of rows) {
    const sheetRow = readSheetRow(merged, alias);
    if (sheetRow) values.push(readCell(sheetRow, column));
  }

  if (fn === "count") {
    return values.filter((value) => value !== null).length;
  }

  const numbers: number[] = [];
  for (const value of values) {
    const n = coerceNumber(value);
    if (n !== null) numbers.push(n);
  }
  const total = Enumerable.from(numbers).sum();
  if (fn === "sum") return total;
  return numbers.length ? total / numbers.length : 0;
}

/* --------------------------------------------------------------------------
 * PLANNING
 * -------------------------------------------------------------------------- */

export interface JoinStep {
  selection: SheetSelection;
  sheet: SheetDescriptor;
}

export interface PreviewPlan {
  primary: SheetSelection;
  aliases: Set<string>;
  joins: JoinStep[];
  filters: CompiledFilter[];
  projections: CompiledProjections;
  warnings: string[];               // stale sheets first, then join warnings in order
}

/** First selection marked primary, else the first selection. */
export function selectPrimary(sheets: SheetSelection[]): SheetSelection | undefined {
  return sheets.find((sheet) => sheet.role === "primary") ?? sheets[0];
}

/* --------------------------------------------------------------------------
 * SERVICE
 * -------------------------------------------------------------------------- */

export class QueryBuilderService {
  private readonly catalog: SheetCatalog;
  private readonly rowSource: RowSource;
  private readonly logger: Logger;

  constructor(catalog: SheetCatalog, rowSource: RowSource, logger?: Logger) {
    this.catalog = catalog;
    this.rowSource = rowSource;
    this.logger = logger ?? createLogger("query-builder");
  }

  /**
   * Validates the whole request against the catalog without loading rows.
   */
  plan(request: PreviewRequest): PreviewPlan {
    if (!request.sheets.length) throw new ValidationError("no sheets");
    if (!request.projections.length) throw new ValidationError("no projections");

    const sheets = new Map<string, SheetDescriptor>();
    const warnings: string[] = [];
    for (const selection of request.sheets) {
      if (sheets.has(selection.alias)) {
        throw new ValidationError(`duplicate alias ${selection.alias}`);
      }
      const sheet = this.catalog.resolve(selection.sheetId);
      if (!sheet) {
        throw new ValidationError(`sheet not found: '${selection.sheetId}'`);
      }
      if (sheet.status !== "active") {
        warnings.push(`Sheet '${selection.alias}' (${sheet.displayLabel}) is ${sheet.status}`);
      }
      sheets.set(selection.alias, sheet);
    }

    const primary = selectPrimary(request.sheets);
    const primarySheet = primary ? sheets.get(primary.alias) : undefined;
    if (!primary || !primarySheet) throw new ValidationError("no sheets");

    const joins: JoinStep[] = [];
    for (const selection of request.sheets) {
      if (selection === primary) continue;
      if (selection.role === "union") {
        throw new ValidationError("union not supported");
      }
      const sheet = sheets.get(selection.alias);
      if (!sheet) continue;
      warnings.push(
        ...validateJoinKeys(primarySheet.schema, sheet.schema, {
          joinKeys: selection.joinKeys,
          primaryAlias: primary.alias,
          joinAlias: selection.alias,
        })
      );
      joins.push({ selection, sheet });
    }

    const aliases = new Set(sheets.keys());
    return {
      primary,
      aliases,
      joins,
      filters: (request.filters ?? []).map((filter) => compileFilter(filter, aliases)),
      projections: compileProjections(request.projections, primary.alias),
      warnings,
    };
  }

  preview(request: PreviewRequest): PreviewResult {
    const start = performance.now();
    const plan = this.plan(request);
    const { primary } = plan;

    let combined: CombinedRow[] = this.rowSource
      .load(primary.sheetId)
      .map((row): CombinedRow => ({ [primary.alias]: row }));

    for (const { selection } of plan.joins) {
      if (!combined.length) break;
      combined = joinRows(combined, this.rowSource.load(selection.sheetId), {
        joinKeys: selection.joinKeys,
        primaryAlias: primary.alias,
        joinAlias: selection.alias,
      });
    }

    const filtered = applyFilters(combined, plan.filters);

    let rows: string[][];
    if (plan.projections.mode === "aggregate") {
      rows = [
        plan.projections.aggregates.map((expr) =>
          stringifyValue(computeAggregate(expr, filtered, plan.aliases))
        ),
      ];
    } else {
      rows = projectRows(filtered, plan.projections.columns);
      if (request.limit !== undefined && request.limit !== null) {
        rows = rows.slice(0, Math.max(0, request.limit));
      }
    }

    const executionMs = performance.now() - start;
    for (const warning of plan.warnings) {
      this.logger.debug("query preview warning", { warning });
    }
    this.logger.debug("query preview completed", {
      primary: primary.alias,
      joins: plan.joins.length,
      mode: plan.projections.mode,
      rowCount: rows.length,
      warningCount: plan.warnings.length,
      executionMs,
    });

    return {
      headers: request.projections.map((projection) => projection.label),
      rows,
      warnings: plan.warnings,
      executionMs,
      rowCount: rows.length,
    };
  }
}
