import { expect } from "chai";
import { ValidationError } from "../src/errors";
import { parsePreviewRequest, toPreviewResponse } from "../src/request";

const validPayload = {
  sheets: [
    { sheetId: "sheet-sales", alias: "sales", role: "primary" },
    { sheetId: "sheet-budget", role: "join", joinKeys: [" region ", 7] },
  ],
  projections: [{ expression: "sum(sales.revenue)", label: "total_revenue" }],
  filters: [{ sheetAlias: "sales", column: "region", operator: "eq", value: "north" }],
};

describe("parsePreviewRequest", () => {
  it("maps a JSON payload onto a preview request", () => {
    const request = parsePreviewRequest(validPayload);

    expect(request.sheets).to.deep.equal([
      { sheetId: "sheet-sales", alias: "sales", role: "primary", joinKeys: [] },
      { sheetId: "sheet-budget", alias: "sheet_2", role: "join", joinKeys: ["region", "7"] },
    ]);
    expect(request.projections).to.deep.equal([
      { expression: "sum(sales.revenue)", label: "total_revenue" },
    ]);
    expect(request.filters).to.deep.equal([
      { alias: "sales", column: "region", operator: "eq", value: "north" },
    ]);
    expect(request.limit).to.equal(null);
  });

  it("defaults role to primary and a missing filter value to null", () => {
    const request = parsePreviewRequest({
      sheets: [{ sheetId: "sheet-sales", alias: "  " }],
      projections: [{ expression: "count(*)", label: "rows" }],
      filters: [{ sheetAlias: "sheet_1", column: "region", operator: "ne" }],
      limit: 25,
    });

    expect(request.sheets[0]).to.deep.equal({
      sheetId: "sheet-sales",
      alias: "sheet_1",
      role: "primary",
      joinKeys: [],
    });
    expect(request.filters?.[0]?.value).to.equal(null);
    expect(request.limit).to.equal(25);
  });

  it("treats null filters and limit as absent", () => {
    const request = parsePreviewRequest({ ...validPayload, filters: null, limit: null });
    expect(request.filters).to.deep.equal([]);
    expect(request.limit).to.equal(null);
  });

  const rejects: Array<[string, unknown, string]> = [
    ["a missing sheets array", {}, "sheets: sheets must be a non-empty array"],
    [
      "an empty projections array",
      { sheets: validPayload.sheets, projections: [] },
      "projections: projections must be a non-empty array",
    ],
    [
      "a blank sheet id",
      { ...validPayload, sheets: [{ sheetId: "  " }] },
      "sheets.0.sheetId: sheetId is required for each sheet",
    ],
    [
      "an unknown role",
      { ...validPayload, sheets: [{ sheetId: "sheet-sales", role: "outer" }] },
      "sheets.0.role: role must be one of primary, join, union",
    ],
    [
      "a blank join key",
      {
        ...validPayload,
        sheets: [validPayload.sheets[0], { sheetId: "sheet-budget", role: "join", joinKeys: [" "] }],
      },
      "sheets.1.joinKeys.0: joinKeys entries must be non-empty strings",
    ],
    ["a zero limit", { ...validPayload, limit: 0 }, "limit: limit must be greater than zero"],
    ["a boolean limit", { ...validPayload, limit: true }, "limit: limit must be an integer when provided"],
    ["a fractional limit", { ...validPayload, limit: 2.5 }, "limit: limit must be an integer when provided"],
    [
      "a blank projection label",
      { ...validPayload, projections: [{ expression: "sales.region", label: "" }] },
      "projections.0.label: projection label must be a non-empty string",
    ],
    [
      "an object filter value",
      {
        ...validPayload,
        filters: [{ sheetAlias: "sales", column: "region", operator: "eq", value: { v: 1 } }],
      },
      "filters.0.value: filter value must be a string, number, boolean or null",
    ],
  ];

  rejects.forEach(([name, payload, message]) => {
    it(`rejects ${name}`, () => {
      expect(() => parsePreviewRequest(payload)).to.throw(ValidationError, message);
    });
  });
});

describe("toPreviewResponse", () => {
  it("nests row count and timing under executionMetrics", () => {
    const response = toPreviewResponse({
      headers: ["region"],
      rows: [["north"], ["south"]],
      warnings: ["Sheet 'sales' (Sales) is deprecated"],
      executionMs: 1.25,
      rowCount: 2,
    });

    expect(response).to.deep.equal({
      headers: ["region"],
      rows: [["north"], ["south"]],
      warnings: ["Sheet 'sales' (Sales) is deprecated"],
      executionMetrics: { rowCount: 2, executionMs: 1.25 },
    });
  });
});
