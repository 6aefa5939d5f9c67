/* --------------------------------------------------------------------------
 * CELL VALUES
 *
 * Rows carry text, numbers or null. Filters, aggregates and output cells all
 * go through the helpers below so numeric coercion and rendering stay the
 * same at every call site.
 * -------------------------------------------------------------------------- */

export type CellValue = string | number | null;

export type SheetRow = Record<string, CellValue>;

const numericText = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Column lookup that ignores inherited properties; absent columns read as null. */
export function readCell(row: SheetRow, column: string): CellValue {
  return Object.hasOwn(row, column) ? row[column] ?? null : null;
}

export function coerceNumber(value: unknown): number | null {
  if (typeof value === "number") return value;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!numericText.test(trimmed)) return null;
    return Number(trimmed);
  }
  return null;
}

export function stringifyValue(value: CellValue | undefined): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (Number.isNaN(value)) return "nan";
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";
  if (Number.isInteger(value)) return BigInt(value).toString();
  return toFixedHalfEven(value, 6).replace(/0+$/, "").replace(/\.$/, "");
}

// toFixed rounds an exact tie away from zero; cells round it to even.
function toFixedHalfEven(value: number, digits: number): string {
  const rounded = value.toFixed(digits);
  if (!isExactTie(value, digits)) return rounded;
  const truncated = value.toFixed(digits + 1).slice(0, -1);
  const lastDigit = Number(truncated[truncated.length - 1]);
  return lastDigit % 2 === 0 ? truncated : rounded;
}

function isExactTie(value: number, digits: number): boolean {
  const { mantissa, exponent } = decompose(Math.abs(value));
  if (exponent >= 0) return false;
  const scaled = mantissa * 10n ** BigInt(digits) * 2n;
  const divisor = 1n << BigInt(-exponent);
  return scaled % divisor === 0n && (scaled / divisor) % 2n === 1n;
}

function decompose(value: number): { mantissa: bigint; exponent: number } {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);
  const biased = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & ((1n << 52n) - 1n);
  if (biased === 0) return { mantissa: fraction, exponent: -1074 };
  return { mantissa: fraction | (1n << 52n), exponent: biased - 1075 };
}
