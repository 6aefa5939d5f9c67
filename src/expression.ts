import { ValidationError } from "./errors";

/* --------------------------------------------------------------------------
 * PARSER COMBINATORS
 * -------------------------------------------------------------------------- */

export type ParseResult<T> = { value: T; nextPos: number };
export type Parser<T> = (input: string, pos: number) => ParseResult<T> | null;

function skipWs(input: string, pos: number): number {
  const match = /^\s*/.exec(input.slice(pos));
  return pos + (match ? match[0].length : 0);
}

function map<A, B>(parser: Parser<A>, fn: (value: A) => B): Parser<B> {
  return (input, pos) => {
    const result = parser(input, pos);
    if (!result) return null;
    return { value: fn(result.value), nextPos: result.nextPos };
  };
}

function seq<A, B, C, D>(
  a: Parser<A>,
  b: Parser<B>,
  c: Parser<C>,
  d: Parser<D>
): Parser<[A, B, C, D]> {
  return (input, pos) => {
    const ra = a(input, pos);
    if (!ra) return null;
    const rb = b(input, ra.nextPos);
    if (!rb) return null;
    const rc = c(input, rb.nextPos);
    if (!rc) return null;
    const rd = d(input, rc.nextPos);
    if (!rd) return null;
    return { value: [ra.value, rb.value, rc.value, rd.value], nextPos: rd.nextPos };
  };
}

function regex(re: RegExp): Parser<string> {
  const anchored = new RegExp("^(?:" + re.source + ")", re.flags);
  return (input, pos) => {
    const start = skipWs(input, pos);
    const match = anchored.exec(input.slice(start));
    if (!match) return null;
    const nextPos = skipWs(input, start + match[0].length);
    return { value: match[0], nextPos };
  };
}

function symbol(text: string): Parser<string> {
  return (input, pos) => {
    const start = skipWs(input, pos);
    if (input.slice(start).startsWith(text)) {
      return { value: text, nextPos: skipWs(input, start + text.length) };
    }
    return null;
  };
}

/** Runs `parser` over the whole input; null when it fails or leaves input behind. */
export function parseAll<T>(parser: Parser<T>, input: string): T | null {
  const result = parser(input, 0);
  if (!result) return null;
  if (skipWs(input, result.nextPos) !== input.length) return null;
  return result.value;
}

/* --------------------------------------------------------------------------
 * PROJECTION AST
 * -------------------------------------------------------------------------- */

export type AggregateFunction = "sum" | "avg" | "count";

export type ProjectionExpression =
  | { kind: "Column"; alias: string | null; column: string }
  | { kind: "Aggregate"; fn: AggregateFunction; alias: string; column: string }
  | { kind: "CountStar" };

export type AggregateExpression = Exclude<ProjectionExpression, { kind: "Column" }>;

export function isAggregateExpression(expr: ProjectionExpression): expr is AggregateExpression {
  return expr.kind !== "Column";
}

/* --------------------------------------------------------------------------
 * PROJECTION PARSER
 *
 *   projection := aggregate | columnRef
 *   aggregate  := ("sum" | "avg" | "count") "(" ("*" | alias "." column) ")"
 *   columnRef  := [alias "."] column
 *
 * Column names may hold spaces, dots and parentheses; only the first "."
 * separates alias from column, and an aggregate's argument runs up to the
 * closing parenthesis that ends the expression.
 * -------------------------------------------------------------------------- */

function isAggregateFunction(name: string): name is AggregateFunction {
  return name === "sum" || name === "avg" || name === "count";
}

const aggregateKeyword = regex(/(?:sum|avg|count)(?![A-Za-z0-9_])/i);

const aggregateName: Parser<AggregateFunction> = (input, pos) => {
  const result = aggregateKeyword(input, pos);
  if (!result) return null;
  const fn = result.value.toLowerCase();
  return isAggregateFunction(fn) ? { value: fn, nextPos: result.nextPos } : null;
};

const aggregateArgument: Parser<string> = regex(/[\s\S]*?(?=\)\s*$)/);

const aggregateCall: Parser<{ fn: AggregateFunction; argument: string }> = map(
  seq(aggregateName, symbol("("), aggregateArgument, symbol(")")),
  ([fn, , argument]) => ({ fn, argument: argument.trim() })
);

function splitColumnRef(text: string): { alias: string | null; column: string } {
  const dot = text.indexOf(".");
  if (dot === -1) return { alias: null, column: text.trim() };
  const alias = text.slice(0, dot).trim();
  return { alias: alias || null, column: text.slice(dot + 1).trim() };
}

export function parseProjection(expression: string): ProjectionExpression {
  const call = parseAll(aggregateCall, expression);
  if (call) {
    const { fn, argument } = call;
    if (!argument) {
      throw new ValidationError(`aggregate expression '${expression}' is empty`);
    }
    if (argument === "*") {
      if (fn !== "count") {
        throw new ValidationError(`aggregate '${fn}' does not accept '*'`);
      }
      return { kind: "CountStar" };
    }
    const { alias, column } = splitColumnRef(argument);
    if (!alias || !column) {
      throw new ValidationError(
        `aggregate expression '${expression}' must reference alias.column`
      );
    }
    return { kind: "Aggregate", fn, alias, column };
  }

  const { alias, column } = splitColumnRef(expression);
  if (!column) {
    throw new ValidationError(`column missing in projection '${expression}'`);
  }
  return { kind: "Column", alias, column };
}
