import { Path } from "../model/Path.js";
import {
  MAX_INDEX,
  indexSegment,
  keySegment,
  textKeySegment,
  type Segment,
} from "../model/Segment.js";
import type { Directive, Operator } from "../types/directive.js";
import type { ParseResult, SyntaxErrorDetail } from "../types/result.js";
import { quoteString } from "../utils/escape.js";
import { isXidContinue, isXidStart } from "./identifier.js";
import { parseJsonValue, scanJsonString } from "./json.js";
import { Scanner } from "./scanner.js";

function failure<T>(error: SyntaxErrorDetail): ParseResult<T> {
  return { ok: false, error };
}

/** UnexpectedChar at the cursor, or UnexpectedEndOfString when there is nothing left. */
function unexpected<T>(s: Scanner): ParseResult<T> {
  const ch = s.peek();
  return ch === undefined
    ? failure({ kind: "UnexpectedEndOfString" })
    : failure({ kind: "UnexpectedChar", pos: s.pos, ch });
}

function isAsciiDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function parseQuotedKey(s: Scanner): ParseResult<Segment> {
  const start = s.pos;
  // Find the closing quote first; the JSON string grammar is checked after.
  let offset = 1;
  let escaped = false;
  for (;;) {
    const ch = s.peek(offset);
    if (ch === undefined) return failure({ kind: "UnexpectedEndOfString" });
    if (escaped) {
      escaped = false;
    } else if (ch === "\\") {
      escaped = true;
    } else if (ch === '"') {
      break;
    } else if (ch < " ") {
      return failure({ kind: "UnexpectedChar", pos: start + offset, ch });
    }
    offset += 1;
  }

  s.advance(offset + 1);
  const quoted = s.sliceFrom(start);
  const span = scanJsonString(new Scanner(quoted));
  if (!span.ok) {
    return failure({ kind: "InvalidKey", pos: start + offset, cause: span.cause });
  }
  return { ok: true, value: keySegment(quoted.slice(1, -1)) };
}

function parseBareKey(s: Scanner): ParseResult<Segment> {
  const start = s.pos;
  s.advance();
  for (let ch = s.peek(); ch !== undefined && isXidContinue(ch); ch = s.peek()) {
    s.advance();
  }
  return { ok: true, value: textKeySegment(s.sliceFrom(start)) };
}

function parseIndex(s: Scanner): ParseResult<Segment> {
  if (s.peek() === "0") {
    s.advance();
    return { ok: true, value: indexSegment(0) };
  }
  const start = s.pos;
  while (isAsciiDigit(s.peek())) s.advance();
  const digits = s.sliceFrom(start);
  const index = Number(digits);
  if (digits.length > 10 || index > MAX_INDEX) {
    return failure({
      kind: "InvalidIndex",
      pos: s.pos,
      cause: "number too large to fit in target type",
    });
  }
  return { ok: true, value: indexSegment(index) };
}

export function parseSegment(s: Scanner): ParseResult<Segment> {
  const ch = s.peek();
  if (ch === '"') return parseQuotedKey(s);
  if (ch !== undefined && isXidStart(ch)) return parseBareKey(s);
  if (isAsciiDigit(ch)) return parseIndex(s);
  return unexpected(s);
}

/** `.` for the root, otherwise segments separated by dots. */
export function parsePath(s: Scanner): ParseResult<Path> {
  if (s.peek() === ".") {
    s.advance();
    return { ok: true, value: Path.root };
  }
  let path = Path.root;
  for (;;) {
    const segment = parseSegment(s);
    if (!segment.ok) return segment;
    path = path.append(segment.value);
    if (s.peek() !== ".") return { ok: true, value: path };
    s.advance();
  }
}

export function parseOperator(s: Scanner): ParseResult<Operator> {
  const ch = s.peek();
  if (ch === ":" || ch === "=") {
    s.advance();
    return { ok: true, value: ch };
  }
  return unexpected(s);
}

/**
 * Parse one directive such as `a.b:true` or `c.0.d=foobar`.
 * Positions in errors are 1-based and count Unicode scalar values.
 */
export function parseDirective(text: string): ParseResult<Directive> {
  const s = new Scanner(text);

  const path = parsePath(s);
  if (!path.ok) return path;

  const operator = parseOperator(s);
  if (!operator.ok) return operator;

  if (operator.value === "=") {
    return {
      ok: true,
      value: { path: path.value, value: quoteString(s.rest()) },
    };
  }

  const literal = parseJsonValue(s);
  if (!literal.ok) return literal;
  return { ok: true, value: { path: path.value, value: literal.value } };
}

/** Parse a path on its own, e.g. to name a location in a test or report. */
export function parsePathText(text: string): ParseResult<Path> {
  const s = new Scanner(text);
  const path = parsePath(s);
  if (!path.ok) return path;
  return s.done ? path : unexpected(s);
}
