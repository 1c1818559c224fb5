import type { ParseResult } from "../types/result.js";
import { Scanner } from "./scanner.js";

/** Outcome of scanning one JSON token; the scanner is left just past it. */
export type Span = { ok: true } | { ok: false; cause: string };

const OK: Span = { ok: true };
const WHITESPACE = new Set([" ", "\t", "\n", "\r"]);
/** Characters that may directly follow a value without a separator. */
const VALUE_TERMINATORS = new Set(['"', "[", "]", "{", "}", ",", ":"]);
const SELF_DELIMITED = new Set(['"', "{", "["]);
const SIMPLE_ESCAPES = new Set(['"', "\\", "/", "b", "f", "n", "r", "t"]);
const LITERALS = ["true", "false", "null"];

function fail(cause: string): Span {
  return { ok: false, cause };
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function isHexDigit(ch: string | undefined): boolean {
  return ch !== undefined && /^[0-9a-fA-F]$/.test(ch);
}

export function isJsonWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && WHITESPACE.has(ch);
}

function skipWhitespace(s: Scanner): void {
  while (isJsonWhitespace(s.peek())) s.advance();
}

function readHex4(s: Scanner): number | undefined {
  let code = 0;
  for (let i = 0; i < 4; i++) {
    const ch = s.next();
    if (ch === undefined || !isHexDigit(ch)) return undefined;
    code = (code << 4) | parseInt(ch, 16);
  }
  return code;
}

/** Scan a JSON string starting at its opening quote. */
export function scanJsonString(s: Scanner): Span {
  if (s.next() !== '"') return fail("expected string");
  for (;;) {
    const ch = s.next();
    if (ch === undefined) return fail("EOF while parsing a string");
    if (ch === '"') return OK;
    if (ch < " ") {
      return fail("control character found while parsing a string");
    }
    if (ch !== "\\") continue;

    const esc = s.next();
    if (esc === undefined) return fail("EOF while parsing a string");
    if (SIMPLE_ESCAPES.has(esc)) continue;
    if (esc !== "u") return fail("invalid escape");

    const code = readHex4(s);
    if (code === undefined) return fail("invalid escape");
    if (code >= 0xdc00 && code <= 0xdfff) {
      return fail("lone trailing surrogate in hex escape");
    }
    if (code >= 0xd800 && code <= 0xdbff) {
      if (s.next() !== "\\" || s.next() !== "u") {
        return fail("lone leading surrogate in hex escape");
      }
      const low = readHex4(s);
      if (low === undefined) return fail("invalid escape");
      if (low < 0xdc00 || low > 0xdfff) {
        return fail("lone leading surrogate in hex escape");
      }
    }
  }
}

function scanDigits(s: Scanner): Span {
  if (!isDigit(s.peek())) return fail("invalid number");
  while (isDigit(s.peek())) s.advance();
  return OK;
}

/** Numbers are only delimited here, never converted, so no precision is lost. */
function scanNumber(s: Scanner): Span {
  if (s.peek() === "-") s.advance();
  if (s.peek() === "0") {
    s.advance();
    if (isDigit(s.peek())) return fail("invalid number");
  } else {
    const integer = scanDigits(s);
    if (!integer.ok) return integer;
  }
  if (s.peek() === ".") {
    s.advance();
    const fraction = scanDigits(s);
    if (!fraction.ok) return fraction;
  }
  const e = s.peek();
  if (e === "e" || e === "E") {
    s.advance();
    const sign = s.peek();
    if (sign === "+" || sign === "-") s.advance();
    const exponent = scanDigits(s);
    if (!exponent.ok) return exponent;
  }
  return OK;
}

function scanLiteral(s: Scanner): Span {
  const word = LITERALS.find((w) => w[0] === s.peek());
  if (!word) return fail("expected value");
  for (const expected of word) {
    if (s.next() !== expected) return fail("expected ident");
  }
  return OK;
}

function scanEmptyContainer(s: Scanner, close: string): Span {
  s.advance();
  if (s.next() !== close) return fail(`expected '${close}'`);
  return OK;
}

/** Scan one JSON value at the cursor. */
export function scanJsonValue(s: Scanner): Span {
  const ch = s.peek();
  if (ch === undefined) return fail("EOF while parsing a value");
  if (ch === '"') return scanJsonString(s);
  if (ch === "-" || isDigit(ch)) return scanNumber(s);
  if (ch === "{") return scanEmptyContainer(s, "}");
  if (ch === "[") return scanEmptyContainer(s, "]");
  return scanLiteral(s);
}

/**
 * Read the rest of the scanner as exactly one JSON value and return its
 * source text. Surrounding whitespace is dropped. Objects and arrays must be
 * empty; nested structure is expressed with paths instead.
 */
export function parseJsonValue(s: Scanner): ParseResult<string> {
  const start = s.pos;
  skipWhitespace(s);

  const first = s.peek();
  if (first === undefined) {
    return { ok: false, error: { kind: "UnexpectedEndOfString" } };
  }
  if (first === "{" || first === "[") {
    const second = s.peek(1);
    if (second === undefined) {
      return { ok: false, error: { kind: "UnexpectedEndOfString" } };
    }
    if (second !== (first === "{" ? "}" : "]")) {
      return {
        ok: false,
        error: { kind: "UnexpectedChar", pos: s.pos + 1, ch: second },
      };
    }
  }

  const valueStart = s.pos;
  const span = scanJsonValue(s);
  if (!span.ok) {
    return {
      ok: false,
      error: { kind: "InvalidJsonValue", pos: start, cause: span.cause },
    };
  }
  // strings and empty containers end themselves; numbers and literals need a delimiter
  const after = s.peek();
  if (
    !SELF_DELIMITED.has(first) &&
    after !== undefined &&
    !isJsonWhitespace(after) &&
    !VALUE_TERMINATORS.has(after)
  ) {
    return {
      ok: false,
      error: { kind: "InvalidJsonValue", pos: start, cause: "trailing characters" },
    };
  }
  const literal = s.sliceFrom(valueStart);

  skipWhitespace(s);
  const garbage = s.peek();
  if (garbage !== undefined) {
    return {
      ok: false,
      error: { kind: "UnexpectedChar", pos: s.pos, ch: garbage },
    };
  }
  return { ok: true, value: literal };
}

/** Validate standalone text as one JSON value, e.g. a command-line flag. */
export function validateJsonText(text: string): ParseResult<string> {
  return parseJsonValue(new Scanner(text));
}
