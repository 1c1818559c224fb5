import { describe, it, expect } from "vitest";
import { Path, indexSegment, keySegment, parseDirective, parsePathText } from "../src/index.js";
import type { Directive, ParseResult } from "../src/index.js";

function parsed(text: string): Directive {
  const r = parseDirective(text);
  if (!r.ok) throw new Error(`failed to parse ${text}: ${r.error.kind}`);
  return r.value;
}

function pathOf(r: ParseResult<Path>): string {
  if (!r.ok) throw new Error(r.error.kind);
  return r.value.toString();
}

describe("parseDirective", () => {
  it("splits path, operator and value", () => {
    const d = parsed("a.b:true");
    expect(d.path.equals(Path.of([keySegment("a"), keySegment("b")]))).toBe(true);
    expect(d.value).toBe("true");
  });

  it("mixes keys and indices", () => {
    const d = parsed("c.0.d=foobar");
    expect(d.path.segments()).toEqual([keySegment("c"), indexSegment(0), keySegment("d")]);
    expect(d.value).toBe('"foobar"');
  });

  it("root path", () => {
    const d = parsed(".=x");
    expect(d.path.isRoot).toBe(true);
    expect(d.value).toBe('"x"');
  });

  it("stores quoted keys with their escapes", () => {
    const d = parsed(String.raw`"a\"b".c:1`);
    expect(d.path.segments()).toEqual([keySegment(String.raw`a\"b`), keySegment("c")]);
  });

  it("escapes bare keys into the key representation", () => {
    expect(parsed("ключ:1").path.segments()).toEqual([keySegment("ключ")]);
  });

  it("stops a bare key at the first non-identifier character", () => {
    expect(parseDirective("a-b:1")).toEqual({
      ok: false,
      error: { kind: "UnexpectedChar", pos: 2, ch: "-" },
    });
  });

  it("does not take a dot after the root", () => {
    expect(parseDirective("..a:1")).toEqual({
      ok: false,
      error: { kind: "UnexpectedChar", pos: 2, ch: "." },
    });
  });

  it("indices above 32 bits", () => {
    expect(parseDirective("0.12345678901:1")).toEqual({
      ok: false,
      error: {
        kind: "InvalidIndex",
        pos: 14,
        cause: "number too large to fit in target type",
      },
    });
    expect(parsed("4294967295:1").path.segments()).toEqual([indexSegment(4294967295)]);
  });

  it("an identifier may not start with a digit", () => {
    expect(parseDirective("1a:1")).toEqual({
      ok: false,
      error: { kind: "UnexpectedChar", pos: 2, ch: "a" },
    });
  });
});

describe("parsePathText", () => {
  it("renders paths back", () => {
    expect(pathOf(parsePathText("."))).toBe(".");
    expect(pathOf(parsePathText("a.0.b"))).toBe("a.0.b");
    expect(pathOf(parsePathText('"x y".z'))).toBe('"x y".z');
    expect(pathOf(parsePathText('"plain"'))).toBe("plain");
  });

  it("rejects anything after the path", () => {
    expect(parsePathText("a.b:1")).toEqual({
      ok: false,
      error: { kind: "UnexpectedChar", pos: 4, ch: ":" },
    });
    expect(parsePathText("a.")).toEqual({
      ok: false,
      error: { kind: "UnexpectedEndOfString" },
    });
  });
});
