import { describe, it, expect } from "vitest";
import { parseDirective, validate } from "../src/index.js";
import type { Directive } from "../src/index.js";
import {
  checkArrayCompleteness,
  checkKeyConsistency,
  findGap,
} from "../src/core/Validator.js";

function directives(...texts: string[]): Directive[] {
  return texts.map((text) => {
    const r = parseDirective(text);
    if (!r.ok) throw new Error(`bad fixture ${text}`);
    return r.value;
  });
}

describe("validate", () => {
  it("returns the kind of every path", () => {
    const r = validate(directives("a.0:1", "a.1.b:2"));
    expect(r.ok).toBe(true);
    if (!r.ok) return;
    const kinds = Object.fromEntries(
      [...r.kinds].map(([path, kind]) => [path.toString(), kind]),
    );
    expect(kinds).toEqual({
      ".": "object",
      a: "array",
      "a.0": "value",
      "a.1": "object",
      "a.1.b": "value",
    });
  });

  it("checks key encodings before uniqueness", () => {
    const r = validate(directives(String.raw`"\u0061":1`, "a:1", "a:2"));
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.kind).toBe("InconsistentKeyEncodings");
  });

  it("checks uniqueness before node kinds", () => {
    const r = validate(directives("a.b:1", "a:1", "a:2"));
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.kind).toBe("ConflictingDirectives");
  });

  it("checks node kinds before array gaps", () => {
    const r = validate(directives("a.3:1", "a.x:2"));
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.kind).toBe("StructuralConflict");
  });
});

describe("checkKeyConsistency", () => {
  it("compares keys under the same decoded parent only", () => {
    expect(checkKeyConsistency(directives("a.x:1", String.raw`b."x":1`))).toEqual({
      ok: true,
    });
  });

  it("follows decoded parents when comparing children", () => {
    const r = checkKeyConsistency(
      directives(String.raw`"a".x:1`, String.raw`a."\u0078":1`),
    );
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error).toMatchObject({
      kind: "InconsistentKeyEncodings",
      key1: { kind: "key", key: "x" },
      key2: { kind: "key", key: String.raw`\u0078` },
    });
    expect(r.error.path.toString()).toBe("a");
  });
});

describe("deep paths", () => {
  it("keeps one entry per distinct path", () => {
    const deep = Array.from({ length: 3000 }, () => "a").join(".");
    const r = validate(directives(`${deep}.x:1`, `${deep}.y:2`));
    expect(r.ok).toBe(true);
    if (!r.ok) return;
    // root, 3000 shared prefixes and the two leaves
    expect(r.kinds.size).toBe(3003);
  });
});

describe("checkArrayCompleteness", () => {
  it("reports arrays in order of first appearance", () => {
    const r = checkArrayCompleteness(directives("a.0.0=x", "a.0.2=y", "a.2=z"));
    expect(r.ok).toBe(false);
    if (r.ok || r.error.kind !== "IncompleteArray") return;
    expect(r.error.path.toString()).toBe("a.0");
    expect(r.error.indexSeen).toBe(2);
    expect(r.error.indexMissing).toBe(1);
  });
});

describe("findGap", () => {
  it("finds the first hole", () => {
    expect(findGap(new Set([0, 1, 2]))).toBeUndefined();
    expect(findGap(new Set())).toBeUndefined();
    expect(findGap(new Set([3, 1]))).toEqual({ seen: 1, missing: 0 });
    expect(findGap(new Set([0, 5, 1, 9]))).toEqual({ seen: 5, missing: 2 });
  });
});
