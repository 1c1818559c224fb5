import { describe, it, expect } from "vitest";
import {
  InvariantViolation,
  Path,
  buildTree,
  indexSegment,
  keySegment,
  serialize,
} from "../src/index.js";
import type { Node } from "../src/index.js";
import { insertAt } from "../src/core/OutputBuilder.js";

const value = (json: string): Node => ({ kind: "value", json });

describe("buildTree", () => {
  it("has no document for an empty batch", () => {
    expect(buildTree([])).toBeUndefined();
  });

  it("creates the whole chain for the first directive", () => {
    const tree = buildTree([
      { path: Path.of([keySegment("a"), indexSegment(0)]), value: "1" },
    ]);
    expect(tree).toEqual({
      kind: "object",
      members: new Map([["a", { kind: "array", items: new Map([[0, value("1")]]) }]]),
    });
  });

  it("shares containers between directives", () => {
    const a = Path.of([keySegment("a")]);
    const tree = buildTree([
      { path: a.append(keySegment("y")), value: "2" },
      { path: a.append(keySegment("x")), value: "1" },
      { path: Path.of([keySegment("b")]), value: "{}" },
    ]);
    expect(tree && serialize(tree)).toBe('{"a":{"x":1,"y":2},"b":{}}');
  });

  it("a root value is the whole document", () => {
    expect(buildTree([{ path: Path.root, value: '"x"' }])).toEqual(value('"x"'));
  });
});

describe("insertAt", () => {
  it("throws when the tree disagrees with the path", () => {
    const root: Node = { kind: "array", items: new Map() };
    expect(() => insertAt(root, Path.of([keySegment("a")]), "1")).toThrow(InvariantViolation);
    expect(() => insertAt(root, Path.of([keySegment("a")]), "1")).toThrow(
      "internal invariant violated: expected object at .",
    );
  });

  it("throws when a path is assigned twice", () => {
    const root: Node = { kind: "object", members: new Map([["a", value("1")]]) };
    expect(() => insertAt(root, Path.of([keySegment("a")]), "2")).toThrow(
      "internal invariant violated: path a assigned twice",
    );
  });
});

describe("serialize", () => {
  it("writes values verbatim", () => {
    expect(serialize(value("1.000"))).toBe("1.000");
  });

  it("orders array items by index, not insertion", () => {
    const node: Node = {
      kind: "array",
      items: new Map([
        [10, value("10")],
        [2, value("2")],
        [0, value("0")],
      ]),
    };
    expect(serialize(node)).toBe("[0,2,10]");
  });
});
