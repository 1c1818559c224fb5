import { Path } from "../model/Path.js";
import type { Segment } from "../model/Segment.js";
import type { Directive, Node } from "../types/directive.js";
import { InvariantViolation } from "./Errors.js";

/** Fresh chain of containers for `segments[from..]`, ending in a value. */
function createChain(
  segments: ReadonlyArray<Segment>,
  from: number,
  json: string,
): Node {
  let node: Node = { kind: "value", json };
  for (const segment of segments.slice(from).reverse()) {
    node =
      segment.kind === "index"
        ? { kind: "array", items: new Map([[segment.index, node]]) }
        : { kind: "object", members: new Map([[segment.key, node]]) };
  }
  return node;
}

function describePrefix(segments: ReadonlyArray<Segment>, length: number): string {
  return Path.of(segments.slice(0, length)).toString();
}

/**
 * Insert a value below `root`, walking existing containers and creating the
 * missing part of the path. Validated input never meets a kind mismatch or an
 * occupied leaf; either one throws.
 */
export function insertAt(root: Node, path: Path, json: string): void {
  const segments = path.segments();
  let node = root;

  for (const [i, segment] of segments.entries()) {
    let child: Node | undefined;

    if (segment.kind === "index") {
      if (node.kind !== "array") {
        throw new InvariantViolation(
          `expected array at ${describePrefix(segments, i)}`,
        );
      }
      child = node.items.get(segment.index);
      if (!child) {
        node.items.set(segment.index, createChain(segments, i + 1, json));
        return;
      }
    } else {
      if (node.kind !== "object") {
        throw new InvariantViolation(
          `expected object at ${describePrefix(segments, i)}`,
        );
      }
      child = node.members.get(segment.key);
      if (!child) {
        node.members.set(segment.key, createChain(segments, i + 1, json));
        return;
      }
    }

    node = child;
  }
  throw new InvariantViolation(`path ${path.toString()} assigned twice`);
}

/**
 * Merge validated directives into one tree. The first directive creates the
 * root; an empty batch has no document at all.
 */
export function buildTree(directives: Iterable<Directive>): Node | undefined {
  let root: Node | undefined;
  for (const { path, value } of directives) {
    if (root === undefined) {
      root = createChain(path.segments(), 0, value);
    } else {
      insertAt(root, path, value);
    }
  }
  return root;
}
