import type { Node } from "../types/directive.js";
import { compareCodePoints } from "../utils/codePoints.js";
import { unescapeString } from "../utils/escape.js";

/**
 * Render a document as compact JSON.
 *
 * Array items follow their indices. Object members are ordered by the code
 * points of the decoded key, but each key is written with the spelling it was
 * given. Values are written exactly as captured.
 */
export function serialize(node: Node): string {
  switch (node.kind) {
    case "value":
      return node.json;
    case "array": {
      const items = [...node.items]
        .sort(([a], [b]) => a - b)
        .map(([, item]) => serialize(item));
      return `[${items.join(",")}]`;
    }
    case "object": {
      const members = [...node.members]
        .map(([key, child]) => ({ key, decoded: unescapeString(key), child }))
        .sort((a, b) => compareCodePoints(a.decoded, b.decoded));
      return `{${members.map((m) => `"${m.key}":${serialize(m.child)}`).join(",")}}`;
    }
  }
}
