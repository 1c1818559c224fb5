import type { Path } from "../model/Path.js";

export type Operator = ":" | "=";

export interface Directive {
  path: Path;
  /** JSON text: the raw literal for `:`, a freshly escaped string for `=`. */
  value: string;
}

export type NodeKind = "object" | "array" | "value";

export type Node =
  | { kind: "value"; json: string }
  | { kind: "array"; items: Map<number, Node> }
  | { kind: "object"; members: Map<string, Node> };
