import type { Path } from "../model/Path.js";
import type { Segment } from "../model/Segment.js";
import type { Node, NodeKind } from "./directive.js";

export type SyntaxErrorDetail =
  | { kind: "UnexpectedChar"; pos: number; ch: string }
  | { kind: "UnexpectedEndOfString" }
  /** index does not fit in 32 bits */
  | { kind: "InvalidIndex"; pos: number; cause: string }
  /** quoted segment is not a valid JSON string */
  | { kind: "InvalidKey"; pos: number; cause: string }
  /** text after `:` is not a JSON value */
  | { kind: "InvalidJsonValue"; pos: number; cause: string };

export type PathErrorDetail =
  | {
      kind: "InconsistentKeyEncodings";
      path: Path;
      key1: Segment;
      key2: Segment;
    }
  | { kind: "ConflictingDirectives"; path: Path }
  | { kind: "StructuralConflict"; path: Path; kind1: NodeKind; kind2: NodeKind }
  | {
      kind: "IncompleteArray";
      path: Path;
      indexSeen: number;
      indexMissing: number;
    };

export type ComposeError =
  | {
      code: "ENCODING_ERROR";
      message: string;
      /** position of the input in the batch */
      index: number;
      /** the offending bytes, printable ASCII kept and the rest as \xNN */
      bytes: string;
    }
  | {
      code: "SYNTAX_ERROR";
      message: string;
      index: number;
      /** directive text with control characters escaped */
      directive: string;
      detail: SyntaxErrorDetail;
    }
  | {
      code: "PATH_ERROR";
      message: string;
      detail: PathErrorDetail;
    };

export type ComposeStage = "decode" | "parse" | "validate" | "build";

export interface ComposeMeta {
  directives: number;
  /** last stage entered */
  stage: ComposeStage;
  /** paths per node kind, once validation got that far */
  kinds?: Record<NodeKind, number>;
}

export type ComposeResult =
  | { ok: true; document: Node | undefined; meta?: ComposeMeta }
  | { ok: false; error: ComposeError; meta?: ComposeMeta };

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: SyntaxErrorDetail };
