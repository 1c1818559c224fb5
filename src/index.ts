export type { Directive, Node, NodeKind, Operator } from "./types/directive.js";
export type {
  ComposeError,
  ComposeMeta,
  ComposeResult,
  ComposeStage,
  ParseResult,
  PathErrorDetail,
  SyntaxErrorDetail,
} from "./types/result.js";
export type { Segment, IndexSegment, KeySegment } from "./model/Segment.js";
export { Path } from "./model/Path.js";
export {
  indexSegment,
  keySegment,
  textKeySegment,
  formatSegment,
} from "./model/Segment.js";
export { parseDirective, parsePathText } from "./parsing/directive.js";
export { validate } from "./core/Validator.js";
export { buildTree } from "./core/OutputBuilder.js";
export { serialize } from "./core/Serializer.js";
export { ComposeFailure, InvariantViolation } from "./core/Errors.js";
export { escapeString, unescapeString } from "./utils/escape.js";
export { Composer } from "./core/Composer.js";
export {
  wrapJsonRpcRequest,
  parseMethod,
  parseId,
  OMIT_ID,
} from "./envelope/JsonRpc.js";
export type {
  JsonRpcRequestOptions,
  EnvelopeResult,
} from "./envelope/JsonRpc.js";

import { Composer, type ComposerOptions } from "./core/Composer.js";

export type { ComposerOptions };

export function createComposer(opts: ComposerOptions = {}): Composer {
  return new Composer(opts);
}
