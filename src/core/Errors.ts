import { formatSegment } from "../model/Segment.js";
import type {
  ComposeError,
  PathErrorDetail,
  SyntaxErrorDetail,
} from "../types/result.js";
import { escapeForDisplay } from "../utils/escape.js";

/** Thrown when validated input still breaks a tree invariant. Always a bug. */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(`internal invariant violated: ${message}`);
    this.name = "InvariantViolation";
  }
}

/** Thrown by the throwing convenience API; carries the structured error. */
export class ComposeFailure extends Error {
  readonly error: ComposeError;

  constructor(error: ComposeError) {
    super(error.message);
    this.name = "ComposeFailure";
    this.error = error;
  }
}

export function describeSyntaxError(detail: SyntaxErrorDetail): string {
  switch (detail.kind) {
    case "UnexpectedChar":
      return `position ${detail.pos}: unexpected character '${escapeForDisplay(detail.ch)}'`;
    case "UnexpectedEndOfString":
      return "unexpected end of string";
    case "InvalidIndex":
      return `position ${detail.pos}: invalid index: ${detail.cause}`;
    case "InvalidKey":
      return `position ${detail.pos}: invalid key: ${detail.cause}`;
    case "InvalidJsonValue":
      return `position ${detail.pos}: invalid json value: ${detail.cause}`;
  }
}

function describePathVariant(detail: PathErrorDetail): string {
  switch (detail.kind) {
    case "InconsistentKeyEncodings":
      return `path has equivalent but inconsistently encoded keys ${formatSegment(detail.key1)} and ${formatSegment(detail.key2)}`;
    case "ConflictingDirectives":
      return "conflicting directives for path";
    case "StructuralConflict":
      return `path referred to as both ${detail.kind1} and ${detail.kind2}`;
    case "IncompleteArray":
      return `array at path has index ${detail.indexSeen} but lacks index ${detail.indexMissing}`;
  }
}

export function describePathError(detail: PathErrorDetail): string {
  return `path ${detail.path.toString()}: ${describePathVariant(detail)}`;
}

export function syntaxError(
  index: number,
  text: string,
  detail: SyntaxErrorDetail,
): ComposeError {
  const directive = escapeForDisplay(text);
  return {
    code: "SYNTAX_ERROR",
    message: `directive "${directive}": ${describeSyntaxError(detail)}`,
    index,
    directive,
    detail,
  };
}

export function pathError(detail: PathErrorDetail): ComposeError {
  return {
    code: "PATH_ERROR",
    message: `validating: ${describePathError(detail)}`,
    detail,
  };
}

export function encodingError(index: number, bytes: string): ComposeError {
  return {
    code: "ENCODING_ERROR",
    message: `directive #${index + 1}: invalid UTF-8 in "${bytes}"`,
    index,
    bytes,
  };
}
