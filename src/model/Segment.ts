import { compareCodePoints } from "../utils/codePoints.js";
import { escapeString, unescapeString } from "../utils/escape.js";
import { isXidString } from "../parsing/identifier.js";

export type Segment = IndexSegment | KeySegment;

export interface IndexSegment {
  readonly kind: "index";
  readonly index: number;
}

export interface KeySegment {
  readonly kind: "key";
  /**
   * Escaped spelling, i.e. the text between the quotes of a JSON string.
   * Segments from `unescapeSegment` hold decoded text instead and are only
   * used to compare keys.
   */
  readonly key: string;
}

export const MAX_INDEX = 0xffff_ffff;

export function indexSegment(index: number): IndexSegment {
  if (!Number.isInteger(index) || index < 0 || index > MAX_INDEX) {
    throw new RangeError(`Array index out of range: ${index}`);
  }
  return { kind: "index", index };
}

export function keySegment(escaped: string): KeySegment {
  return { kind: "key", key: escaped };
}

/** Key segment for unescaped text, e.g. a bare identifier. */
export function textKeySegment(text: string): KeySegment {
  return keySegment(escapeString(text));
}

/**
 * Decode a key so equivalent spellings compare equal. The result holds plain
 * text, not an escaped spelling: do not format or serialize it.
 */
export function unescapeSegment(segment: Segment): Segment {
  return segment.kind === "key"
    ? keySegment(unescapeString(segment.key))
    : segment;
}

export function segmentsEqual(a: Segment, b: Segment): boolean {
  if (a.kind === "index") return b.kind === "index" && a.index === b.index;
  return b.kind === "key" && a.key === b.key;
}

/** Indices sort before keys; keys by code point. */
export function compareSegments(a: Segment, b: Segment): number {
  if (a.kind === "index") {
    if (b.kind === "key") return -1;
    return a.index - b.index;
  }
  if (b.kind === "index") return 1;
  return compareCodePoints(a.key, b.key);
}

/** Unambiguous identity used when paths key a Map. */
export function segmentId(segment: Segment): string {
  return segment.kind === "index"
    ? `#${segment.index}`
    : `${segment.key.length}:${segment.key}`;
}

export function formatSegment(segment: Segment): string {
  if (segment.kind === "index") return String(segment.index);
  return isXidString(segment.key) ? segment.key : `"${segment.key}"`;
}
