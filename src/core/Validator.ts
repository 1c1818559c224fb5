import type { Path } from "../model/Path.js";
import { PathIndex, ROOT_ID } from "../model/PathIndex.js";
import { segmentsEqual, type Segment } from "../model/Segment.js";
import type { Directive, NodeKind } from "../types/directive.js";
import type { PathErrorDetail } from "../types/result.js";

export type ValidationResult =
  | { ok: true; kinds: Map<Path, NodeKind> }
  | { ok: false; error: PathErrorDetail };

type PassResult = { ok: true } | { ok: false; error: PathErrorDetail };

const PASSED: PassResult = { ok: true };

/**
 * Run the batch checks in a fixed order and stop at the first failure:
 * key encodings, path uniqueness, node kinds, array completeness.
 * On success, returns the node kind of every distinct path, keyed by the
 * first Path object seen for it.
 */
export function validate(directives: ReadonlyArray<Directive>): ValidationResult {
  const index = new PathIndex();

  const keys = checkKeyConsistency(directives, index);
  if (!keys.ok) return keys;

  const unique = checkPathUniqueness(directives, index);
  if (!unique.ok) return unique;

  const kinds = inferNodeKinds(directives, index);
  if (!kinds.ok) return kinds;

  const arrays = checkArrayCompleteness(directives, index);
  if (!arrays.ok) return arrays;

  return kinds;
}

/**
 * Keys that decode to the same text must be spelled the same way, so `a` and
 * `"\u0061"` cannot both appear under one parent. Different normalization
 * forms of a character are different keys.
 */
export function checkKeyConsistency(
  directives: ReadonlyArray<Directive>,
  index = new PathIndex(),
): PassResult {
  // number of the unescaped path -> first concrete spelling of its last key
  const spellings = new Map<number, Segment>();

  for (const { path } of directives) {
    const decoded = index.steps(path.unescape());

    for (const [i, step] of [...path.ancestry()].entries()) {
      const d = decoded[i];
      if (!d) break;

      const segment = step.segment;
      if (segment.kind !== "key") continue;

      const first = spellings.get(d.id);
      if (first === undefined) {
        spellings.set(d.id, segment);
      } else if (!segmentsEqual(first, segment)) {
        return {
          ok: false,
          error: {
            kind: "InconsistentKeyEncodings",
            path: step.parent,
            key1: first,
            key2: segment,
          },
        };
      }
    }
  }
  return PASSED;
}

export function checkPathUniqueness(
  directives: ReadonlyArray<Directive>,
  index = new PathIndex(),
): PassResult {
  const seen = new Set<number>();
  for (const { path } of directives) {
    const id = index.idOf(path);
    if (seen.has(id)) {
      return { ok: false, error: { kind: "ConflictingDirectives", path } };
    }
    seen.add(id);
  }
  return PASSED;
}

/**
 * Every directive target is a value; every proper prefix is an object or an
 * array depending on the segment that follows it.
 */
export function inferNodeKinds(
  directives: ReadonlyArray<Directive>,
  index = new PathIndex(),
): ValidationResult {
  const seen = new Map<number, { path: Path; kind: NodeKind }>();

  const record = (id: number, path: Path, kind: NodeKind): PassResult => {
    const existing = seen.get(id);
    if (existing === undefined) {
      seen.set(id, { path, kind });
      return PASSED;
    }
    if (existing.kind === kind) return PASSED;
    return {
      ok: false,
      error: { kind: "StructuralConflict", path, kind1: existing.kind, kind2: kind },
    };
  };

  for (const { path } of directives) {
    const steps = index.steps(path);

    const leaf = record(steps[0]?.id ?? ROOT_ID, path, "value");
    if (!leaf.ok) return leaf;

    for (const { parent, parentId, segment } of steps) {
      const r = record(parentId, parent, segment.kind === "key" ? "object" : "array");
      if (!r.ok) return r;
    }
  }

  const kinds = new Map<Path, NodeKind>();
  for (const { path, kind } of seen.values()) kinds.set(path, kind);
  return { ok: true, kinds };
}

/**
 * Arrays must have every index from 0 to their largest. Arrays are checked in
 * the order they first appear in the batch.
 */
export function checkArrayCompleteness(
  directives: ReadonlyArray<Directive>,
  index = new PathIndex(),
): PassResult {
  const arrays = new Map<number, { path: Path; indices: Set<number> }>();

  for (const { path } of directives) {
    for (const { parent, parentId, segment } of index.steps(path)) {
      if (segment.kind !== "index") continue;
      let entry = arrays.get(parentId);
      if (!entry) {
        entry = { path: parent, indices: new Set() };
        arrays.set(parentId, entry);
      }
      entry.indices.add(segment.index);
    }
  }

  for (const { path, indices } of arrays.values()) {
    const gap = findGap(indices);
    if (gap) {
      return {
        ok: false,
        error: {
          kind: "IncompleteArray",
          path,
          indexSeen: gap.seen,
          indexMissing: gap.missing,
        },
      };
    }
  }
  return PASSED;
}

/** Smallest missing index and the smallest present index above it. */
export function findGap(
  indices: ReadonlySet<number>,
): { seen: number; missing: number } | undefined {
  const sorted = [...indices].sort((a, b) => a - b);
  let expected = 0;
  for (const index of sorted) {
    if (index !== expected) return { seen: index, missing: expected };
    expected += 1;
  }
  return undefined;
}
