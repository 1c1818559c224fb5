import {
  compareSegments,
  formatSegment,
  segmentsEqual,
  unescapeSegment,
  type Segment,
} from "./Segment.js";

interface PathTail {
  readonly parent: Path;
  readonly segment: Segment;
}

export interface AncestryStep extends PathTail {
  /** `parent` with `segment` appended */
  readonly path: Path;
}

/**
 * Persistent path: either the root or a parent path plus one segment.
 * Appending never copies the parent, so directives that share a prefix share
 * its nodes. Paths are never mutated.
 */
export class Path {
  static readonly root = new Path(undefined);

  readonly length: number;

  private constructor(readonly tail: PathTail | undefined) {
    this.length = tail ? tail.parent.length + 1 : 0;
  }

  static of(segments: Iterable<Segment>): Path {
    let path = Path.root;
    for (const segment of segments) path = path.append(segment);
    return path;
  }

  get isRoot(): boolean {
    return this.tail === undefined;
  }

  append(segment: Segment): Path {
    return new Path({ parent: this, segment });
  }

  /** Segments from the root down. */
  segments(): Segment[] {
    const out: Segment[] = [];
    for (let p: Path = this; p.tail; p = p.tail.parent) out.push(p.tail.segment);
    return out.reverse();
  }

  /**
   * Walk towards the root, yielding each segment with the path it was
   * appended to, starting with the last segment.
   */
  *ancestry(): Generator<AncestryStep> {
    for (let p: Path = this; p.tail; p = p.tail.parent) {
      yield { path: p, parent: p.tail.parent, segment: p.tail.segment };
    }
  }

  /**
   * The same path with every key segment decoded. The result identifies
   * equivalent keys; it is not a path that can be written back out.
   */
  unescape(): Path {
    return Path.of(this.segments().map(unescapeSegment));
  }

  equals(other: Path): boolean {
    if (this === other) return true;
    if (this.length !== other.length) return false;
    let a: Path = this;
    let b: Path = other;
    while (a.tail && b.tail) {
      if (a === b) return true;
      if (!segmentsEqual(a.tail.segment, b.tail.segment)) return false;
      a = a.tail.parent;
      b = b.tail.parent;
    }
    return true;
  }

  /** Parent chains first, then the last segment; the root sorts last. */
  compare(other: Path): number {
    if (!this.tail) return other.tail ? 1 : 0;
    if (!other.tail) return -1;
    const byParent = this.tail.parent.compare(other.tail.parent);
    if (byParent !== 0) return byParent;
    return compareSegments(this.tail.segment, other.tail.segment);
  }

  toString(): string {
    if (!this.tail) return ".";
    return this.segments().map(formatSegment).join(".");
  }
}
