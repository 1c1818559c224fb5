import type { AncestryStep, Path } from "./Path.js";
import { segmentId } from "./Segment.js";

/** Number of the root path in every index. */
export const ROOT_ID = 0;

export interface IndexedStep extends AncestryStep {
  /** number of `path` */
  readonly id: number;
  /** number of `parent` */
  readonly parentId: number;
}

/**
 * Numbers the distinct paths of one batch. Each path is looked up one segment
 * at a time under its parent's number, so equal paths get equal numbers
 * without ever building their full text.
 */
export class PathIndex {
  // `${parentId}/${segmentId}` -> id
  private readonly ids = new Map<string, number>();

  get size(): number {
    return this.ids.size + 1;
  }

  /** Like `path.ancestry()`, with the number of every path on the way. */
  steps(path: Path): IndexedStep[] {
    const steps: IndexedStep[] = [];
    let parentId = ROOT_ID;
    for (const step of [...path.ancestry()].reverse()) {
      const id = this.intern(parentId, step);
      steps.push({ ...step, id, parentId });
      parentId = id;
    }
    return steps.reverse();
  }

  idOf(path: Path): number {
    return this.steps(path)[0]?.id ?? ROOT_ID;
  }

  private intern(parentId: number, step: AncestryStep): number {
    const key = `${parentId}/${segmentId(step.segment)}`;
    let id = this.ids.get(key);
    if (id === undefined) {
      id = this.ids.size + 1;
      this.ids.set(key, id);
    }
    return id;
  }
}
