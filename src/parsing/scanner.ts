import { toCodePoints } from "../utils/codePoints.js";

/**
 * Cursor over the Unicode scalar values of one directive. Positions are
 * 1-based, matching what error messages report.
 */
export class Scanner {
  private readonly chars: string[];
  private index = 0;

  constructor(
    text: string,
    private readonly base = 1,
  ) {
    this.chars = toCodePoints(text);
  }

  /** Position of the next unread character. */
  get pos(): number {
    return this.base + this.index;
  }

  get done(): boolean {
    return this.index >= this.chars.length;
  }

  peek(offset = 0): string | undefined {
    return this.chars[this.index + offset];
  }

  next(): string | undefined {
    const ch = this.chars[this.index];
    if (ch !== undefined) this.index += 1;
    return ch;
  }

  advance(count = 1): void {
    this.index = Math.min(this.index + count, this.chars.length);
  }

  /** Text from `from` (a position) up to the cursor. */
  sliceFrom(from: number): string {
    return this.chars.slice(from - this.base, this.index).join("");
  }

  rest(): string {
    return this.chars.slice(this.index).join("");
  }
}
