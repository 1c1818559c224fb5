/** Split text into Unicode scalar values (lone surrogates stay single units). */
export function toCodePoints(text: string): string[] {
  return Array.from(text);
}

/**
 * Compare two strings by code point sequence.
 *
 * Plain `<` on JS strings compares UTF-16 code units, which puts U+E000..U+FFFF
 * after astral characters.
 */
export function compareCodePoints(a: string, b: string): number {
  const ai = a[Symbol.iterator]();
  const bi = b[Symbol.iterator]();
  for (;;) {
    const x = ai.next();
    const y = bi.next();
    if (x.done || y.done) {
      if (x.done && y.done) return 0;
      return x.done ? -1 : 1;
    }
    const cx = x.value.codePointAt(0) ?? 0;
    const cy = y.value.codePointAt(0) ?? 0;
    if (cx !== cy) return cx < cy ? -1 : 1;
  }
}
