import { describe, it, expect } from "vitest";
import { escapeString, unescapeString } from "../src/index.js";
import { escapeBytesForDisplay, escapeForDisplay } from "../src/utils/escape.js";
import { compareCodePoints } from "../src/utils/codePoints.js";

describe("escapeString", () => {
  it("escapes quotes, backslashes and C0 controls", () => {
    expect(escapeString('a"b\\c')).toBe(String.raw`a\"b\\c`);
    expect(escapeString("\b\f\n\r\t")).toBe(String.raw`\b\f\n\r\t`);
    expect(escapeString("\x00\x1f")).toBe(String.raw`\u0000\u001f`);
  });

  it("leaves everything else alone", () => {
    expect(escapeString("/\x7f\u0085é☀😀")).toBe("/\x7f\u0085é☀😀");
  });

  it("is undone by unescapeString", () => {
    const samples = ["", "plain", 'q"uote', "back\\slash", "\x00\x01\x1f\x7f", "tab\tnew\nline", "😀 and ☀"];
    for (const text of samples) {
      expect(unescapeString(escapeString(text))).toBe(text);
    }
  });
});

describe("unescapeString", () => {
  it("decodes escapes, including surrogate pairs", () => {
    expect(unescapeString(String.raw`\/é😀`)).toBe("/é😀");
  });

  it("throws on malformed escapes", () => {
    expect(() => unescapeString(String.raw`\x`)).toThrow();
    expect(() => unescapeString(String.raw`\u12`)).toThrow();
  });
});

describe("display escaping", () => {
  it("makes directives readable in messages", () => {
    expect(escapeForDisplay('a"\\\t\n\r\x01\x7f\u0090é')).toBe(
      String.raw`a\"\\\t\n\r\u{1}\u{7f}\u{90}é`,
    );
  });

  it("shows undecodable bytes in hex", () => {
    expect(escapeBytesForDisplay(Uint8Array.of(0x61, 0x22, 0x00, 0xc3, 0x7e))).toBe(
      String.raw`a\"\x00\xc3~`,
    );
  });
});

describe("compareCodePoints", () => {
  it("orders astral characters after the BMP", () => {
    expect(compareCodePoints("\uffff", "😀")).toBeLessThan(0);
    expect(compareCodePoints("ab", "a")).toBeGreaterThan(0);
    expect(compareCodePoints("", "")).toBe(0);
  });
});
