const TWO_CHAR_ESCAPES: Record<string, string> = {
  '"': '\\"',
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

const UNESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

/**
 * Escape text for use between the quotes of a JSON string.
 * DEL and all non-control characters pass through unchanged.
 */
export function escapeString(text: string): string {
  let out = "";
  for (const ch of text) {
    const short = TWO_CHAR_ESCAPES[ch];
    if (short !== undefined) {
      out += short;
      continue;
    }
    const code = ch.charCodeAt(0);
    out += code < 0x20 ? `\\u${code.toString(16).padStart(4, "0")}` : ch;
  }
  return out;
}

/**
 * Decode the body of a JSON string. The caller must have checked the escape
 * grammar already; malformed input throws.
 */
export function unescapeString(escaped: string): string {
  let out = "";
  let i = 0;
  while (i < escaped.length) {
    const ch = escaped.charAt(i);
    if (ch !== "\\") {
      out += ch;
      i += 1;
      continue;
    }
    const next = escaped.charAt(i + 1);
    if (next === "u") {
      const hex = escaped.slice(i + 2, i + 6);
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
        throw new Error(`Malformed unicode escape in "${escaped}"`);
      }
      out += String.fromCharCode(parseInt(hex, 16));
      i += 6;
      continue;
    }
    const decoded = UNESCAPES[next];
    if (decoded === undefined) {
      throw new Error(`Malformed escape in "${escaped}"`);
    }
    out += decoded;
    i += 2;
  }
  return out;
}

/** Render a JSON string literal for `text`. */
export function quoteString(text: string): string {
  return `"${escapeString(text)}"`;
}

function isDisplayControl(code: number): boolean {
  return code < 0x20 || (code >= 0x7f && code <= 0x9f);
}

/**
 * Make user text safe to show inside a double-quoted message: control
 * characters become `\u{hex}`, quotes and backslashes get a backslash.
 */
export function escapeForDisplay(text: string): string {
  let out = "";
  for (const ch of text) {
    switch (ch) {
      case "\\":
        out += "\\\\";
        continue;
      case '"':
        out += '\\"';
        continue;
      case "\t":
        out += "\\t";
        continue;
      case "\n":
        out += "\\n";
        continue;
      case "\r":
        out += "\\r";
        continue;
    }
    const code = ch.codePointAt(0) ?? 0;
    out += isDisplayControl(code) ? `\\u{${code.toString(16)}}` : ch;
  }
  return out;
}

/** Render raw bytes with everything but printable ASCII as `\xNN`. */
export function escapeBytesForDisplay(bytes: Uint8Array): string {
  let out = "";
  for (const byte of bytes) {
    if (byte === 0x5c) out += "\\\\";
    else if (byte === 0x22) out += '\\"';
    else if (byte >= 0x20 && byte < 0x7f) out += String.fromCharCode(byte);
    else out += `\\x${byte.toString(16).padStart(2, "0")}`;
  }
  return out;
}
