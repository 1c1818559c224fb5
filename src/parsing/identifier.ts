const XID_START = /^\p{XID_Start}$/u;
const XID_CONTINUE = /^\p{XID_Continue}$/u;
const XID_STRING = /^\p{XID_Start}\p{XID_Continue}*$/u;

export function isXidStart(ch: string): boolean {
  return XID_START.test(ch);
}

export function isXidContinue(ch: string): boolean {
  return XID_CONTINUE.test(ch);
}

/** True when `text` can be written as a bare key. */
export function isXidString(text: string): boolean {
  return XID_STRING.test(text);
}
