import { isXidString } from "../parsing/identifier.js";
import { validateJsonText } from "../parsing/json.js";
import { describeSyntaxError } from "../core/Errors.js";
import type { Node } from "../types/directive.js";
import { quoteString } from "../utils/escape.js";

/** `id` value that leaves the member out, making the request a notification. */
export const OMIT_ID = ":omit";
const NULL_ID = ":null";

export interface JsonRpcRequestOptions {
  method: string;
  /** default: ":omit" */
  id?: string;
}

export type EnvelopeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: { code: "INVALID_ENVELOPE"; field: "method" | "id"; message: string } };

function invalid<T>(field: "method" | "id", message: string): EnvelopeResult<T> {
  return { ok: false, error: { code: "INVALID_ENVELOPE", field, message } };
}

function checkJson(
  field: "method" | "id",
  text: string,
): EnvelopeResult<string> {
  const r = validateJsonText(text);
  if (!r.ok) return invalid(field, describeSyntaxError(r.error));
  return { ok: true, value: r.value };
}

/** Method names are identifiers, or JSON string literals written out. */
export function parseMethod(input: string): EnvelopeResult<string> {
  if (isXidString(input)) return { ok: true, value: quoteString(input) };
  if (input.startsWith('"')) return checkJson("method", input);
  return invalid("method", "must be a string");
}

/**
 * Request ids: an identifier, a JSON string or number, `:null`, or `:omit`.
 * Returns undefined for `:omit`.
 */
export function parseId(input: string): EnvelopeResult<string | undefined> {
  if (isXidString(input)) return { ok: true, value: quoteString(input) };
  if (input === NULL_ID) return { ok: true, value: "null" };
  if (input === OMIT_ID) return { ok: true, value: undefined };
  if (input.startsWith('"') || /^[0-9]/.test(input)) {
    return checkJson("id", input);
  }
  return invalid("id", "must be a string, number, ':null' or ':omit'");
}

/**
 * Wrap a composed document as the `params` of a JSON-RPC 2.0 request. No
 * document means no `params` member.
 */
export function wrapJsonRpcRequest(
  params: Node | undefined,
  opts: JsonRpcRequestOptions,
): EnvelopeResult<Node> {
  const method = parseMethod(opts.method);
  if (!method.ok) return method;

  const id = parseId(opts.id ?? OMIT_ID);
  if (!id.ok) return id;

  const members = new Map<string, Node>([
    ["jsonrpc", { kind: "value", json: '"2.0"' }],
    ["method", { kind: "value", json: method.value }],
  ]);
  if (id.value !== undefined) {
    members.set("id", { kind: "value", json: id.value });
  }
  if (params) members.set("params", params);

  return { ok: true, value: { kind: "object", members } };
}
