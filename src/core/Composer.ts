import { TextDecoder } from "node:util";
import type { Path } from "../model/Path.js";
import { parseDirective } from "../parsing/directive.js";
import type { Directive, NodeKind } from "../types/directive.js";
import type {
  ComposeError,
  ComposeMeta,
  ComposeResult,
  ComposeStage,
} from "../types/result.js";
import { escapeBytesForDisplay } from "../utils/escape.js";
import {
  ComposeFailure,
  encodingError,
  pathError,
  syntaxError,
} from "./Errors.js";
import { buildTree } from "./OutputBuilder.js";
import { serialize } from "./Serializer.js";
import { validate } from "./Validator.js";

export interface ComposerOptions {
  /** keep `meta` on results (default: false) */
  debug?: boolean;
}

export class Composer {
  private debug: boolean;

  constructor(opts: ComposerOptions = {}) {
    this.debug = opts.debug ?? false;
  }

  /**
   * Parse, validate and merge a batch of directives. The batch is all or
   * nothing: the first syntax error in input order, or the first failing
   * batch check, rejects everything.
   */
  compose(texts: Iterable<string>): ComposeResult {
    const directives: Directive[] = [];
    let index = 0;
    for (const text of texts) {
      const parsed = parseDirective(text);
      if (!parsed.ok) {
        return this.fail(
          syntaxError(index, text, parsed.error),
          meta(directives.length, "parse"),
        );
      }
      directives.push(parsed.value);
      index += 1;
    }

    const checked = validate(directives);
    if (!checked.ok) {
      return this.fail(
        pathError(checked.error),
        meta(directives.length, "validate"),
      );
    }

    const document = buildTree(directives);
    return this.finalize({
      ok: true,
      document,
      meta: meta(directives.length, "build", countKinds(checked.kinds)),
    });
  }

  /** Like `compose`, for raw argument bytes that still need UTF-8 decoding. */
  composeBytes(inputs: Iterable<Uint8Array>): ComposeResult {
    const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
    const texts: string[] = [];
    let index = 0;
    for (const bytes of inputs) {
      const text = decodeUtf8(decoder, bytes);
      if (text === undefined) {
        return this.fail(
          encodingError(index, escapeBytesForDisplay(bytes)),
          meta(0, "decode"),
        );
      }
      texts.push(text);
      index += 1;
    }
    return this.compose(texts);
  }

  /**
   * Compose and serialize in one step. Returns undefined for an empty batch
   * and throws a ComposeFailure for invalid input.
   */
  composeJson(texts: Iterable<string>): string | undefined {
    const result = this.compose(texts);
    if (!result.ok) throw new ComposeFailure(result.error);
    return result.document && serialize(result.document);
  }

  private fail(error: ComposeError, m: ComposeMeta): ComposeResult {
    return this.finalize({ ok: false, error, meta: m });
  }

  private finalize(result: ComposeResult): ComposeResult {
    if (this.debug) return result;

    if (result.ok) {
      return { ok: true, document: result.document };
    }

    return { ok: false, error: result.error };
  }
}

function decodeUtf8(decoder: TextDecoder, bytes: Uint8Array): string | undefined {
  try {
    return decoder.decode(bytes);
  } catch (e) {
    if (e instanceof TypeError) return undefined;
    throw e;
  }
}

function meta(
  directives: number,
  stage: ComposeStage,
  kinds?: Record<NodeKind, number>,
): ComposeMeta {
  return kinds ? { directives, stage, kinds } : { directives, stage };
}

function countKinds(kinds: ReadonlyMap<Path, NodeKind>): Record<NodeKind, number> {
  const counts: Record<NodeKind, number> = { object: 0, array: 0, value: 0 };
  for (const kind of kinds.values()) counts[kind] += 1;
  return counts;
}

