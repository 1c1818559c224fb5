import { createComposer } from "../src/index.js";
import type { PathErrorDetail, SyntaxErrorDetail } from "../src/index.js";

const composer = createComposer();

export function check(directives: string[]): string | undefined {
  return composer.composeJson(directives);
}

export function syntaxErrorOf(directives: string[]): SyntaxErrorDetail {
  const r = composer.compose(directives);
  if (r.ok || r.error.code !== "SYNTAX_ERROR") {
    throw new Error(`expected a syntax error for ${JSON.stringify(directives)}`);
  }
  return r.error.detail;
}

/** Path error with the path rendered, so tests can compare plain objects. */
export function pathErrorOf(
  directives: string[],
): Omit<PathErrorDetail, "path"> & { path: string } {
  const r = composer.compose(directives);
  if (r.ok || r.error.code !== "PATH_ERROR") {
    throw new Error(`expected a path error for ${JSON.stringify(directives)}`);
  }
  return { ...r.error.detail, path: r.error.detail.path.toString() };
}
