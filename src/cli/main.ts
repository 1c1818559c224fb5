import { Composer } from "../core/Composer.js";
import { serialize } from "../core/Serializer.js";
import { wrapJsonRpcRequest } from "../envelope/JsonRpc.js";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliArgs {
  directives: ReadonlyArray<string>;
  /** when set, wrap the document in a JSON-RPC request */
  method?: string;
  id?: string;
}

export const EXIT_OK = 0;
export const EXIT_INPUT_ERROR = 2;

export function run(args: CliArgs, io: CliIO): number {
  const result = new Composer().compose(args.directives);
  if (!result.ok) {
    io.stderr(`input error: ${result.error.message}\n`);
    return EXIT_INPUT_ERROR;
  }

  if (args.method === undefined) {
    if (result.document) io.stdout(`${serialize(result.document)}\n`);
    return EXIT_OK;
  }

  const request = wrapJsonRpcRequest(result.document, {
    method: args.method,
    id: args.id,
  });
  if (!request.ok) {
    io.stderr(`input error: --${request.error.field}: ${request.error.message}\n`);
    return EXIT_INPUT_ERROR;
  }
  io.stdout(`${serialize(request.value)}\n`);
  return EXIT_OK;
}
