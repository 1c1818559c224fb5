#!/usr/bin/env node
import process from "node:process";
import meow from "meow";
import { run } from "./main.js";

const cli = meow(
  `
	Usage
	  $ pathwright [--method <name> [--id <id>]] <directive>...

	Directives
	  path:json   place a JSON literal at path (e.g. a.b:true, .:42)
	  path=text   place text as a JSON string (e.g. c.0.d=foobar)

	Options
	  --method, -m  Wrap the document as params of a JSON-RPC request
	  --id, -i      Request id: identifier, JSON string or number, :null or :omit (default)

	Examples
	  $ pathwright a.b:true c.0.d=foobar
	  {"a":{"b":true},"c":[{"d":"foobar"}]}
	  $ pathwright -m subtract -i 1 0:42 1:23
	  {"id":1,"jsonrpc":"2.0","method":"subtract","params":[42,23]}
`,
  {
    importMeta: import.meta,
    flags: {
      method: {
        type: "string",
        shortFlag: "m",
      },
      id: {
        type: "string",
        shortFlag: "i",
      },
    },
  },
);

process.exitCode = run(
  {
    directives: cli.input,
    method: cli.flags.method,
    id: cli.flags.id,
  },
  {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  },
);
