/**
 * `htl` command: HTL on standard input, HTML on standard output
 */

import { render } from "./builders/render.js";
import { parse } from "./core/parser.js";
import { logParseFailure } from "./utils/debug.js";

export type CliIO = {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
};

/**
 * Read a whole stream as UTF-8 text
 */
export async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Convert `input` and write the result. Returns the exit code.
 */
export function runCli(input: string, io: CliIO): number {
  const { tree, error } = parse(input);
  if (error) {
    logParseFailure({
      source: "stdin",
      reason: error.reason,
      snippet: input,
      error,
    });
    io.stderr.write(`${error.message}\n`);
    return 1;
  }
  io.stdout.write(`${render(tree)}\n`);
  return 0;
}
